export const ENV_KEY_SEPARATOR = '_';

/**
 * Appends the separator to a non-empty prefix that lacks one.
 * @example normalizePrefix('APP') => 'APP_'
 * @example normalizePrefix('') => ''
 */
export function normalizePrefix(prefix: string): string {
    if (prefix === '' || prefix.endsWith(ENV_KEY_SEPARATOR)) {
        return prefix;
    }
    return prefix + ENV_KEY_SEPARATOR;
}

/**
 * Environment variable name for a flag.
 * @example envKey('app', 'config-file') => 'APP_CONFIG_FILE'
 */
export function envKey(prefix: string, flagName: string): string {
    return (normalizePrefix(prefix) + flagName)
        .replace(/-/g, ENV_KEY_SEPARATOR)
        .toUpperCase();
}
