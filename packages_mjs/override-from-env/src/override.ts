/**
 * Sets flags left at their defaults from environment variables.
 *
 * A flag named `config-file` with prefix `app` is read from
 * `APP_CONFIG_FILE`. Flags given explicitly on the command line are
 * never touched.
 */
import { Command, program } from 'commander';
import { commandRegistry } from './commander-registry.js';
import { envKey } from './env-key.js';
import { FlagConversionError } from './errors.js';
import { debug, redact } from './logger.js';
import type { FlagRegistry, OverrideOptions, OverrideResult } from './types.js';
import { parseOverrideOptions } from './validators.js';

/**
 * Names of flags that still hold their default. Registries only report
 * "all flags" and "explicitly set flags", so take the difference.
 */
function unsetFlagNames(registry: FlagRegistry): Set<string> {
    const unset = new Set<string>();
    registry.visitAll(flag => { unset.add(flag.name); });
    registry.visit(flag => { unset.delete(flag.name); });
    return unset;
}

/**
 * Overrides every unset flag in `registry` whose environment variable
 * (see {@link envKey}) is present.
 *
 * Stops at the first value the flag cannot convert and throws
 * {@link FlagConversionError}. Flags applied before it are not rolled back.
 * Iteration order is not defined, so with several bad values any one of
 * them may be the one reported.
 */
export function override(
    registry: FlagRegistry | Command,
    prefix: string,
    options: OverrideOptions = {}
): OverrideResult {
    const validated = parseOverrideOptions(prefix, options.env);
    const env = validated.env ?? process.env;
    const flags = registry instanceof Command ? commandRegistry(registry) : registry;

    const unset = unsetFlagNames(flags);
    const result: OverrideResult = { unset: [...unset], applied: [] };

    debug(`override() prefix="${validated.prefix}" unset_flags=${unset.size}`);

    for (const name of unset) {
        const key = envKey(validated.prefix, name);
        const value = env[key];

        if (value === undefined) {
            debug(`ENV MISS: ${key} (flag ${name} keeps its default)`);
            continue;
        }

        try {
            flags.set(name, value);
        } catch (error) {
            throw new FlagConversionError(name, key, value, error);
        }

        debug(`ENV SET: ${name} = ${redact(key, value)} (from ${key})`);
        result.applied.push({ flag: name, envKey: key });
    }

    return result;
}

/**
 * {@link override} applied to commander's global `program`.
 *
 * Call it after `program.parse()`. Before parsing, every flag looks unset.
 */
export function overrideCommandLine(prefix: string, options: OverrideOptions = {}): OverrideResult {
    return override(program, prefix, options);
}
