/**
 * Registry contract consumed by the overrider.
 */

export interface FlagInfo {
    /** Name as written on the command line, without leading dashes. */
    name: string;
    /** Current value rendered as a string. */
    value: string;
    usage: string;
}

export type FlagVisitor = (flag: FlagInfo) => void;

/**
 * A set of command-line flags that can tell flags assigned by the caller
 * apart from flags still holding their default.
 */
export interface FlagRegistry {
    /** Calls `fn` for every registered flag, set or not. */
    visitAll(fn: FlagVisitor): void;
    /** Calls `fn` only for flags that were explicitly set. */
    visit(fn: FlagVisitor): void;
    /**
     * Assigns `value` to the named flag through the flag's own conversion.
     * Throws when the string is not a valid value for the flag.
     */
    set(name: string, value: string): void;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface OverrideOptions {
    /** Environment to read from. Defaults to `process.env`. */
    env?: EnvSource;
}

export interface AppliedOverride {
    flag: string;
    envKey: string;
}

export interface OverrideResult {
    /** Flags that were not explicitly set when the pass started. */
    unset: string[];
    /** Flags assigned from the environment, in the order they were applied. */
    applied: AppliedOverride[];
}
