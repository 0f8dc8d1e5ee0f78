export class OverrideFromEnvError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'OverrideFromEnvError';
    }
}

/**
 * An environment value could not be converted to the flag's type.
 * Flags handled before this one keep their new values.
 */
export class FlagConversionError extends OverrideFromEnvError {
    constructor(
        public flagName: string,
        public envKey: string,
        public value: string,
        cause: unknown
    ) {
        super(
            `unable to set flag ${flagName} from environment variable ${envKey}, ` +
            `which has a value of "${value}": ${describeCause(cause)}`,
            { cause }
        );
        this.name = 'FlagConversionError';
    }
}

export class OverrideOptionsError extends OverrideFromEnvError {
    constructor(message: string) {
        super(message);
        this.name = 'OverrideOptionsError';
    }
}

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
