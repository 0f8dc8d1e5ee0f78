/**
 * Debug trace of an override pass. Off unless OVERRIDE_FROM_ENV_DEBUG is
 * `1` or `true`, or {@link setDebug} turns it on.
 */

export type DebugSink = (line: string) => void;

const LINE_PREFIX = '[override-from-env]';

const SECRET_KEY = /KEY|SECRET|PASSWORD|TOKEN|CREDENTIAL|AUTH|PRIVATE/i;
const SECRET_VALUE = /^(sk-|pk-|Bearer |Basic |eyJ)/;

let enabled = ['1', 'true'].includes(process.env.OVERRIDE_FROM_ENV_DEBUG?.toLowerCase() ?? '');
let sink: DebugSink = line => console.debug(line);

export function setDebug(on: boolean, to?: DebugSink): void {
    enabled = on;
    if (to) {
        sink = to;
    }
}

export function isDebugEnabled(): boolean {
    return enabled;
}

export function debug(message: string): void {
    if (enabled) {
        sink(`${LINE_PREFIX} ${message}`);
    }
}

/** Value as it may appear in a debug line; secrets become `[REDACTED]`. */
export function redact(envKey: string, value: string): string {
    return SECRET_KEY.test(envKey) || SECRET_VALUE.test(value) ? '[REDACTED]' : value;
}
