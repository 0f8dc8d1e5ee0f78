export { override, overrideCommandLine } from './override.js';
export { envKey, normalizePrefix, ENV_KEY_SEPARATOR } from './env-key.js';
export { CommandFlagRegistry, commandRegistry, parseBooleanFlag } from './commander-registry.js';
export * from './types.js';
export * from './errors.js';
export { OverrideOptionsSchema, parseOverrideOptions } from './validators.js';
export { setDebug, isDebugEnabled, redact, type DebugSink } from './logger.js';
