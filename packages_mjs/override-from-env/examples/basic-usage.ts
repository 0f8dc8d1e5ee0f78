/**
 * Basic usage examples for override-from-env.
 *
 * Run with APP_PORT and APP_CONFIG_FILE set to see the environment fill in
 * the flags the command line left alone.
 */
import { Command, InvalidArgumentError, program } from 'commander';
import { FlagConversionError, override, overrideCommandLine } from '../src/index.js';

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError(`not a positive integer: ${value}`);
    }
    return parsed;
}

// =============================================================================
// Example 1: A dedicated Command
// =============================================================================
/**
 * Explicit arguments win; unset flags take APP_* variables; the rest keep
 * their defaults.
 */
function example1_command(): void {
    process.env.APP_PORT = '9090';
    process.env.APP_CONFIG_FILE = 'my-config.toml';

    const cmd = new Command('demo')
        .option('--host <host>', 'server host', 'localhost')
        .option('--port <port>', 'server port', parsePositiveInt, 8080)
        .option('--config-file <file>', 'config file', 'config.toml');

    // Simulate the user passing --port explicitly.
    cmd.parse(['--port=7777'], { from: 'user' });

    override(cmd, 'APP');

    const opts = cmd.opts();
    console.log('Example 1 - host:', opts.host);
    // Output: localhost
    console.log('Example 1 - port:', opts.port);
    // Output: 7777
    console.log('Example 1 - config:', opts.configFile);
    // Output: my-config.toml

    delete process.env.APP_PORT;
    delete process.env.APP_CONFIG_FILE;
}

// =============================================================================
// Example 2: Handling a bad value
// =============================================================================
function example2_conversionError(): void {
    const cmd = new Command('demo').option('--port <port>', 'server port', parsePositiveInt, 8080);
    cmd.parse([], { from: 'user' });

    try {
        override(cmd, 'APP', { env: { APP_PORT: 'eighty' } });
    } catch (error) {
        if (error instanceof FlagConversionError) {
            console.log('Example 2 - error:', error.message);
            // Output: unable to set flag port from environment variable APP_PORT,
            //         which has a value of "eighty": not a positive integer: eighty
            return;
        }
        throw error;
    }
}

// =============================================================================
// Example 3: The global program
// =============================================================================
/**
 * overrideCommandLine() works on commander's shared `program`, which must
 * already be parsed.
 */
function example3_globalProgram(): void {
    program
        .option('--workers <n>', 'worker count', parsePositiveInt, 4)
        .option('--verbose', 'chatty output', false);
    program.parse();

    const result = overrideCommandLine('APP');
    console.log('Example 3 - applied:', result.applied);
    console.log('Example 3 - options:', program.opts());
}

function main(): void {
    console.log('=== override-from-env Examples ===\n');

    example1_command();
    example2_conversionError();
    example3_globalProgram();

    console.log('\n=== Examples Complete ===');
}

main();
