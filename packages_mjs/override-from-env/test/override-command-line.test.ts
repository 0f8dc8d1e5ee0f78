import { describe, it, expect, beforeAll } from '@jest/globals';
import { program } from 'commander';
import { overrideCommandLine } from '../src/override.js';
import { parseInteger } from './parsers.js';

describe('overrideCommandLine', () => {
    beforeAll(() => {
        program
            .exitOverride()
            .option('--host <host>', 'server host', 'localhost')
            .option('--port <port>', 'server port', parseInteger, 8080)
            .option('--config-file <file>', 'config file', 'config.toml');
        program.parse(['node', 'demo', '--host', 'cli.internal']);
    });

    it('should override the global program after parsing', () => {
        const result = overrideCommandLine('APP', {
            env: { APP_HOST: 'env.internal', APP_PORT: '9090' }
        });

        expect(program.opts()).toEqual({ host: 'cli.internal', port: 9090, configFile: 'config.toml' });
        expect(result.applied).toEqual([{ flag: 'port', envKey: 'APP_PORT' }]);
    });
});
