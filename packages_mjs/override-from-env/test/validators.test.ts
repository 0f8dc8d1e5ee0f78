import { describe, it, expect } from '@jest/globals';
import { parseOverrideOptions } from '../src/validators.js';
import { OverrideOptionsError } from '../src/errors.js';

describe('parseOverrideOptions', () => {
    it('should accept a prefix without an env', () => {
        expect(parseOverrideOptions('APP')).toEqual({ prefix: 'APP' });
    });

    it('should accept an explicit env', () => {
        expect(parseOverrideOptions('', { APP_PORT: '9090' }))
            .toEqual({ prefix: '', env: { APP_PORT: '9090' } });
    });

    it('should reject a prefix that is not a string', () => {
        expect(() => parseOverrideOptions(42)).toThrow(OverrideOptionsError);
        expect(() => parseOverrideOptions(42))
            .toThrow('Invalid override options: prefix: Expected string, received number');
    });
});
