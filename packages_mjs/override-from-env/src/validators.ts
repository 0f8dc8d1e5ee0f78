import { z } from 'zod';
import { OverrideOptionsError } from './errors.js';
import type { EnvSource } from './types.js';

export const EnvSourceSchema = z.record(z.string().optional());

export const OverrideOptionsSchema = z.object({
    prefix: z.string(),
    env: EnvSourceSchema.optional()
});

export type ValidatedOverrideOptions = z.infer<typeof OverrideOptionsSchema>;

export function parseOverrideOptions(prefix: unknown, env?: EnvSource): ValidatedOverrideOptions {
    const result = OverrideOptionsSchema.safeParse({ prefix, env });

    if (!result.success) {
        const errorMsg = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
        throw new OverrideOptionsError(`Invalid override options: ${errorMsg}`);
    }

    return result.data;
}
