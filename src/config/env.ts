// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

/**
 * Nearest directory at or above `start` holding a package.json.
 * Resolves the same root from `src/config` and from `dist/src/config`.
 */
export function findPackageRoot(start: string): string {
    let dir = start;
    while (!fs.existsSync(path.join(dir, 'package.json'))) {
        const parent = path.dirname(dir);
        if (parent === dir) return start;
        dir = parent;
    }
    return dir;
}

// Load environment variables from the package root, not process.cwd()
dotenv.config({ path: path.join(findPackageRoot(__dirname), '.env') });

const lowerCase = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

// Unset and blank both mean "use the default"; Number('') would read as 0.
const nonNegativeIntFromEnv = (fallback: number) =>
    z.preprocess(
        value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
        z.coerce.number().int().nonnegative()
    ).catch(fallback);

/**
 * Environment Variable Schema
 * Overrides for the serializer and stack capture defaults. The host process
 * owns these variables, so a value outside the schema falls back to its
 * default instead of failing the import.
 */
const envSchema = z.object({
    NODE_ENV: z.preprocess(lowerCase, z.enum(['development', 'production', 'test'])).catch('development'),

    // Logging
    LOG_LEVEL: z.preprocess(lowerCase, z.enum(['debug', 'info', 'warn', 'error']).optional()).catch(undefined),

    // Serializer defaults
    FAULTLINE_MAX_DEPTH: nonNegativeIntFromEnv(32),
    FAULTLINE_MAX_STACK_FRAMES: nonNegativeIntFromEnv(32),
    FAULTLINE_INCLUDE_STANDARD_ERRORS: z.preprocess(lowerCase, z.enum(['true', 'false']))
        .catch('true')
        .transform(val => val === 'true'),

    // Stack capture
    FAULTLINE_STACK_CAPTURE_LIMIT: nonNegativeIntFromEnv(32),
});

export type Env = z.infer<typeof envSchema>;

export const ENV: Env = envSchema.parse(process.env);
