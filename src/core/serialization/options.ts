// src/core/serialization/options.ts

import { z } from 'zod';
import { CONFIG } from '../../config/config';

/**
 * Caller-facing serializer options. Omitted fields fall back to CONFIG.SERIALIZER.
 */
export interface SerializeOptions {
    /** Nodes at this depth are replaced by a "(max depth reached)" marker; zero or less truncates the root. */
    maxDepth?: number;
    /** Frames kept per node; zero or less keeps all of them. */
    maxStackFrames?: number;
    /** When false, causes that are not classification markers are dropped. */
    includeStandardErrors?: boolean;
}

// Any integer is meaningful; anything else falls back to the configured default.
const optionsSchema = z.object({
    maxDepth: z.number().int().optional().catch(undefined),
    maxStackFrames: z.number().int().optional().catch(undefined),
    includeStandardErrors: z.boolean().optional().catch(undefined),
}).catch({});

export type ResolvedSerializeOptions = Required<SerializeOptions>;

export function resolveSerializeOptions(options: SerializeOptions = {}): ResolvedSerializeOptions {
    const parsed = optionsSchema.parse(options);

    return {
        maxDepth: parsed.maxDepth ?? CONFIG.SERIALIZER.MAX_DEPTH,
        maxStackFrames: parsed.maxStackFrames ?? CONFIG.SERIALIZER.MAX_STACK_FRAMES,
        includeStandardErrors: parsed.includeStandardErrors ?? CONFIG.SERIALIZER.INCLUDE_STANDARD_ERRORS,
    };
}
