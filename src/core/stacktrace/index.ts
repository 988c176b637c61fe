// src/core/stacktrace/index.ts

import { Classified } from '../errors/classified';
import { classify as classifyPlain, wrap as wrapPlain } from '../errors/Carrier';
import { Frame } from './Traced';
import { v8StackWalker } from './stackWalker';

export type { Frame } from './Traced';
export type { StackWalker } from './stackWalker';
export { Traced, formatFrame, isTraced } from './Traced';
export { v8StackWalker } from './stackWalker';

/**
 * Captures the caller's stack as a marker to pass to `wrap` or `classify`.
 *
 * @example
 * wrap('operation failed', cause, ErrNotFound, here());
 */
export function here(): Classified {
    return v8StackWalker.capture(here);
}

/**
 * Frames of the first traced marker in `err`'s chain.
 */
export function extract(err: Error | null | undefined): readonly Frame[] | undefined {
    return v8StackWalker.extract(err);
}

/**
 * `wrap` that also records the call site. A nil cause still yields undefined,
 * and no stack is captured for it.
 */
export function wrap(text: string, cause: Error | null | undefined, ...classifications: Classified[]): Error | undefined {
    if (!cause) return undefined;
    return wrapPlain(text, cause, ...classifications, v8StackWalker.capture(wrap));
}

/**
 * `classify` that also records the call site.
 */
export function classify(cause: Error | null | undefined, ...classifications: Classified[]): Error | undefined {
    if (!cause) return undefined;
    return classifyPlain(cause, ...classifications, v8StackWalker.capture(classify));
}
