// src/core/compat/index.ts

import { Classified, isClassified } from '../errors/classified';
import { classify as classifyPlain, wrap as wrapPlain } from '../errors/Carrier';

/**
 * Adapts an arbitrary error into a classification marker. It renders as the
 * wrapped error and unwraps to it, so `matches(result, inner)` holds.
 */
export class ExternalClassification extends Error implements Classified {
    public readonly kind = 'external';
    public readonly cause: Error;

    constructor(inner: Error) {
        super(inner.message, { cause: inner });
        this.name = inner.name;
        this.cause = inner;
    }

    public isClassified(): boolean {
        return true;
    }
}

export function toClassified(err: Error): Classified {
    return isClassified(err) ? err : new ExternalClassification(err);
}

function toClassifiedList(errors: readonly (Error | null | undefined)[]): Classified[] {
    const result: Classified[] = [];
    for (const err of errors) {
        if (err) result.push(toClassified(err));
    }
    return result;
}

/**
 * `wrap` accepting any errors as classifications.
 *
 * @example
 * const ErrNotFound = new Error('not found');
 * const err = compat.wrap('failed to fetch user', dbErr, ErrNotFound);
 * matches(err, ErrNotFound); // true
 */
export function wrap(text: string, cause: Error | null | undefined, ...classifications: (Error | null | undefined)[]): Error | undefined {
    if (!cause) return undefined;
    return wrapPlain(text, cause, ...toClassifiedList(classifications));
}

/**
 * `classify` accepting any errors as classifications.
 */
export function classify(cause: Error | null | undefined, ...classifications: (Error | null | undefined)[]): Error | undefined {
    if (!cause) return undefined;
    return classifyPlain(cause, ...toClassifiedList(classifications));
}
