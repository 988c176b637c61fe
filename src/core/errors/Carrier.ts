// src/core/errors/Carrier.ts

import { Classified } from './classified';

/**
 * Composition node that layers classification markers onto a cause.
 *
 * A Carrier renders exactly as its cause: `message` and `name` are copied from
 * the cause and the classifications never appear in either.
 */
export class Carrier extends Error {
    public readonly classifications: readonly Classified[];
    public readonly cause: Error;

    constructor(cause: Error, classifications: readonly Classified[]) {
        super(cause.message, { cause });
        this.name = cause.name;
        this.cause = cause;
        this.classifications = Object.freeze([...classifications]);
    }
}

export function isCarrier(err: unknown): err is Carrier {
    return err instanceof Carrier;
}

/**
 * Attaches classifications to `cause` without touching its message.
 * A nil cause yields undefined whatever classifications are supplied.
 *
 * @example
 * const ErrNotFound = newSentinel('resource not found');
 * const err = classify(new Error('row missing'), ErrNotFound);
 * err.message;                 // 'row missing'
 * matches(err, ErrNotFound);   // true
 */
export function classify(cause: Error, ...classifications: Classified[]): Error;
export function classify(cause: Error | null | undefined, ...classifications: Classified[]): Error | undefined;
export function classify(cause: Error | null | undefined, ...classifications: Classified[]): Error | undefined {
    if (!cause) return undefined;
    return new Carrier(cause, classifications);
}

/**
 * Prefixes `cause` with context text and attaches classifications.
 * The result renders as `${text}: ${cause.message}`.
 *
 * Without classifications no Carrier is allocated and the result is a plain
 * wrapped Error.
 */
export function wrap(text: string, cause: Error, ...classifications: Classified[]): Error;
export function wrap(text: string, cause: Error | null | undefined, ...classifications: Classified[]): Error | undefined;
export function wrap(text: string, cause: Error | null | undefined, ...classifications: Classified[]): Error | undefined {
    if (!cause) return undefined;
    const inner = classifications.length === 0 ? cause : new Carrier(cause, classifications);
    return new Error(`${text}: ${inner.message}`, { cause: inner });
}
