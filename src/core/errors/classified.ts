// src/core/errors/classified.ts

/**
 * Closed set of classification marker variants. Third-party markers use `external`.
 */
export type ClassificationKind = 'sentinel' | 'displayable' | 'attributed' | 'traced' | 'external';

const CLASSIFICATION_KINDS: ReadonlySet<string> = new Set<ClassificationKind>([
    'sentinel',
    'displayable',
    'attributed',
    'traced',
    'external',
]);

/**
 * A classification marker: an ordinary error that can be attached to a cause
 * through a Carrier without changing the cause's message.
 *
 * External types opt in by extending Error, declaring `kind = 'external'`
 * and returning true from `isClassified()`.
 */
export interface Classified extends Error {
    readonly kind: ClassificationKind;
    isClassified(): boolean;
}

/**
 * Type predicate used for typed extraction (`findAs`).
 */
export type ErrorGuard<T extends Error> = (err: Error) => err is T;

/**
 * Optional hook: a node that takes part in identity matching beyond `===`.
 */
export interface IdentityMatcher {
    is(target: Error): boolean;
}

/**
 * Optional hook: a node that can resolve a typed search on behalf of something it holds.
 */
export interface TypedUnwrapper {
    as<T extends Error>(guard: ErrorGuard<T>): T | undefined;
}

export function isClassified(value: unknown): value is Classified {
    if (!(value instanceof Error)) return false;
    if (!('kind' in value) || typeof value.kind !== 'string' || !CLASSIFICATION_KINDS.has(value.kind)) {
        return false;
    }
    return 'isClassified' in value
        && typeof value.isClassified === 'function'
        && value.isClassified() === true;
}

export function hasIdentityMatcher(err: Error): err is Error & IdentityMatcher {
    return 'is' in err && typeof err.is === 'function';
}

export function hasTypedUnwrapper(err: Error): err is Error & TypedUnwrapper {
    return 'as' in err && typeof err.as === 'function';
}

/**
 * Single-cause unwrap: the standard `cause` property, when it holds an Error.
 */
export function unwrap(err: Error): Error | undefined {
    return err.cause instanceof Error ? err.cause : undefined;
}

/**
 * Multi-cause unwrap: an `errors` array as found on AggregateError.
 * Members that are not Error instances are skipped.
 */
export function unwrapAll(err: Error): Error[] | undefined {
    if (!('errors' in err) || !Array.isArray(err.errors)) return undefined;
    const members: unknown[] = err.errors;
    return members.filter((member): member is Error => member instanceof Error);
}
