// src/core/errors/Sentinel.ts

import { Classified, ErrorGuard } from './classified';
import { findAs, matches } from './identity';

/**
 * Immutable classification marker. A sentinel matches itself and,
 * transitively, every parent it was declared with.
 *
 * Parent hierarchies must be acyclic. This is not checked: a sentinel that
 * reaches itself through its parents makes `matches` recurse without bound.
 */
export class Sentinel extends Error implements Classified {
    public readonly kind = 'sentinel';
    public readonly parents: readonly Classified[];

    constructor(text: string, parents: readonly Classified[] = []) {
        // The first parent doubles as the standard single-cause unwrap target.
        super(text, parents.length > 0 ? { cause: parents[0] } : undefined);
        this.name = 'Sentinel';
        this.parents = Object.freeze([...parents]);
    }

    public isClassified(): boolean {
        return true;
    }

    public is(target: Error): boolean {
        if (target === this) return true;
        return this.parents.some(parent => matches(parent, target));
    }

    /**
     * Typed search over the parents only; the sentinel itself is never a candidate here.
     */
    public as<T extends Error>(guard: ErrorGuard<T>): T | undefined {
        for (const parent of this.parents) {
            const found = findAs(parent, guard);
            if (found) return found;
        }
        return undefined;
    }
}

/**
 * Creates a classification sentinel, optionally parented.
 *
 * @example
 * const ErrDatabase = newSentinel('database error');
 * const ErrTimeout = newSentinel('timeout', ErrDatabase);
 * matches(classify(cause, ErrTimeout), ErrDatabase); // true
 */
export function newSentinel(text: string, ...parents: Classified[]): Sentinel {
    return new Sentinel(text, parents);
}
