// src/core/errors/identity.ts

import { ErrorGuard, hasIdentityMatcher, hasTypedUnwrapper, unwrap, unwrapAll } from './classified';
import { Carrier } from './Carrier';
import { VisitedErrors } from './graphTraversal';

/**
 * Reports whether `target` is found anywhere in `err`'s graph: by identity,
 * through a node's `is()` hook, through a Carrier's cause or classifications,
 * or down the unwrap chain.
 */
export function matches(err: Error | null | undefined, target: Error | null | undefined): boolean {
    if (!err || !target) return !err && !target;
    return matchesFrom(err, target, new VisitedErrors());
}

function matchesFrom(err: Error, target: Error, visited: VisitedErrors): boolean {
    if (visited.has(err)) return false;
    visited.add(err);

    if (err === target) return true;

    if (err instanceof Carrier) {
        // The cause is reached again below through the unwrap step.
        if (err.classifications.some(cls => matchesFrom(cls, target, visited))) return true;
    } else if (hasIdentityMatcher(err) && err.is(target)) {
        return true;
    }

    const members = unwrapAll(err);
    if (members) {
        return members.some(member => matchesFrom(member, target, visited));
    }
    const next = unwrap(err);
    return next ? matchesFrom(next, target, visited) : false;
}

/**
 * Returns the first node in `err`'s graph accepted by `guard`.
 *
 * A Carrier is searched cause first, then each classification in order.
 * Other nodes may resolve the search through their `as()` hook before the
 * walk continues down their unwrap chain.
 */
export function findAs<T extends Error>(err: Error | null | undefined, guard: ErrorGuard<T>): T | undefined {
    if (!err) return undefined;
    return findFrom(err, guard, new VisitedErrors());
}

function findFrom<T extends Error>(err: Error, guard: ErrorGuard<T>, visited: VisitedErrors): T | undefined {
    if (visited.has(err)) return undefined;
    visited.add(err);

    if (guard(err)) return err;

    if (err instanceof Carrier) {
        const viaCause = findFrom(err.cause, guard, visited);
        if (viaCause) return viaCause;
        for (const cls of err.classifications) {
            const found = findFrom(cls, guard, visited);
            if (found) return found;
        }
        return undefined;
    }

    if (hasTypedUnwrapper(err)) {
        const found = err.as(guard);
        if (found) return found;
    }

    const members = unwrapAll(err);
    if (members) {
        for (const member of members) {
            const found = findFrom(member, guard, visited);
            if (found) return found;
        }
        return undefined;
    }
    const next = unwrap(err);
    return next ? findFrom(next, guard, visited) : undefined;
}
