// src/core/errors/graphTraversal.ts

import { Classified, isClassified, unwrap, unwrapAll } from './classified';
import { Carrier } from './Carrier';

/**
 * Tracks visited errors by object identity. Errors with identical content
 * are distinct nodes; the same instance reached twice is one node.
 */
export class VisitedErrors {
    private readonly visited = new WeakSet<Error>();

    public has(err: Error): boolean {
        return this.visited.has(err);
    }

    public add(err: Error): void {
        this.visited.add(err);
    }
}

/**
 * Breadth-first walk over every error reachable from `root`, calling `visitor`
 * once for each classification marker in discovery order.
 *
 * Carriers contribute their classifications before their cause; aggregate
 * nodes contribute all members in order. Terminates on cyclic graphs.
 */
export function visitClassifications(root: Error, visitor: (marker: Classified) => void): void {
    const visited = new VisitedErrors();
    const queue: Error[] = [root];

    while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined || visited.has(current)) continue;
        visited.add(current);

        if (isClassified(current)) {
            visitor(current);
        }

        if (current instanceof Carrier) {
            queue.push(...current.classifications);
        }

        const members = unwrapAll(current);
        if (members) {
            queue.push(...members);
        } else {
            const next = unwrap(current);
            if (next) queue.push(next);
        }
    }
}
