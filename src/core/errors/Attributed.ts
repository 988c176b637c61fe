// src/core/errors/Attributed.ts

import { inspect } from 'util';
import { Classified } from './classified';
import { visitClassifications } from './graphTraversal';

/**
 * Key/value pair of structured error context.
 */
export interface Attr {
    readonly key: string;
    readonly value: unknown;
}

export type AttrList = readonly Attr[];

/** Key used for arguments that could not be paired with a key. */
export const BAD_KEY = '!BADKEY';

/**
 * Classification marker carrying ordered key/value metadata.
 */
export class Attributed extends Error implements Classified {
    public readonly kind = 'attributed';
    public readonly attrs: AttrList;

    constructor(attrs: AttrList) {
        super(attrs.length === 0 ? '(empty attribute list)' : formatAttrs(attrs));
        this.name = 'Attributed';
        this.attrs = Object.freeze(attrs.map(a => Object.freeze({ key: a.key, value: a.value })));
    }

    public isClassified(): boolean {
        return true;
    }
}

export function isAttributed(err: Error): err is Attributed {
    return err instanceof Attributed;
}

export function attr(key: string, value: unknown): Attr {
    return { key, value };
}

function isAttr(value: unknown): value is Attr {
    return typeof value === 'object'
        && value !== null
        && !Array.isArray(value)
        && 'key' in value
        && typeof value.key === 'string'
        && 'value' in value;
}

function isAttrArray(value: unknown): value is Attr[] {
    return Array.isArray(value) && value.every(isAttr);
}

/**
 * Normalizes a mixed argument list into attributes:
 * - an Attr is taken as is, an Attr[] is spliced in
 * - a string followed by another argument forms a key/value pair
 * - anything else is kept under the `!BADKEY` key
 */
export function parseAttrs(args: readonly unknown[]): Attr[] {
    const result: Attr[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (isAttr(arg)) {
            result.push(arg);
        } else if (isAttrArray(arg)) {
            result.push(...arg);
        } else if (typeof arg === 'string' && i + 1 < args.length) {
            result.push({ key: arg, value: args[i + 1] });
            i++;
        } else {
            result.push({ key: BAD_KEY, value: arg });
        }
    }

    return result;
}

/**
 * Creates an attribute marker, usually attached through `wrap` or `classify`.
 *
 * @example
 * wrap('failed to delete user', cause, attrs('user_id', 123, 'action', 'delete'));
 */
export function attrs(...args: unknown[]): Attributed {
    return new Attributed(parseAttrs(args));
}

/**
 * Creates an attribute marker from a record or Map, in insertion order.
 */
export function fromAttrMap(map: Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>): Attributed {
    const entries = map instanceof Map ? [...map.entries()] : Object.entries(map);
    return new Attributed(entries.map(([key, value]) => ({ key, value })));
}

function formatValue(value: unknown): string {
    if (typeof value === 'object' && value !== null) {
        return inspect(value, { breakLength: Infinity, depth: 2 });
    }
    return String(value);
}

export function formatAttrs(list: AttrList): string {
    return list.map(a => `${a.key}=${formatValue(a.value)}`).join(' ');
}

/**
 * Flattens attributes into a log context object; a repeated key keeps its last value.
 */
export function attrsToLogContext(list: AttrList | undefined): Record<string, unknown> {
    const context: Record<string, unknown> = {};
    for (const a of list ?? []) {
        context[a.key] = a.value;
    }
    return context;
}

/**
 * Reports whether any Attributed marker is reachable from `err`.
 */
export function hasAttrs(err: Error | null | undefined): boolean {
    if (!err) return false;
    let found = false;
    visitClassifications(err, marker => {
        if (isAttributed(marker)) found = true;
    });
    return found;
}

/**
 * Collects the attributes of every distinct Attributed marker reachable from
 * `err`, in breadth-first discovery order. The same marker reached along two
 * paths contributes once; equal-content markers each contribute.
 *
 * Returns undefined when there is nothing to collect.
 */
export function extractAttrs(err: Error | null | undefined): AttrList | undefined {
    if (!err) return undefined;
    const collected: Attr[] = [];
    visitClassifications(err, marker => {
        if (isAttributed(marker)) collected.push(...marker.attrs);
    });
    return collected.length > 0 ? collected : undefined;
}
