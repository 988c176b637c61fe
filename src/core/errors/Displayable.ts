// src/core/errors/Displayable.ts

import { Classified } from './classified';
import { findAs } from './identity';

/**
 * Classification marker whose message is safe to show to end users.
 */
export class Displayable extends Error implements Classified {
    public readonly kind = 'displayable';

    constructor(message: string) {
        super(message);
        this.name = 'Displayable';
    }

    public isClassified(): boolean {
        return true;
    }
}

export function newDisplayable(message: string): Displayable {
    return new Displayable(message);
}

function isDisplayableNode(err: Error): err is Displayable {
    return err instanceof Displayable;
}

export function isDisplayable(err: Error | null | undefined): boolean {
    return findAs(err, isDisplayableNode) !== undefined;
}

/**
 * Returns the message of the first displayable found down the unwrap chain,
 * or the full message of `err` when there is none.
 *
 * @example
 * displayText(wrap('ctx', newDisplayable('msg'))); // 'msg'
 */
export function displayText(err: Error | null | undefined): string {
    if (!err) return '';
    return findAs(err, isDisplayableNode)?.message ?? err.message;
}

/**
 * Like `displayText`, but falls back to `fallback` instead of the full message.
 * A nil error yields '' regardless of the fallback.
 */
export function displayTextDefault(err: Error | null | undefined, fallback: string): string {
    if (!err) return '';
    return findAs(err, isDisplayableNode)?.message ?? fallback;
}
