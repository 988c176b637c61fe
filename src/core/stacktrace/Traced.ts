// src/core/stacktrace/Traced.ts

import { Classified } from '../errors/classified';

/**
 * One captured call site.
 */
export interface Frame {
    readonly file: string;
    readonly line: number;
    readonly function: string;
}

export function formatFrame(frame: Frame): string {
    return `${frame.file}:${frame.line} ${frame.function}`;
}

/**
 * Classification marker holding the frames captured at its creation site.
 */
export class Traced extends Error implements Classified {
    public readonly kind = 'traced';
    public readonly frames: readonly Frame[];

    constructor(frames: readonly Frame[]) {
        super(frames.length === 0 ? '(empty stack trace)' : `stack trace: ${frames.length} frames`);
        this.name = 'Traced';
        this.frames = Object.freeze(frames.map(f => Object.freeze({ file: f.file, line: f.line, function: f.function })));
    }

    public isClassified(): boolean {
        return true;
    }
}

export function isTraced(err: Error): err is Traced {
    return err instanceof Traced;
}
