// src/core/stacktrace/stackWalker.ts

import { CONFIG } from '../../config/config';
import { Classified } from '../errors/classified';
import { findAs } from '../errors/identity';
import { Frame, Traced, isTraced } from './Traced';

type CallerBoundary = (...args: never[]) => unknown;

/**
 * Captures call stacks as classification markers and reads them back.
 */
export interface StackWalker {
    /** Captures frames starting at the caller of `below`. */
    capture(below?: CallerBoundary): Classified;
    /** Frames of the first traced marker in the chain, if any. */
    extract(err: Error | null | undefined): readonly Frame[] | undefined;
}

function toFrame(site: NodeJS.CallSite): Frame {
    const typeName = site.getTypeName();
    const functionName = site.getFunctionName() ?? site.getMethodName() ?? '<anonymous>';
    return {
        file: site.getFileName() ?? '<unknown>',
        line: site.getLineNumber() ?? 0,
        function: typeName && !site.isToplevel() ? `${typeName}.${functionName}` : functionName,
    };
}

/**
 * Reads structured call sites through V8's `prepareStackTrace` hook,
 * restoring the previous hook and limit afterwards.
 */
function captureCallSites(below: CallerBoundary, limit: number): NodeJS.CallSite[] {
    const previousPrepare = Error.prepareStackTrace;
    const previousLimit = Error.stackTraceLimit;
    try {
        Error.stackTraceLimit = limit;
        Error.prepareStackTrace = (_err, sites) => sites;
        const holder: { stack?: NodeJS.CallSite[] } = {};
        Error.captureStackTrace(holder, below);
        // `stack` is formatted lazily, so it must be read while the hook is installed.
        return holder.stack ?? [];
    } finally {
        Error.prepareStackTrace = previousPrepare;
        Error.stackTraceLimit = previousLimit;
    }
}

export const v8StackWalker: StackWalker = {
    capture(below?: CallerBoundary): Classified {
        const sites = captureCallSites(below ?? v8StackWalker.capture, CONFIG.STACK.CAPTURE_LIMIT);
        return new Traced(sites.map(toFrame));
    },

    extract(err: Error | null | undefined): readonly Frame[] | undefined {
        return findAs(err, isTraced)?.frames;
    },
};
