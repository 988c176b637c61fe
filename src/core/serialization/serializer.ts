// src/core/serialization/serializer.ts

import { CONFIG } from '../../config/config';
import { Logger } from '../logging/Logger';
import { extractAttrs, isAttributed } from '../errors/Attributed';
import { Carrier } from '../errors/Carrier';
import { Classified, isClassified, unwrap, unwrapAll } from '../errors/classified';
import { displayText, isDisplayable } from '../errors/Displayable';
import { VisitedErrors } from '../errors/graphTraversal';
import { findAs } from '../errors/identity';
import { extract } from '../stacktrace';
import { ResolvedSerializeOptions, SerializeOptions, resolveSerializeOptions } from './options';
import {
    CIRCULAR_REFERENCE_MESSAGE,
    MAX_DEPTH_MESSAGE,
    SerializedAttr,
    SerializedError,
    SerializedFrame,
} from './types';

/**
 * Converts an error graph into its tree-shaped wire form.
 * Returns undefined for a nil error; never throws on cyclic or deep graphs
 * or on out-of-range options.
 *
 * Carriers are not emitted as nodes of their own: a Carrier cause is skipped
 * and its cause is serialized in its place.
 */
export function toSerializedError(err: Error | null | undefined, options?: SerializeOptions): SerializedError | undefined {
    if (!err) return undefined;
    const cfg = resolveSerializeOptions(options);
    return serializeNode(err, cfg, new VisitedErrors(), 0);
}

/**
 * Serializes `err` to a JSON string. Returns undefined for a nil error.
 * Encoding failures (e.g. a BigInt attribute value) are thrown as-is.
 */
export function marshal(err: Error | null | undefined, options?: SerializeOptions): string | undefined {
    const serialized = toSerializedError(err, options);
    if (serialized === undefined) return undefined;
    return JSON.stringify(serialized);
}

/**
 * Pretty-printed `marshal`. Every line after the first starts with `prefix`.
 */
export function marshalIndent(
    err: Error | null | undefined,
    prefix: string,
    indent: string,
    options?: SerializeOptions
): string | undefined {
    const serialized = toSerializedError(err, options);
    if (serialized === undefined) return undefined;
    const json = JSON.stringify(serialized, null, indent);
    return prefix ? json.split('\n').join(`\n${prefix}`) : json;
}

function serializeNode(err: Error, cfg: ResolvedSerializeOptions, visited: VisitedErrors, depth: number): SerializedError {
    if (depth >= cfg.maxDepth) {
        Logger.debug('Serializer', 'Max depth reached, truncating error tree', { depth });
        return { message: MAX_DEPTH_MESSAGE };
    }

    if (visited.has(err)) {
        Logger.debug('Serializer', 'Circular reference detected', { depth, message: err.message });
        return { message: CIRCULAR_REFERENCE_MESSAGE };
    }
    visited.add(err);

    const result: SerializedError = { message: err.message };

    if (isDisplayable(err)) {
        const text = displayText(err);
        if (text) result.display_text = text;
    }

    const sentinels = collectSentinels(err);
    if (sentinels.length > 0) result.sentinels = sentinels;

    const attributes = serializeAttributes(err);
    if (attributes) result.attributes = attributes;

    const stackTrace = serializeStackTrace(err, cfg);
    if (stackTrace) result.stack_trace = stackTrace;

    serializeCauses(err, cfg, visited, depth, result);

    return result;
}

function serializeAttributes(err: Error): SerializedAttr[] | undefined {
    const attrs = extractAttrs(err);
    if (!attrs) return undefined;
    // JSON.stringify would drop an undefined value together with its key.
    return attrs.map(a => ({ key: a.key, value: a.value === undefined ? null : a.value }));
}

function serializeStackTrace(err: Error, cfg: ResolvedSerializeOptions): SerializedFrame[] | undefined {
    const frames = extract(err);
    if (!frames || frames.length === 0) return undefined;
    const limit = cfg.maxStackFrames > 0 ? Math.min(frames.length, cfg.maxStackFrames) : frames.length;
    return frames.slice(0, limit).map(f => ({ file: f.file, line: f.line, function: f.function }));
}

function shouldInclude(err: Error, cfg: ResolvedSerializeOptions): boolean {
    return cfg.includeStandardErrors || isClassified(err);
}

function serializeCauses(
    err: Error,
    cfg: ResolvedSerializeOptions,
    visited: VisitedErrors,
    depth: number,
    result: SerializedError
): void {
    const members = unwrapAll(err);
    if (members) {
        const causes = members
            .filter(member => shouldInclude(member, cfg))
            .map(member => serializeNode(member, cfg, visited, depth + 1));
        if (causes.length > 0) result.causes = causes;
        return;
    }

    const cause = unwrap(err);
    if (!cause) return;

    const target = cause instanceof Carrier ? cause.cause : cause;
    if (shouldInclude(target, cfg)) {
        result.cause = serializeNode(target, cfg, visited, depth + 1);
    }
}

/**
 * A marker with no payload of its own: not displayable, no attributes, no frames.
 * Each check is a typed search, so every sentinel parent is consulted.
 */
function isPureSentinel(cls: Classified): boolean {
    return !isDisplayable(cls) && findAs(cls, isAttributed) === undefined && extract(cls) === undefined;
}

/**
 * Sentinel texts attached at this node's own level: its Carrier layer, up to
 * CARRIER_LOOKAHEAD nested Carrier causes, and the node itself.
 */
function collectSentinels(err: Error): string[] {
    const sentinels: string[] = [];
    const seen = new Set<string>();

    const add = (cls: Classified) => {
        if (!isPureSentinel(cls) || seen.has(cls.message)) return;
        seen.add(cls.message);
        sentinels.push(cls.message);
    };

    if (err instanceof Carrier) {
        err.classifications.forEach(add);
    }

    let current: Error = err;
    for (let level = 0; level < CONFIG.SERIALIZER.CARRIER_LOOKAHEAD; level++) {
        const cause = unwrap(current);
        if (!(cause instanceof Carrier)) break;
        cause.classifications.forEach(add);
        current = cause;
    }

    if (isClassified(err)) {
        add(err);
    }

    return sentinels;
}
