// tests/unit/serializer.test.ts

import { marshal, marshalIndent, toSerializedError } from '../../src/core/serialization';
import { CIRCULAR_REFERENCE_MESSAGE, MAX_DEPTH_MESSAGE } from '../../src/core/serialization/types';
import { classify, wrap } from '../../src/core/errors/Carrier';
import { newSentinel } from '../../src/core/errors/Sentinel';
import { newDisplayable } from '../../src/core/errors/Displayable';
import { attrs } from '../../src/core/errors/Attributed';
import { resolveSerializeOptions } from '../../src/core/serialization/options';
import { CONFIG } from '../../src/config/config';
import { Traced } from '../../src/core/stacktrace/Traced';

describe('Error Serializer', () => {
    const ErrNotFound = newSentinel('not found');
    const ErrDatabase = newSentinel('database');
    const ErrTimeout = newSentinel('timeout', ErrDatabase);

    describe('toSerializedError', () => {
        it('should return undefined for a nil error', () => {
            expect(toSerializedError(undefined)).toBeUndefined();
            expect(marshal(null)).toBeUndefined();
            expect(marshalIndent(undefined, '', '  ')).toBeUndefined();
        });

        it('should emit only the message for a plain error', () => {
            expect(marshal(new Error('boom'))).toBe('{"message":"boom"}');
        });

        it('should list sentinels attached at the node level', () => {
            const err = wrap('ctx', new Error('base'), ErrNotFound);
            expect(toSerializedError(err)).toEqual({
                message: 'ctx: base',
                sentinels: ['not found'],
                cause: { message: 'base' },
            });
        });

        it('should report display text and skip the Carrier layer', () => {
            const err = wrap('failed to fetch user', newDisplayable('User not found'), ErrNotFound);
            expect(toSerializedError(err)).toEqual({
                message: 'failed to fetch user: User not found',
                display_text: 'User not found',
                sentinels: ['not found'],
                cause: { message: 'User not found', display_text: 'User not found' },
            });
        });

        it('should list only the attached sentinel, not its ancestors', () => {
            const err = wrap('query failed', new Error('connection timed out'), ErrTimeout);
            expect(toSerializedError(err)).toEqual({
                message: 'query failed: connection timed out',
                sentinels: ['timeout'],
                cause: { message: 'connection timed out' },
            });
        });

        it('should not list a sentinel whose later parent carries attributes', () => {
            const tagged = newSentinel('tagged', newSentinel('plain parent'), attrs('k', 1));
            const err = wrap('ctx', new Error('b'), tagged);
            expect(toSerializedError(err)?.sentinels).toBeUndefined();
        });

        it('should de-duplicate sentinels by text', () => {
            const err = wrap('ctx', new Error('b'), newSentinel('dup'), newSentinel('dup'));
            expect(toSerializedError(err)?.sentinels).toEqual(['dup']);
        });

        it('should look at most two Carrier layers ahead for sentinels', () => {
            const s1 = newSentinel('s1');
            const s2 = newSentinel('s2');
            const s3 = newSentinel('s3');
            const layered = classify(classify(classify(new Error('base'), s3), s2), s1);
            const err = new Error('top', { cause: layered });
            expect(toSerializedError(err)).toEqual({
                message: 'top',
                sentinels: ['s1', 's2'],
                cause: {
                    message: 'base',
                    sentinels: ['s2', 's3'],
                    cause: { message: 'base' },
                },
            });
        });

        it('should include attributes and emit undefined values as null', () => {
            const err = wrap('load', new Error('x'), attrs('user_id', 42, 'missing', undefined));
            expect(marshal(err)).toBe(
                '{"message":"load: x","attributes":[{"key":"user_id","value":42},{"key":"missing","value":null}],"cause":{"message":"x"}}'
            );
        });

        it('should throw the encoder error for unencodable attribute values', () => {
            const err = wrap('x', new Error('y'), attrs('big', BigInt(10)));
            expect(() => marshal(err)).toThrow(TypeError);
        });
    });

    describe('cycles and depth', () => {
        it('should mark a self-referential cause as circular', () => {
            const err = new Error('self');
            err.cause = err;
            expect(toSerializedError(err)).toEqual({
                message: 'self',
                cause: { message: CIRCULAR_REFERENCE_MESSAGE },
            });
        });

        it('should mark a two-node cycle on the second visit', () => {
            const a = new Error('a');
            const b = new Error('b', { cause: a });
            a.cause = b;
            expect(toSerializedError(a)).toEqual({
                message: 'a',
                cause: { message: 'b', cause: { message: CIRCULAR_REFERENCE_MESSAGE } },
            });
        });

        it('should truncate chains deeper than maxDepth', () => {
            let err = new Error('level 5');
            for (let level = 4; level >= 1; level--) {
                err = new Error(`level ${level}`, { cause: err });
            }
            expect(toSerializedError(err, { maxDepth: 3 })).toEqual({
                message: 'level 1',
                cause: {
                    message: 'level 2',
                    cause: {
                        message: 'level 3',
                        cause: { message: MAX_DEPTH_MESSAGE },
                    },
                },
            });
        });

        it('should truncate the root itself when maxDepth is zero', () => {
            expect(toSerializedError(new Error('root'), { maxDepth: 0 })).toEqual({ message: MAX_DEPTH_MESSAGE });
        });
    });

    describe('options', () => {
        it('should drop standard causes when includeStandardErrors is false', () => {
            const err = wrap('ctx', new Error('base'), ErrNotFound);
            expect(toSerializedError(err, { includeStandardErrors: false })).toEqual({
                message: 'ctx: base',
                sentinels: ['not found'],
            });
        });

        it('should keep classified causes when includeStandardErrors is false', () => {
            const err = new Error('outer', { cause: newDisplayable('shown') });
            expect(toSerializedError(err, { includeStandardErrors: false })).toEqual({
                message: 'outer',
                display_text: 'shown',
                cause: { message: 'shown', display_text: 'shown' },
            });
        });

        it('should cap stack frames and treat zero as unlimited', () => {
            const traced = new Traced([
                { file: 'app.ts', line: 10, function: 'main' },
                { file: 'app.ts', line: 20, function: 'run' },
                { file: 'lib.ts', line: 5, function: 'load' },
            ]);
            const err = wrap('op', new Error('base'), traced);

            expect(toSerializedError(err, { maxStackFrames: 2 })?.stack_trace).toEqual([
                { file: 'app.ts', line: 10, function: 'main' },
                { file: 'app.ts', line: 20, function: 'run' },
            ]);
            expect(toSerializedError(err, { maxStackFrames: 0 })?.stack_trace).toHaveLength(3);
            expect(toSerializedError(err)?.sentinels).toBeUndefined();
        });

        it('should truncate the root for a negative maxDepth', () => {
            expect(marshal(new Error('x'), { maxDepth: -1 })).toBe('{"message":"(max depth reached)"}');
        });

        it('should keep every frame for a negative maxStackFrames', () => {
            const err = wrap('op', new Error('base'), new Traced([
                { file: 'app.ts', line: 10, function: 'main' },
                { file: 'app.ts', line: 20, function: 'run' },
            ]));
            expect(toSerializedError(err, { maxStackFrames: -5 })?.stack_trace).toHaveLength(2);
        });

        it('should fall back to the defaults for non-integer options', () => {
            const err = new Error('outer', { cause: new Error('inner') });
            expect(toSerializedError(err, { maxDepth: 1.5 })).toEqual({
                message: 'outer',
                cause: { message: 'inner' },
            });
            expect(resolveSerializeOptions({ maxDepth: Number.NaN, maxStackFrames: 2.5 })).toEqual({
                maxDepth: CONFIG.SERIALIZER.MAX_DEPTH,
                maxStackFrames: CONFIG.SERIALIZER.MAX_STACK_FRAMES,
                includeStandardErrors: CONFIG.SERIALIZER.INCLUDE_STANDARD_ERRORS,
            });
        });

        it('should not validate options for a nil error', () => {
            expect(toSerializedError(undefined, { maxDepth: -1 })).toBeUndefined();
        });
    });

    describe('multi-cause errors', () => {
        it('should serialize aggregate members as causes', () => {
            const agg = new AggregateError([
                new Error('item 1'),
                wrap('item 2', new Error('b'), ErrNotFound),
            ], 'batch failed');
            expect(toSerializedError(agg)).toEqual({
                message: 'batch failed',
                causes: [
                    { message: 'item 1' },
                    { message: 'item 2: b', sentinels: ['not found'], cause: { message: 'b' } },
                ],
            });
        });

        it('should omit causes when every member is filtered out', () => {
            const agg = new AggregateError([new Error('a'), new Error('b')], 'batch failed');
            expect(toSerializedError(agg, { includeStandardErrors: false })).toEqual({ message: 'batch failed' });
        });
    });

    describe('marshalIndent', () => {
        it('should indent and prefix every line after the first', () => {
            const err = new Error('outer', { cause: new Error('inner') });
            expect(marshalIndent(err, '>', '  ')).toBe(
                '{\n>  "message": "outer",\n>  "cause": {\n>    "message": "inner"\n>  }\n>}'
            );
        });

        it('should match plain indentation without a prefix', () => {
            expect(marshalIndent(new Error('solo'), '', '\t')).toBe('{\n\t"message": "solo"\n}');
        });
    });
});
