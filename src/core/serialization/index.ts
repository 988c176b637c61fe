// src/core/serialization/index.ts

export { marshal, marshalIndent, toSerializedError } from './serializer';
export { resolveSerializeOptions } from './options';
export type { SerializeOptions, ResolvedSerializeOptions } from './options';
export { CIRCULAR_REFERENCE_MESSAGE, MAX_DEPTH_MESSAGE } from './types';
export type { SerializedAttr, SerializedError, SerializedFrame } from './types';
