// src/index.ts

export * from './core/errors';
export * as stacktrace from './core/stacktrace';
export * as compat from './core/compat';
export * as serialization from './core/serialization';
export { marshal, marshalIndent, toSerializedError } from './core/serialization';
export type { SerializeOptions, SerializedError } from './core/serialization';
export { Logger, LogLevel } from './core/logging/Logger';
export { CONFIG } from './config/config';
