// src/core/serialization/types.ts

// Wire field names are part of the output format and stay snake_case.

export interface SerializedAttr {
    key: string;
    value: unknown;
}

export interface SerializedFrame {
    file: string;
    line: number;
    function: string;
}

/**
 * Tree-shaped wire form of an error graph. `cause` and `causes` are never both set.
 */
export interface SerializedError {
    message: string;
    display_text?: string;
    sentinels?: string[];
    attributes?: SerializedAttr[];
    stack_trace?: SerializedFrame[];
    cause?: SerializedError;
    causes?: SerializedError[];
}

export const MAX_DEPTH_MESSAGE = '(max depth reached)';
export const CIRCULAR_REFERENCE_MESSAGE = '(circular reference)';
