// src/config/config.ts

import { ENV } from './env';

interface PackageConfig {
    NAME: string;
    VERSION: string;
}

interface SerializerConfig {
    MAX_DEPTH: number;
    MAX_STACK_FRAMES: number;
    INCLUDE_STANDARD_ERRORS: boolean;
    /** How many nested Carrier causes are inspected for sentinels at one node. */
    CARRIER_LOOKAHEAD: number;
}

interface StackConfig {
    CAPTURE_LIMIT: number;
}

interface Config {
    PACKAGE: PackageConfig;
    SERIALIZER: SerializerConfig;
    STACK: StackConfig;
}

/**
 * Centralized configuration for faultline.
 */
export const CONFIG: Config = {
    PACKAGE: {
        NAME: 'faultline',
        VERSION: '1.0.0',
    },

    SERIALIZER: {
        MAX_DEPTH: ENV.FAULTLINE_MAX_DEPTH,
        MAX_STACK_FRAMES: ENV.FAULTLINE_MAX_STACK_FRAMES,
        INCLUDE_STANDARD_ERRORS: ENV.FAULTLINE_INCLUDE_STANDARD_ERRORS,
        CARRIER_LOOKAHEAD: 2,
    },

    STACK: {
        CAPTURE_LIMIT: ENV.FAULTLINE_STACK_CAPTURE_LIMIT,
    },
};
