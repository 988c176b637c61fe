// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * Centralizes logging to ensure:
 * 1. Structured output (timestamps, levels, modules)
 * 2. Secret redaction (security)
 * 3. Error context: attributes, user-safe text and captured frames
 */

import { ENV } from '../../config/env';
import { attrsToLogContext, extractAttrs } from '../errors/Attributed';
import { displayTextDefault } from '../errors/Displayable';
import { extract, formatFrame } from '../stacktrace';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

const LEVEL_BY_NAME: Record<NonNullable<typeof ENV.LOG_LEVEL>, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
};

// Library default: quiet unless LOG_LEVEL asks for more.
function defaultLevel(): LogLevel {
    if (ENV.LOG_LEVEL) return LEVEL_BY_NAME[ENV.LOG_LEVEL];
    if (ENV.NODE_ENV === 'production') return LogLevel.ERROR;
    return LogLevel.WARN;
}

export class Logger {
    private static currentLevel: LogLevel = defaultLevel();

    /**
     * Regex to catch potential API keys (sk-...)
     * Matches sk- followed by at least 20 alphanumeric/underscore/dash chars
     */
    private static SECRET_REGEX = /sk-[a-zA-Z0-9_\-]{20,}/g;

    public static setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }

    public static getLevel(): LogLevel {
        return this.currentLevel;
    }

    private static redact(text: string): string {
        return text.replace(this.SECRET_REGEX, '[REDACTED]');
    }

    private static stringify(value: unknown): string {
        if (typeof value === 'string') return value;
        try {
            return JSON.stringify(value) ?? String(value);
        } catch (e) {
            // BigInt or a circular structure; fall back to the plain rendering
            return String(value);
        }
    }

    private static formatMessage(level: string, module: string, message: unknown, context?: unknown): string {
        const timestamp = new Date().toISOString();

        let log = `[${timestamp}] [${level}] [${module}] ${this.redact(this.stringify(message))}`;

        if (context !== undefined) {
            log += ` ${this.redact(this.stringify(context))}`;
        }

        return log;
    }

    /**
     * Renders the parts of an error graph worth keeping in a log line.
     */
    private static describeError(error: Error): string {
        const attributes = extractAttrs(error);
        let details = '';
        if (attributes) {
            details += ` Attributes: ${this.redact(this.stringify(attrsToLogContext(attributes)))}`;
        }

        const display = displayTextDefault(error, '');
        if (display) {
            details += ` Display: ${this.redact(display)}`;
        }

        const frames = extract(error);
        const stack = frames ? frames.map(formatFrame).join('\n    ') : error.stack;
        if (stack) {
            details += ` Stack: ${this.redact(stack)}`;
        }
        return details;
    }

    public static debug(module: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.error(this.formatMessage('DEBUG', module, message, context));
        }
    }

    public static info(module: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.error(this.formatMessage('INFO', module, message, context));
        }
    }

    public static warn(module: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.error(this.formatMessage('WARN', module, message, context));
        }
    }

    public static error(module: string, message: unknown, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            let errorDetails = '';
            if (error instanceof Error) {
                errorDetails = this.describeError(error);
            } else if (error !== undefined) {
                errorDetails = ` Details: ${this.redact(this.stringify(error))}`;
            }

            console.error(this.formatMessage('ERROR', module, message) + errorDetails);
        }
    }
}
