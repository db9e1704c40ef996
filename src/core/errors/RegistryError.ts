// src/core/errors/RegistryError.ts

import { ErrorContext } from './ErrorContext';
import { Logger } from '../logging/Logger';

/**
 * Base error class for everything the module registry throws.
 * Provides structured metadata and user-friendly formatting.
 */
export class RegistryError extends Error {
    public readonly context: ErrorContext;
    public readonly timestamp: number;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = 'RegistryError';
        this.context = context;
        this.timestamp = Date.now();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    public get code(): string {
        return this.context.code ?? 'ERROR';
    }

    /**
     * Converts the error to a plain object for JSON serialization.
     */
    public toJSON() {
        const { cause, ...rest } = this.context;
        return {
            name: this.name,
            message: this.message,
            timestamp: this.timestamp,
            context: cause === undefined ? rest : { ...rest, cause: describeError(cause) },
            stack: process.env.NODE_ENV === 'development' ? this.stack : undefined
        };
    }

    /**
     * Formats a message suitable for end-users.
     */
    public toUserFriendly(): string {
        let msg = `[${this.code}] ${Logger.redact(this.message)}`;
        if (this.context.suggestion) {
            msg += `\nTip: ${this.context.suggestion}`;
        }
        return msg;
    }

    /**
     * Detailed string representation for internal logging.
     */
    public toDebugString(): string {
        return JSON.stringify(this.toJSON(), null, 2);
    }
}

export function isRegistryError(error: unknown): error is RegistryError {
    return error instanceof RegistryError;
}

/**
 * Renders any thrown value as a single line of text.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}
