// src/core/errors/errors.ts

import { RegistryError } from './RegistryError';
import { ErrorContext } from './ErrorContext';

/**
 * Thrown when a module with the same metadata URL is already registered.
 */
export class AlreadyExistsError extends RegistryError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'ALREADY_EXISTS',
            component: 'CORE_REGISTRY',
            ...context
        });
        this.name = 'AlreadyExistsError';
    }
}

/**
 * Thrown when no module has the requested identifier.
 */
export class NotFoundError extends RegistryError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'NOT_FOUND',
            component: 'CORE_REGISTRY',
            ...context
        });
        this.name = 'NotFoundError';
    }
}

/**
 * Thrown when a remote metadata document or script cannot be retrieved.
 */
export class FetchError extends RegistryError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'FETCH_ERROR',
            component: 'INFRA_HTTP',
            ...context
        });
        this.name = 'FetchError';
    }
}

/**
 * Thrown when a remote metadata document is not valid JSON of the expected shape.
 */
export class ParseError extends RegistryError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'PARSE_ERROR',
            component: 'CORE_REGISTRY',
            ...context
        });
        this.name = 'ParseError';
    }
}

/**
 * Thrown when a cached script cannot be read or written.
 */
export class IOError extends RegistryError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'IO_ERROR',
            component: 'INFRA_STORAGE',
            ...context
        });
        this.name = 'IOError';
    }
}

/**
 * Thrown when front-end input is rejected before reaching the registry.
 */
export class ValidationError extends RegistryError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'VALIDATION_ERROR',
            component: 'INTERFACE_MCP',
            ...context
        });
        this.name = 'ValidationError';
    }
}
