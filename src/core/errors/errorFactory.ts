// src/core/errors/errorFactory.ts

import * as Errors from './errors';
import { ErrorContext } from './ErrorContext';

/**
 * Factory class to create consistent error instances across the application.
 */
export class ErrorFactory {
    static alreadyExists(message: string, context?: ErrorContext) {
        return new Errors.AlreadyExistsError(message, context);
    }

    static notFound(message: string, context?: ErrorContext) {
        return new Errors.NotFoundError(message, context);
    }

    static fetch(message: string, context?: ErrorContext) {
        return new Errors.FetchError(message, context);
    }

    static parse(message: string, context?: ErrorContext) {
        return new Errors.ParseError(message, context);
    }

    static io(message: string, context?: ErrorContext) {
        return new Errors.IOError(message, context);
    }

    static validation(message: string, context?: ErrorContext) {
        return new Errors.ValidationError(message, context);
    }
}
