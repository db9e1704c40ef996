// src/core/errors/ErrorContext.ts

/**
 * Metadata attached to a registry error for debugging and user guidance.
 */
export interface ErrorContext {
    code?: string;           // Machine-readable error code (e.g., 'NOT_FOUND')
    operation?: string;      // The registry operation that failed
    suggestion?: string;     // Hint shown to the caller
    component?: string;      // The layer where the error occurred
    moduleId?: string;       // Record involved, when there is one
    url?: string;            // Remote location involved, when there is one
    path?: string;           // Local file involved, when there is one
    cause?: unknown;         // Underlying error
}
