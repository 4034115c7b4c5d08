// Agent Error Utilities
// Typed error classes and error handling helpers for the dictation agent

import { createLogger } from './logger.js';

const log = createLogger('error');

/**
 * Base agent error with typed error codes
 */
export class AppError extends Error {
    public readonly code: string;
    public readonly isOperational: boolean;
    public readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        code: string = 'INTERNAL_ERROR',
        isOperational: boolean = true,
        context?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.code = code;
        this.isOperational = isOperational;
        this.context = context;
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

// ============================================
// SPECIFIC ERROR TYPES
// ============================================

/**
 * Microphone unavailable or the input stream failed to open.
 */
export class CaptureError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(message, 'CAPTURE_ERROR', true, undefined, { cause });
    }
}

export class EmptyAudioError extends AppError {
    constructor(sessionId: string) {
        super('No audio recorded', 'EMPTY_AUDIO', true, { sessionId });
    }
}

export type BackendErrorCode =
    | 'BACKEND_AUTH'
    | 'BACKEND_HTTP'
    | 'BACKEND_NETWORK'
    | 'BACKEND_TIMEOUT'
    | 'BACKEND_LOCAL'
    | 'BACKEND_ERROR';

export class BackendError extends AppError {
    public readonly backend: string;

    constructor(backend: string, message: string, code: BackendErrorCode = 'BACKEND_ERROR', cause?: unknown) {
        super(message, code, true, { backend }, { cause });
        this.backend = backend;
    }
}

/**
 * Clipboard write or synthesized paste failed. Never rolls back a transcript.
 */
export class OutputError extends AppError {
    constructor(step: 'clipboard' | 'paste', message: string, cause?: unknown) {
        super(message, 'OUTPUT_ERROR', true, { step }, { cause });
    }
}

/**
 * Unrecoverable startup problem: bad environment or no usable backend.
 */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', false, context);
    }
}

// ============================================
// HELPERS
// ============================================

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything a backend threw so the controller only ever sees BackendError
 */
export function toBackendError(backend: string, error: unknown): BackendError {
    if (error instanceof BackendError) {
        return error;
    }
    return new BackendError(backend, describeError(error), 'BACKEND_ERROR', error);
}

/**
 * Log error with context prefix
 */
export function logError(error: unknown, context: string): void {
    const message = describeError(error);

    if (error instanceof AppError && error.isOperational) {
        // Operational errors are expected - log at warn level
        log.warn(`${context}: ${error.code}: ${message}`);
        return;
    }

    log.error(`${context}: ${message}`);
    if (error instanceof Error && error.stack) {
        log.debug(error.stack);
    }
}
