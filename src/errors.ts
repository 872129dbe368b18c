/**
 * Custom error types for the turbine assistant
 * Each pipeline stage records these as diagnostics instead of letting them escape
 */

/**
 * Base error class for turbine assistant errors
 */
export class TurbineAssistError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TurbineAssistError';
        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigError extends TurbineAssistError {
    public readonly configKey?: string;

    constructor(message: string, configKey?: string) {
        super(message);
        this.name = 'ConfigError';
        this.configKey = configKey;
    }
}

/**
 * Error thrown when a request is rejected before it reaches the pipeline
 */
export class QueryValidationError extends TurbineAssistError {
    constructor(message: string) {
        super(message);
        this.name = 'QueryValidationError';
    }
}

/**
 * Error thrown when embedding or search against the document index fails
 */
export class RetrievalError extends TurbineAssistError {
    public readonly query?: string;

    constructor(message: string, query?: string) {
        super(message);
        this.name = 'RetrievalError';
        this.query = query;
    }
}

export class TelemetryError extends TurbineAssistError {
    public readonly status?: number;

    constructor(message: string, status?: number) {
        super(message);
        this.name = 'TelemetryError';
        this.status = status;
    }
}

/**
 * Error thrown when a reasoning backend cannot produce an answer
 */
export class ReasoningError extends TurbineAssistError {
    public readonly modelKey: string;

    constructor(modelKey: string, message: string) {
        super(message);
        this.name = 'ReasoningError';
        this.modelKey = modelKey;
    }
}

export class GuardrailError extends TurbineAssistError {
    constructor(message: string) {
        super(message);
        this.name = 'GuardrailError';
    }
}

/**
 * Error thrown when a session cannot be read from or written to the store
 */
export class SessionStoreError extends TurbineAssistError {
    public readonly sessionId: string;

    constructor(sessionId: string, message: string) {
        super(message);
        this.name = 'SessionStoreError';
        this.sessionId = sessionId;
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

export function describeError(value: unknown): string {
    return toError(value).message;
}
