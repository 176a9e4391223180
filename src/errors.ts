/**
 * Custom error types for the course assistant
 */

/**
 * Base error class for course assistant errors
 */
export class CourseAssistantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CourseAssistantError';
        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Error thrown when an API key is missing or rejected by the provider
 */
export class ApiKeyError extends CourseAssistantError {
    public readonly keyName: string;
    public readonly helpUrl?: string;

    constructor(keyName: string, message?: string, helpUrl?: string) {
        const defaultMessage = `${keyName} is not set or invalid.\n` +
            `Run: course-assistant init\n` +
            (helpUrl ? `Get your key at: ${helpUrl}` : '');
        super(message || defaultMessage);
        this.name = 'ApiKeyError';
        this.keyName = keyName;
        this.helpUrl = helpUrl;
    }
}

/**
 * Error thrown when API rate limits are exceeded
 */
export class RateLimitError extends CourseAssistantError {
    public readonly retryAfterMs?: number;

    constructor(service: string, retryAfterMs?: number) {
        const retryMessage = retryAfterMs
            ? ` Please wait ${Math.ceil(retryAfterMs / 1000)} seconds and try again.`
            : ' Please wait a moment and try again.';
        super(`${service} rate limit exceeded.${retryMessage}`);
        this.name = 'RateLimitError';
        this.retryAfterMs = retryAfterMs;
    }
}

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigError extends CourseAssistantError {
    public readonly configKey?: string;

    constructor(message: string, configKey?: string) {
        super(message);
        this.name = 'ConfigError';
        this.configKey = configKey;
    }
}

/**
 * Error thrown when the language model provider answers with a non-2xx status
 */
export class ModelApiError extends CourseAssistantError {
    public readonly status: number;

    constructor(status: number, detail: string) {
        super(`OpenRouter API error: ${status} - ${detail}`);
        this.name = 'ModelApiError';
        this.status = status;
    }
}

/**
 * Error thrown when the course catalog cannot be read or fails validation
 */
export class CatalogError extends CourseAssistantError {
    public readonly catalogPath?: string;

    constructor(message: string, catalogPath?: string) {
        super(message);
        this.name = 'CatalogError';
        this.catalogPath = catalogPath;
    }
}
