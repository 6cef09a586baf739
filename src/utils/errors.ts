/**
 * 🚨 PIPELINE ERRORS
 * `fatal` errors stop a run at startup; everything else is handled per
 * candidate and degrades to an empty result.
 */

export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly fatal: boolean,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/** A response worth retrying: connection-level failures, 429 and 5xx. */
export class NetworkError extends PipelineError {
    constructor(message: string, public readonly url: string, public readonly status?: number) {
        super(message, 'NETWORK_ERROR', false, { url, status });
    }

    get retryable(): boolean {
        return this.status === undefined || this.status === 429 || this.status >= 500;
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', true);
    }
}

export class ValidationError extends PipelineError {
    constructor(message: string) {
        super(message, 'VALIDATION_ERROR', true);
    }
}

/** The output CSV cannot be opened or prepared for appending. */
export class PersistenceError extends PipelineError {
    constructor(message: string, public readonly path: string) {
        super(`${message} (${path})`, 'PERSISTENCE_ERROR', true, { path });
    }
}
