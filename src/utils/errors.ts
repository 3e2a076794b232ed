export type PipelineErrorCode =
    | 'configuration'
    | 'extraction'
    | 'connectivity'
    | 'posting'
    | 'transport'
    | 'persistence';

export class PipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Missing or invalid credential / endpoint settings. */
export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('configuration', message, options);
    }
}

/** The extraction collaborator failed or returned something unparseable. */
export class ExtractionError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('extraction', message, options);
    }
}

export class ConnectivityError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('connectivity', message, options);
    }
}

/** Line-level rejection reported by the accounting system. */
export class PostingError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('posting', message, options);
    }
}

/** Timeout or connection failure on a call to the accounting system. */
export class TransportError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('transport', message, options);
    }
}

export class PersistenceError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('persistence', message, options);
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
