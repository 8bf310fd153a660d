/**
 * Base class for failures the runtime surfaces to its caller.
 */
export class AidoError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = new.target.name
    }
}

/** Missing credential, prompt or policy. Raised before any remote call. */
export class ConfigurationError extends AidoError {}

/** Connection failure, timeout or an unusable response body. Never retried. */
export class TransportError extends AidoError {}

export interface ModelErrorOptions extends ErrorOptions {
    status?: number | undefined
    /** Server-provided wait hint, already converted to milliseconds */
    retryAfterMs?: number | undefined
}

/**
 * Error payload returned by the model endpoint.
 * Only rate-limit errors are eligible for retry.
 */
export class ModelError extends AidoError {
    readonly status: number | undefined
    readonly retryAfterMs: number | undefined

    constructor(message: string, options: ModelErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause })
        this.status = options.status
        this.retryAfterMs = options.retryAfterMs
    }

    get rateLimited(): boolean {
        return this.status === 429
    }
}

/** The `code` of a Node system error (`ENOENT`, `EEXIST`, ...), if any. */
export function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code
    return undefined
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
