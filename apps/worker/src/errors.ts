/**
 * Error types shared across the pipeline.
 *
 * Transient ledger errors are retried by the next loop tick; nothing in
 * the pipeline retries inline.
 */

export class LedgerRequestError extends Error {
    constructor(
        message: string,
        readonly operation: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "LedgerRequestError";
    }
}

export class LedgerTimeoutError extends Error {
    constructor(
        readonly settlementRef: string,
        readonly timeoutMs: number
    ) {
        super(`Settlement ${settlementRef} not confirmed within ${timeoutMs}ms`);
        this.name = "LedgerTimeoutError";
    }
}

export class EventDecodeError extends Error {
    constructor(
        message: string,
        readonly txRef: string,
        readonly logIndex: number
    ) {
        super(message);
        this.name = "EventDecodeError";
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
