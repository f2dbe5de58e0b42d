export class FloodDataError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Connection, DNS or non-2xx failure talking to the monitoring API. */
export class NetworkError extends FloodDataError {
    readonly status?: number;

    constructor(message: string, status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.status = status;
    }
}

/** A request exceeded its per-request deadline. */
export class TimeoutError extends FloodDataError {
    readonly timeoutMs?: number;

    constructor(message: string, timeoutMs?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.timeoutMs = timeoutMs;
    }
}

/**
 * A single record lacks a required field. Raised and caught inside the catalog
 * builder; callers only ever see skip counts.
 */
export class MalformedRecordError extends FloodDataError {
    readonly field: string;

    constructor(field: string, message = `Record is missing required field "${field}"`) {
        super(message);
        this.field = field;
    }
}

export type TransportError = NetworkError | TimeoutError;

export const isTransportError = (error: unknown): error is TransportError =>
    error instanceof NetworkError || error instanceof TimeoutError;
