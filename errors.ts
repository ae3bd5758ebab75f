/**
 * Failure taxonomy for the collection pipeline and the serving layer.
 *
 * FetchError       - a page or API could not be reached (network, timeout, HTTP status)
 * ParseError       - the expected markup was not on the page
 * PersistenceError - the blob store could not be read or written
 */

export class FetchError extends Error {
    name = "FetchError";

    constructor(
        message: string,
        readonly url: string,
        readonly status: number | null = null,
        readonly retryable = false,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class ParseError extends Error {
    name = "ParseError";

    constructor(
        message: string,
        readonly context: string
    ) {
        super(`${context}: ${message}`);
    }
}

export class PersistenceError extends Error {
    name = "PersistenceError";

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
