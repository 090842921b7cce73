// src/utils/errors.ts

export interface PrinterApiErrorOptions {
    status?: number;
    /** True when the request never got an HTTP response. */
    unreachable?: boolean;
    cause?: unknown;
}

/** Raised by the OctoPrint client for transport failures and non-2xx replies. */
export class PrinterApiError extends Error {
    readonly status: number | null;
    readonly unreachable: boolean;

    constructor(message: string, options: PrinterApiErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = 'PrinterApiError';
        this.status = options.status ?? null;
        this.unreachable = options.unreachable ?? false;
    }
}

/**
 * Flattens an error and its `cause` chain into one line, e.g.
 * `fetch failed: connect ECONNREFUSED 127.0.0.1:5000`.
 */
export function describeError(err: unknown): string {
    const parts: string[] = [];
    const seen = new Set<unknown>();
    let current: unknown = err;

    while (current !== undefined && current !== null && !seen.has(current)) {
        seen.add(current);
        if (current instanceof Error) {
            // skip causes already quoted by a wrapper
            const message = current.message;
            if (message && !parts.some(p => p.includes(message))) parts.push(message);
            current = current.cause;
        } else {
            parts.push(String(current));
            break;
        }
    }

    return parts.length > 0 ? parts.join(': ') : String(err);
}
