// src/features/connection/errorFormat.ts

import { PrinterApiError, describeError } from '../../utils/errors';

const CONNECTION_REFUSED = /connection refused|ECONNREFUSED/i;

function isRefused(err: unknown, text: string): boolean {
    return (err instanceof PrinterApiError && err.unreachable) || CONNECTION_REFUSED.test(text);
}

/**
 * Turns a status/connect failure into the text shown on the splash screen.
 * A refused or unreachable connection means the OctoPrint server is most likely not
 * running, so that case names the endpoint and whether a key is configured.
 * The key itself never appears in the output.
 */
export function formatUserError(err: unknown, endpoint: string, apiKey: string): string {
    const text = describeError(err);
    if (isRefused(err, text)) {
        return `Unable to connect to ${JSON.stringify(endpoint)} (Key: ${apiKey !== ''}), \nmaybe OctoPrint not running?`;
    }

    return `Unexpected error: ${text}`;
}
