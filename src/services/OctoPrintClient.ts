// src/services/OctoPrintClient.ts

import { ConnectionState }                  from './ConnectionState';
import { PrinterApiError, describeError }  from '../utils/errors';

/**
 * What the connection reconciler needs from the printer server: the current
 * connection state, and a way to ask the server to (re)open the serial link.
 */
export interface PrinterStatusSource {
    readonly endpoint: string;
    readonly apiKey: string;
    getConnectionState(): Promise<ConnectionState>;
    connect(): Promise<void>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

// Subset of the `GET /api/connection` reply we read
interface ConnectionResponse {
    current: {
        state: string;
    };
}

function isConnectionResponse(value: unknown): value is ConnectionResponse {
    if (typeof value !== 'object' || value === null || !('current' in value)) return false;
    const current = value.current;
    return typeof current === 'object' && current !== null
        && 'state' in current && typeof current.state === 'string';
}

/**
 * OctoPrintClient
 *
 * Thin REST wrapper around the two connection endpoints of an OctoPrint
 * server.  Transport failures, non-2xx replies and malformed bodies all
 * surface as `PrinterApiError`.
 */
export class OctoPrintClient implements PrinterStatusSource {
    readonly endpoint: string;
    readonly apiKey: string;
    private readonly fetchImpl: FetchLike;

    constructor(endpoint: string, apiKey: string, fetchImpl?: FetchLike) {
        this.endpoint  = endpoint.replace(/\/+$/, '');
        this.apiKey    = apiKey;
        this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    }

    async getConnectionState(): Promise<ConnectionState> {
        const body = await this.request('GET', '/api/connection');
        if (!isConnectionResponse(body)) {
            throw new PrinterApiError(`GET ${this.url('/api/connection')}: unexpected response body`);
        }
        return new ConnectionState(body.current.state);
    }

    async connect(): Promise<void> {
        await this.request('POST', '/api/connection', { command: 'connect' });
    }

    private url(path: string): string {
        return `${this.endpoint}${path}`;
    }

    private async request(method: 'GET' | 'POST', path: string, payload?: object): Promise<unknown> {
        const url = this.url(path);
        const headers: Record<string, string> = { 'Accept': 'application/json' };
        if (this.apiKey !== '') headers['X-Api-Key'] = this.apiKey;
        if (payload !== undefined) headers['Content-Type'] = 'application/json';

        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                method,
                headers,
                body: payload !== undefined ? JSON.stringify(payload) : undefined,
            });
        } catch (err) {
            // browsers only report "Failed to fetch" for a refused socket
            throw new PrinterApiError(`${method} ${url}: ${describeError(err)}`, { unreachable: true, cause: err });
        }

        if (!response.ok) {
            let text: string;
            try {
                text = await response.text();
            } catch (err) {
                throw new PrinterApiError(`${method} ${url}: ${describeError(err)}`, { status: response.status, cause: err });
            }
            throw new PrinterApiError(
                `${method} ${url}: ${text || `request failed with ${response.status}`}`,
                { status: response.status },
            );
        }

        // POST /api/connection answers 204 No Content
        if (response.status === 204) return null;

        try {
            return await response.json();
        } catch (err) {
            throw new PrinterApiError(`${method} ${url}: ${describeError(err)}`, { cause: err });
        }
    }
}
