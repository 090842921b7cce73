// src/services/LivenessNotifier.ts

import { createLogger }      from '../utils/log';
import { describeError }     from '../utils/errors';
import type { FetchLike }    from './OctoPrintClient';

const log = createLogger('Liveness');

/**
 * Where readiness (`READY=1`) and heartbeat (`WATCHDOG=1`) messages go.
 * On a kiosk this is the supervisor that restarts the browser when the
 * heartbeat stops.
 */
export interface LivenessSink {
    notify(message: string): Promise<void>;
}

/** POSTs each message as plain text to the supervisor's watchdog URL. */
export class HttpLivenessSink implements LivenessSink {
    private readonly fetchImpl: FetchLike;

    constructor(private readonly url: string, fetchImpl?: FetchLike) {
        this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    }

    async notify(message: string): Promise<void> {
        const response = await this.fetchImpl(this.url, {
            method:  'POST',
            headers: { 'Content-Type': 'text/plain' },
            body:    message,
        });
        if (!response.ok) {
            throw new Error(`watchdog replied ${response.status}`);
        }
    }
}

/** Used when no supervisor is configured. */
export class LogLivenessSink implements LivenessSink {
    async notify(message: string): Promise<void> {
        log.debug(`notify ${message}`);
    }
}

/**
 * Fire-and-forget wrapper: sends `message` and logs any failure.  Never
 * throws and never rejects, so callers cannot be disturbed by the sink.
 */
export function signalLiveness(sink: LivenessSink, message: string): void {
    let pending: Promise<void>;
    try {
        pending = sink.notify(message);
    } catch (err) {
        log.error(`Error sending notification: ${describeError(err)}`);
        return;
    }
    pending.catch((err: unknown) => log.error(`Error sending notification: ${describeError(err)}`));
}
