// src/services/ConnectionState.ts

const PRINTING_PREFIXES = ['Printing', 'Pausing', 'Paused', 'Cancelling', 'Resuming', 'Finishing', 'Starting'];
const ERROR_PREFIXES    = ['Error', 'Closed with Error', 'Unknown'];
const OFFLINE_PREFIXES    = ['Offline', 'Closed'];
const CONNECTING_PREFIXES = ['Opening serial', 'Detecting serial', 'Detecting baudrate', 'Connecting'];

/**
 * ConnectionState
 *
 * The printer connection label reported by OctoPrint (`current.state` of
 * `GET /api/connection`), e.g. "Operational", "Printing from SD",
 * "Error: Too many consecutive timeouts".  Only the predicates below are
 * interpreted; the label itself is shown verbatim on the splash screen.
 */
export class ConnectionState {
    constructor(readonly label: string) {}

    isOperational(): boolean {
        return this.label === 'Operational';
    }

    isPrinting(): boolean {
        return PRINTING_PREFIXES.some(p => this.label.startsWith(p));
    }

    isError(): boolean {
        return ERROR_PREFIXES.some(p => this.label.startsWith(p));
    }

    // "Offline after error" is offline; "Closed with Error" is an error
    isOffline(): boolean {
        return OFFLINE_PREFIXES.some(p => this.label.startsWith(p))
            && !this.label.startsWith('Closed with Error');
    }

    // Covers both "Opening serial port" and "Opening serial connection" wordings
    isConnecting(): boolean {
        return CONNECTING_PREFIXES.some(p => this.label.startsWith(p));
    }

    toString(): string {
        return this.label;
    }
}
