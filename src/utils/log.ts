// src/utils/log.ts

/**
 * Scoped console logging.  Every line is prefixed with the scope name
 * (`[Reconciler] Printer is ready`) and filtered against one global level,
 * which the controller sets from configuration at startup.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info:  20,
    warn:  30,
    error: 40,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function createLogger(scope: string): Logger {
    const prefix = `[${scope}]`;
    return {
        debug: (message) => { if (enabled('debug')) console.debug(`${prefix} ${message}`); },
        info:  (message) => { if (enabled('info'))  console.info(`${prefix} ${message}`); },
        warn:  (message) => { if (enabled('warn'))  console.warn(`${prefix} ${message}`); },
        error: (message) => { if (enabled('error')) console.error(`${prefix} ${message}`); },
    };
}
