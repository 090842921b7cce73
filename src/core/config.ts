// src/core/config.ts

import { createLogger, isLogLevel, type LogLevel } from '../utils/log';

const log = createLogger('Config');

export const DEFAULT_ENDPOINT         = 'http://localhost:5000';
export const DEFAULT_WIDTH            = 800;
export const DEFAULT_HEIGHT           = 480;
export const DEFAULT_POLL_INTERVAL_MS = 5000;

export interface AppConfig {
    endpoint: string;
    apiKey: string;
    width: number;
    height: number;
    stylePath: string;
    watchdogUrl: string | null;
    pollIntervalMs: number;
    logLevel: LogLevel;
}

/** The VITE_* variables the app reads; every one is optional. */
export interface ConfigEnv {
    VITE_OCTOPRINT_HOST?: string;
    VITE_OCTOPRINT_APIKEY?: string;
    VITE_RESOLUTION?: string;
    VITE_STYLE_PATH?: string;
    VITE_WATCHDOG_URL?: string;
    VITE_POLL_INTERVAL_MS?: string;
    VITE_LOG_LEVEL?: string;
}

function nonEmpty(value: string | undefined): string | null {
    const trimmed = value?.trim() ?? '';
    return trimmed.length > 0 ? trimmed : null;
}

/** Parses `800x480`; null when the value is not two positive integers. */
export function parseResolution(value: string): { width: number; height: number } | null {
    const match = /^(\d+)x(\d+)$/i.exec(value.trim());
    if (!match) return null;
    const width  = Number(match[1]);
    const height = Number(match[2]);
    if (width <= 0 || height <= 0) return null;
    return { width, height };
}

export function scaleFactorFor(width: number): number {
    if (width > 1000) return 3;
    if (width > 480)  return 2;
    return 1;
}

/**
 * Builds the runtime configuration from a Vite env object.  Bad values fall
 * back to their defaults with a warning rather than stopping the kiosk.
 */
export function parseConfig(env: ConfigEnv): AppConfig {
    const endpoint = (nonEmpty(env.VITE_OCTOPRINT_HOST) ?? DEFAULT_ENDPOINT).replace(/\/+$/, '');

    let width  = DEFAULT_WIDTH;
    let height = DEFAULT_HEIGHT;
    const rawResolution = nonEmpty(env.VITE_RESOLUTION);
    if (rawResolution) {
        const parsed = parseResolution(rawResolution);
        if (parsed) {
            ({ width, height } = parsed);
        } else {
            log.warn(`Malformed resolution "${rawResolution}", using ${DEFAULT_WIDTH}x${DEFAULT_HEIGHT}`);
        }
    }

    let pollIntervalMs = DEFAULT_POLL_INTERVAL_MS;
    const rawInterval = nonEmpty(env.VITE_POLL_INTERVAL_MS);
    if (rawInterval) {
        const parsed = Number(rawInterval);
        if (Number.isInteger(parsed) && parsed > 0) {
            pollIntervalMs = parsed;
        } else {
            log.warn(`Malformed poll interval "${rawInterval}", using ${DEFAULT_POLL_INTERVAL_MS}ms`);
        }
    }

    let logLevel: LogLevel = 'info';
    const rawLevel = nonEmpty(env.VITE_LOG_LEVEL)?.toLowerCase();
    if (rawLevel) {
        if (isLogLevel(rawLevel)) {
            logLevel = rawLevel;
        } else {
            log.warn(`Unknown log level "${rawLevel}", using info`);
        }
    }

    return {
        endpoint,
        apiKey:      env.VITE_OCTOPRINT_APIKEY?.trim() ?? '',
        width,
        height,
        stylePath:   (nonEmpty(env.VITE_STYLE_PATH) ?? '').replace(/\/+$/, ''),
        watchdogUrl: nonEmpty(env.VITE_WATCHDOG_URL),
        pollIntervalMs,
        logLevel,
    };
}

export function loadConfig(): AppConfig {
    return parseConfig(import.meta.env);
}
