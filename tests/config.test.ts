// tests/config.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
    parseConfig,
    parseResolution,
    scaleFactorFor,
    DEFAULT_ENDPOINT,
} from '../src/core/config';
import { setLogLevel } from '../src/utils/log';

beforeEach(() => setLogLevel('info'));
afterEach(() => vi.restoreAllMocks());

describe('parseConfig', () => {
    it('fills every default from an empty env', () => {
        expect(parseConfig({})).toEqual({
            endpoint:       DEFAULT_ENDPOINT,
            apiKey:         '',
            width:          800,
            height:         480,
            stylePath:      '',
            watchdogUrl:    null,
            pollIntervalMs: 5000,
            logLevel:       'info',
        });
    });

    it('reads every variable', () => {
        expect(parseConfig({
            VITE_OCTOPRINT_HOST:   'http://octopi.local/',
            VITE_OCTOPRINT_APIKEY: 'test-secret',
            VITE_RESOLUTION:       '1024x600',
            VITE_STYLE_PATH:       '/themes/dark/',
            VITE_WATCHDOG_URL:     'http://localhost:9000/watchdog',
            VITE_POLL_INTERVAL_MS: '2500',
            VITE_LOG_LEVEL:        'DEBUG',
        })).toEqual({
            endpoint:       'http://octopi.local',
            apiKey:         'test-secret',
            width:          1024,
            height:         600,
            stylePath:      '/themes/dark',
            watchdogUrl:    'http://localhost:9000/watchdog',
            pollIntervalMs: 2500,
            logLevel:       'debug',
        });
    });

    it('blank values count as unset', () => {
        const cfg = parseConfig({ VITE_OCTOPRINT_HOST: '  ', VITE_WATCHDOG_URL: '' });
        expect(cfg.endpoint).toBe(DEFAULT_ENDPOINT);
        expect(cfg.watchdogUrl).toBeNull();
    });

    it('a malformed resolution falls back with a warning', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const cfg = parseConfig({ VITE_RESOLUTION: 'big' });

        expect([cfg.width, cfg.height]).toEqual([800, 480]);
        expect(warn).toHaveBeenCalledWith('[Config] Malformed resolution "big", using 800x480');
    });

    it('a malformed interval falls back with a warning', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        expect(parseConfig({ VITE_POLL_INTERVAL_MS: '-3' }).pollIntervalMs).toBe(5000);
        expect(warn).toHaveBeenCalledWith('[Config] Malformed poll interval "-3", using 5000ms');
    });

    it('an unknown log level falls back to info', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        expect(parseConfig({ VITE_LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
        expect(warn).toHaveBeenCalledWith('[Config] Unknown log level "verbose", using info');
    });
});

describe('parseResolution', () => {
    it('parses WIDTHxHEIGHT in either case', () => {
        expect(parseResolution('480x320')).toEqual({ width: 480, height: 320 });
        expect(parseResolution('1280X720')).toEqual({ width: 1280, height: 720 });
    });

    it('rejects zero and garbage', () => {
        expect(parseResolution('0x480')).toBeNull();
        expect(parseResolution('800')).toBeNull();
        expect(parseResolution('800x480x2')).toBeNull();
    });
});

describe('scaleFactorFor', () => {
    it('steps at 480 and 1000 pixels of width', () => {
        expect(scaleFactorFor(480)).toBe(1);
        expect(scaleFactorFor(800)).toBe(2);
        expect(scaleFactorFor(1000)).toBe(2);
        expect(scaleFactorFor(1024)).toBe(3);
    });
});
