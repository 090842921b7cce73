// tests/BackgroundTask.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BackgroundTask } from '../src/services/BackgroundTask';
import { setLogLevel }    from '../src/utils/log';

describe('BackgroundTask', () => {
    beforeEach(() => {
        vi.useFakeTimers();
        setLogLevel('info');
    });
    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('runs the task immediately on start, then once per interval', () => {
        const task = vi.fn();
        const bg = new BackgroundTask(5000, task);

        bg.start();
        expect(task).toHaveBeenCalledTimes(1);

        vi.advanceTimersByTime(4999);
        expect(task).toHaveBeenCalledTimes(1);

        vi.advanceTimersByTime(1);
        expect(task).toHaveBeenCalledTimes(2);

        vi.advanceTimersByTime(10000);
        expect(task).toHaveBeenCalledTimes(4);
        bg.stop();
    });

    it('a second start() warns and does not add a second schedule', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const task = vi.fn();
        const bg = new BackgroundTask(1000, task);

        bg.start();
        bg.start();
        expect(task).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith('[BackgroundTask] start() called on a task that is already running');

        vi.advanceTimersByTime(1000);
        expect(task).toHaveBeenCalledTimes(2);
        bg.stop();
    });

    it('keeps ticking after the task throws', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const task = vi.fn(() => { throw new Error('boom'); });
        const bg = new BackgroundTask(1000, task);

        bg.start();
        vi.advanceTimersByTime(2000);
        expect(task).toHaveBeenCalledTimes(3);
        expect(error).toHaveBeenCalledWith('[BackgroundTask] Task failed: Error: boom');
        bg.stop();
    });

    it('logs a rejected task promise', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const bg = new BackgroundTask(1000, async () => { throw new Error('rejected'); });

        bg.start();
        await Promise.resolve();
        expect(error).toHaveBeenCalledWith('[BackgroundTask] Task failed: Error: rejected');
        bg.stop();
    });

    it('does not wait for a slow task before the next tick', () => {
        let resolveFirst: () => void = () => {};
        const task = vi.fn()
            .mockImplementationOnce(() => new Promise<void>(resolve => { resolveFirst = resolve; }))
            .mockImplementation(() => Promise.resolve());
        const bg = new BackgroundTask(1000, task);

        bg.start();
        vi.advanceTimersByTime(1000);
        expect(task).toHaveBeenCalledTimes(2);
        resolveFirst();
        bg.stop();
    });

    it('stop() ends the schedule', () => {
        const task = vi.fn();
        const bg = new BackgroundTask(1000, task);

        bg.start();
        expect(bg.running).toBe(true);
        bg.stop();
        expect(bg.running).toBe(false);

        vi.advanceTimersByTime(5000);
        expect(task).toHaveBeenCalledTimes(1);
    });
});
