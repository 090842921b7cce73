// src/services/BackgroundTask.ts

import { createLogger } from '../utils/log';

const log = createLogger('BackgroundTask');

/**
 * BackgroundTask
 *
 * Runs one action on a fixed wall-clock interval, starting immediately.
 * The schedule is independent of how long the action takes, so a slow tick
 * never delays the next one.  Errors belong to the action; anything that
 * still escapes is logged and the schedule carries on.
 */
export class BackgroundTask {
    private timer: ReturnType<typeof setInterval> | null = null;

    constructor(
        private readonly intervalMs: number,
        private readonly task:       () => void | Promise<void>,
    ) {}

    get running(): boolean {
        return this.timer !== null;
    }

    start(): void {
        if (this.timer !== null) {
            log.warn('start() called on a task that is already running');
            return;
        }

        this.execute();
        this.timer = setInterval(() => this.execute(), this.intervalMs);
    }

    stop(): void {
        if (this.timer === null) return;
        clearInterval(this.timer);
        this.timer = null;
    }

    private execute(): void {
        try {
            const result = this.task();
            if (result instanceof Promise) {
                result.catch((err: unknown) => log.error(`Task failed: ${String(err)}`));
            }
        } catch (err) {
            log.error(`Task failed: ${String(err)}`);
        }
    }
}
