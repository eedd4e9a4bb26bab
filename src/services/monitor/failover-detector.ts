import { FailoverEvent, FailoverState } from './types.js';

/**
 * Tracks the active backend pool and reports every change.
 *
 * The first pool seen is the baseline and reports nothing. A different pool
 * afterwards is adopted at once, so repeats of the new pool stay quiet even
 * if the alert for the change was suppressed or throttled.
 */
export class FailoverDetector {
    private pool: string | null = null;

    /**
     * Current detector state
     */
    public get state(): FailoverState {
        return this.pool === null ? FailoverState.UNINITIALIZED : FailoverState.TRACKING;
    }

    /**
     * Pool currently tracked, if any
     */
    public get activePool(): string | null {
        return this.pool;
    }

    /**
     * Feed the pool of one record. Empty or absent pools are ignored.
     */
    public observe(pool: string | undefined): FailoverEvent | null {
        if (!pool) return null;

        if (this.pool === null) {
            this.pool = pool;
            return null;
        }

        if (pool === this.pool) return null;

        const event: FailoverEvent = { previousPool: this.pool, currentPool: pool };
        this.pool = pool;
        return event;
    }
}
