/**
 * Time source for the runtime. Budget accounting, simulated latency and
 * backoff all go through a Clock so a run can be replayed on virtual time.
 */

export interface Clock {
    /** Milliseconds since an arbitrary fixed origin. */
    now(): number;
    sleep(ms: number): Promise<void>;
}

export class SystemClock implements Clock {
    now(): number {
        return Date.now();
    }

    sleep(ms: number): Promise<void> {
        if (ms <= 0) return Promise.resolve();
        return new Promise((resolve) => setTimeout(resolve, ms));
    }
}

/** Advances only when slept on. */
export class VirtualClock implements Clock {
    private current: number;

    constructor(startMs: number = 0) {
        this.current = startMs;
    }

    now(): number {
        return this.current;
    }

    sleep(ms: number): Promise<void> {
        if (ms > 0) this.current += ms;
        return Promise.resolve();
    }

    advance(ms: number): void {
        this.current += ms;
    }
}
