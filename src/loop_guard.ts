/**
 * Non-progress guard: counts consecutive failures of one step that leave the
 * world-state hash unchanged.
 */

import { LOOP_GUARD_WINDOW } from './config';
import { createStructuredError, StructuredError } from './structured_error';

export class LoopGuard {
    private stepIdx = -1;
    private stateHash: string | null = null;
    private streak = 0;

    constructor(private readonly window: number = LOOP_GUARD_WINDOW) {}

    /** Returns the current streak after recording. */
    recordFailure(stepIdx: number, stateHash: string): number {
        if (stepIdx === this.stepIdx && stateHash === this.stateHash) {
            this.streak += 1;
        } else {
            this.stepIdx = stepIdx;
            this.stateHash = stateHash;
            this.streak = 1;
        }
        return this.streak;
    }

    recordSuccess(): void {
        this.stepIdx = -1;
        this.stateHash = null;
        this.streak = 0;
    }

    tripped(): boolean {
        return this.streak >= this.window;
    }

    get consecutiveFailures(): number {
        return this.streak;
    }

    toError(): StructuredError {
        return createStructuredError(
            'LOOP_DETECTED',
            `Step ${this.stepIdx} failed ${this.streak} times with unchanged state`,
            { step_idx: this.stepIdx, state_hash: this.stateHash, streak: this.streak }
        );
    }
}
