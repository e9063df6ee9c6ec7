/**
 * Per-step retry state machine. Transitions return a new state; the
 * orchestrator holds exactly one per step and discards it when the step
 * succeeds.
 */

import { RETRY } from './config';
import { RecoveryAction } from './types';

export interface StepRetryState {
    readonly stepIdx: number;
    readonly attempts: number;
    readonly retries: number;
    readonly rollbacks: number;
    readonly nextDelayMs: number;
}

export function initialRetryState(stepIdx: number): StepRetryState {
    return { stepIdx, attempts: 0, retries: 0, rollbacks: 0, nextDelayMs: 0 };
}

/** min(base * 2^retries, max) */
export function backoffDelayMs(retries: number): number {
    return Math.min(RETRY.BASE_DELAY_MS * 2 ** retries, RETRY.MAX_DELAY_MS);
}

export function recordAttempt(state: StepRetryState): StepRetryState {
    return { ...state, attempts: state.attempts + 1 };
}

/** Transition after the policy chose an action that re-runs the step. */
export function applyRecovery(state: StepRetryState, action: RecoveryAction, delayMs: number): StepRetryState {
    switch (action) {
        case 'retry':
            return { ...state, retries: state.retries + 1, nextDelayMs: delayMs };
        case 'rollback_then_retry':
            return { ...state, rollbacks: state.rollbacks + 1, nextDelayMs: delayMs };
        case 'compensate_then_escalate':
        case 'escalate':
            return { ...state, nextDelayMs: 0 };
    }
}

export function canRetry(state: StepRetryState, maxRetries: number = RETRY.MAX_RETRIES_PER_STEP): boolean {
    return state.retries < maxRetries;
}

export function canRollback(state: StepRetryState, maxRollbacks: number = RETRY.MAX_ROLLBACKS_PER_STEP): boolean {
    return state.rollbacks < maxRollbacks;
}
