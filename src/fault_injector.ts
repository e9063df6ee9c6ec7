/**
 * Fault Injector
 *
 * Decides, as a pure function of (seed, task, fault schedule, step, attempt),
 * whether a fault is applied to a call. Never reads or mutates world state,
 * so every strategy sees the identical fault sequence for a given seed.
 */

import crypto from 'crypto';
import { FaultDescriptor, FaultKind, FaultLayer, FaultSpec } from './types';

export const FAULT_KIND_LAYER: Record<FaultKind, FaultLayer> = {
    Timeout: 'transient',
    HTTP_500: 'transient',
    RateLimited: 'transient',
    AuthDenied: 'persistent',
    NotFound: 'persistent',
    BadRequest: 'persistent',
    Conflict: 'persistent',
    PolicyRejected: 'semantic',
    StaleWrite: 'semantic',
    StateCorruption: 'cascade',
    PartialWrite: 'cascade',
};

export const FAULT_MESSAGES: Record<FaultKind, string> = {
    Timeout: 'Request timeout after 30s',
    HTTP_500: 'Internal server error',
    RateLimited: 'Rate limit exceeded, retry later',
    AuthDenied: 'Authentication denied',
    NotFound: 'Resource not found',
    BadRequest: 'Invalid request parameters',
    Conflict: 'Resource conflict detected',
    PolicyRejected: 'Policy violation detected',
    StaleWrite: 'Write based on stale version',
    StateCorruption: 'State corruption detected',
    PartialWrite: 'Write only partially applied',
};

/** Inclusive simulated latency bounds per fault kind, in ms. */
const LATENCY_RANGES: Record<FaultKind, [number, number]> = {
    Timeout: [50, 150],
    HTTP_500: [30, 80],
    RateLimited: [20, 60],
    AuthDenied: [10, 40],
    NotFound: [10, 40],
    BadRequest: [10, 40],
    Conflict: [20, 60],
    PolicyRejected: [10, 40],
    StaleWrite: [10, 40],
    StateCorruption: [20, 60],
    PartialWrite: [20, 60],
};

const CLEAN_LATENCY_RANGE: [number, number] = [5, 20];

/** Kind reported when a tool's post-condition catches a silently dropped effect. */
export const POSTCONDITION_FAILED = 'PostconditionFailed';

export function isFaultKind(value: string): value is FaultKind {
    return value in FAULT_KIND_LAYER;
}

/**
 * Layer of an observed error kind. Policies classify from what they observe,
 * never from the injected ground truth.
 */
export function classifyErrorKind(kind: string): FaultLayer {
    if (isFaultKind(kind)) return FAULT_KIND_LAYER[kind];
    if (kind === POSTCONDITION_FAILED) return 'semantic';
    return 'persistent';
}

/* -------------------------------------------------------------------------- */
/* Seeded randomness                                                          */
/* -------------------------------------------------------------------------- */

/** Uniform number in [0, 1) derived from the SHA-256 of the joined parts. */
export function seededRoll(...parts: Array<string | number>): number {
    const digest = crypto.createHash('sha256').update(parts.join(':')).digest();
    return digest.readUInt32BE(0) / 0x1_0000_0000;
}

/** Integer in [low, high], inclusive. */
export function seededInt(low: number, high: number, ...parts: Array<string | number>): number {
    return low + Math.floor(seededRoll(...parts) * (high - low + 1));
}

/* -------------------------------------------------------------------------- */
/* Injection decision                                                         */
/* -------------------------------------------------------------------------- */

function fires(seed: number, taskId: string, spec: FaultSpec, attemptIdx: number): boolean {
    const mode = spec.mode ?? 'once';
    switch (mode) {
        case 'once':
            if (attemptIdx !== 0) return false;
            return seededRoll(seed, taskId, spec.faultId, spec.stepIdx) < spec.probability;
        case 'persistent':
            return seededRoll(seed, taskId, spec.faultId, spec.stepIdx) < spec.probability;
        case 'per_attempt':
            return seededRoll(seed, taskId, spec.faultId, spec.stepIdx, attemptIdx) < spec.probability;
    }
}

/**
 * The first schedule entry for this step that fires wins; later entries for
 * the same step are not consulted for this attempt.
 */
export function decideFault(
    seed: number,
    taskId: string,
    schedule: readonly FaultSpec[],
    stepIdx: number,
    attemptIdx: number
): FaultDescriptor | null {
    for (const spec of schedule) {
        if (spec.stepIdx !== stepIdx) continue;
        if (!fires(seed, taskId, spec, attemptIdx)) continue;

        return {
            faultId: spec.faultId,
            kind: spec.kind,
            layer: spec.layer ?? FAULT_KIND_LAYER[spec.kind],
            probability: spec.probability,
            stepIdx,
            attemptIdx,
            scenario: spec.scenario ?? null,
        };
    }
    return null;
}

export function simulatedLatencyMs(
    seed: number,
    taskId: string,
    stepIdx: number,
    attemptIdx: number,
    fault: FaultDescriptor | null
): number {
    if (fault) {
        const [low, high] = LATENCY_RANGES[fault.kind];
        return seededInt(low, high, seed, `${taskId}:${fault.faultId}`, fault.kind, attemptIdx);
    }
    const [low, high] = CLEAN_LATENCY_RANGE;
    return seededInt(low, high, seed, taskId, stepIdx, attemptIdx, 'clean');
}
