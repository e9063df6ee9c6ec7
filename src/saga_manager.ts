/**
 * Saga Manager
 *
 * Stack of compensating actions for completed reversible steps, plus the
 * idempotency ledger for irreversible ones. Lives outside the world state:
 * a checkpoint restore never rewinds either.
 */

import { createLogger } from './logger';
import { stableStringify } from './stable_stringify';
import { ErrorFactory, StructuredError } from './structured_error';
import { executeTool, ToolRegistry } from './tool_registry';
import { hashWorldState } from './world_state';
import { JsonObject, StepResult, WorldState } from './types';

const log = createLogger('saga');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface SagaFrame {
    /** Compensating tool name. */
    tool: string;
    args: JsonObject;
    /** Forward step this frame undoes. */
    stepIdx: number;
    stepName: string;
}

export interface CompensationRecord {
    frame: SagaFrame;
    result: StepResult;
    preStateHash: string;
    stateHash: string;
}

export interface SagaRollbackResult {
    compensated: CompensationRecord[];
    /** Set when a compensation failed; rollback stopped at that frame. */
    failure: StructuredError | null;
}

/* -------------------------------------------------------------------------- */
/* Manager                                                                    */
/* -------------------------------------------------------------------------- */

export function idempotencyKey(tool: string, params: JsonObject): string {
    return `${tool}:${stableStringify(params)}`;
}

export class SagaManager {
    private stack: SagaFrame[] = [];
    private ledger: Map<string, JsonObject> = new Map();

    constructor(private readonly registry: ToolRegistry) {}

    push(frame: SagaFrame): void {
        this.stack.push(frame);
        log.debug('Saga frame pushed', { tool: frame.tool, step_idx: frame.stepIdx, depth: this.stack.length });
    }

    get depth(): number {
        return this.stack.length;
    }

    frames(): readonly SagaFrame[] {
        return [...this.stack];
    }

    /** Discard the stack: the transaction is final. */
    commit(): void {
        this.stack = [];
    }

    /**
     * Pop and run frames LIFO. A failing compensation halts the rollback and
     * leaves the remaining frames on the stack.
     */
    rollback(state: WorldState, latencyFor: (frame: SagaFrame) => number = () => 0): SagaRollbackResult {
        const compensated: CompensationRecord[] = [];

        let frame = this.stack.pop();
        while (frame) {
            const tool = this.registry.get(frame.tool);
            const preStateHash = hashWorldState(state);
            const { result } = executeTool(tool, state, frame.args, null, latencyFor(frame));
            compensated.push({ frame, result, preStateHash, stateHash: hashWorldState(state) });

            if (result.status === 'error') {
                const failure = ErrorFactory.compensationFailed(
                    frame.tool,
                    frame.stepIdx,
                    result.error?.message ?? 'unknown error',
                    this.stack.length
                );
                log.error('Compensation failed, rollback halted', {
                    tool: frame.tool,
                    step_idx: frame.stepIdx,
                    remaining_frames: this.stack.length,
                });
                return { compensated, failure };
            }

            log.info('Compensation applied', { tool: frame.tool, step_idx: frame.stepIdx });
            frame = this.stack.pop();
        }

        return { compensated, failure: null };
    }

    /* ---------------------------------------------------------------------- */
    /* Irreversible ledger                                                    */
    /* ---------------------------------------------------------------------- */

    recordIrreversible(tool: string, params: JsonObject, output: JsonObject): void {
        this.ledger.set(idempotencyKey(tool, params), output);
    }

    /** Output of a previously applied irreversible call, or null. */
    appliedOutput(tool: string, params: JsonObject): JsonObject | null {
        return this.ledger.get(idempotencyKey(tool, params)) ?? null;
    }

    ledgerKeys(): string[] {
        return [...this.ledger.keys()];
    }
}
