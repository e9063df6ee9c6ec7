/**
 * Recovery Policy Engine
 *
 * Evaluates a failed attempt and selects the recovery action. Cross-cutting
 * overrides wrap the run's strategy in a fixed order:
 *
 *   1. loop guard   (non-progress → escalate)
 *   2. budget       (next attempt not admissible → escalate)
 *   3. strategy     (decide)
 *   4. bounds       (retry/rollback past the per-step cap → escalate)
 */

import { RETRY } from './config';
import { BudgetGuard } from './budget_guard';
import { createLogger } from './logger';
import { canRetry, canRollback, StepRetryState } from './retry_state';
import {
    DecisionSource,
    DiagnosisReply,
    PolicyDecision,
    RecoveryAction,
    StepContext,
    StepResult,
    StrategyName,
    TraceEvent,
} from './types';

const log = createLogger('policy');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface PolicyInput {
    context: StepContext;
    result: StepResult;
    /** Trace events of the current task so far. */
    history: readonly TraceEvent[];
    retryState: StepRetryState;
    loopTripped: boolean;
    budget: BudgetGuard;
}

export interface RecoveryStrategy {
    readonly name: StrategyName;
    decide(input: PolicyInput): Promise<PolicyDecision>;
    /** Sees the final decision after engine overrides. */
    onDecision?(input: PolicyInput, decision: PolicyDecision): void;
    /** Called once when a task ends. */
    recordOutcome?(taskId: string, success: boolean): void;
}

export interface DecisionDetails {
    confidence?: number;
    delayMs?: number;
    diagnosis?: DiagnosisReply | null;
    memoryKey?: string | null;
    tokensUsed?: number;
}

export function makeDecision(
    action: RecoveryAction,
    source: DecisionSource,
    rationale: string,
    details: DecisionDetails = {}
): PolicyDecision {
    return {
        action,
        source,
        rationale,
        confidence: details.confidence ?? 1,
        delayMs: details.delayMs ?? 0,
        diagnosis: details.diagnosis ?? null,
        memoryKey: details.memoryKey ?? null,
        tokensUsed: details.tokensUsed ?? 0,
    };
}

/* -------------------------------------------------------------------------- */
/* Engine                                                                     */
/* -------------------------------------------------------------------------- */

export class RecoveryPolicyEngine {
    private readonly maxRetriesPerStep: number;
    private readonly maxRollbacksPerStep: number;

    constructor(
        public readonly strategy: RecoveryStrategy,
        config?: {
            maxRetriesPerStep?: number;
            maxRollbacksPerStep?: number;
        }
    ) {
        this.maxRetriesPerStep = config?.maxRetriesPerStep ?? RETRY.MAX_RETRIES_PER_STEP;
        this.maxRollbacksPerStep = config?.maxRollbacksPerStep ?? RETRY.MAX_ROLLBACKS_PER_STEP;
    }

    async evaluate(input: PolicyInput): Promise<PolicyDecision> {
        const decision = await this.select(input);
        this.strategy.onDecision?.(input, decision);

        log.debug('Recovery decision', {
            step_idx: input.context.stepIdx,
            attempt_idx: input.context.attemptIdx,
            error_kind: input.result.error?.kind ?? null,
            action: decision.action,
            source: decision.source,
            confidence: decision.confidence,
        });
        return decision;
    }

    private async select(input: PolicyInput): Promise<PolicyDecision> {
        if (input.loopTripped) {
            return makeDecision('escalate', 'loop_guard', 'Repeated failure with unchanged state');
        }

        const admission = input.budget.admit({ toolCalls: 1 });
        if (!admission.admitted) {
            return makeDecision(
                'escalate',
                'budget',
                admission.error?.message ?? 'Budget cannot admit another attempt'
            );
        }

        const proposed = await this.strategy.decide(input);
        return this.applyBounds(proposed, input.retryState);
    }

    private applyBounds(decision: PolicyDecision, state: StepRetryState): PolicyDecision {
        if (decision.action === 'retry' && !canRetry(state, this.maxRetriesPerStep)) {
            return {
                ...decision,
                action: 'escalate',
                source: 'bound',
                delayMs: 0,
                rationale: `Exceeded maximum retries per step (${this.maxRetriesPerStep}); was: ${decision.rationale}`,
            };
        }
        if (decision.action === 'rollback_then_retry' && !canRollback(state, this.maxRollbacksPerStep)) {
            return {
                ...decision,
                action: 'escalate',
                source: 'bound',
                delayMs: 0,
                rationale: `Exceeded maximum rollbacks per step (${this.maxRollbacksPerStep}); was: ${decision.rationale}`,
            };
        }
        return decision;
    }
}
