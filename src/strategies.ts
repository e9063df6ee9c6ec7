/**
 * Recovery strategies, one per baseline. Each is selected once per run by
 * createStrategy() and only implements `decide`; overrides live in the
 * policy engine.
 */

import { CONFIDENCE_THRESHOLDS, DIAGNOSIS_REPLY_TOKEN_LIMIT, RETRY } from './config';
import { estimateTokens } from './budget_guard';
import {
    buildDiagnosisRequest,
    DiagnosisCollaborator,
    HeuristicDiagnosisAgent,
    parseDiagnosisReply,
    reportMalformedReply,
} from './diagnosis';
import { classifyErrorKind } from './fault_injector';
import { createLogger } from './logger';
import { buildSignature, FaultSignature, MemoryBank } from './memory_bank';
import { makeDecision, PolicyInput, RecoveryStrategy } from './recovery_policy';
import { backoffDelayMs, canRetry, canRollback } from './retry_state';
import { DiagnosisReply, PolicyDecision, RecoveryAction, StrategyName } from './types';

const log = createLogger('strategy');

export const STRATEGY_NAMES: readonly StrategyName[] = ['none', 'naive_retry', 'rule_based', 'diagnosis', 'memory'];

export function isStrategyName(value: string): value is StrategyName {
    return STRATEGY_NAMES.some((n) => n === value);
}

/* -------------------------------------------------------------------------- */
/* B0 / B1 / B2                                                               */
/* -------------------------------------------------------------------------- */

export class NoRecoveryStrategy implements RecoveryStrategy {
    readonly name = 'none';

    async decide(): Promise<PolicyDecision> {
        return makeDecision('escalate', 'rule', 'No recovery configured');
    }
}

export class NaiveRetryStrategy implements RecoveryStrategy {
    readonly name = 'naive_retry';

    async decide(input: PolicyInput): Promise<PolicyDecision> {
        if (canRetry(input.retryState)) {
            return makeDecision('retry', 'rule', 'Retry with fixed delay', { delayMs: RETRY.NAIVE_DELAY_MS });
        }
        return makeDecision('escalate', 'rule', 'Retries exhausted');
    }
}

export class RuleBasedStrategy implements RecoveryStrategy {
    readonly name = 'rule_based';

    async decide(input: PolicyInput): Promise<PolicyDecision> {
        const kind = input.result.error?.kind ?? 'Unknown';
        const layer = classifyErrorKind(kind);
        const state = input.retryState;

        if (layer === 'transient') {
            return canRetry(state)
                ? makeDecision('retry', 'rule', `${kind} is transient`, { delayMs: backoffDelayMs(state.retries) })
                : makeDecision('escalate', 'rule', `${kind} persisted after ${state.retries} retries`);
        }
        if (kind === 'Conflict') {
            return canRollback(state)
                ? makeDecision('rollback_then_retry', 'rule', 'Conflict: restore and retry once')
                : makeDecision('escalate', 'rule', 'Conflict persisted after rollback');
        }
        if (layer === 'cascade') {
            return makeDecision('compensate_then_escalate', 'rule', `${kind} left partial effects`);
        }
        return makeDecision('escalate', 'rule', `${kind} is ${layer}, not recoverable by rule`);
    }
}

/* -------------------------------------------------------------------------- */
/* B3: diagnosis                                                              */
/* -------------------------------------------------------------------------- */

function mapReplyAction(action: DiagnosisReply['action']): RecoveryAction {
    switch (action) {
        case 'retry': return 'retry';
        case 'rollback': return 'rollback_then_retry';
        case 'compensate': return 'compensate_then_escalate';
        case 'escalate': return 'escalate';
    }
}

export class DiagnosisStrategy implements RecoveryStrategy {
    readonly name: StrategyName = 'diagnosis';

    constructor(
        private readonly collaborator: DiagnosisCollaborator,
        private readonly threshold: number = CONFIDENCE_THRESHOLDS.DIAGNOSIS,
        private readonly replyTokenLimit: number = DIAGNOSIS_REPLY_TOKEN_LIMIT
    ) {}

    async decide(input: PolicyInput): Promise<PolicyDecision> {
        const request = buildDiagnosisRequest(input.context, input.result, input.history);
        const requestTokens = estimateTokens(request);

        const reserved = requestTokens + this.replyTokenLimit;

        const admission = input.budget.admit({ toolCalls: 1, tokens: reserved });
        if (!admission.admitted) {
            return makeDecision('escalate', 'budget', admission.error?.message ?? 'No token budget for diagnosis');
        }

        let raw: unknown;
        try {
            raw = await this.collaborator.diagnose(request);
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            reportMalformedReply(request, [`collaborator failed: ${message}`]);
            return makeDecision('escalate', 'diagnosis', `Diagnosis unavailable: ${message}`, {
                confidence: 0,
                tokensUsed: requestTokens,
            });
        }

        const replyTokens = estimateTokens(raw);
        if (replyTokens > this.replyTokenLimit) {
            reportMalformedReply(request, [`reply of ${replyTokens} tokens exceeds ${this.replyTokenLimit}`]);
            return makeDecision('escalate', 'diagnosis', `Diagnosis reply exceeds ${this.replyTokenLimit} tokens`, {
                confidence: 0,
                tokensUsed: reserved,
            });
        }

        const tokensUsed = requestTokens + replyTokens;
        const { reply, errors } = parseDiagnosisReply(raw);
        if (!reply) {
            reportMalformedReply(request, errors);
            return makeDecision('escalate', 'diagnosis', 'Malformed diagnosis reply', { confidence: 0, tokensUsed });
        }

        if (reply.confidence < this.threshold) {
            return makeDecision(
                'escalate',
                'diagnosis',
                `Diagnosis confidence ${reply.confidence} below ${this.threshold}`,
                { confidence: reply.confidence, diagnosis: reply, tokensUsed }
            );
        }

        const action = mapReplyAction(reply.action);
        return makeDecision(action, 'diagnosis', reply.reasoning || `Diagnosed ${reply.layer}`, {
            confidence: reply.confidence,
            diagnosis: reply,
            delayMs: action === 'retry' ? backoffDelayMs(input.retryState.retries) : 0,
            tokensUsed,
        });
    }
}

/* -------------------------------------------------------------------------- */
/* B4: memory                                                                 */
/* -------------------------------------------------------------------------- */

interface PendingOutcome {
    signature: FaultSignature;
    action: RecoveryAction;
}

/**
 * Consults the Memory Bank before diagnosis. Decisions it makes are held per
 * task and written back with the task's success once the task ends.
 */
export class MemoryStrategy implements RecoveryStrategy {
    readonly name = 'memory';
    private readonly fallback: DiagnosisStrategy;
    private pending: Map<string, PendingOutcome[]> = new Map();

    constructor(
        private readonly bank: MemoryBank,
        collaborator: DiagnosisCollaborator,
        private readonly bypassThreshold: number = CONFIDENCE_THRESHOLDS.MEMORY_BYPASS,
        diagnosisThreshold: number = CONFIDENCE_THRESHOLDS.DIAGNOSIS
    ) {
        this.fallback = new DiagnosisStrategy(collaborator, diagnosisThreshold);
    }

    async decide(input: PolicyInput): Promise<PolicyDecision> {
        const signature = buildSignature(input.context, input.result);
        const hit = this.bank.query(signature);

        if (hit.action && hit.confidence >= this.bypassThreshold) {
            log.debug('Memory bypass', { key: hit.matchedKey, action: hit.action, confidence: hit.confidence });
            return makeDecision(hit.action, 'memory', `Remembered action for ${hit.matchedKey}`, {
                confidence: hit.confidence,
                memoryKey: hit.matchedKey,
                delayMs: hit.action === 'retry' ? backoffDelayMs(input.retryState.retries) : 0,
            });
        }

        const decision = await this.fallback.decide(input);
        return { ...decision, memoryKey: hit.matchedKey };
    }

    onDecision(input: PolicyInput, decision: PolicyDecision): void {
        if (decision.source !== 'memory' && decision.source !== 'diagnosis') return;
        const list = this.pending.get(input.context.taskId) ?? [];
        list.push({ signature: buildSignature(input.context, input.result), action: decision.action });
        this.pending.set(input.context.taskId, list);
    }

    recordOutcome(taskId: string, success: boolean): void {
        const list = this.pending.get(taskId) ?? [];
        for (const { signature, action } of list) {
            this.bank.upsert(signature, action, success);
        }
        this.pending.delete(taskId);
    }
}

/* -------------------------------------------------------------------------- */
/* Factory                                                                    */
/* -------------------------------------------------------------------------- */

export interface StrategyDeps {
    collaborator?: DiagnosisCollaborator;
    memory?: MemoryBank;
    diagnosisThreshold?: number;
    memoryThreshold?: number;
}

export function createStrategy(name: StrategyName, deps: StrategyDeps = {}): RecoveryStrategy {
    switch (name) {
        case 'none':
            return new NoRecoveryStrategy();
        case 'naive_retry':
            return new NaiveRetryStrategy();
        case 'rule_based':
            return new RuleBasedStrategy();
        case 'diagnosis':
            return new DiagnosisStrategy(deps.collaborator ?? new HeuristicDiagnosisAgent(), deps.diagnosisThreshold);
        case 'memory':
            return new MemoryStrategy(
                deps.memory ?? new MemoryBank(),
                deps.collaborator ?? new HeuristicDiagnosisAgent(),
                deps.memoryThreshold,
                deps.diagnosisThreshold
            );
    }
}
