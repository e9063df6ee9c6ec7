/**
 * BudgetGuard — per-task resource control for tool calls, diagnosis tokens
 * and wall-clock time.
 *
 * INVARIANT: No attempt and no diagnosis request runs without passing admit().
 * Compensations are charged but never gated: a rollback always completes.
 *
 * Features:
 * - Hard ceilings (fail-closed): tokens, tool calls, elapsed ms
 * - Pre-flight admission against the projected usage
 * - Charge ledger with the reason of every charge
 * - Snapshot of used/remaining counters for traces and step contexts
 */

import { CHARS_PER_TOKEN, DEFAULT_BUDGET } from './config';
import { Clock } from './clock';
import { createLogger } from './logger';
import { stableStringify } from './stable_stringify';
import { createStructuredError, StructuredError } from './structured_error';
import { BudgetCeilings, BudgetSnapshot } from './types';

const log = createLogger('budget');

export interface BudgetCharge {
    tokens?: number;
    toolCalls?: number;
}

export interface ChargeRecord {
    reason: string;
    tokens: number;
    toolCalls: number;
    atMs: number;
}

export interface Admission {
    admitted: boolean;
    /** Present when refused. */
    error: StructuredError | null;
}

export function defaultCeilings(): BudgetCeilings {
    return {
        maxTokens: DEFAULT_BUDGET.MAX_TOKENS,
        maxToolCalls: DEFAULT_BUDGET.MAX_TOOL_CALLS,
        maxTimeMs: DEFAULT_BUDGET.MAX_TIME_MS,
    };
}

/** Token estimate for a payload sent to or received from a collaborator. */
export function estimateTokens(payload: unknown): number {
    const text = typeof payload === 'string' ? payload : stableStringify(payload ?? null);
    return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export class BudgetGuard {
    private usedTokens = 0;
    private usedToolCalls = 0;
    private readonly startMs: number;
    private ledger: ChargeRecord[] = [];
    private warned = false;

    constructor(
        private readonly clock: Clock,
        private readonly ceilings: BudgetCeilings = defaultCeilings(),
        private readonly warnThreshold: number = 0.8
    ) {
        this.startMs = clock.now();
    }

    /**
     * Pre-flight check: would this charge stay within every ceiling?
     * Elapsed time at or past its ceiling refuses everything.
     */
    admit(charge: BudgetCharge): Admission {
        const tokens = charge.tokens ?? 0;
        const toolCalls = charge.toolCalls ?? 0;
        const elapsed = this.elapsedMs();

        let refusal: string | null = null;
        if (elapsed >= this.ceilings.maxTimeMs) {
            refusal = `time ${elapsed}ms reached ceiling ${this.ceilings.maxTimeMs}ms`;
        } else if (this.usedToolCalls + toolCalls > this.ceilings.maxToolCalls) {
            refusal = `tool calls ${this.usedToolCalls}+${toolCalls} exceed ceiling ${this.ceilings.maxToolCalls}`;
        } else if (this.usedTokens + tokens > this.ceilings.maxTokens) {
            refusal = `tokens ${this.usedTokens}+${tokens} exceed ceiling ${this.ceilings.maxTokens}`;
        }

        if (refusal) {
            log.warn('Budget refused', { reason: refusal });
            return {
                admitted: false,
                error: createStructuredError('BUDGET_EXHAUSTED', `Budget exhausted: ${refusal}`, {
                    ...this.snapshot(),
                    requested_tokens: tokens,
                    requested_tool_calls: toolCalls,
                }),
            };
        }
        return { admitted: true, error: null };
    }

    /** Record actual usage. Counters only grow. */
    consume(reason: string, charge: BudgetCharge): void {
        const tokens = Math.max(0, charge.tokens ?? 0);
        const toolCalls = Math.max(0, charge.toolCalls ?? 0);
        this.usedTokens += tokens;
        this.usedToolCalls += toolCalls;
        this.ledger.push({ reason, tokens, toolCalls, atMs: this.elapsedMs() });

        if (!this.warned && this.fractionUsed() > this.warnThreshold) {
            this.warned = true;
            log.warn('Budget warning', { ...this.snapshot(), threshold: this.warnThreshold });
        }
        log.debug('Budget charged', { reason, tokens, tool_calls: toolCalls });
    }

    elapsedMs(): number {
        return Math.max(0, this.clock.now() - this.startMs);
    }

    snapshot(): BudgetSnapshot {
        const usedTimeMs = this.elapsedMs();
        return {
            usedTokens: this.usedTokens,
            usedToolCalls: this.usedToolCalls,
            usedTimeMs,
            remainingTokens: Math.max(0, this.ceilings.maxTokens - this.usedTokens),
            remainingToolCalls: Math.max(0, this.ceilings.maxToolCalls - this.usedToolCalls),
            remainingTimeMs: Math.max(0, this.ceilings.maxTimeMs - usedTimeMs),
        };
    }

    getLedger(): ChargeRecord[] {
        return [...this.ledger];
    }

    private fractionUsed(): number {
        return Math.max(
            this.usedTokens / this.ceilings.maxTokens,
            this.usedToolCalls / this.ceilings.maxToolCalls,
            this.elapsedMs() / this.ceilings.maxTimeMs
        );
    }
}
