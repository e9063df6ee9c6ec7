/**
 * Workflow Orchestrator
 *
 * Drives one task's fixed step sequence against the tool registry:
 *
 *   admit → checkpoint → inject → execute → charge → trace
 *     ok:    push saga frame / record irreversible effect, next step
 *     error: loop guard → policy → trace → retry | rollback | compensate | escalate
 *
 * A failed call that applied a reversible effect is restored from its
 * checkpoint before any retry or escalation, so no partial write survives.
 *
 * Domain faults never escape; a RuntimeInvariantError ends the task as an
 * unhandled failure with a critical ticket.
 */

import { BudgetGuard, defaultCeilings } from './budget_guard';
import { CheckpointManager } from './checkpoint_manager';
import { Clock, SystemClock } from './clock';
import { DEFAULT_SEED } from './config';
import { decideFault, simulatedLatencyMs } from './fault_injector';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import { LoopGuard } from './loop_guard';
import { PolicyInput, RecoveryPolicyEngine } from './recovery_policy';
import { applyRecovery, initialRetryState, recordAttempt } from './retry_state';
import { SagaManager } from './saga_manager';
import { RuntimeInvariantError, StructuredError } from './structured_error';
import { executeTool, ToolRegistry } from './tool_registry';
import { TraceSink } from './trace_sink';
import {
    checkInvariants,
    checkRollbackConsistency,
    cloneWorldState,
    createWorldState,
    evaluatePredicate,
    hashWorldState,
} from './world_state';
import {
    BudgetCeilings,
    BudgetSnapshot,
    DecisionSource,
    JsonObject,
    PolicyDecision,
    RecoveryAction,
    StepContext,
    StepResult,
    Task,
    TaskOutcome,
    TraceEvent,
    WorldState,
} from './types';

const log = createLogger('orchestrator');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface OrchestratorOptions {
    registry: ToolRegistry;
    engine: RecoveryPolicyEngine;
    sink: TraceSink;
    clock?: Clock;
    seed?: number;
    ceilings?: BudgetCeilings;
    runId?: string;
}

export interface TaskReport {
    taskId: string;
    outcome: TaskOutcome;
    reason: string;
    events: TraceEvent[];
    finalState: WorldState;
    invariantsOk: boolean;
    rollbackConsistent: boolean | null;
    ticketId: string | null;
    budget: BudgetSnapshot;
}

interface Termination {
    outcome: TaskOutcome;
    reason: string;
}

interface AttemptOutcome {
    result: StepResult;
    /** A failed call left a reversible effect in the world state. */
    partialEffect: boolean;
}

const TICKET_TOOL = 'create_ticket';

/* -------------------------------------------------------------------------- */
/* Per-task run                                                               */
/* -------------------------------------------------------------------------- */

class TaskRun {
    readonly state: WorldState;
    readonly initial: WorldState;
    readonly events: TraceEvent[] = [];
    readonly budget: BudgetGuard;
    readonly loop = new LoopGuard();
    readonly checkpoints = new CheckpointManager();
    readonly saga: SagaManager;

    ticketId: string | null = null;
    unwound = false;
    private seq = 0;

    constructor(
        readonly task: Task,
        private readonly opts: Required<OrchestratorOptions>
    ) {
        this.state = createWorldState(task.initialState);
        this.initial = cloneWorldState(this.state);
        this.budget = new BudgetGuard(opts.clock, opts.ceilings);
        this.saga = new SagaManager(opts.registry);
    }

    emit(fields: Partial<TraceEvent> & Pick<TraceEvent, 'event_type' | 'status'>): TraceEvent {
        const event: TraceEvent = {
            seq: this.seq++,
            run_id: this.opts.runId,
            task_id: this.task.taskId,
            strategy: this.opts.engine.strategy.name,
            step_idx: -1,
            step_name: '',
            tool_name: '',
            attempt_idx: 0,
            params: {},
            latency_ms: 0,
            error_kind: null,
            error_message: null,
            injected_fault: null,
            pre_state_hash: null,
            state_hash: hashWorldState(this.state),
            recovery_action: null,
            decision_source: null,
            confidence: null,
            diagnosis: null,
            budget: this.budget.snapshot(),
            saga_depth: this.saga.depth,
            final_outcome: null,
            final_reason: null,
            invariants_ok: null,
            rollback_consistent: null,
            ts_ms: this.opts.clock.now(),
            ...fields,
        };
        this.events.push(event);
        this.opts.sink.append(event);
        return event;
    }
}

/* -------------------------------------------------------------------------- */
/* Orchestrator                                                               */
/* -------------------------------------------------------------------------- */

export class WorkflowOrchestrator {
    private readonly opts: Required<OrchestratorOptions>;

    constructor(options: OrchestratorOptions) {
        this.opts = {
            clock: new SystemClock(),
            seed: DEFAULT_SEED,
            ceilings: defaultCeilings(),
            runId: 'run-0',
            ...options,
        };
    }

    get strategyName(): string {
        return this.opts.engine.strategy.name;
    }

    async runTask(task: Task): Promise<TaskReport> {
        setCorrelation({ runId: this.opts.runId, taskId: task.taskId, strategy: this.opts.engine.strategy.name });
        const run = new TaskRun(task, this.opts);
        log.info('Task started', { steps: task.steps.length, faults: task.faults.length });

        let termination: Termination;
        try {
            termination = await this.runSteps(run);
        } catch (e) {
            if (!(e instanceof RuntimeInvariantError)) {
                clearCorrelation();
                throw e;
            }
            termination = this.handleInvariant(run, e.detail);
        }

        const report = this.finish(run, termination);
        this.opts.engine.strategy.recordOutcome?.(task.taskId, report.outcome === 'success');
        log.info('Task finished', { outcome: report.outcome, reason: report.reason, events: report.events.length });
        clearCorrelation();
        return report;
    }

    /* ---------------------------------------------------------------------- */
    /* Step loop                                                              */
    /* ---------------------------------------------------------------------- */

    private async runSteps(run: TaskRun): Promise<Termination> {
        const { task } = run;

        for (let stepIdx = 0; stepIdx < task.steps.length; stepIdx++) {
            const step = task.steps[stepIdx];
            let retry = initialRetryState(stepIdx);
            let attemptIdx = 0;

            for (;;) {
                const admission = run.budget.admit({ toolCalls: 1 });
                if (!admission.admitted) {
                    return this.escalate(run, stepIdx, 'budget', admission.error?.message ?? 'Budget exhausted', admission.error);
                }

                const tool = this.opts.registry.get(step.toolName);
                const preHash = hashWorldState(run.state);
                const context: StepContext = Object.freeze({
                    taskId: task.taskId,
                    stepIdx,
                    stepName: step.stepName,
                    toolName: step.toolName,
                    params: step.params,
                    attemptIdx,
                    stateHash: preHash,
                    budgetRemaining: run.budget.snapshot(),
                });
                const token = run.checkpoints.snapshot(run.state);

                const { result, partialEffect } = await this.attempt(run, context, tool.irreversible === true);
                retry = recordAttempt(retry);

                const base = {
                    step_idx: stepIdx,
                    step_name: step.stepName,
                    tool_name: step.toolName,
                    attempt_idx: attemptIdx,
                    params: step.params,
                    latency_ms: result.latencyMs,
                    injected_fault: result.injectedFault,
                    pre_state_hash: preHash,
                };

                if (result.status === 'ok') {
                    run.loop.recordSuccess();
                    run.emit({ ...base, event_type: 'attempt', status: 'ok' });
                    run.checkpoints.release(token);
                    break;
                }

                run.loop.recordFailure(stepIdx, hashWorldState(run.state));
                const input: PolicyInput = {
                    context,
                    result,
                    history: run.events,
                    retryState: retry,
                    loopTripped: run.loop.tripped(),
                    budget: run.budget,
                };
                const decision = await this.opts.engine.evaluate(input);
                if (decision.tokensUsed > 0) {
                    run.budget.consume('diagnosis', { tokens: decision.tokensUsed });
                }

                run.emit({
                    ...base,
                    event_type: 'attempt',
                    status: 'error',
                    error_kind: result.error?.kind ?? null,
                    error_message: result.error?.message ?? null,
                    recovery_action: decision.action,
                    decision_source: decision.source,
                    confidence: decision.confidence,
                    diagnosis: decision.diagnosis,
                });

                switch (decision.action) {
                    case 'retry':
                        if (partialEffect) this.restoreCheckpoint(run, token, context, 'retry');
                        retry = applyRecovery(retry, 'retry', decision.delayMs);
                        run.checkpoints.release(token);
                        await this.opts.clock.sleep(retry.nextDelayMs);
                        attemptIdx++;
                        continue;

                    case 'rollback_then_retry':
                        this.restoreCheckpoint(run, token, context, 'rollback_then_retry');
                        retry = applyRecovery(retry, 'rollback_then_retry', decision.delayMs);
                        run.checkpoints.release(token);
                        await this.opts.clock.sleep(retry.nextDelayMs);
                        attemptIdx++;
                        continue;

                    case 'compensate_then_escalate':
                        this.restoreCheckpoint(run, token, context, 'compensate_then_escalate');
                        run.checkpoints.release(token);
                        run.unwound = true;
                        return this.escalate(run, stepIdx, decision.source, decision.rationale, this.escalationError(run, decision));

                    case 'escalate':
                        if (partialEffect) {
                            this.restoreCheckpoint(run, token, context, 'escalate');
                            run.unwound = true;
                        }
                        run.checkpoints.release(token);
                        return this.escalate(run, stepIdx, decision.source, decision.rationale, this.escalationError(run, decision));
                }
            }
        }

        run.saga.commit();
        const ok = evaluatePredicate(run.state, task.successPredicate);
        return ok
            ? { outcome: 'success', reason: 'All steps completed and success predicate holds' }
            : { outcome: 'predicate_failed', reason: 'All steps completed but success predicate is false' };
    }

    /**
     * One call, or a ledger replay for an irreversible effect already applied.
     * Irreversible effects never count as partial: the ledger keeps them.
     */
    private async attempt(run: TaskRun, context: StepContext, irreversible: boolean): Promise<AttemptOutcome> {
        const tool = this.opts.registry.get(context.toolName);

        if (irreversible) {
            const previous = run.saga.appliedOutput(tool.name, context.params);
            if (previous) {
                log.info('Irreversible effect already applied, skipping call', { tool: tool.name, step_idx: context.stepIdx });
                return {
                    result: {
                        status: 'ok',
                        output: { ...previous, deduplicated: true },
                        error: null,
                        latencyMs: 0,
                        injectedFault: null,
                    },
                    partialEffect: false,
                };
            }
        }

        const fault = decideFault(this.opts.seed, context.taskId, run.task.faults, context.stepIdx, context.attemptIdx);
        const latencyMs = simulatedLatencyMs(this.opts.seed, context.taskId, context.stepIdx, context.attemptIdx, fault);
        await this.opts.clock.sleep(latencyMs);

        const { result, effectApplied } = executeTool(tool, run.state, context.params, fault, latencyMs);
        run.budget.consume(`call:${tool.name}`, { toolCalls: 1 });

        if (fault) {
            log.debug('Fault injected', { fault_id: fault.faultId, kind: fault.kind, layer: fault.layer, attempt_idx: context.attemptIdx });
        }

        if (effectApplied && irreversible) {
            run.saga.recordIrreversible(tool.name, context.params, result.output ?? {});
        }
        if (effectApplied && result.status === 'ok' && result.output && tool.compensate) {
            run.saga.push({
                tool: tool.compensate.tool,
                args: tool.compensate.args(context.params, result.output),
                stepIdx: context.stepIdx,
                stepName: context.stepName,
            });
        }
        return { result, partialEffect: effectApplied && result.status === 'error' && !irreversible };
    }

    /* ---------------------------------------------------------------------- */
    /* Recovery actions                                                       */
    /* ---------------------------------------------------------------------- */

    /** Undo the failed attempt's effects. Only an explicit rollback is audited. */
    private restoreCheckpoint(run: TaskRun, token: string, context: StepContext, action: RecoveryAction): void {
        const before = hashWorldState(run.state);
        run.checkpoints.restore(token, run.state);
        if (action === 'rollback_then_retry') {
            run.state.auditLog.push({ action: 'rollback', step_idx: context.stepIdx, checkpoint: token });
        }
        run.emit({
            event_type: 'rollback',
            status: 'ok',
            step_idx: context.stepIdx,
            step_name: context.stepName,
            tool_name: context.toolName,
            attempt_idx: context.attemptIdx,
            params: context.params,
            pre_state_hash: before,
            recovery_action: action,
        });
    }

    private escalationError(run: TaskRun, decision: PolicyDecision): StructuredError | null {
        if (decision.source === 'loop_guard') return run.loop.toError();
        return null;
    }

    /** Unwind the saga, raise a ticket and stop. */
    private async escalate(
        run: TaskRun,
        stepIdx: number,
        source: DecisionSource,
        reason: string,
        detail: StructuredError | null
    ): Promise<Termination> {
        const compensations = await this.unwindSaga(run);
        if (compensations) return compensations;

        const summary = detail ? `${detail.code}: ${reason}` : reason;
        this.raiseTicket(run, stepIdx, source, summary, detail ? 'high' : 'medium');
        log.warn('Task escalated', { step_idx: stepIdx, source, reason });
        return { outcome: 'escalated', reason };
    }

    /** Returns a termination when a compensation failed. */
    private async unwindSaga(run: TaskRun): Promise<Termination | null> {
        if (run.saga.depth === 0) return null;
        run.unwound = true;

        const { seed } = this.opts;
        const rollback = run.saga.rollback(run.state, (frame) =>
            simulatedLatencyMs(seed, run.task.taskId, frame.stepIdx, -1, null)
        );

        for (const record of rollback.compensated) {
            run.budget.consume(`compensate:${record.frame.tool}`, { toolCalls: 1 });
            await this.opts.clock.sleep(record.result.latencyMs);
            run.emit({
                event_type: 'compensation',
                status: record.result.status,
                step_idx: record.frame.stepIdx,
                step_name: record.frame.stepName,
                tool_name: record.frame.tool,
                params: record.frame.args,
                latency_ms: record.result.latencyMs,
                error_kind: record.result.error?.kind ?? null,
                error_message: record.result.error?.message ?? null,
                pre_state_hash: record.preStateHash,
                state_hash: record.stateHash,
                saga_depth: run.saga.depth,
            });
        }

        if (rollback.failure) {
            const failed = rollback.compensated[rollback.compensated.length - 1];
            this.raiseTicket(run, failed ? failed.frame.stepIdx : -1, 'rule', rollback.failure.message, 'critical');
            return { outcome: 'unhandled_failure', reason: rollback.failure.message };
        }
        return null;
    }

    private handleInvariant(run: TaskRun, detail: StructuredError): Termination {
        log.error('Runtime invariant violated', { code: detail.code, message: detail.message, context: detail.context });
        this.raiseTicket(run, -1, 'rule', `${detail.code}: ${detail.message}`, 'critical');
        return { outcome: 'unhandled_failure', reason: detail.message };
    }

    private raiseTicket(run: TaskRun, stepIdx: number, source: DecisionSource, summary: string, severity: string): void {
        const params: JsonObject = { summary, severity };

        if (!this.opts.registry.has(TICKET_TOOL)) {
            log.error('No ticket tool registered; escalation not recorded in world state', { summary, severity });
            run.emit({ event_type: 'escalation', status: 'error', step_idx: stepIdx, tool_name: TICKET_TOOL, params, recovery_action: 'escalate', decision_source: source });
            return;
        }

        const before = hashWorldState(run.state);
        const { result } = executeTool(this.opts.registry.get(TICKET_TOOL), run.state, params, null, 0);
        const ticketId = result.output?.ticket_id;
        run.ticketId = typeof ticketId === 'string' ? ticketId : null;

        run.emit({
            event_type: 'escalation',
            status: result.status,
            step_idx: stepIdx,
            tool_name: TICKET_TOOL,
            params,
            error_kind: result.error?.kind ?? null,
            error_message: result.error?.message ?? null,
            pre_state_hash: before,
            recovery_action: 'escalate',
            decision_source: source,
        });
    }

    /* ---------------------------------------------------------------------- */
    /* Completion                                                             */
    /* ---------------------------------------------------------------------- */

    private finish(run: TaskRun, termination: Termination): TaskReport {
        const invariants = checkInvariants(run.state);
        const consistency = run.unwound ? checkRollbackConsistency(run.initial, run.state) : null;

        let { outcome, reason } = termination;
        if (!invariants.ok && outcome !== 'unhandled_failure') {
            log.error('World-state invariants violated at task end', { violations: invariants.violations });
            outcome = 'unhandled_failure';
            reason = `Invariant violated: ${invariants.violations.join('; ')}`;
        }
        if (consistency && !consistency.ok) {
            log.warn('Rollback left state inconsistent', { violations: consistency.violations });
        }

        run.emit({
            event_type: 'final',
            status: 'final',
            final_outcome: outcome,
            final_reason: reason,
            invariants_ok: invariants.ok,
            rollback_consistent: consistency ? consistency.ok : null,
        });

        return {
            taskId: run.task.taskId,
            outcome,
            reason,
            events: [...run.events],
            finalState: cloneWorldState(run.state),
            invariantsOk: invariants.ok,
            rollbackConsistent: consistency ? consistency.ok : null,
            ticketId: run.ticketId,
            budget: run.budget.snapshot(),
        };
    }
}
