/**
 * Shared runtime types: world state, steps, faults, results and trace events.
 */

/* -------------------------------------------------------------------------- */
/* World state                                                                */
/* -------------------------------------------------------------------------- */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type RecordFields = { [field: string]: JsonValue };

export interface AuditEntry {
    action: string;
    record_id?: string;
    [key: string]: JsonValue | undefined;
}

export interface WorldState {
    records: Record<string, RecordFields>;
    inventory: Record<string, number>;
    auditLog: AuditEntry[];
}

/* -------------------------------------------------------------------------- */
/* Fault taxonomy                                                             */
/* -------------------------------------------------------------------------- */

export type FaultLayer = 'transient' | 'persistent' | 'semantic' | 'cascade';

export type FaultKind =
    | 'Timeout'
    | 'HTTP_500'
    | 'RateLimited'
    | 'AuthDenied'
    | 'NotFound'
    | 'BadRequest'
    | 'Conflict'
    | 'PolicyRejected'
    | 'StaleWrite'
    | 'StateCorruption'
    | 'PartialWrite';

export type FaultMode = 'once' | 'persistent' | 'per_attempt';

/** One entry of a task's fault schedule. */
export interface FaultSpec {
    faultId: string;
    stepIdx: number;
    kind: FaultKind;
    probability: number;
    layer?: FaultLayer;
    mode?: FaultMode;
    scenario?: string;
}

/** What the injector decided for one attempt. */
export interface FaultDescriptor {
    faultId: string;
    kind: FaultKind;
    layer: FaultLayer;
    probability: number;
    stepIdx: number;
    attemptIdx: number;
    scenario: string | null;
}

/* -------------------------------------------------------------------------- */
/* Tasks                                                                      */
/* -------------------------------------------------------------------------- */

export interface StepSpec {
    stepName: string;
    toolName: string;
    params: JsonObject;
}

export type SuccessPredicate =
    | { type: 'record_status'; recordId: string; expectedStatus: string }
    | { type: 'record_field'; recordId: string; field: string; expected: JsonValue }
    | { type: 'inventory_at_least'; itemId: string; quantity: number }
    | { type: 'all'; predicates: SuccessPredicate[] };

export interface Task {
    taskId: string;
    initialState: WorldState;
    steps: StepSpec[];
    faults: FaultSpec[];
    successPredicate: SuccessPredicate;
}

/* -------------------------------------------------------------------------- */
/* Budget                                                                     */
/* -------------------------------------------------------------------------- */

export interface BudgetCeilings {
    maxTokens: number;
    maxToolCalls: number;
    maxTimeMs: number;
}

export interface BudgetSnapshot {
    usedTokens: number;
    usedToolCalls: number;
    usedTimeMs: number;
    remainingTokens: number;
    remainingToolCalls: number;
    remainingTimeMs: number;
}

/* -------------------------------------------------------------------------- */
/* Attempts                                                                   */
/* -------------------------------------------------------------------------- */

export interface StepContext {
    readonly taskId: string;
    readonly stepIdx: number;
    readonly stepName: string;
    readonly toolName: string;
    readonly params: JsonObject;
    readonly attemptIdx: number;
    readonly stateHash: string;
    readonly budgetRemaining: BudgetSnapshot;
}

export interface StepError {
    kind: string;
    message: string;
    trace: string;
}

export interface StepResult {
    readonly status: 'ok' | 'error';
    readonly output: JsonObject | null;
    readonly error: StepError | null;
    readonly latencyMs: number;
    readonly injectedFault: FaultDescriptor | null;
}

/* -------------------------------------------------------------------------- */
/* Recovery decisions                                                         */
/* -------------------------------------------------------------------------- */

export type RecoveryAction = 'retry' | 'rollback_then_retry' | 'compensate_then_escalate' | 'escalate';

export type DecisionSource = 'rule' | 'diagnosis' | 'memory' | 'loop_guard' | 'budget' | 'bound';

export type StrategyName = 'none' | 'naive_retry' | 'rule_based' | 'diagnosis' | 'memory';

/** Validated reply of the diagnosis collaborator. */
export interface DiagnosisReply {
    layer: FaultLayer;
    action: 'retry' | 'rollback' | 'compensate' | 'escalate';
    confidence: number;
    reasoning: string;
}

export interface PolicyDecision {
    action: RecoveryAction;
    confidence: number;
    source: DecisionSource;
    delayMs: number;
    rationale: string;
    diagnosis: DiagnosisReply | null;
    memoryKey: string | null;
    /** Tokens spent reaching the decision (diagnosis request and reply). */
    tokensUsed: number;
}

/* -------------------------------------------------------------------------- */
/* Trace                                                                      */
/* -------------------------------------------------------------------------- */

export type TraceEventType = 'attempt' | 'rollback' | 'compensation' | 'escalation' | 'final';

export type TaskOutcome = 'success' | 'predicate_failed' | 'escalated' | 'unhandled_failure';

/**
 * The single durable record every strategy emits. All keys are always present;
 * fields that do not apply to an event type are null.
 */
export interface TraceEvent {
    seq: number;
    run_id: string;
    task_id: string;
    strategy: StrategyName;
    event_type: TraceEventType;
    step_idx: number;
    step_name: string;
    tool_name: string;
    attempt_idx: number;
    params: JsonObject;
    status: 'ok' | 'error' | 'final';
    latency_ms: number;
    error_kind: string | null;
    error_message: string | null;
    injected_fault: FaultDescriptor | null;
    pre_state_hash: string | null;
    state_hash: string;
    recovery_action: RecoveryAction | null;
    decision_source: DecisionSource | null;
    confidence: number | null;
    diagnosis: DiagnosisReply | null;
    budget: BudgetSnapshot;
    saga_depth: number;
    final_outcome: TaskOutcome | null;
    final_reason: string | null;
    invariants_ok: boolean | null;
    rollback_consistent: boolean | null;
    ts_ms: number;
}
