/**
 * Main entry point - exports all public APIs
 */

export type * from './types';

export { WorkflowOrchestrator } from './workflow_orchestrator';
export type { OrchestratorOptions, TaskReport } from './workflow_orchestrator';
export { runBenchmark, summarize } from './benchmark_runner';
export type { BenchmarkOptions, BenchmarkResult, BenchmarkSummary } from './benchmark_runner';
export { loadTasks, parseTask, parseTasksJsonl } from './task_loader';

export { ToolRegistry, ToolError, executeTool } from './tool_registry';
export type { ToolSpec, CompensationSpec, ToolExecution } from './tool_registry';
export { createDefaultRegistry, DEFAULT_TOOLS } from './mock_tools';
export {
    createWorldState,
    cloneWorldState,
    hashWorldState,
    checkInvariants,
    checkRollbackConsistency,
    evaluatePredicate,
} from './world_state';
export type { InvariantReport } from './world_state';
export { decideFault, classifyErrorKind, seededRoll, FAULT_KIND_LAYER } from './fault_injector';
export { CheckpointManager } from './checkpoint_manager';
export { SagaManager, idempotencyKey } from './saga_manager';
export type { SagaFrame, SagaRollbackResult } from './saga_manager';
export { BudgetGuard, defaultCeilings, estimateTokens } from './budget_guard';
export { LoopGuard } from './loop_guard';

export { RecoveryPolicyEngine, makeDecision } from './recovery_policy';
export type { PolicyInput, RecoveryStrategy } from './recovery_policy';
export {
    createStrategy,
    NoRecoveryStrategy,
    NaiveRetryStrategy,
    RuleBasedStrategy,
    DiagnosisStrategy,
    MemoryStrategy,
    STRATEGY_NAMES,
} from './strategies';
export type { StrategyDeps } from './strategies';
export { HeuristicDiagnosisAgent, PromptedDiagnosisAgent, parseDiagnosisReply } from './diagnosis';
export type { DiagnosisCollaborator, DiagnosisRequest, CompletionFn } from './diagnosis';
export { MemoryBank, buildSignature } from './memory_bank';
export type { FaultSignature, MemoryQueryResult, MemorySnapshot } from './memory_bank';
export { MemoryStore } from './memory_store';

export { InMemoryTraceSink, JsonlTraceSink, serializeTraceEvent } from './trace_sink';
export type { TraceSink } from './trace_sink';
export { SystemClock, VirtualClock } from './clock';
export type { Clock } from './clock';
export { SchemaValidator } from './schema_validator';
export type { ValidationResult, JsonSchema } from './schema_validator';
export { ErrorFactory, RuntimeInvariantError, createStructuredError } from './structured_error';
export type { StructuredError, ErrorCode } from './structured_error';
export { createLogger } from './logger';
