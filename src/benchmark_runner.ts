/**
 * Benchmark Runner
 *
 * Runs a task set under one strategy. The Memory Bank is loaded from its
 * store before the first task and saved after the last; traces go to a JSONL
 * file when a path is given, otherwise they stay in memory.
 */

import { defaultCeilings } from './budget_guard';
import { Clock, VirtualClock } from './clock';
import { DEFAULT_SEED } from './config';
import { DiagnosisCollaborator } from './diagnosis';
import { createLogger } from './logger';
import { MemoryBank } from './memory_bank';
import { MemoryStore } from './memory_store';
import { createDefaultRegistry } from './mock_tools';
import { RecoveryPolicyEngine } from './recovery_policy';
import { createStrategy } from './strategies';
import { ToolRegistry } from './tool_registry';
import { InMemoryTraceSink, JsonlTraceSink, TraceSink } from './trace_sink';
import { TaskReport, WorkflowOrchestrator } from './workflow_orchestrator';
import { BudgetCeilings, StrategyName, Task, TaskOutcome } from './types';

const log = createLogger('benchmark');

export interface BenchmarkOptions {
    tasks: readonly Task[];
    strategy: StrategyName;
    seed?: number;
    /**
     * Defaults to a VirtualClock so traces replay byte for byte. A SystemClock
     * puts real sleeps into ts_ms and the time budget.
     */
    clock?: Clock;
    ceilings?: BudgetCeilings;
    runId?: string;
    registry?: ToolRegistry;
    collaborator?: DiagnosisCollaborator;
    /** Shared across runs when given; otherwise a fresh bank per run. */
    memory?: MemoryBank;
    /** SQLite file the Memory Bank is loaded from and saved to. */
    memoryStorePath?: string;
    tracePath?: string;
}

export interface BenchmarkSummary {
    runId: string;
    strategy: StrategyName;
    seed: number;
    tasks: number;
    outcomes: Record<TaskOutcome, number>;
    successRate: number;
    /** Attempts decided by a diagnosis call. */
    diagnosisCalls: number;
    /** Attempts decided from memory without diagnosis. */
    memoryHits: number;
    totalEvents: number;
    toolCalls: number;
    tokens: number;
    memoryEntries: number;
}

export interface BenchmarkResult {
    summary: BenchmarkSummary;
    reports: TaskReport[];
}

function emptyOutcomes(): Record<TaskOutcome, number> {
    return { success: 0, predicate_failed: 0, escalated: 0, unhandled_failure: 0 };
}

function round4(value: number): number {
    return Math.round(value * 10_000) / 10_000;
}

export function summarize(
    reports: readonly TaskReport[],
    meta: { runId: string; strategy: StrategyName; seed: number; memoryEntries: number }
): BenchmarkSummary {
    const outcomes = emptyOutcomes();
    let diagnosisCalls = 0;
    let memoryHits = 0;
    let totalEvents = 0;
    let toolCalls = 0;
    let tokens = 0;

    for (const report of reports) {
        outcomes[report.outcome] += 1;
        totalEvents += report.events.length;
        toolCalls += report.budget.usedToolCalls;
        tokens += report.budget.usedTokens;
        for (const event of report.events) {
            if (event.event_type !== 'attempt') continue;
            if (event.decision_source === 'diagnosis') diagnosisCalls += 1;
            if (event.decision_source === 'memory') memoryHits += 1;
        }
    }

    return {
        ...meta,
        tasks: reports.length,
        outcomes,
        successRate: reports.length === 0 ? 0 : round4(outcomes.success / reports.length),
        diagnosisCalls,
        memoryHits,
        totalEvents,
        toolCalls,
        tokens,
    };
}

export async function runBenchmark(options: BenchmarkOptions): Promise<BenchmarkResult> {
    const seed = options.seed ?? DEFAULT_SEED;
    const runId = options.runId ?? `${options.strategy}-${seed}`;
    const memory = options.memory ?? new MemoryBank();

    const store = options.memoryStorePath ? new MemoryStore(options.memoryStorePath) : null;
    const sink: TraceSink = options.tracePath ? new JsonlTraceSink(options.tracePath) : new InMemoryTraceSink();

    try {
        if (store && store.load(memory)) {
            log.info('Memory bank loaded', { entries: memory.size });
        }

        const strategy = createStrategy(options.strategy, { collaborator: options.collaborator, memory });
        const orchestrator = new WorkflowOrchestrator({
            registry: options.registry ?? createDefaultRegistry(),
            engine: new RecoveryPolicyEngine(strategy),
            sink,
            clock: options.clock ?? new VirtualClock(),
            seed,
            ceilings: options.ceilings ?? defaultCeilings(),
            runId,
        });

        const reports: TaskReport[] = [];
        for (const task of options.tasks) {
            reports.push(await orchestrator.runTask(task));
        }

        sink.flush();
        if (store) store.save(memory);

        const summary = summarize(reports, { runId, strategy: options.strategy, seed, memoryEntries: memory.size });
        log.info('Benchmark finished', {
            strategy: summary.strategy,
            tasks: summary.tasks,
            success_rate: summary.successRate,
            diagnosis_calls: summary.diagnosisCalls,
            memory_hits: summary.memoryHits,
        });
        return { summary, reports };
    } finally {
        store?.close();
    }
}
