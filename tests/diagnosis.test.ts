import test from 'node:test';
import assert from 'node:assert/strict';

import {
    buildDiagnosisRequest,
    classifyByKeywords,
    DiagnosisRequest,
    HeuristicDiagnosisAgent,
    parseDiagnosisReply,
    PromptedDiagnosisAgent,
} from '../src/diagnosis';
import { StepContext, StepResult, TraceEvent } from '../src/types';

const BUDGET = {
    usedTokens: 0,
    usedToolCalls: 0,
    usedTimeMs: 0,
    remainingTokens: 100,
    remainingToolCalls: 10,
    remainingTimeMs: 1000,
};

function context(overrides: Partial<StepContext> = {}): StepContext {
    return {
        taskId: 'T1',
        stepIdx: 0,
        stepName: 'get_record',
        toolName: 'get_record',
        params: { record_id: 'R1' },
        attemptIdx: 0,
        stateHash: 'abc123',
        budgetRemaining: BUDGET,
        ...overrides,
    };
}

function failed(kind: string, message: string): StepResult {
    return { status: 'error', output: null, error: { kind, message, trace: kind }, latencyMs: 10, injectedFault: null };
}

function request(overrides: Partial<DiagnosisRequest> = {}): DiagnosisRequest {
    return {
        task_id: 'T1',
        step_idx: 0,
        step_name: 'get_record',
        tool_name: 'get_record',
        params: {},
        attempt_idx: 0,
        state_hash: 'abc123',
        error_kind: 'Timeout',
        error_message: 'Request timeout after 30s',
        retry_count: 0,
        recent_history: [],
        fault_hint: null,
        ...overrides,
    };
}

function attemptEvent(stepIdx: number, status: 'ok' | 'error', errorKind: string | null, eventType: TraceEvent['event_type'] = 'attempt'): TraceEvent {
    return {
        seq: 0,
        run_id: 'run-0',
        task_id: 'T1',
        strategy: 'diagnosis',
        event_type: eventType,
        step_idx: stepIdx,
        step_name: `step_${stepIdx}`,
        tool_name: 'get_record',
        attempt_idx: 0,
        params: {},
        status,
        latency_ms: 5,
        error_kind: errorKind,
        error_message: null,
        injected_fault: null,
        pre_state_hash: null,
        state_hash: 'h',
        recovery_action: null,
        decision_source: null,
        confidence: null,
        diagnosis: null,
        budget: BUDGET,
        saga_depth: 0,
        final_outcome: null,
        final_reason: null,
        invariants_ok: null,
        rollback_consistent: null,
        ts_ms: 0,
    };
}

test('request carries the failure, step retry count and the last three attempts', () => {
    const history = [
        attemptEvent(0, 'ok', null),
        attemptEvent(1, 'error', 'HTTP_500'),
        attemptEvent(1, 'ok', null, 'rollback'),
        attemptEvent(1, 'error', 'HTTP_500'),
        attemptEvent(2, 'error', 'Timeout'),
    ].map((e, i) => ({ ...e, seq: i }));

    const result: StepResult = {
        ...failed('HTTP_500', 'Internal server error'),
        injectedFault: { faultId: 'F1', kind: 'HTTP_500', layer: 'transient', probability: 1, stepIdx: 1, attemptIdx: 2, scenario: 'dep_down' },
    };
    const req = buildDiagnosisRequest(context({ stepIdx: 1, stepName: 'pay', attemptIdx: 2 }), result, history);

    assert.equal(req.retry_count, 2);
    assert.equal(req.error_kind, 'HTTP_500');
    assert.deepEqual(req.recent_history, [
        { step: 'step_1', status: 'error', error: 'HTTP_500' },
        { step: 'step_1', status: 'error', error: 'HTTP_500' },
        { step: 'step_2', status: 'error', error: 'Timeout' },
    ]);
    assert.deepEqual(req.fault_hint, { layer: 'transient', scenario: 'dep_down' });
});

test('reply parsing accepts objects and fenced JSON text', () => {
    assert.deepEqual(parseDiagnosisReply({ layer: 'transient', action: 'retry', confidence: 0.9 }), {
        reply: { layer: 'transient', action: 'retry', confidence: 0.9, reasoning: '' },
        errors: [],
    });
    const fenced = '```json\n{"layer":"cascade","action":"compensate","confidence":0.75,"reasoning":"partial"}\n```';
    assert.deepEqual(parseDiagnosisReply(fenced).reply, { layer: 'cascade', action: 'compensate', confidence: 0.75, reasoning: 'partial' });
});

test('malformed replies are rejected with reasons', () => {
    assert.deepEqual(parseDiagnosisReply({ layer: 'transient', action: 'retry', confidence: 2 }), {
        reply: null,
        errors: ['.confidence: Value 2 > maximum 1'],
    });
    assert.deepEqual(parseDiagnosisReply({ layer: 'weird', action: 'retry' }).errors, [
        '.confidence: Required field missing',
        '.layer: Value must be one of: transient, persistent, semantic, cascade',
    ]);
    assert.equal(parseDiagnosisReply('not json').reply, null);
    assert.match(parseDiagnosisReply('not json').errors[0], /^unparsable reply:/);
    assert.deepEqual(parseDiagnosisReply(null).errors, ['$: Expected type object, got null']);
});

test('keyword classification order', () => {
    assert.equal(classifyByKeywords('Request timeout after 30s'), 'transient');
    assert.equal(classifyByKeywords('Resource conflict detected'), 'cascade');
    assert.equal(classifyByKeywords('Policy violation detected'), 'semantic');
    assert.equal(classifyByKeywords('Resource not found'), 'persistent');
});

test('heuristic agent maps kinds to actions', () => {
    const agent = new HeuristicDiagnosisAgent({ seed: 42 });
    assert.deepEqual(agent.classify(request()), {
        layer: 'transient',
        action: 'retry',
        confidence: 0.85,
        reasoning: 'Timeout is transient, retry recommended',
    });

    const conflict = agent.classify(request({ step_idx: 2, step_name: 'update_record', error_kind: 'Conflict', error_message: 'Resource conflict detected' }));
    assert.equal(conflict.layer, 'cascade');
    assert.equal(conflict.action, 'rollback');

    const partial = agent.classify(request({ error_kind: 'PartialWrite', error_message: 'Write only partially applied' }));
    assert.equal(partial.action, 'compensate');

    const unknown = agent.classify(request({ error_kind: 'RuntimeError', error_message: 'boom', step_name: 'x' }));
    assert.deepEqual(unknown, { layer: 'persistent', action: 'escalate', confidence: 0.65, reasoning: 'RuntimeError uncertain, escalating' });
});

test('NotFound is retried only when the hint is trusted and points at eventual consistency', () => {
    const notFound = request({ error_kind: 'NotFound', error_message: 'Resource not found', fault_hint: { layer: 'persistent', scenario: 'eventual_consistency' } });
    assert.equal(new HeuristicDiagnosisAgent({ seed: 42 }).classify(notFound).action, 'escalate');
    assert.equal(new HeuristicDiagnosisAgent({ seed: 42, trustHints: true }).classify(notFound).action, 'retry');
});

test('deterministic noise degrades one in ten diagnoses', () => {
    const agent = new HeuristicDiagnosisAgent({ seed: 42 });
    const noisy = agent.classify(request({ step_idx: 5, error_kind: 'HTTP_500', error_message: 'Internal server error' }));
    assert.deepEqual(noisy, { layer: 'persistent', action: 'retry', confidence: 0.55, reasoning: 'HTTP_500 is transient, retry recommended' });

    const clean = agent.classify(request({ step_idx: 4, error_kind: 'HTTP_500', error_message: 'Internal server error' }));
    assert.equal(clean.confidence, 0.85);
});

test('prompted agent sends the prompt and a payload without the fault hint', async () => {
    const calls: Array<{ system: string; user: string }> = [];
    const agent = new PromptedDiagnosisAgent(async (system, user) => {
        calls.push({ system, user });
        return '{"layer":"transient","action":"retry","confidence":0.8}';
    }, 'Be brief.');

    const raw = await agent.diagnose(request({ fault_hint: { layer: 'transient', scenario: 'x' } }));
    assert.equal(parseDiagnosisReply(raw).reply?.action, 'retry');
    assert.equal(calls.length, 1);
    assert.match(calls[0].system, /ONLY RETURN JSON/);
    assert.ok(calls[0].system.endsWith('\n\nBe brief.'));
    assert.deepEqual(JSON.parse(calls[0].user), {
        error_kind: 'Timeout',
        error_message: 'Request timeout after 30s',
        step_name: 'get_record',
        tool_name: 'get_record',
        retry_count: 0,
        recent_history: [],
        state_hash: 'abc123',
    });
});
