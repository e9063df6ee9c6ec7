import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { InMemoryTraceSink, JsonlTraceSink, serializeTraceEvent } from '../src/trace_sink';
import { TraceEvent } from '../src/types';

function event(seq: number, taskId: string = 'T1'): TraceEvent {
    return {
        seq,
        run_id: 'run-0',
        task_id: taskId,
        strategy: 'rule_based',
        event_type: 'attempt',
        step_idx: 0,
        step_name: 'get_record',
        tool_name: 'get_record',
        attempt_idx: 0,
        params: { record_id: 'R1' },
        status: 'ok',
        latency_ms: 7,
        error_kind: null,
        error_message: null,
        injected_fault: null,
        pre_state_hash: 'a',
        state_hash: 'a',
        recovery_action: null,
        decision_source: null,
        confidence: null,
        diagnosis: null,
        budget: {
            usedTokens: 0,
            usedToolCalls: 1,
            usedTimeMs: 7,
            remainingTokens: 10_000,
            remainingToolCalls: 49,
            remainingTimeMs: 59_993,
        },
        saga_depth: 0,
        final_outcome: null,
        final_reason: null,
        invariants_ok: null,
        rollback_consistent: null,
        ts_ms: 7,
    };
}

test('serialized events have sorted keys and keep null fields', () => {
    const line = serializeTraceEvent(event(0));
    assert.ok(line.startsWith('{"attempt_idx":0,"budget":{"remainingTimeMs":59993,'));
    assert.ok(line.includes('"confidence":null,"decision_source":null,"diagnosis":null,'));
    assert.equal(Object.keys(JSON.parse(line)).length, 28);
});

test('in-memory sink filters by task and renders JSONL', () => {
    const sink = new InMemoryTraceSink();
    sink.append(event(0, 'T1'));
    sink.append(event(1, 'T2'));
    sink.append(event(2, 'T1'));

    assert.deepEqual(sink.forTask('T1').map((e) => e.seq), [0, 2]);
    assert.equal(sink.all().length, 3);

    const lines = sink.toJsonl().split('\n');
    assert.equal(lines.length, 4);
    assert.equal(lines[3], '');
    assert.equal(lines[1], serializeTraceEvent(event(1, 'T2')));
});

test('JSONL sink writes one line per event on flush', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'trace-sink-'));
    const file = path.join(tmp, 'trace.jsonl');
    try {
        const sink = new JsonlTraceSink(file);
        sink.append(event(0));
        sink.append(event(1));
        assert.equal(fs.existsSync(file), false);

        sink.flush();
        const text = fs.readFileSync(file, 'utf8');
        assert.equal(text, serializeTraceEvent(event(0)) + '\n' + serializeTraceEvent(event(1)) + '\n');
        assert.equal(sink.eventCount, 2);
        assert.deepEqual(fs.readdirSync(tmp), ['trace.jsonl']);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('JSONL sink flushes automatically every N events', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'trace-sink-'));
    const file = path.join(tmp, 'trace.jsonl');
    try {
        const sink = new JsonlTraceSink(file, 2);
        sink.append(event(0));
        assert.equal(fs.existsSync(file), false);
        sink.append(event(1));
        assert.equal(fs.readFileSync(file, 'utf8').split('\n').length, 3);
        sink.append(event(2));
        assert.equal(fs.readFileSync(file, 'utf8').split('\n').length, 3);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('flushing an empty JSONL sink creates an empty file', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'trace-sink-'));
    const file = path.join(tmp, 'trace.jsonl');
    try {
        new JsonlTraceSink(file).flush();
        assert.equal(fs.readFileSync(file, 'utf8'), '');
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});
