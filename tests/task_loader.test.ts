import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { RuntimeInvariantError } from '../src/structured_error';
import { loadTasks, parseTask, parseTasksJsonl } from '../src/task_loader';

const FIXTURE = path.join(__dirname, 'fixtures', 'tasks.jsonl');

function minimal(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        task_id: 'T1',
        initial_world_state: { records: { R1: { status: 'pending' } }, inventory: {} },
        steps: [{ step_name: 'read', tool_name: 'get_record', params: { record_id: 'R1' } }],
        success_condition: { type: 'record_status', record_id: 'R1', expected_status: 'pending' },
        ...overrides,
    };
}

function invalidMessage(fn: () => unknown): string {
    try {
        fn();
    } catch (e) {
        assert.ok(e instanceof RuntimeInvariantError);
        assert.equal(e.code, 'INVALID_TASK');
        return e.message;
    }
    assert.fail('expected INVALID_TASK');
}

test('loads the fixture file into runtime tasks', () => {
    const tasks = loadTasks(FIXTURE);
    assert.deepEqual(tasks.map((t) => t.taskId), ['ORD-1', 'ORD-2']);

    const [order, read] = tasks;
    assert.equal(order.steps.length, 4);
    assert.deepEqual(order.steps[0], {
        stepName: 'reserve',
        toolName: 'lock_inventory',
        params: { item_id: 'widget', quantity: 2 },
    });
    assert.deepEqual(order.steps[3].params, {});
    assert.deepEqual(order.faults, [{ faultId: 'F1', stepIdx: 1, kind: 'HTTP_500', probability: 1, mode: 'persistent' }]);
    assert.deepEqual(order.initialState.auditLog, []);
    assert.deepEqual(order.successPredicate, { type: 'record_status', recordId: 'R1', expectedStatus: 'approved' });

    assert.deepEqual(read.faults[0], {
        faultId: 'F1',
        stepIdx: 0,
        kind: 'NotFound',
        probability: 0.5,
        mode: 'per_attempt',
        layer: 'transient',
        scenario: 'eventual_consistency',
    });
    assert.deepEqual(read.initialState.auditLog, [{ action: 'seed', record_id: 'R1' }]);
    assert.deepEqual(read.successPredicate, {
        type: 'all',
        predicates: [
            { type: 'record_field', recordId: 'R1', field: 'status', expected: 'pending' },
            { type: 'inventory_at_least', itemId: 'widget', quantity: 3 },
        ],
    });
});

test('a task without fault injections has an empty schedule', () => {
    assert.deepEqual(parseTask(minimal()).faults, []);
});

test('missing required fields are reported with their path', () => {
    const { steps: _steps, ...noSteps } = minimal();
    assert.equal(invalidMessage(() => parseTask(noSteps)), 'Invalid task record (task): .steps: Required field missing');
});

test('an empty step list is rejected', () => {
    assert.equal(
        invalidMessage(() => parseTask(minimal({ steps: [] }))),
        'Invalid task record (task): .steps: Expected at least 1 items, got 0'
    );
});

test('fault probability above one is rejected', () => {
    const raw = minimal({ fault_injections: [{ fault_id: 'F1', step_idx: 0, fault_type: 'Timeout', prob: 1.5 }] });
    assert.equal(
        invalidMessage(() => parseTask(raw)),
        'Invalid task record (task): .fault_injections[0].prob: Value 1.5 > maximum 1'
    );
});

test('unknown fault types are rejected', () => {
    const raw = minimal({ fault_injections: [{ fault_id: 'F1', step_idx: 0, fault_type: 'Meteor', prob: 1 }] });
    assert.match(invalidMessage(() => parseTask(raw)), /^Invalid task record \(task\): \.fault_injections\[0\]\.fault_type: Value must be one of: Timeout, /);
});

test('fault step index past the last step is rejected', () => {
    const raw = minimal({ fault_injections: [{ fault_id: 'F9', step_idx: 3, fault_type: 'Timeout', prob: 1 }] });
    assert.equal(
        invalidMessage(() => parseTask(raw)),
        'Invalid task record (task): fault F9: step_idx 3 out of range (1 steps)'
    );
});

test('predicates missing their operands are rejected', () => {
    const raw = minimal({ success_condition: { type: 'record_status', record_id: 'R1' } });
    assert.equal(
        invalidMessage(() => parseTask(raw)),
        'Invalid task record (task): .success_condition.expected_status: Required field missing'
    );
});

test('nested predicates are validated recursively', () => {
    const raw = minimal({ success_condition: { type: 'all', predicates: [{ type: 'bogus' }] } });
    assert.equal(
        invalidMessage(() => parseTask(raw)),
        'Invalid task record (task): .success_condition.predicates[0].type: Value must be one of: record_status, record_field, inventory_at_least, all'
    );
});

test('task ids may not contain whitespace', () => {
    assert.equal(
        invalidMessage(() => parseTask(minimal({ task_id: 'two words' }))),
        'Invalid task record (task): .task_id: Value does not match pattern: ^\\S+$'
    );
});

test('JSONL parsing skips blank lines and reports the failing line', () => {
    const line = JSON.stringify(minimal());
    assert.equal(parseTasksJsonl(`\n${line}\n\n`).length, 1);

    assert.equal(
        invalidMessage(() => parseTasksJsonl(`${line}\n${line}\n`)),
        'Invalid task record (tasks:2): duplicate task_id T1'
    );
    assert.match(invalidMessage(() => parseTasksJsonl('{"task_id": ', 'batch.jsonl')), /^Invalid task record \(batch\.jsonl:1\): /);
});
