import test from 'node:test';
import assert from 'node:assert/strict';

import { createDefaultRegistry } from '../src/mock_tools';
import { RuntimeInvariantError } from '../src/structured_error';
import { executeTool, ToolRegistry } from '../src/tool_registry';
import { FaultDescriptor, FaultKind, FaultLayer } from '../src/types';
import { createWorldState, hashWorldState } from '../src/world_state';

function fault(kind: FaultKind, layer: FaultLayer): FaultDescriptor {
    return { faultId: 'F1', kind, layer, probability: 1, stepIdx: 0, attemptIdx: 0, scenario: null };
}

function inventoryState() {
    return createWorldState({
        records: { R1: { status: 'pending', value: 10 } },
        inventory: { widget: 5 },
    });
}

const registry = createDefaultRegistry();

test('registry lists tools sorted and rejects unknown names', () => {
    assert.deepEqual(registry.names().slice(0, 3), ['auth_check', 'commit', 'create_record']);
    assert.equal(registry.has('lock_inventory'), true);
    assert.throws(
        () => registry.get('launch_rocket'),
        (e: unknown) => e instanceof RuntimeInvariantError && e.code === 'UNKNOWN_TOOL'
    );
});

test('clean call applies the effect and reports the output', () => {
    const state = inventoryState();
    const { result, effectApplied } = executeTool(registry.get('lock_inventory'), state, { item_id: 'widget', quantity: 2 }, null, 7);
    assert.equal(effectApplied, true);
    assert.equal(result.status, 'ok');
    assert.deepEqual(result.output, { item_id: 'widget', locked: 2, remaining: 3 });
    assert.equal(result.latencyMs, 7);
    assert.equal(state.inventory.widget, 3);
    assert.deepEqual(state.auditLog, [{ action: 'lock_inventory', item_id: 'widget', quantity: 2 }]);
});

test('transient and persistent faults leave the state untouched', () => {
    for (const [kind, layer] of [['HTTP_500', 'transient'], ['AuthDenied', 'persistent']] as const) {
        const state = inventoryState();
        const before = hashWorldState(state);
        const { result, effectApplied } = executeTool(
            registry.get('lock_inventory'), state, { item_id: 'widget', quantity: 2 }, fault(kind, layer), 30
        );
        assert.equal(effectApplied, false);
        assert.equal(result.status, 'error');
        assert.equal(result.error?.kind, kind);
        assert.equal(result.error?.trace, `Injected fault: ${kind} (F1)`);
        assert.equal(hashWorldState(state), before);
    }
});

test('semantic fault drops the effect and the post-condition notices', () => {
    const state = inventoryState();
    const { result, effectApplied } = executeTool(
        registry.get('lock_inventory'), state, { item_id: 'widget', quantity: 2 }, fault('StaleWrite', 'semantic'), 12
    );
    assert.equal(effectApplied, false);
    assert.equal(state.inventory.widget, 5);
    assert.deepEqual(result.error, {
        kind: 'PostconditionFailed',
        message: 'inventory widget is 5, expected 3',
        trace: 'lock_inventory: postcondition: inventory widget is 5, expected 3',
    });
});

test('semantic fault on a tool without a post-condition reports ok', () => {
    const state = inventoryState();
    const { result, effectApplied } = executeTool(
        registry.get('send_message'), state, { user_id: 'u1', text: 'hello' }, fault('PolicyRejected', 'semantic'), 12
    );
    assert.equal(effectApplied, false);
    assert.equal(result.status, 'ok');
    assert.equal(state.auditLog.length, 0);
});

test('cascade fault applies the effect and still reports the error', () => {
    const state = inventoryState();
    const { result, effectApplied } = executeTool(
        registry.get('lock_inventory'), state, { item_id: 'widget', quantity: 2 }, fault('PartialWrite', 'cascade'), 40
    );
    assert.equal(effectApplied, true);
    assert.equal(state.inventory.widget, 3);
    assert.equal(result.status, 'error');
    assert.equal(result.error?.message, 'Write only partially applied');
    assert.equal(result.output, null);
});

test('domain errors thrown by a tool keep their kind', () => {
    const state = inventoryState();
    const missing = executeTool(registry.get('get_record'), state, { record_id: 'R9' }, null, 5);
    assert.deepEqual(missing.result.error, { kind: 'NotFound', message: 'Record R9 not found', trace: 'get_record: NotFound: Record R9 not found' });

    const bad = executeTool(registry.get('lock_inventory'), state, { item_id: 'widget', quantity: -1 }, null, 5);
    assert.equal(bad.result.error?.kind, 'BadRequest');

    const short = executeTool(registry.get('lock_inventory'), state, { item_id: 'widget', quantity: 9 }, null, 5);
    assert.equal(short.result.error?.message, 'Insufficient stock for widget: 5 < 9');
    assert.equal(state.inventory.widget, 5);
});

test('unexpected throws become RuntimeError', () => {
    const local = new ToolRegistry().register({
        name: 'explode',
        do() {
            throw new Error('boom');
        },
    });
    const { result } = executeTool(local.get('explode'), createWorldState(), {}, null, 0);
    assert.deepEqual(result.error, { kind: 'RuntimeError', message: 'boom', trace: 'explode: RuntimeError: boom' });
});

test('update_record compensation restores previous fields and drops added ones', () => {
    const state = inventoryState();
    const update = registry.get('update_record');
    const params = { record_id: 'R1', patch: { status: 'approved', approver: 'ops' } };
    const { result } = executeTool(update, state, params, null, 5);
    assert.deepEqual(result.output, { record_id: 'R1', updated: true, previous: { status: 'pending' }, added: ['approver'] });

    const comp = update.compensate;
    assert.ok(comp && result.output);
    const args = comp.args(params, result.output);
    assert.deepEqual(args, { record_id: 'R1', fields: { status: 'pending' }, remove: ['approver'] });

    executeTool(registry.get(comp.tool), state, args, null, 5);
    assert.deepEqual(state.records.R1, { status: 'pending', value: 10 });
});

test('payment capture and refund', () => {
    const state = inventoryState();
    executeTool(registry.get('process_payment'), state, { payment_id: 'P1', amount: 250 }, null, 5);
    assert.deepEqual(state.records.P1, { type: 'payment', amount: 250, status: 'captured' });

    const again = executeTool(registry.get('process_payment'), state, { payment_id: 'P1', amount: 250 }, null, 5);
    assert.equal(again.result.error?.kind, 'Conflict');

    executeTool(registry.get('refund_payment'), state, { payment_id: 'P1' }, null, 5);
    assert.equal(state.records.P1.status, 'refunded');
    assert.deepEqual(state.auditLog.map((e) => e.action), ['process_payment', 'refund_payment']);
});

test('policy_check rejects when inventory is short', () => {
    const state = inventoryState();
    const { result } = executeTool(
        registry.get('policy_check'), state, { action: 'ship', required_inventory: { widget: 6 } }, null, 5
    );
    assert.equal(result.error?.kind, 'PolicyRejected');
    assert.equal(result.error?.message, 'Insufficient inventory: widget');
});

test('create_ticket numbers tickets by audit position', () => {
    const state = inventoryState();
    const { result } = executeTool(registry.get('create_ticket'), state, { summary: 'stuck', severity: 'high' }, null, 0);
    assert.deepEqual(result.output, { ticket_id: 'TKT-0', created: true });
    assert.deepEqual(state.auditLog[0], { action: 'create_ticket', ticket_id: 'TKT-0', summary: 'stuck', severity: 'high' });
});
