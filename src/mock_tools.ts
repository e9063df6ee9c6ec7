/**
 * Mock API tools
 *
 * Stateless handlers over the world state. Forward tools with a reversible
 * effect name their compensating tool; irreversible tools are deduplicated by
 * the saga manager's ledger instead.
 */

import { stableStringify } from './stable_stringify';
import { ToolError, ToolRegistry, ToolSpec } from './tool_registry';
import { JsonObject, JsonValue, WorldState } from './types';

/* -------------------------------------------------------------------------- */
/* Argument helpers                                                           */
/* -------------------------------------------------------------------------- */

function requireString(args: JsonObject, key: string): string {
    const value = args[key];
    if (typeof value !== 'string' || value === '') {
        throw new ToolError('BadRequest', `Missing string argument: ${key}`);
    }
    return value;
}

function requireQuantity(args: JsonObject, key: string): number {
    const value = args[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new ToolError('BadRequest', `Argument ${key} must be a non-negative integer`);
    }
    return value;
}

function optionalObject(args: JsonObject, key: string): JsonObject {
    const value = args[key];
    if (value === undefined || value === null) return {};
    if (typeof value !== 'object' || Array.isArray(value)) {
        throw new ToolError('BadRequest', `Argument ${key} must be an object`);
    }
    return value;
}

function optionalStringList(args: JsonObject, key: string): string[] {
    const value = args[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new ToolError('BadRequest', `Argument ${key} must be a list of strings`);
    }
    return value;
}

function sameJson(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
    return stableStringify(a ?? null) === stableStringify(b ?? null);
}

function requireRecord(state: WorldState, recordId: string): JsonObject {
    const record = state.records[recordId];
    if (!record) throw new ToolError('NotFound', `Record ${recordId} not found`);
    return record;
}

/* -------------------------------------------------------------------------- */
/* Reads and checks                                                           */
/* -------------------------------------------------------------------------- */

const getRecord: ToolSpec = {
    name: 'get_record',
    do(state, args) {
        const recordId = requireString(args, 'record_id');
        return { record: structuredClone(requireRecord(state, recordId)) };
    },
};

const authCheck: ToolSpec = {
    name: 'auth_check',
    do(_state, args) {
        const userId = requireString(args, 'user_id');
        return { user_id: userId, authorized: true };
    },
};

const policyCheck: ToolSpec = {
    name: 'policy_check',
    do(state, args) {
        const action = requireString(args, 'action');
        const required = optionalObject(args, 'required_inventory');
        for (const [itemId, qty] of Object.entries(required)) {
            if (typeof qty !== 'number') {
                throw new ToolError('BadRequest', `required_inventory.${itemId} must be a number`);
            }
            if ((state.inventory[itemId] ?? 0) < qty) {
                throw new ToolError('PolicyRejected', `Insufficient inventory: ${itemId}`);
            }
        }
        return { allowed: true, action };
    },
};

/* -------------------------------------------------------------------------- */
/* Records                                                                    */
/* -------------------------------------------------------------------------- */

const createRecord: ToolSpec = {
    name: 'create_record',
    do(state, args) {
        const recordId = requireString(args, 'record_id');
        if (recordId in state.records) {
            throw new ToolError('Conflict', `Record ${recordId} already exists`);
        }
        state.records[recordId] = structuredClone(optionalObject(args, 'fields'));
        state.auditLog.push({ action: 'create_record', record_id: recordId });
        return { record_id: recordId, created: true };
    },
    compensate: {
        tool: 'delete_record',
        args: (params) => ({ record_id: params.record_id }),
    },
    verify(state, _args, output) {
        const recordId = output.record_id;
        return typeof recordId === 'string' && recordId in state.records
            ? null
            : `record ${String(recordId)} missing after create`;
    },
};

const deleteRecord: ToolSpec = {
    name: 'delete_record',
    do(state, args) {
        const recordId = requireString(args, 'record_id');
        requireRecord(state, recordId);
        delete state.records[recordId];
        state.auditLog.push({ action: 'delete_record', record_id: recordId });
        return { record_id: recordId, deleted: true };
    },
};

const updateRecord: ToolSpec = {
    name: 'update_record',
    do(state, args) {
        const recordId = requireString(args, 'record_id');
        const patch = optionalObject(args, 'patch');
        const record = requireRecord(state, recordId);

        const previous: JsonObject = {};
        const added: string[] = [];
        for (const [field, value] of Object.entries(patch)) {
            if (field in record) {
                previous[field] = record[field];
            } else {
                added.push(field);
            }
            record[field] = structuredClone(value);
        }

        state.auditLog.push({ action: 'update_record', record_id: recordId, patch: structuredClone(patch) });
        return { record_id: recordId, updated: true, previous, added };
    },
    compensate: {
        tool: 'restore_record',
        args: (params, output) => ({
            record_id: params.record_id,
            fields: output.previous ?? {},
            remove: output.added ?? [],
        }),
    },
    verify(state, args, output) {
        const recordId = output.record_id;
        const record = typeof recordId === 'string' ? state.records[recordId] : undefined;
        if (!record) return `record ${String(recordId)} missing after update`;
        for (const [field, value] of Object.entries(optionalObject(args, 'patch'))) {
            if (!sameJson(record[field], value)) return `field ${field} not updated`;
        }
        return null;
    },
};

const restoreRecord: ToolSpec = {
    name: 'restore_record',
    do(state, args) {
        const recordId = requireString(args, 'record_id');
        const record = requireRecord(state, recordId);
        for (const [field, value] of Object.entries(optionalObject(args, 'fields'))) {
            record[field] = structuredClone(value);
        }
        for (const field of optionalStringList(args, 'remove')) {
            delete record[field];
        }
        state.auditLog.push({ action: 'restore_record', record_id: recordId });
        return { record_id: recordId, restored: true };
    },
};

/* -------------------------------------------------------------------------- */
/* Inventory and payments                                                     */
/* -------------------------------------------------------------------------- */

const lockInventory: ToolSpec = {
    name: 'lock_inventory',
    do(state, args) {
        const itemId = requireString(args, 'item_id');
        const quantity = requireQuantity(args, 'quantity');
        const available = state.inventory[itemId] ?? 0;
        if (available < quantity) {
            throw new ToolError('Conflict', `Insufficient stock for ${itemId}: ${available} < ${quantity}`);
        }
        state.inventory[itemId] = available - quantity;
        state.auditLog.push({ action: 'lock_inventory', item_id: itemId, quantity });
        return { item_id: itemId, locked: quantity, remaining: available - quantity };
    },
    compensate: {
        tool: 'unlock_inventory',
        args: (params) => ({ item_id: params.item_id, quantity: params.quantity }),
    },
    verify(state, _args, output) {
        const itemId = output.item_id;
        if (typeof itemId !== 'string') return 'lock output missing item_id';
        return state.inventory[itemId] === output.remaining
            ? null
            : `inventory ${itemId} is ${state.inventory[itemId] ?? 0}, expected ${String(output.remaining)}`;
    },
};

const unlockInventory: ToolSpec = {
    name: 'unlock_inventory',
    do(state, args) {
        const itemId = requireString(args, 'item_id');
        const quantity = requireQuantity(args, 'quantity');
        state.inventory[itemId] = (state.inventory[itemId] ?? 0) + quantity;
        state.auditLog.push({ action: 'unlock_inventory', item_id: itemId, quantity });
        return { item_id: itemId, unlocked: quantity, remaining: state.inventory[itemId] };
    },
};

const processPayment: ToolSpec = {
    name: 'process_payment',
    do(state, args) {
        const paymentId = requireString(args, 'payment_id');
        const amount = requireQuantity(args, 'amount');
        if (state.records[paymentId]?.status === 'captured') {
            throw new ToolError('Conflict', `Payment ${paymentId} already captured`);
        }
        state.records[paymentId] = { type: 'payment', amount, status: 'captured' };
        state.auditLog.push({ action: 'process_payment', record_id: paymentId, amount });
        return { payment_id: paymentId, captured: amount };
    },
    compensate: {
        tool: 'refund_payment',
        args: (params) => ({ payment_id: params.payment_id }),
    },
    verify(state, args) {
        const paymentId = requireString(args, 'payment_id');
        return state.records[paymentId]?.status === 'captured' ? null : `payment ${paymentId} not captured`;
    },
};

const refundPayment: ToolSpec = {
    name: 'refund_payment',
    do(state, args) {
        const paymentId = requireString(args, 'payment_id');
        const payment = requireRecord(state, paymentId);
        if (payment.status !== 'captured') {
            throw new ToolError('Conflict', `Payment ${paymentId} is ${String(payment.status)}, cannot refund`);
        }
        payment.status = 'refunded';
        state.auditLog.push({ action: 'refund_payment', record_id: paymentId });
        return { payment_id: paymentId, refunded: true };
    },
};

/* -------------------------------------------------------------------------- */
/* Side effects                                                               */
/* -------------------------------------------------------------------------- */

const writeAudit: ToolSpec = {
    name: 'write_audit',
    do(state, args) {
        const note = requireString(args, 'note');
        const recordId = args.record_id;
        if (typeof recordId === 'string') {
            state.auditLog.push({ action: 'write_audit', record_id: recordId, note });
        } else {
            state.auditLog.push({ action: 'write_audit', note });
        }
        return { written: true };
    },
};

const sendMessage: ToolSpec = {
    name: 'send_message',
    do(state, args) {
        const userId = requireString(args, 'user_id');
        const text = requireString(args, 'text');
        state.auditLog.push({ action: 'send_message', user_id: userId, text });
        return { user_id: userId, sent: true };
    },
};

const notifyUser: ToolSpec = {
    name: 'notify_user',
    irreversible: true,
    do(state, args) {
        const userId = requireString(args, 'user_id');
        const message = requireString(args, 'message');
        state.auditLog.push({ action: 'notify_user', user_id: userId, message });
        return { user_id: userId, notified: true };
    },
};

const createTicket: ToolSpec = {
    name: 'create_ticket',
    do(state, args) {
        const summary = requireString(args, 'summary');
        const severity = requireString(args, 'severity');
        const ticketId = `TKT-${state.auditLog.length}`;
        state.auditLog.push({ action: 'create_ticket', ticket_id: ticketId, summary, severity });
        return { ticket_id: ticketId, created: true };
    },
};

const commit: ToolSpec = {
    name: 'commit',
    irreversible: true,
    do(state) {
        state.auditLog.push({ action: 'commit' });
        return { committed: true };
    },
    verify(state) {
        const last = state.auditLog[state.auditLog.length - 1];
        return last?.action === 'commit' ? null : 'commit entry missing from audit log';
    },
};

export const DEFAULT_TOOLS: readonly ToolSpec[] = [
    getRecord,
    authCheck,
    policyCheck,
    createRecord,
    deleteRecord,
    updateRecord,
    restoreRecord,
    lockInventory,
    unlockInventory,
    processPayment,
    refundPayment,
    writeAudit,
    sendMessage,
    notifyUser,
    createTicket,
    commit,
];

export function createDefaultRegistry(): ToolRegistry {
    const registry = new ToolRegistry();
    for (const tool of DEFAULT_TOOLS) registry.register(tool);
    return registry;
}
