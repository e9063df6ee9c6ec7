/**
 * World State Store
 *
 * Mutable simulation state for one task. Only tool calls mutate it; this
 * module supplies copying, hashing and the consistency checks run when a
 * task terminates.
 */

import crypto from 'crypto';
import { stableStringify } from './stable_stringify';
import { SuccessPredicate, WorldState } from './types';

export function createWorldState(initial?: Partial<WorldState>): WorldState {
    return cloneWorldState({
        records: initial?.records ?? {},
        inventory: initial?.inventory ?? {},
        auditLog: initial?.auditLog ?? [],
    });
}

export function cloneWorldState(state: WorldState): WorldState {
    return structuredClone(state);
}

/** Replace the live state's contents in place so holders of the reference see the restore. */
export function replaceWorldState(target: WorldState, source: WorldState): void {
    const copy = cloneWorldState(source);
    target.records = copy.records;
    target.inventory = copy.inventory;
    target.auditLog = copy.auditLog;
}

/** SHA-256 over the canonical JSON of the whole state. */
export function hashWorldState(state: WorldState): string {
    const canonical = stableStringify({
        records: state.records,
        inventory: state.inventory,
        audit_log: state.auditLog,
    });
    return crypto.createHash('sha256').update(canonical).digest('hex');
}

/* -------------------------------------------------------------------------- */
/* Invariants                                                                 */
/* -------------------------------------------------------------------------- */

export interface InvariantReport {
    ok: boolean;
    violations: string[];
}

/**
 * Records referenced by the audit log but missing from `records`. A record
 * whose most recent audit entry is its deletion is not orphaned.
 */
export function findOrphanedRecords(state: WorldState): string[] {
    const lastAction = new Map<string, string>();
    for (const entry of state.auditLog) {
        if (typeof entry.record_id === 'string') {
            lastAction.set(entry.record_id, entry.action);
        }
    }

    const orphans: string[] = [];
    for (const [recordId, action] of lastAction) {
        if (!(recordId in state.records) && action !== 'delete_record') {
            orphans.push(recordId);
        }
    }
    return orphans.sort();
}

export function checkInvariants(state: WorldState): InvariantReport {
    const violations: string[] = [];

    for (const [itemId, qty] of Object.entries(state.inventory)) {
        if (qty < 0) violations.push(`negative inventory: ${itemId}=${qty}`);
    }
    for (const recordId of findOrphanedRecords(state)) {
        violations.push(`orphaned record reference: ${recordId}`);
    }

    return { ok: violations.length === 0, violations };
}

/**
 * Saga consistency after a rollback: every inventory quantity equals its
 * pre-transaction value and no audit reference is orphaned.
 */
export function checkRollbackConsistency(before: WorldState, after: WorldState): InvariantReport {
    const violations: string[] = [];
    const items = new Set([...Object.keys(before.inventory), ...Object.keys(after.inventory)]);

    for (const itemId of [...items].sort()) {
        const expected = before.inventory[itemId] ?? 0;
        const actual = after.inventory[itemId] ?? 0;
        if (expected !== actual) {
            violations.push(`inventory ${itemId}: expected ${expected}, found ${actual}`);
        }
    }
    for (const recordId of findOrphanedRecords(after)) {
        violations.push(`orphaned record reference: ${recordId}`);
    }

    return { ok: violations.length === 0, violations };
}

/* -------------------------------------------------------------------------- */
/* Success predicates                                                         */
/* -------------------------------------------------------------------------- */

export function evaluatePredicate(state: WorldState, predicate: SuccessPredicate): boolean {
    switch (predicate.type) {
        case 'record_status':
            return state.records[predicate.recordId]?.status === predicate.expectedStatus;
        case 'record_field': {
            const record = state.records[predicate.recordId];
            if (!record || !(predicate.field in record)) return false;
            return stableStringify(record[predicate.field]) === stableStringify(predicate.expected);
        }
        case 'inventory_at_least':
            return (state.inventory[predicate.itemId] ?? 0) >= predicate.quantity;
        case 'all':
            return predicate.predicates.every((p) => evaluatePredicate(state, p));
    }
}
