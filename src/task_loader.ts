/**
 * Task Loader
 *
 * Reads task records from JSONL (one task per line), validates each against
 * the task schema and converts it to the runtime Task shape.
 *
 * Record format (snake_case on disk):
 *   { task_id, initial_world_state: { records, inventory, audit_log },
 *     steps: [{ step_name, tool_name, params }],
 *     fault_injections: [{ fault_id, step_idx, fault_type, prob, mode?, layer?, scenario? }],
 *     success_condition: { type, ... } }
 */

import * as fs from 'fs';
import { FAULT_KIND_LAYER, isFaultKind } from './fault_injector';
import { createLogger } from './logger';
import { isPlainObject, JsonSchema, SchemaValidator } from './schema_validator';
import { ErrorFactory } from './structured_error';
import {
    AuditEntry,
    FaultLayer,
    FaultMode,
    FaultSpec,
    JsonObject,
    JsonValue,
    RecordFields,
    StepSpec,
    SuccessPredicate,
    Task,
    WorldState,
} from './types';

const log = createLogger('task_loader');

/* -------------------------------------------------------------------------- */
/* Schemas                                                                    */
/* -------------------------------------------------------------------------- */

const FAULT_KINDS = Object.keys(FAULT_KIND_LAYER);
const FAULT_MODES: readonly FaultMode[] = ['once', 'persistent', 'per_attempt'];
const FAULT_LAYERS: readonly FaultLayer[] = ['transient', 'persistent', 'semantic', 'cascade'];

const PREDICATE_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['type'],
    properties: {
        type: { type: 'string', enum: ['record_status', 'record_field', 'inventory_at_least', 'all'] },
        record_id: { type: 'string' },
        expected_status: { type: 'string' },
        field: { type: 'string' },
        item_id: { type: 'string' },
        quantity: { type: 'integer', minimum: 0 },
        predicates: { type: 'array', items: { ref: 'success_condition' } },
    },
};

const TASK_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['task_id', 'initial_world_state', 'steps', 'success_condition'],
    properties: {
        task_id: { type: 'string', pattern: '^\\S+$' },
        initial_world_state: {
            type: 'object',
            required: ['records', 'inventory'],
            properties: {
                records: { type: 'object', additionalProperties: { type: 'object' } },
                inventory: { type: 'object', additionalProperties: { type: 'integer', minimum: 0 } },
                audit_log: {
                    type: 'array',
                    items: {
                        type: 'object',
                        required: ['action'],
                        properties: { action: { type: 'string' }, record_id: { type: 'string' } },
                    },
                },
            },
        },
        steps: {
            type: 'array',
            minItems: 1,
            items: {
                type: 'object',
                required: ['step_name', 'tool_name'],
                properties: {
                    step_name: { type: 'string' },
                    tool_name: { type: 'string' },
                    params: { type: 'object' },
                },
            },
        },
        fault_injections: {
            type: 'array',
            items: {
                type: 'object',
                required: ['fault_id', 'step_idx', 'fault_type', 'prob'],
                properties: {
                    fault_id: { type: 'string' },
                    step_idx: { type: 'integer', minimum: 0 },
                    fault_type: { type: 'string', enum: FAULT_KINDS },
                    prob: { type: 'number', minimum: 0, maximum: 1 },
                    mode: { type: 'string', enum: FAULT_MODES },
                    layer: { type: 'string', enum: FAULT_LAYERS },
                    scenario: { type: 'string' },
                },
            },
        },
        success_condition: { ref: 'success_condition' },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('success_condition', PREDICATE_SCHEMA);
validator.registerSchema('task_v1', TASK_SCHEMA);

/* -------------------------------------------------------------------------- */
/* Narrowing                                                                  */
/* -------------------------------------------------------------------------- */

function toJsonValue(value: unknown): JsonValue | undefined {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (Array.isArray(value)) {
        const items: JsonValue[] = [];
        for (const item of value) {
            const converted = toJsonValue(item);
            if (converted === undefined) return undefined;
            items.push(converted);
        }
        return items;
    }
    if (isPlainObject(value)) return toJsonObject(value);
    return undefined;
}

function toJsonObject(value: unknown): JsonObject | undefined {
    if (!isPlainObject(value)) return undefined;
    const out: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
        const converted = toJsonValue(entry);
        if (converted === undefined) return undefined;
        out[key] = converted;
    }
    return out;
}

function str(obj: Record<string, unknown>, key: string): string {
    const value = obj[key];
    return typeof value === 'string' ? value : '';
}

function num(obj: Record<string, unknown>, key: string): number {
    const value = obj[key];
    return typeof value === 'number' ? value : 0;
}

function isFaultMode(value: unknown): value is FaultMode {
    return FAULT_MODES.some((m) => m === value);
}

function isFaultLayer(value: unknown): value is FaultLayer {
    return FAULT_LAYERS.some((l) => l === value);
}

/* -------------------------------------------------------------------------- */
/* Conversion                                                                 */
/* -------------------------------------------------------------------------- */

function toWorldState(raw: Record<string, unknown>, errors: string[]): WorldState {
    const records: Record<string, RecordFields> = {};
    const inventory: Record<string, number> = {};
    const auditLog: AuditEntry[] = [];

    if (isPlainObject(raw.records)) {
        for (const [id, fields] of Object.entries(raw.records)) {
            const converted = toJsonObject(fields);
            if (converted) records[id] = converted;
            else errors.push(`initial_world_state.records.${id}: not JSON`);
        }
    }
    if (isPlainObject(raw.inventory)) {
        for (const [id, qty] of Object.entries(raw.inventory)) {
            if (typeof qty === 'number') inventory[id] = qty;
        }
    }
    if (Array.isArray(raw.audit_log)) {
        for (const entry of raw.audit_log) {
            const converted = toJsonObject(entry);
            const action = converted?.action;
            if (!converted || typeof action !== 'string') {
                errors.push('initial_world_state.audit_log: malformed entry');
                continue;
            }
            const audit: AuditEntry = { action };
            for (const [key, value] of Object.entries(converted)) audit[key] = value;
            auditLog.push(audit);
        }
    }
    return { records, inventory, auditLog };
}

function toStep(raw: unknown, idx: number, errors: string[]): StepSpec {
    const obj = isPlainObject(raw) ? raw : {};
    const params = obj.params === undefined ? {} : toJsonObject(obj.params);
    if (!params) errors.push(`steps[${idx}].params: not JSON`);
    return { stepName: str(obj, 'step_name'), toolName: str(obj, 'tool_name'), params: params ?? {} };
}

function toFault(raw: unknown, stepCount: number, errors: string[]): FaultSpec | null {
    if (!isPlainObject(raw)) return null;
    const kind = raw.fault_type;
    if (typeof kind !== 'string' || !isFaultKind(kind)) return null;

    const stepIdx = num(raw, 'step_idx');
    if (stepIdx >= stepCount) {
        errors.push(`fault ${str(raw, 'fault_id')}: step_idx ${stepIdx} out of range (${stepCount} steps)`);
    }

    const spec: FaultSpec = { faultId: str(raw, 'fault_id'), stepIdx, kind, probability: num(raw, 'prob') };
    if (isFaultMode(raw.mode)) spec.mode = raw.mode;
    if (isFaultLayer(raw.layer)) spec.layer = raw.layer;
    if (typeof raw.scenario === 'string') spec.scenario = raw.scenario;
    return spec;
}

function toPredicate(raw: unknown, path: string, errors: string[]): SuccessPredicate {
    const obj = isPlainObject(raw) ? raw : {};
    const need = (key: string): void => {
        if (!(key in obj)) errors.push(`${path}.${key}: Required field missing`);
    };

    switch (obj.type) {
        case 'record_status':
            need('record_id');
            need('expected_status');
            return { type: 'record_status', recordId: str(obj, 'record_id'), expectedStatus: str(obj, 'expected_status') };
        case 'record_field': {
            need('record_id');
            need('field');
            const expected = toJsonValue(obj.expected);
            if (expected === undefined) errors.push(`${path}.expected: missing or not JSON`);
            return { type: 'record_field', recordId: str(obj, 'record_id'), field: str(obj, 'field'), expected: expected ?? null };
        }
        case 'inventory_at_least':
            need('item_id');
            need('quantity');
            return { type: 'inventory_at_least', itemId: str(obj, 'item_id'), quantity: num(obj, 'quantity') };
        default: {
            const list = Array.isArray(obj.predicates) ? obj.predicates : [];
            return { type: 'all', predicates: list.map((p, i) => toPredicate(p, `${path}.predicates[${i}]`, errors)) };
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Validate and convert one task record.
 *
 * @throws RuntimeInvariantError (INVALID_TASK)
 */
export function parseTask(raw: unknown, source: string = 'task'): Task {
    const validation = validator.validate(raw, 'task_v1');
    if (!validation.valid || !isPlainObject(raw)) {
        throw ErrorFactory.invalidTask(source, validation.errors.map((e) => `${e.path || '$'}: ${e.message}`));
    }

    const errors: string[] = [];
    const world = isPlainObject(raw.initial_world_state) ? raw.initial_world_state : {};
    const rawSteps = Array.isArray(raw.steps) ? raw.steps : [];
    const rawFaults = Array.isArray(raw.fault_injections) ? raw.fault_injections : [];

    const steps = rawSteps.map((s, i) => toStep(s, i, errors));
    const faults = rawFaults
        .map((f) => toFault(f, steps.length, errors))
        .filter((f): f is FaultSpec => f !== null);

    const task: Task = {
        taskId: str(raw, 'task_id'),
        initialState: toWorldState(world, errors),
        steps,
        faults,
        successPredicate: toPredicate(raw.success_condition, '.success_condition', errors),
    };

    if (errors.length > 0) throw ErrorFactory.invalidTask(source, errors);
    return task;
}

/** Parse JSONL text. Blank lines are skipped; task ids must be unique. */
export function parseTasksJsonl(text: string, source: string = 'tasks'): Task[] {
    const tasks: Task[] = [];
    const seen = new Set<string>();

    text.split('\n').forEach((line, i) => {
        if (line.trim() === '') return;
        const where = `${source}:${i + 1}`;

        let raw: unknown;
        try {
            raw = JSON.parse(line);
        } catch (e) {
            throw ErrorFactory.invalidTask(where, [e instanceof Error ? e.message : String(e)]);
        }

        const task = parseTask(raw, where);
        if (seen.has(task.taskId)) {
            throw ErrorFactory.invalidTask(where, [`duplicate task_id ${task.taskId}`]);
        }
        seen.add(task.taskId);
        tasks.push(task);
    });

    return tasks;
}

export function loadTasks(filePath: string): Task[] {
    const text = fs.readFileSync(filePath, 'utf8');
    const tasks = parseTasksJsonl(text, filePath);
    log.info('Tasks loaded', { file: filePath, count: tasks.length });
    return tasks;
}
