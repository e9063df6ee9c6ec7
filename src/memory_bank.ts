/**
 * Memory Bank
 *
 * Cross-task store of (fault signature → recovery action) outcomes. Exact
 * key matches win; otherwise the nearest stored signature by a weighted
 * exact-match similarity is used, down to MEMORY.MIN_SIMILARITY.
 *
 * All methods are synchronous, so on one event loop reads and writes are
 * serialized without locking.
 */

import { LRUCache } from 'lru-cache';
import { MEMORY } from './config';
import { createLogger } from './logger';
import { isPlainObject, SchemaValidator } from './schema_validator';
import { ErrorFactory } from './structured_error';
import { RecoveryAction, StepContext, StepResult } from './types';

const log = createLogger('memory');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface FaultSignature {
    toolName: string;
    errorKind: string;
    stepName: string;
    keywords: string[];
    stateHashPrefix: string;
}

export interface ActionStats {
    trials: number;
    successes: number;
}

export interface MemoryQueryResult {
    action: RecoveryAction | null;
    confidence: number;
    matchedKey: string | null;
    similarity: number;
}

export const MEMORY_SNAPSHOT_VERSION = 1;

export interface MemorySnapshotEntry {
    key: string;
    signature: FaultSignature;
    actions: Array<{ action: RecoveryAction; trials: number; successes: number }>;
}

export interface MemorySnapshot {
    version: number;
    entries: MemorySnapshotEntry[];
}

interface MemoryEntry {
    signature: FaultSignature;
    actions: Map<RecoveryAction, ActionStats>;
}

const NO_MATCH: MemoryQueryResult = { action: null, confidence: 0, matchedKey: null, similarity: 0 };

const RECOVERY_ACTIONS: readonly RecoveryAction[] = ['retry', 'rollback_then_retry', 'compensate_then_escalate', 'escalate'];

/* -------------------------------------------------------------------------- */
/* Signatures                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Lowercased word tokens longer than two characters, most frequent first,
 * ties alphabetical.
 */
export function extractKeywords(text: string, limit: number = MEMORY.TOP_K_KEYWORDS): string[] {
    const counts = new Map<string, number>();
    for (const match of text.toLowerCase().matchAll(/[a-z0-9_]+/g)) {
        const token = match[0];
        if (token.length <= 2) continue;
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
        .slice(0, limit)
        .map(([token]) => token);
}

export function buildSignature(context: StepContext, result: StepResult): FaultSignature {
    const kind = result.error?.kind ?? 'Unknown';
    return {
        toolName: context.toolName,
        errorKind: kind,
        stepName: context.stepName,
        keywords: extractKeywords(`${kind} ${result.error?.message ?? ''}`),
        stateHashPrefix: context.stateHash.slice(0, MEMORY.HASH_PREFIX_CHARS),
    };
}

export function signatureKey(sig: FaultSignature): string {
    return [sig.toolName, sig.errorKind, sig.stepName, sig.stateHashPrefix, sig.keywords.join(',')].join('|');
}

function round4(n: number): number {
    return Math.round(n * 10_000) / 10_000;
}

function jaccard(a: readonly string[], b: readonly string[]): number {
    const left = new Set(a);
    const right = new Set(b);
    if (left.size === 0 && right.size === 0) return 1;
    let shared = 0;
    for (const token of left) if (right.has(token)) shared++;
    return shared / (left.size + right.size - shared);
}

/** tool 0.3, kind 0.3, step 0.2, keyword Jaccard 0.1, hash prefix 0.1 */
export function signatureSimilarity(a: FaultSignature, b: FaultSignature): number {
    return round4(
        (a.toolName === b.toolName ? 0.3 : 0) +
        (a.errorKind === b.errorKind ? 0.3 : 0) +
        (a.stepName === b.stepName ? 0.2 : 0) +
        0.1 * jaccard(a.keywords, b.keywords) +
        (a.stateHashPrefix === b.stateHashPrefix ? 0.1 : 0)
    );
}

function successRate(stats: ActionStats): number {
    return stats.trials === 0 ? 0 : stats.successes / stats.trials;
}

/** Highest success rate, then more trials, then action name. */
function bestAction(actions: Map<RecoveryAction, ActionStats>): [RecoveryAction, ActionStats] | null {
    let best: [RecoveryAction, ActionStats] | null = null;
    for (const [action, stats] of actions) {
        if (!best) {
            best = [action, stats];
            continue;
        }
        const rateDiff = successRate(stats) - successRate(best[1]);
        if (
            rateDiff > 0 ||
            (rateDiff === 0 && stats.trials > best[1].trials) ||
            (rateDiff === 0 && stats.trials === best[1].trials && action < best[0])
        ) {
            best = [action, stats];
        }
    }
    return best;
}

/* -------------------------------------------------------------------------- */
/* Snapshot schema                                                            */
/* -------------------------------------------------------------------------- */

const snapshotValidator = new SchemaValidator();
snapshotValidator.registerSchema('memory_snapshot_v1', {
    type: 'object',
    required: ['version', 'entries'],
    properties: {
        version: { type: 'integer', enum: [MEMORY_SNAPSHOT_VERSION] },
        entries: {
            type: 'array',
            items: {
                type: 'object',
                required: ['key', 'signature', 'actions'],
                properties: {
                    key: { type: 'string' },
                    signature: {
                        type: 'object',
                        required: ['toolName', 'errorKind', 'stepName', 'keywords', 'stateHashPrefix'],
                        properties: {
                            toolName: { type: 'string' },
                            errorKind: { type: 'string' },
                            stepName: { type: 'string' },
                            keywords: { type: 'array', items: { type: 'string' } },
                            stateHashPrefix: { type: 'string' },
                        },
                    },
                    actions: {
                        type: 'array',
                        items: {
                            type: 'object',
                            required: ['action', 'trials', 'successes'],
                            properties: {
                                action: { type: 'string', enum: RECOVERY_ACTIONS },
                                trials: { type: 'integer', minimum: 0 },
                                successes: { type: 'integer', minimum: 0 },
                            },
                        },
                    },
                },
            },
        },
    },
});

function isRecoveryAction(value: unknown): value is RecoveryAction {
    return RECOVERY_ACTIONS.some((a) => a === value);
}

function readString(obj: Record<string, unknown>, key: string): string {
    const value = obj[key];
    return typeof value === 'string' ? value : '';
}

function readCount(obj: Record<string, unknown>, key: string): number {
    const value = obj[key];
    return typeof value === 'number' ? value : 0;
}

function toSignature(raw: unknown): FaultSignature | null {
    if (!isPlainObject(raw) || !Array.isArray(raw.keywords)) return null;
    return {
        toolName: readString(raw, 'toolName'),
        errorKind: readString(raw, 'errorKind'),
        stepName: readString(raw, 'stepName'),
        keywords: raw.keywords.filter((k): k is string => typeof k === 'string'),
        stateHashPrefix: readString(raw, 'stateHashPrefix'),
    };
}

/* -------------------------------------------------------------------------- */
/* Memory Bank                                                                */
/* -------------------------------------------------------------------------- */

export class MemoryBank {
    private entries: Map<string, MemoryEntry> = new Map();
    private cache = new LRUCache<string, MemoryQueryResult>({ max: MEMORY.QUERY_CACHE_MAX });

    get size(): number {
        return this.entries.size;
    }

    upsert(signature: FaultSignature, action: RecoveryAction, success: boolean): void {
        const key = signatureKey(signature);
        let entry = this.entries.get(key);
        if (!entry) {
            entry = { signature: { ...signature, keywords: [...signature.keywords] }, actions: new Map() };
            this.entries.set(key, entry);
        }
        const stats = entry.actions.get(action) ?? { trials: 0, successes: 0 };
        entry.actions.set(action, {
            trials: stats.trials + 1,
            successes: stats.successes + (success ? 1 : 0),
        });
        this.cache.clear();
        log.debug('Memory upserted', { key, action, success });
    }

    query(signature: FaultSignature): MemoryQueryResult {
        const key = signatureKey(signature);
        const cached = this.cache.get(key);
        if (cached) return cached;

        const result = this.lookup(key, signature);
        this.cache.set(key, result);
        return result;
    }

    private lookup(key: string, signature: FaultSignature): MemoryQueryResult {
        let matchedKey: string | null = null;
        let similarity = 0;

        if (this.entries.has(key)) {
            matchedKey = key;
            similarity = 1;
        } else {
            for (const [candidateKey, entry] of this.entries) {
                const sim = signatureSimilarity(signature, entry.signature);
                if (sim > similarity || (sim === similarity && matchedKey !== null && candidateKey < matchedKey)) {
                    similarity = sim;
                    matchedKey = candidateKey;
                }
            }
        }

        if (matchedKey === null || similarity < MEMORY.MIN_SIMILARITY) return NO_MATCH;

        const entry = this.entries.get(matchedKey);
        const best = entry ? bestAction(entry.actions) : null;
        if (!best) return NO_MATCH;

        const [action, stats] = best;
        const confidence = round4(MEMORY.SIMILARITY_WEIGHT * similarity + MEMORY.SUCCESS_WEIGHT * successRate(stats));
        return { action, confidence, matchedKey, similarity };
    }

    stats(key: string): Partial<Record<RecoveryAction, ActionStats>> | null {
        const entry = this.entries.get(key);
        if (!entry) return null;
        const out: Partial<Record<RecoveryAction, ActionStats>> = {};
        for (const [action, s] of entry.actions) out[action] = { ...s };
        return out;
    }

    clear(): void {
        this.entries.clear();
        this.cache.clear();
    }

    /* ---------------------------------------------------------------------- */
    /* Snapshot                                                               */
    /* ---------------------------------------------------------------------- */

    snapshot(): MemorySnapshot {
        const keys = [...this.entries.keys()].sort();
        const entries: MemorySnapshotEntry[] = [];
        for (const key of keys) {
            const entry = this.entries.get(key);
            if (!entry) continue;
            entries.push({
                key,
                signature: { ...entry.signature, keywords: [...entry.signature.keywords] },
                actions: [...entry.actions.entries()]
                    .sort((a, b) => (a[0] < b[0] ? -1 : 1))
                    .map(([action, s]) => ({ action, trials: s.trials, successes: s.successes })),
            });
        }
        return { version: MEMORY_SNAPSHOT_VERSION, entries };
    }

    /**
     * Replace the contents with a snapshot.
     * @throws RuntimeInvariantError (STORE_ERROR) on a malformed snapshot
     */
    restore(raw: unknown): void {
        const validation = snapshotValidator.validate(raw, 'memory_snapshot_v1');
        if (!validation.valid || !isPlainObject(raw) || !Array.isArray(raw.entries)) {
            throw ErrorFactory.storeError(
                `Malformed memory snapshot: ${validation.errors.map((e) => `${e.path || '$'} ${e.message}`).join('; ')}`
            );
        }

        const next = new Map<string, MemoryEntry>();
        for (const rawEntry of raw.entries) {
            if (!isPlainObject(rawEntry) || !Array.isArray(rawEntry.actions)) continue;
            const signature = toSignature(rawEntry.signature);
            if (!signature) continue;

            const actions = new Map<RecoveryAction, ActionStats>();
            for (const rawAction of rawEntry.actions) {
                if (!isPlainObject(rawAction) || !isRecoveryAction(rawAction.action)) continue;
                actions.set(rawAction.action, {
                    trials: readCount(rawAction, 'trials'),
                    successes: readCount(rawAction, 'successes'),
                });
            }
            // key recomputed from the signature
            next.set(signatureKey(signature), { signature, actions });
        }

        this.entries = next;
        this.cache.clear();
        log.info('Memory restored', { entries: next.size });
    }
}
