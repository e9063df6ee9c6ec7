/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the recovery runtime.
 * Values can be overridden via environment variables.
 */

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function envFloat(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    const parsed = parseFloat(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

// Seed shared by the fault injector and the heuristic diagnosis noise
export const DEFAULT_SEED = envInt('RECOVERY_SEED', 42);

// Per-task resource ceilings
export const DEFAULT_BUDGET = {
    MAX_TOKENS: envInt('RECOVERY_MAX_TOKENS', 10_000),
    MAX_TOOL_CALLS: envInt('RECOVERY_MAX_TOOL_CALLS', 50),
    MAX_TIME_MS: envInt('RECOVERY_MAX_TIME_MS', 60_000),
};

// Confidence gates
export const CONFIDENCE_THRESHOLDS = {
    DIAGNOSIS: envFloat('RECOVERY_DIAGNOSIS_THRESHOLD', 0.7),
    MEMORY_BYPASS: envFloat('RECOVERY_MEMORY_THRESHOLD', 0.8),
};

// Retry state machine
export const RETRY = {
    MAX_RETRIES_PER_STEP: 3,
    MAX_ROLLBACKS_PER_STEP: 1,
    BASE_DELAY_MS: 100,
    MAX_DELAY_MS: 400,
    NAIVE_DELAY_MS: 50,
};

// Consecutive unchanged-hash failures that trip the loop guard
export const LOOP_GUARD_WINDOW = 3;

// Memory bank similarity search
export const MEMORY = {
    MIN_SIMILARITY: 0.6,
    SIMILARITY_WEIGHT: 0.7,
    SUCCESS_WEIGHT: 0.3,
    TOP_K_KEYWORDS: 5,
    HASH_PREFIX_CHARS: 10,
    QUERY_CACHE_MAX: 1024,
};

// Recent trace events handed to the diagnosis collaborator
export const DIAGNOSIS_HISTORY_WINDOW = 3;

// Token estimate: serialized characters per token
export const CHARS_PER_TOKEN = 4;

// Reply tokens reserved at diagnosis admission; a longer reply is rejected
export const DIAGNOSIS_REPLY_TOKEN_LIMIT = envInt('RECOVERY_DIAGNOSIS_REPLY_TOKENS', 256);
