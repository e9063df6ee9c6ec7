/**
 * Diagnosis collaborators
 *
 * A collaborator receives the failing step, its error and the recent trace
 * history and replies with {layer, action, confidence}. Replies are untrusted:
 * parseDiagnosisReply validates them and anything malformed is treated as
 * zero confidence by the strategies.
 */

import crypto from 'crypto';
import { DEFAULT_SEED, DIAGNOSIS_HISTORY_WINDOW } from './config';
import { createLogger } from './logger';
import { getDiagnosisPrompt } from './prompts';
import { isPlainObject, SchemaValidator } from './schema_validator';
import { createStructuredError } from './structured_error';
import {
    DiagnosisReply,
    FaultLayer,
    JsonObject,
    StepContext,
    StepResult,
    TraceEvent,
} from './types';

const log = createLogger('diagnosis');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface HistoryEntry {
    step: string;
    status: string;
    error: string | null;
}

export interface DiagnosisRequest {
    task_id: string;
    step_idx: number;
    step_name: string;
    tool_name: string;
    params: JsonObject;
    attempt_idx: number;
    state_hash: string;
    error_kind: string;
    error_message: string;
    retry_count: number;
    recent_history: HistoryEntry[];
    /** Ground truth of an injected fault. Only offline agents may read it. */
    fault_hint: { layer: FaultLayer; scenario: string | null } | null;
}

export interface DiagnosisCollaborator {
    diagnose(request: DiagnosisRequest): Promise<unknown>;
}

/** Model completion: (system prompt, user message) → raw text. */
export type CompletionFn = (system: string, user: string) => Promise<string>;

/* -------------------------------------------------------------------------- */
/* Request / reply                                                            */
/* -------------------------------------------------------------------------- */

export function buildDiagnosisRequest(
    context: StepContext,
    result: StepResult,
    history: readonly TraceEvent[]
): DiagnosisRequest {
    const attempts = history.filter((e) => e.event_type === 'attempt');
    const retryCount = attempts.filter((e) => e.step_idx === context.stepIdx && e.status === 'error').length;

    return {
        task_id: context.taskId,
        step_idx: context.stepIdx,
        step_name: context.stepName,
        tool_name: context.toolName,
        params: context.params,
        attempt_idx: context.attemptIdx,
        state_hash: context.stateHash,
        error_kind: result.error?.kind ?? 'Unknown',
        error_message: result.error?.message ?? '',
        retry_count: retryCount,
        recent_history: attempts.slice(-DIAGNOSIS_HISTORY_WINDOW).map((e) => ({
            step: e.step_name,
            status: e.status,
            error: e.error_kind,
        })),
        fault_hint: result.injectedFault
            ? { layer: result.injectedFault.layer, scenario: result.injectedFault.scenario }
            : null,
    };
}

const LAYERS: readonly FaultLayer[] = ['transient', 'persistent', 'semantic', 'cascade'];
const ACTIONS: readonly DiagnosisReply['action'][] = ['retry', 'rollback', 'compensate', 'escalate'];

const replyValidator = new SchemaValidator();
replyValidator.registerSchema('diagnosis_reply_v1', {
    type: 'object',
    required: ['layer', 'action', 'confidence'],
    properties: {
        layer: { type: 'string', enum: LAYERS },
        action: { type: 'string', enum: ACTIONS },
        confidence: { type: 'number', minimum: 0, maximum: 1 },
        reasoning: { type: 'string' },
    },
});

function isLayer(value: unknown): value is FaultLayer {
    return LAYERS.some((l) => l === value);
}

function isReplyAction(value: unknown): value is DiagnosisReply['action'] {
    return ACTIONS.some((a) => a === value);
}

export interface ParsedReply {
    reply: DiagnosisReply | null;
    errors: string[];
}

function stripFences(text: string): string {
    const trimmed = text.trim();
    const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(trimmed);
    return fenced ? fenced[1] : trimmed;
}

/** Accepts an object or JSON text (optionally fenced). */
export function parseDiagnosisReply(raw: unknown): ParsedReply {
    let value: unknown = raw;
    if (typeof raw === 'string') {
        try {
            value = JSON.parse(stripFences(raw));
        } catch (e) {
            return { reply: null, errors: [`unparsable reply: ${e instanceof Error ? e.message : String(e)}`] };
        }
    }

    const validation = replyValidator.validate(value, 'diagnosis_reply_v1');
    if (!validation.valid) {
        return { reply: null, errors: validation.errors.map((err) => `${err.path || '$'}: ${err.message}`) };
    }

    if (!isPlainObject(value) || !isLayer(value.layer) || !isReplyAction(value.action) || typeof value.confidence !== 'number') {
        return { reply: null, errors: ['reply shape mismatch'] };
    }
    return {
        reply: {
            layer: value.layer,
            action: value.action,
            confidence: value.confidence,
            reasoning: typeof value.reasoning === 'string' ? value.reasoning : '',
        },
        errors: [],
    };
}

/** Logs a malformed reply as a DIAGNOSIS_MALFORMED warning. */
export function reportMalformedReply(request: DiagnosisRequest, errors: string[]): void {
    const detail = createStructuredError('DIAGNOSIS_MALFORMED', 'Diagnosis reply rejected', {
        task_id: request.task_id,
        step_idx: request.step_idx,
        errors,
    });
    log.warn(detail.message, detail.context);
}

/* -------------------------------------------------------------------------- */
/* Heuristic agent                                                            */
/* -------------------------------------------------------------------------- */

const TRANSIENT_TOKENS = ['timeout', 'http_500', 'temporar', 'throttle', 'rate'];
const CASCADE_TOKENS = ['conflict', 'rollback', 'state', 'partial'];
const SEMANTIC_TOKENS = ['auth', 'policy', 'badrequest', 'validation', 'postcondition', 'stale'];

const NOISE_CONFIDENCE = 0.55;

type Verdict = Pick<DiagnosisReply, 'action' | 'confidence' | 'reasoning'>;

function verdictOf(action: DiagnosisReply['action'], confidence: number, reasoning: string): Verdict {
    return { action, confidence, reasoning };
}

export interface HeuristicAgentOptions {
    seed?: number;
    /** Use the injected ground-truth layer when present. */
    trustHints?: boolean;
}

/**
 * Offline collaborator: keyword layer classification, a per-kind action table
 * and a deterministic 1-in-10 confidence degradation.
 */
export class HeuristicDiagnosisAgent implements DiagnosisCollaborator {
    private readonly seed: number;
    private readonly trustHints: boolean;

    constructor(opts: HeuristicAgentOptions = {}) {
        this.seed = opts.seed ?? DEFAULT_SEED;
        this.trustHints = opts.trustHints ?? false;
    }

    async diagnose(request: DiagnosisRequest): Promise<DiagnosisReply> {
        return this.classify(request);
    }

    classify(request: DiagnosisRequest): DiagnosisReply {
        const kind = request.error_kind;
        const hint = this.trustHints ? request.fault_hint : null;

        let layer = classifyByKeywords(`${kind} ${request.error_message} ${request.step_name}`);
        if (hint) layer = hint.layer;

        const noisy = this.isNoisy(request);
        if (noisy) layer = 'persistent';

        let verdict: Verdict;

        switch (kind) {
            case 'Timeout':
            case 'HTTP_500':
            case 'RateLimited':
                verdict = verdictOf('retry', 0.85, `${kind} is transient, retry recommended`);
                break;
            case 'Conflict':
                verdict = verdictOf('rollback', 0.85, `${kind} indicates state issues, rollback and retry`);
                break;
            case 'NotFound':
                if (hint?.scenario === 'eventual_consistency' || hint?.layer === 'transient') {
                    verdict = verdictOf('retry', 0.85, 'NotFound may be eventual consistency, retry recommended');
                } else {
                    verdict = verdictOf('escalate', 0.85, 'NotFound likely persistent, escalation required');
                }
                break;
            case 'StateCorruption':
            case 'PartialWrite':
                verdict = verdictOf('compensate', 0.85, `${kind} left partial effects, compensate and escalate`);
                break;
            case 'PolicyRejected':
            case 'AuthDenied':
            case 'BadRequest':
            case 'StaleWrite':
                verdict = verdictOf('escalate', 0.85, `${kind} requires escalation`);
                break;
            default:
                if (layer === 'transient') {
                    verdict = verdictOf('retry', 0.65, `${kind} looks transient`);
                } else if (layer === 'cascade') {
                    verdict = verdictOf('rollback', 0.65, `${kind} looks cascade-like`);
                } else {
                    verdict = verdictOf('escalate', 0.65, `${kind} uncertain, escalating`);
                }
        }

        const confidence = noisy ? Math.min(verdict.confidence, NOISE_CONFIDENCE) : verdict.confidence;

        return { layer, action: verdict.action, confidence, reasoning: verdict.reasoning };
    }

    private isNoisy(request: DiagnosisRequest): boolean {
        const digest = crypto
            .createHash('sha256')
            .update(`${this.seed}:${request.task_id}:${request.error_kind}:${request.step_idx}`)
            .digest();
        return digest.readUInt32BE(0) % 10 === 0;
    }
}

export function classifyByKeywords(text: string): FaultLayer {
    const message = text.toLowerCase();
    if (TRANSIENT_TOKENS.some((t) => message.includes(t))) return 'transient';
    if (CASCADE_TOKENS.some((t) => message.includes(t))) return 'cascade';
    if (SEMANTIC_TOKENS.some((t) => message.includes(t))) return 'semantic';
    return 'persistent';
}

/* -------------------------------------------------------------------------- */
/* Prompted agent                                                             */
/* -------------------------------------------------------------------------- */

/**
 * Sends the diagnosis prompt to an injected completion function and returns
 * its raw text; validation happens in the strategy. The fault hint is never
 * sent.
 */
export class PromptedDiagnosisAgent implements DiagnosisCollaborator {
    constructor(
        private readonly complete: CompletionFn,
        private readonly extraInstruction?: string
    ) {}

    async diagnose(request: DiagnosisRequest): Promise<string> {
        const payload = {
            error_kind: request.error_kind,
            error_message: request.error_message,
            step_name: request.step_name,
            tool_name: request.tool_name,
            retry_count: request.retry_count,
            recent_history: request.recent_history,
            state_hash: request.state_hash,
        };
        log.debug('Diagnosis prompt sent', { task_id: request.task_id, step_idx: request.step_idx });
        return this.complete(getDiagnosisPrompt(this.extraInstruction), JSON.stringify(payload));
    }
}
