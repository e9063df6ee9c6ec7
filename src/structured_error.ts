/**
 * Structured Error Schema
 *
 * Machine-readable errors for invariant violations inside the runtime.
 * Simulated domain faults never use this path: they travel as StepResult
 * errors and are contained by the recovery policy.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Programming / policy invariants (fatal to the task)
    | 'CHECKPOINT_UNKNOWN'
    | 'COMPENSATION_FAILED'
    | 'UNKNOWN_TOOL'

    // Resource exhaustion (forces escalation)
    | 'BUDGET_EXHAUSTED'
    | 'LOOP_DETECTED'

    // Inputs from external collaborators
    | 'INVALID_TASK'
    | 'DIAGNOSIS_MALFORMED'
    | 'STORE_ERROR';

export type ErrorSeverity = 'FATAL' | 'ERROR' | 'WARNING';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: ErrorSeverity;
    context: Record<string, unknown>;
    critical: boolean;
    human_intervention_required: boolean;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

const CRITICAL_CODES: ErrorCode[] = ['CHECKPOINT_UNKNOWN', 'COMPENSATION_FAILED', 'UNKNOWN_TOOL'];

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {}
): StructuredError {
    const critical = CRITICAL_CODES.includes(code);
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        critical,
        human_intervention_required: critical || code === 'BUDGET_EXHAUSTED' || code === 'LOOP_DETECTED',
        timestamp: new Date().toISOString(),
    };
}

function getSeverity(code: ErrorCode): ErrorSeverity {
    const fatalCodes: ErrorCode[] = [...CRITICAL_CODES, 'STORE_ERROR'];
    const warningCodes: ErrorCode[] = ['DIAGNOSIS_MALFORMED'];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/**
 * Thrown for invariant violations. Never retried; the orchestrator turns it
 * into an unhandled task failure with a critical ticket.
 */
export class RuntimeInvariantError extends Error {
    constructor(public readonly detail: StructuredError) {
        super(detail.message);
        this.name = 'RuntimeInvariantError';
    }

    get code(): ErrorCode {
        return this.detail.code;
    }
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static checkpointUnknown(token: string): RuntimeInvariantError {
        return new RuntimeInvariantError(createStructuredError(
            'CHECKPOINT_UNKNOWN',
            `Unknown checkpoint token: ${token}`,
            { token }
        ));
    }

    static compensationFailed(
        tool: string,
        stepIdx: number,
        reason: string,
        remainingFrames: number
    ): StructuredError {
        return createStructuredError(
            'COMPENSATION_FAILED',
            `Compensation ${tool} for step ${stepIdx} failed: ${reason}`,
            { tool, step_idx: stepIdx, reason, remaining_frames: remainingFrames }
        );
    }

    static unknownTool(name: string): RuntimeInvariantError {
        return new RuntimeInvariantError(createStructuredError(
            'UNKNOWN_TOOL',
            `Tool not registered: ${name}`,
            { tool: name }
        ));
    }

    static invalidTask(source: string, errors: string[]): RuntimeInvariantError {
        return new RuntimeInvariantError(createStructuredError(
            'INVALID_TASK',
            `Invalid task record (${source}): ${errors.join('; ')}`,
            { source, errors }
        ));
    }

    static storeError(message: string, cause?: unknown): RuntimeInvariantError {
        return new RuntimeInvariantError(createStructuredError(
            'STORE_ERROR',
            message,
            { cause: cause instanceof Error ? cause.message : cause ?? null }
        ));
    }
}
