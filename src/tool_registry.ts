/**
 * Tool Registry
 *
 * Named mock API tools and the executor that applies an injected fault to a
 * call. A tool mutates world state only through `do`.
 */

import { ErrorFactory } from './structured_error';
import { FAULT_MESSAGES, POSTCONDITION_FAILED } from './fault_injector';
import { cloneWorldState } from './world_state';
import { FaultDescriptor, JsonObject, StepError, StepResult, WorldState } from './types';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface CompensationSpec {
    /** Registered name of the compensating tool. */
    tool: string;
    /** Arguments for the compensating call, built from the forward call. */
    args(params: JsonObject, output: JsonObject): JsonObject;
}

export interface ToolSpec {
    name: string;
    do(state: WorldState, args: JsonObject): JsonObject;
    compensate?: CompensationSpec;
    irreversible?: boolean;
    /** Post-condition on the live state; returns a failure message or null. */
    verify?(state: WorldState, args: JsonObject, output: JsonObject): string | null;
}

/** Domain failure raised by a tool body. `kind` becomes the StepError kind. */
export class ToolError extends Error {
    constructor(public readonly kind: string, message: string) {
        super(message);
        this.name = 'ToolError';
    }
}

export interface ToolExecution {
    result: StepResult;
    /** True when `do` ran against the live state, whatever was reported. */
    effectApplied: boolean;
}

/* -------------------------------------------------------------------------- */
/* Registry                                                                   */
/* -------------------------------------------------------------------------- */

export class ToolRegistry {
    private tools: Map<string, ToolSpec> = new Map();

    register(spec: ToolSpec): this {
        this.tools.set(spec.name, spec);
        return this;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    /** @throws RuntimeInvariantError (UNKNOWN_TOOL) */
    get(name: string): ToolSpec {
        const spec = this.tools.get(name);
        if (!spec) throw ErrorFactory.unknownTool(name);
        return spec;
    }

    names(): string[] {
        return [...this.tools.keys()].sort();
    }
}

/* -------------------------------------------------------------------------- */
/* Execution                                                                  */
/* -------------------------------------------------------------------------- */

function failure(error: StepError, latencyMs: number, fault: FaultDescriptor | null): StepResult {
    return { status: 'error', output: null, error, latencyMs, injectedFault: fault };
}

function success(output: JsonObject, latencyMs: number, fault: FaultDescriptor | null): StepResult {
    return { status: 'ok', output, error: null, latencyMs, injectedFault: fault };
}

function errorFromThrown(tool: string, e: unknown): StepError {
    if (e instanceof ToolError) {
        return { kind: e.kind, message: e.message, trace: `${tool}: ${e.kind}: ${e.message}` };
    }
    const message = e instanceof Error ? e.message : String(e);
    return { kind: 'RuntimeError', message, trace: `${tool}: RuntimeError: ${message}` };
}

function injectedError(fault: FaultDescriptor): StepError {
    return {
        kind: fault.kind,
        message: FAULT_MESSAGES[fault.kind],
        trace: `Injected fault: ${fault.kind} (${fault.faultId})`,
    };
}

function postcondition(tool: ToolSpec, state: WorldState, args: JsonObject, output: JsonObject): StepError | null {
    if (!tool.verify) return null;
    const message = tool.verify(state, args, output);
    if (message === null) return null;
    return { kind: POSTCONDITION_FAILED, message, trace: `${tool.name}: postcondition: ${message}` };
}

/**
 * Run one call. Fault layers shape the outcome:
 * - transient/persistent: no effect, the fault's error is reported
 * - semantic: the effect is computed on a throwaway copy and dropped, the call
 *   reports ok unless the tool's post-condition notices
 * - cascade: the effect is applied, then the fault's error is reported
 */
export function executeTool(
    tool: ToolSpec,
    state: WorldState,
    args: JsonObject,
    fault: FaultDescriptor | null,
    latencyMs: number
): ToolExecution {
    if (fault && (fault.layer === 'transient' || fault.layer === 'persistent')) {
        return { result: failure(injectedError(fault), latencyMs, fault), effectApplied: false };
    }

    if (fault && fault.layer === 'semantic') {
        let output: JsonObject;
        try {
            output = tool.do(cloneWorldState(state), args);
        } catch (e) {
            return { result: failure(errorFromThrown(tool.name, e), latencyMs, fault), effectApplied: false };
        }
        const violated = postcondition(tool, state, args, output);
        return {
            result: violated ? failure(violated, latencyMs, fault) : success(output, latencyMs, fault),
            effectApplied: false,
        };
    }

    let output: JsonObject;
    try {
        output = tool.do(state, args);
    } catch (e) {
        return { result: failure(errorFromThrown(tool.name, e), latencyMs, fault), effectApplied: false };
    }

    if (fault) {
        return { result: failure(injectedError(fault), latencyMs, fault), effectApplied: true };
    }

    const violated = postcondition(tool, state, args, output);
    return {
        result: violated ? failure(violated, latencyMs, null) : success(output, latencyMs, null),
        effectApplied: true,
    };
}
