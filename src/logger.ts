/**
 * Structured Logger — component logging for the recovery runtime
 *
 * Every line carries the component and, while a task runs, the run/task/strategy
 * it belongs to, so logs can be joined against trace events.
 *
 *   text:  2026-01-01T00:00:00.000Z INFO  orchestrator run-0/T1/memory Task started {"steps":4}
 *   json:  {"ts":...,"level":"info","component":"orchestrator","msg":"Task started","run_id":"run-0",...}
 *
 * Environment:
 *   RECOVERY_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   RECOVERY_LOG_JSON   = 1 (default: text)
 *   RECOVERY_LOG_FILE   = path (optional, appends)
 *   RECOVERY_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const value = (raw || 'info').toLowerCase();
    return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

const DEBUG_OVERRIDE = process.env.RECOVERY_DEBUG === '1' || process.env.RECOVERY_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : LEVEL_ORDER[parseLevel(process.env.RECOVERY_LOG_LEVEL)];

const JSON_MODE = process.env.RECOVERY_LOG_JSON === '1';
const LOG_FILE = process.env.RECOVERY_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Correlation                                                                */
/* -------------------------------------------------------------------------- */

export interface LogCorrelation {
    runId?: string;
    taskId?: string;
    strategy?: string;
}

let correlation: LogCorrelation = {};

/** Merge into the active correlation. The orchestrator sets it at task start. */
export function setCorrelation(next: LogCorrelation): void {
    correlation = { ...correlation, ...next };
}

export function clearCorrelation(): void {
    correlation = {};
}

export function currentCorrelation(): LogCorrelation {
    return { ...correlation };
}

/* -------------------------------------------------------------------------- */
/* Formatting                                                                 */
/* -------------------------------------------------------------------------- */

export interface LogEntry {
    ts: string;
    level: LogLevel;
    component: string;
    message: string;
    correlation: LogCorrelation;
    data?: Record<string, unknown>;
}

export function formatEntry(entry: LogEntry, json: boolean): string {
    const { runId, taskId, strategy } = entry.correlation;

    if (json) {
        const record: Record<string, unknown> = {
            ts: entry.ts,
            level: entry.level,
            component: entry.component,
            msg: entry.message,
        };
        if (runId) record.run_id = runId;
        if (taskId) record.task_id = taskId;
        if (strategy) record.strategy = strategy;
        if (entry.data) record.data = entry.data;
        return JSON.stringify(record);
    }

    const where = [runId, taskId, strategy].filter((part): part is string => Boolean(part)).join('/');
    const head = `${entry.ts} ${entry.level.toUpperCase().padEnd(5)} ${entry.component}${where ? ' ' + where : ''}`;
    return entry.data ? `${head} ${entry.message} ${JSON.stringify(entry.data)}` : `${head} ${entry.message}`;
}

/* -------------------------------------------------------------------------- */
/* Output                                                                     */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const line = formatEntry(
        { ts: new Date().toISOString(), level, component, message, correlation, data },
        JSON_MODE
    );

    const stream = level === 'warn' || level === 'error' ? process.stderr : process.stdout;
    stream.write(line + '\n');

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            process.stderr.write(`[logger] append to ${LOG_FILE} failed: ${e instanceof Error ? e.message : String(e)}\n`);
        }
    }
}

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info: (msg, data) => emit('info', component, msg, data),
        warn: (msg, data) => emit('warn', component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
