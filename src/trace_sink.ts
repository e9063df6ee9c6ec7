/**
 * Trace sinks — append-only TraceEvent streams.
 *
 * Every event is serialized as canonical JSON (sorted keys), so two runs with
 * the same seed and task set produce byte-identical lines.
 */

import { atomicWriteFileSync } from './atomic_write';
import { createLogger } from './logger';
import { stableStringify } from './stable_stringify';
import { TraceEvent } from './types';

const log = createLogger('trace');

export interface TraceSink {
    append(event: TraceEvent): void;
    /** Persist buffered events. No-op for sinks without storage. */
    flush(): void;
}

export function serializeTraceEvent(event: TraceEvent): string {
    return stableStringify(event);
}

export class InMemoryTraceSink implements TraceSink {
    private readonly events: TraceEvent[] = [];

    append(event: TraceEvent): void {
        this.events.push(event);
    }

    flush(): void {
        // nothing buffered
    }

    all(): readonly TraceEvent[] {
        return this.events;
    }

    forTask(taskId: string): TraceEvent[] {
        return this.events.filter((e) => e.task_id === taskId);
    }

    toJsonl(): string {
        return this.events.map((e) => serializeTraceEvent(e) + '\n').join('');
    }
}

/**
 * JSONL file sink. Lines accumulate in memory; flush() rewrites the file
 * through a temp file and rename, so a reader never sees a torn line.
 */
export class JsonlTraceSink implements TraceSink {
    private readonly lines: string[] = [];
    private flushedCount = 0;

    constructor(
        private readonly filePath: string,
        private readonly flushEvery: number = 0
    ) {}

    append(event: TraceEvent): void {
        this.lines.push(serializeTraceEvent(event));
        if (this.flushEvery > 0 && this.lines.length - this.flushedCount >= this.flushEvery) {
            this.flush();
        }
    }

    flush(): void {
        if (this.flushedCount === this.lines.length && this.flushedCount > 0) return;

        const warnings: string[] = [];
        atomicWriteFileSync({
            filePath: this.filePath,
            content: this.lines.map((line) => line + '\n').join(''),
            mode: 0o644,
            fsyncMode: 'BEST_EFFORT',
            warnings,
        });
        for (const warning of warnings) log.warn(warning, { file: this.filePath });

        this.flushedCount = this.lines.length;
        log.debug('Trace flushed', { file: this.filePath, events: this.lines.length });
    }

    get eventCount(): number {
        return this.lines.length;
    }
}
