// memory_store.ts — durable Memory Bank snapshots
//
// GUARANTEES:
// - One snapshot per store; save() replaces it atomically (single transaction)
// - Forward-compatible schema migrations (schema_version)
// - Snapshots are validated on load; malformed rows fail with STORE_ERROR
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import { createLogger } from './logger';
import { MEMORY_SNAPSHOT_VERSION, MemoryBank, MemorySnapshot } from './memory_bank';
import { ErrorFactory } from './structured_error';

const log = createLogger('memory_store');

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 1;

interface EntryRow {
    entry_key: string;
    signature_json: string;
    actions_json: string;
}

function openDatabase(dbPath: string): Database.Database {
    try {
        return new Database(dbPath);
    } catch (e) {
        throw ErrorFactory.storeError(`Cannot open memory store at ${dbPath}`, e);
    }
}

/* -------------------------------------------------------------------------- */
/* Memory Store                                                               */
/* -------------------------------------------------------------------------- */

export class MemoryStore {
    private readonly db: Database.Database;

    /** `:memory:` gives a private in-process database. */
    constructor(dbPath: string) {
        this.db = openDatabase(dbPath);
        this.configureDatabase();
        this.runMigrations();
    }

    /* ------------------------------------------------------------------------ */
    /* SQLite Configuration                                                     */
    /* ------------------------------------------------------------------------ */

    private configureDatabase(): void {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.db.pragma('busy_timeout = 5000');
    }

    /* ------------------------------------------------------------------------ */
    /* Migrations                                                               */
    /* ------------------------------------------------------------------------ */

    private runMigrations(): void {
        const tx = this.db.transaction(() => {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS schema_version (
                    version INTEGER PRIMARY KEY,
                    applied_at TEXT DEFAULT CURRENT_TIMESTAMP
                ) STRICT
            `);

            const row = this.db
                .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
                .get() as { version: number } | undefined;

            const current = row?.version ?? 0;

            if (current < SCHEMA_VERSION) {
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS memory_entries (
                        entry_key TEXT PRIMARY KEY,
                        signature_json TEXT NOT NULL,
                        actions_json TEXT NOT NULL,
                        saved_at TEXT DEFAULT CURRENT_TIMESTAMP
                    ) STRICT;

                    CREATE TABLE IF NOT EXISTS memory_meta (
                        name TEXT PRIMARY KEY,
                        value TEXT NOT NULL
                    ) STRICT;
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
            }
        });
        tx();
    }

    /* ------------------------------------------------------------------------ */
    /* Snapshots                                                                */
    /* ------------------------------------------------------------------------ */

    saveSnapshot(snapshot: MemorySnapshot): void {
        const insert = this.db.prepare(
            `INSERT INTO memory_entries (entry_key, signature_json, actions_json) VALUES (?, ?, ?)`
        );
        const setMeta = this.db.prepare(
            `INSERT INTO memory_meta (name, value) VALUES (?, ?)
             ON CONFLICT(name) DO UPDATE SET value = excluded.value`
        );

        const tx = this.db.transaction((snap: MemorySnapshot) => {
            this.db.prepare(`DELETE FROM memory_entries`).run();
            for (const entry of snap.entries) {
                insert.run(entry.key, JSON.stringify(entry.signature), JSON.stringify(entry.actions));
            }
            setMeta.run('snapshot_version', String(snap.version));
        });

        try {
            tx(snapshot);
        } catch (e) {
            throw ErrorFactory.storeError('Failed to save memory snapshot', e);
        }
        log.info('Memory snapshot saved', { entries: snapshot.entries.length });
    }

    /**
     * Raw stored snapshot, or null when nothing has been saved yet. Shape is
     * checked by MemoryBank.restore().
     */
    loadSnapshot(): { version: number; entries: unknown[] } | null {
        const meta = this.db
            .prepare(`SELECT value FROM memory_meta WHERE name = 'snapshot_version'`)
            .get() as { value: string } | undefined;
        if (!meta) return null;

        const rows = this.db
            .prepare(`SELECT entry_key, signature_json, actions_json FROM memory_entries ORDER BY entry_key`)
            .all() as EntryRow[];

        try {
            return {
                version: Number(meta.value),
                entries: rows.map((row): unknown => {
                    const signature: unknown = JSON.parse(row.signature_json);
                    const actions: unknown = JSON.parse(row.actions_json);
                    return { key: row.entry_key, signature, actions };
                }),
            };
        } catch (e) {
            throw ErrorFactory.storeError('Corrupt memory snapshot row', e);
        }
    }

    save(bank: MemoryBank): void {
        this.saveSnapshot(bank.snapshot());
    }

    /** Restore `bank` from the stored snapshot. Returns false when none exists. */
    load(bank: MemoryBank): boolean {
        const snapshot = this.loadSnapshot();
        if (!snapshot) return false;
        if (snapshot.version !== MEMORY_SNAPSHOT_VERSION) {
            throw ErrorFactory.storeError(`Unsupported memory snapshot version ${snapshot.version}`);
        }
        bank.restore(snapshot);
        return true;
    }

    close(): void {
        this.db.close();
    }
}
