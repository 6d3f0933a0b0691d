// session_archive.ts: durable record of finished sessions
//
// GUARANTEES:
// - One row per session; consuming the same session again replaces it
// - The envelope index mirrors snapshot.history (seq order) for the session
// - Forward-compatible schema migrations (schema_version)
// - Memory-bounded cache of parsed snapshots
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design). Implements
// ReportSink so an orchestrator can archive every session it finishes.

import Database from 'better-sqlite3';
import { LRUCache } from 'lru-cache';
import { createLogger } from './logger';
import type { ReportSink } from './pipeline_orchestrator';
import type { SessionSnapshot } from './session';
import { ContextForgeError } from './structured_error';

const log = createLogger('archive');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ArchivedSessionSummary {
    session_id: string;
    state: string;
    stop_reason: string | null;
    cycles: number;
    envelopes: number;
    epsilon_spent: number;
    /** null for an unbounded session. */
    epsilon_budget: number | null;
    created_at: string;
    archived_at: string;
}

export interface EnvelopeIndexRow {
    seq: number;
    id: string;
    sender: string;
    receiver: string;
    kind: string;
    event: string | null;
    cycle: number | null;
    applied: boolean;
    epsilon: number;
    created_at: string;
}

export interface SessionArchiveOptions {
    /** Parsed snapshots kept in memory (default 64). */
    cacheEntries?: number;
    clock?: () => Date;
}

interface SessionRow {
    session_id: string;
    state: string;
    stop_reason: string | null;
    cycles: number;
    envelopes: number;
    epsilon_spent: number;
    epsilon_budget: number | null;
    created_at: string;
    archived_at: string;
}

interface EnvelopeRow {
    seq: number;
    envelope_id: string;
    sender: string;
    receiver: string;
    kind: string;
    event: string | null;
    cycle: number | null;
    applied: number;
    epsilon: number;
    created_at: string;
}

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 2;
const DEFAULT_CACHE_ENTRIES = 64;

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSnapshot(value: unknown): value is SessionSnapshot {
    return (
        isRecord(value) &&
        typeof value.session_id === 'string' &&
        typeof value.state === 'string' &&
        Array.isArray(value.history) &&
        isRecord(value.stats) &&
        isRecord(value.privacy) &&
        isRecord(value.per_stage)
    );
}

/* -------------------------------------------------------------------------- */
/* Session Archive                                                            */
/* -------------------------------------------------------------------------- */

export class SessionArchive implements ReportSink {
    private readonly db: Database.Database;
    private readonly clock: () => Date;
    private readonly cache: LRUCache<string, SessionSnapshot>;

    constructor(dbPath = ':memory:', options: SessionArchiveOptions = {}) {
        this.clock = options.clock ?? (() => new Date());
        this.cache = new LRUCache<string, SessionSnapshot>({ max: options.cacheEntries ?? DEFAULT_CACHE_ENTRIES });

        this.db = new Database(dbPath);
        this.configureDatabase();
        this.runMigrations();
        this.integrityCheck();
        log.debug('Archive opened', { path: dbPath });
    }

    /* ------------------------------------------------------------------------ */
    /* SQLite Configuration                                                     */
    /* ------------------------------------------------------------------------ */

    private configureDatabase(): void {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
        this.db.pragma('synchronous = NORMAL');
        this.db.pragma('busy_timeout = 5000');
    }

    private runMigrations(): void {
        const tx = this.db.transaction(() => {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS schema_version (
                    version INTEGER PRIMARY KEY,
                    applied_at TEXT DEFAULT CURRENT_TIMESTAMP
                ) STRICT
            `);

            const row = this.db
                .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
                .get();
            const current = row?.version ?? 0;

            if (current < 1) {
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS sessions (
                        session_id TEXT PRIMARY KEY,
                        state TEXT NOT NULL,
                        stop_reason TEXT,
                        cycles INTEGER NOT NULL,
                        envelopes INTEGER NOT NULL,
                        epsilon_spent REAL NOT NULL,
                        epsilon_budget REAL,
                        created_at TEXT NOT NULL,
                        archived_at TEXT NOT NULL,
                        snapshot_json TEXT NOT NULL
                    ) STRICT;

                    CREATE INDEX IF NOT EXISTS idx_sessions_archived ON sessions(archived_at);
                `);
                this.db.prepare(`INSERT INTO schema_version(version) VALUES (1)`).run();
            }

            if (current < 2) {
                // v2: per-envelope index for inspecting a history without parsing the snapshot
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS envelopes (
                        session_id TEXT NOT NULL REFERENCES sessions(session_id) ON DELETE CASCADE,
                        seq INTEGER NOT NULL,
                        envelope_id TEXT NOT NULL,
                        sender TEXT NOT NULL,
                        receiver TEXT NOT NULL,
                        kind TEXT NOT NULL,
                        event TEXT,
                        cycle INTEGER,
                        applied INTEGER NOT NULL CHECK(applied IN (0,1)),
                        epsilon REAL NOT NULL,
                        created_at TEXT NOT NULL,
                        PRIMARY KEY (session_id, envelope_id)
                    ) STRICT;
                `);
                this.db.prepare(`INSERT INTO schema_version(version) VALUES (2)`).run();
            }
        });
        tx();
    }

    private integrityCheck(): void {
        const result = this.db.pragma('quick_check', { simple: true });
        if (result !== 'ok') {
            throw new ContextForgeError(`Session archive failed integrity check: ${String(result)}`, 'INTERNAL_ERROR', {
                schema_version: SCHEMA_VERSION,
            });
        }
    }

    /* ------------------------------------------------------------------------ */
    /* ReportSink                                                               */
    /* ------------------------------------------------------------------------ */

    consume(snapshot: SessionSnapshot): void {
        const archived_at = this.clock().toISOString();
        const insertSession = this.db.prepare(`
            INSERT OR REPLACE INTO sessions
                (session_id, state, stop_reason, cycles, envelopes, epsilon_spent, epsilon_budget, created_at, archived_at, snapshot_json)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `);
        const clearEnvelopes = this.db.prepare(`DELETE FROM envelopes WHERE session_id = ?`);
        const insertEnvelope = this.db.prepare(`
            INSERT INTO envelopes
                (session_id, seq, envelope_id, sender, receiver, kind, event, cycle, applied, epsilon, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `);

        const tx = this.db.transaction(() => {
            clearEnvelopes.run(snapshot.session_id);
            insertSession.run(
                snapshot.session_id,
                snapshot.state,
                snapshot.stop_reason,
                snapshot.cycle,
                snapshot.history.length,
                snapshot.privacy.epsilon_spent,
                snapshot.privacy.epsilon_budget,
                snapshot.created_at,
                archived_at,
                JSON.stringify(snapshot)
            );
            for (const e of snapshot.history) {
                insertEnvelope.run(
                    snapshot.session_id,
                    e.seq,
                    e.id,
                    e.sender,
                    e.receiver,
                    e.kind,
                    e.meta.event ?? null,
                    e.meta.cycle ?? null,
                    e.privacy.applied ? 1 : 0,
                    e.privacy.epsilon,
                    e.created_at
                );
            }
        });
        tx();

        this.cache.set(snapshot.session_id, snapshot);
        log.info('Session archived', {
            session_id: snapshot.session_id,
            state: snapshot.state,
            envelopes: snapshot.history.length,
        });
    }

    /* ------------------------------------------------------------------------ */
    /* Queries                                                                  */
    /* ------------------------------------------------------------------------ */

    load(session_id: string): SessionSnapshot | null {
        const cached = this.cache.get(session_id);
        if (cached) return cached;

        const row = this.db
            .prepare<[string], { snapshot_json: string }>(`SELECT snapshot_json FROM sessions WHERE session_id = ?`)
            .get(session_id);
        if (!row) return null;

        const parsed: unknown = JSON.parse(row.snapshot_json);
        if (!isSnapshot(parsed)) {
            throw new ContextForgeError(`Archived snapshot for ${session_id} is corrupt`, 'INTERNAL_ERROR', { session_id });
        }
        this.cache.set(session_id, parsed);
        return parsed;
    }

    /** Most recently archived first. */
    list(limit = 50): ArchivedSessionSummary[] {
        return this.db
            .prepare<[number], SessionRow>(`
                SELECT session_id, state, stop_reason, cycles, envelopes, epsilon_spent, epsilon_budget, created_at, archived_at
                FROM sessions
                ORDER BY archived_at DESC, rowid DESC
                LIMIT ?
            `)
            .all(limit);
    }

    envelopeIndex(session_id: string): EnvelopeIndexRow[] {
        return this.db
            .prepare<[string], EnvelopeRow>(`
                SELECT seq, envelope_id, sender, receiver, kind, event, cycle, applied, epsilon, created_at
                FROM envelopes
                WHERE session_id = ?
                ORDER BY seq ASC
            `)
            .all(session_id)
            .map((r) => ({
                seq: r.seq,
                id: r.envelope_id,
                sender: r.sender,
                receiver: r.receiver,
                kind: r.kind,
                event: r.event,
                cycle: r.cycle,
                applied: r.applied === 1,
                epsilon: r.epsilon,
                created_at: r.created_at,
            }));
    }

    close(): void {
        this.cache.clear();
        this.db.close();
    }
}
