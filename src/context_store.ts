// context_store.ts: append-only envelope history, partitioned by session
//
// GUARANTEES:
// - Append-only: stored envelopes are deep-frozen and never replaced
// - history() is ordered by created_at ascending, ties broken by insertion order
// - latest(stage) is the envelope the next stage worker reads as its input
// - No cross-session state: each session id owns its own partition
//
// CONTRACT: Synchronous API. A call runs to completion before any other
// append() for the same session can start.

import { deepFreeze } from './immutable';
import { createLogger } from './logger';
import { InvalidEnvelopeError } from './structured_error';
import { Envelope, StageName, isStageName } from './types';

const log = createLogger('context');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ContextStats {
    count: number;
    by_sender: Partial<Record<StageName, number>>;
    by_receiver: Partial<Record<StageName, number>>;
    /** Mean privacy.epsilon over envelopes with privacy.applied = true; 0 when there are none. */
    avg_epsilon: number;
    /** Sum of privacy.epsilon over envelopes with privacy.applied = true. */
    epsilon_total: number;
}

interface Partition {
    /** Insertion order. */
    entries: Envelope[];
    byId: Map<string, Envelope>;
    /** True while entries are already in created_at order (the common case). */
    ordered: boolean;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function assertWellFormed(envelope: Envelope): void {
    const problems: string[] = [];
    if (typeof envelope.id !== 'string' || envelope.id.length === 0) problems.push('id');
    if (typeof envelope.session_id !== 'string' || envelope.session_id.length === 0) problems.push('session_id');
    if (!isStageName(envelope.sender)) problems.push('sender');
    if (!isStageName(envelope.receiver)) problems.push('receiver');
    if (typeof envelope.created_at !== 'string' || !Number.isFinite(Date.parse(envelope.created_at))) problems.push('created_at');
    if (!envelope.privacy || typeof envelope.privacy.applied !== 'boolean' || !Number.isFinite(envelope.privacy.epsilon)) {
        problems.push('privacy');
    }
    if (problems.length > 0) {
        throw new InvalidEnvelopeError(`Malformed envelope: bad ${problems.join(', ')}`, { fields: problems });
    }
}

/* -------------------------------------------------------------------------- */
/* Context Store                                                              */
/* -------------------------------------------------------------------------- */

export class ContextStore {
    private partitions = new Map<string, Partition>();

    /** Amortized O(1). Rejects only structurally malformed envelopes and duplicate ids. */
    append(envelope: Envelope): void {
        assertWellFormed(envelope);

        let partition = this.partitions.get(envelope.session_id);
        if (!partition) {
            partition = { entries: [], byId: new Map(), ordered: true };
            this.partitions.set(envelope.session_id, partition);
        }
        if (partition.byId.has(envelope.id)) {
            throw new InvalidEnvelopeError(`Duplicate envelope id ${envelope.id}`, { id: envelope.id });
        }

        const last = partition.entries[partition.entries.length - 1];
        if (last && Date.parse(envelope.created_at) < Date.parse(last.created_at)) {
            partition.ordered = false;
        }

        const stored = deepFreeze(envelope);
        partition.entries.push(stored);
        partition.byId.set(stored.id, stored);

        log.debug('Envelope appended', {
            session_id: stored.session_id,
            id: stored.id,
            sender: stored.sender,
            receiver: stored.receiver,
            kind: stored.kind,
        });
    }

    /** Most recent envelope (in history order) addressed to `stage`. */
    latest(session_id: string, stage: StageName): Envelope | undefined {
        const history = this.history(session_id);
        for (let i = history.length - 1; i >= 0; i--) {
            if (history[i].receiver === stage) return history[i];
        }
        return undefined;
    }

    history(session_id: string): Envelope[] {
        const partition = this.partitions.get(session_id);
        if (!partition) return [];
        if (partition.ordered) return [...partition.entries];
        // Array.prototype.sort is stable, so equal timestamps keep insertion order.
        return [...partition.entries].sort((a, b) => Date.parse(a.created_at) - Date.parse(b.created_at));
    }

    get(session_id: string, id: string): Envelope | undefined {
        return this.partitions.get(session_id)?.byId.get(id);
    }

    /** Every envelope addressed to `stage`, in history order. */
    byStage(session_id: string, stage: StageName): Envelope[] {
        return this.history(session_id).filter((e) => e.receiver === stage);
    }

    stats(session_id: string): ContextStats {
        const entries = this.partitions.get(session_id)?.entries ?? [];
        const by_sender: Partial<Record<StageName, number>> = {};
        const by_receiver: Partial<Record<StageName, number>> = {};
        let applied = 0;
        let epsilon_total = 0;

        for (const e of entries) {
            by_sender[e.sender] = (by_sender[e.sender] ?? 0) + 1;
            by_receiver[e.receiver] = (by_receiver[e.receiver] ?? 0) + 1;
            if (e.privacy.applied) {
                applied++;
                epsilon_total += e.privacy.epsilon;
            }
        }

        return {
            count: entries.length,
            by_sender,
            by_receiver,
            avg_epsilon: applied === 0 ? 0 : epsilon_total / applied,
            epsilon_total,
        };
    }

    sessions(): string[] {
        return [...this.partitions.keys()];
    }

    /** Drop a session's partition (session teardown). */
    clear(session_id: string): void {
        this.partitions.delete(session_id);
    }
}
