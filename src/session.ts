/**
 * Session
 *
 * One analysis run: its config, its privacy account, its slice of the context
 * store and its position in the state machine
 *
 *   Init -> GapDetection -> Debate -> HypothesisGeneration -> Evolving (xN) -> Finalized
 *
 * with Failed reachable from every non-terminal state. Terminal states have
 * no outgoing edges.
 */

import * as crypto from 'crypto';
import { SessionConfig, resolveSessionConfig } from './config';
import { ContextStats, ContextStore } from './context_store';
import { deepFreeze } from './immutable';
import { Logger, createLogger } from './logger';
import { PrivacyLedger } from './privacy_ledger';
import { CancelledError, InvalidStateTransitionError, StructuredError } from './structured_error';
import type { Envelope, StageName, StopReason } from './types';

export type SessionState =
    | 'Init'
    | 'GapDetection'
    | 'Debate'
    | 'HypothesisGeneration'
    | 'Evolving'
    | 'Finalized'
    | 'Failed';

const VALID_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
    Init: ['GapDetection', 'Failed'],
    GapDetection: ['Debate', 'Failed'],
    Debate: ['HypothesisGeneration', 'Failed'],
    HypothesisGeneration: ['Evolving', 'Failed'],
    Evolving: ['Evolving', 'Finalized', 'Failed'],
    Finalized: [],
    Failed: [],
};

export function isTerminal(state: SessionState): boolean {
    return VALID_TRANSITIONS[state].length === 0;
}

export interface StageUsage {
    envelopes: number;
    epsilon: number;
}

export interface PrivacySummary {
    epsilon_spent: number;
    /** null for an unbounded session. */
    epsilon_budget: number | null;
    /** null for an unbounded session. */
    remaining: number | null;
    charges: number;
}

/** Read-only view of a session; deep-frozen. */
export interface SessionSnapshot {
    session_id: string;
    state: SessionState;
    cycle: number;
    stop_reason: StopReason | null;
    failure: StructuredError | null;
    created_at: string;
    history: Envelope[];
    stats: ContextStats;
    privacy: PrivacySummary;
    /** Keyed by the receiving stage. */
    per_stage: Partial<Record<StageName, StageUsage>>;
}

export interface SessionOptions {
    id?: string;
    config?: Partial<SessionConfig>;
    store?: ContextStore;
    ledger?: PrivacyLedger;
}

export class Session {
    readonly id: string;
    readonly config: SessionConfig;
    readonly store: ContextStore;
    readonly ledger: PrivacyLedger;
    readonly created_at: string;

    private _state: SessionState = 'Init';
    private _cycle = 0;
    private _stopReason: StopReason | null = null;
    private _failure: StructuredError | null = null;
    private cancelReason: string | null = null;
    private readonly log: Logger;

    constructor(options: SessionOptions = {}) {
        this.id = options.id ?? crypto.randomUUID();
        this.config = resolveSessionConfig(options.config);
        this.store = options.store ?? new ContextStore();
        this.ledger = options.ledger ?? new PrivacyLedger();
        this.created_at = new Date().toISOString();
        this.ledger.registerSession(this.id, { epsilon_budget: this.config.epsilon_budget });
        this.log = createLogger('session', { session_id: this.id });
    }

    get state(): SessionState {
        return this._state;
    }

    get cycle(): number {
        return this._cycle;
    }

    get stopReason(): StopReason | null {
        return this._stopReason;
    }

    get failure(): StructuredError | null {
        return this._failure;
    }

    get cancelled(): boolean {
        return this.cancelReason !== null;
    }

    transition(to: SessionState): void {
        if (!VALID_TRANSITIONS[this._state].includes(to)) {
            throw new InvalidStateTransitionError(this.id, this._state, to);
        }
        this.log.debug('State transition', { from: this._state, to });
        this._state = to;
    }

    /** Enter the next evolution cycle and return its 1-based number. */
    nextCycle(): number {
        this.transition('Evolving');
        this._cycle += 1;
        return this._cycle;
    }

    finalize(reason: StopReason): void {
        this.transition('Finalized');
        this._stopReason = reason;
        this.log.info('Session finalized', { stop_reason: reason, cycles: this._cycle });
    }

    fail(error: StructuredError): void {
        this.transition('Failed');
        this._failure = error;
        this.log.warn('Session failed', { code: error.code, message: error.message });
    }

    /**
     * Request cooperative cancellation. Takes effect at the next checkpoint
     * (before a stage, an attempt or a cycle, and after each model call).
     * No-op once the session is terminal.
     */
    cancel(reason = 'Cancelled'): void {
        if (isTerminal(this._state) || this.cancelReason !== null) return;
        this.cancelReason = reason;
        this.log.info('Cancellation requested', { reason });
    }

    throwIfCancelled(): void {
        if (this.cancelReason !== null) {
            throw new CancelledError(this.id, this.cancelReason);
        }
    }

    snapshot(): SessionSnapshot {
        const history = this.store.history(this.id);
        const per_stage: Partial<Record<StageName, StageUsage>> = {};
        for (const e of history) {
            const usage = per_stage[e.receiver] ?? { envelopes: 0, epsilon: 0 };
            usage.envelopes += 1;
            if (e.privacy.applied) usage.epsilon += e.privacy.epsilon;
            per_stage[e.receiver] = usage;
        }

        const budget = this.ledger.budget(this.id);
        const bounded = Number.isFinite(budget);
        return deepFreeze({
            session_id: this.id,
            state: this._state,
            cycle: this._cycle,
            stop_reason: this._stopReason,
            failure: this._failure === null ? null : structuredClone(this._failure),
            created_at: this.created_at,
            history,
            stats: this.store.stats(this.id),
            privacy: {
                epsilon_spent: this.ledger.spent(this.id),
                epsilon_budget: bounded ? budget : null,
                remaining: bounded ? this.ledger.remaining(this.id) : null,
                charges: this.ledger.getLedger(this.id).length,
            },
            per_stage,
        });
    }

    /** Tear down: drop the session's envelopes and privacy account. Returns the last snapshot. */
    release(): SessionSnapshot {
        const last = this.snapshot();
        this.store.clear(this.id);
        this.ledger.releaseSession(this.id);
        return last;
    }
}
