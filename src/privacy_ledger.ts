/**
 * PrivacyLedger: cumulative epsilon accounting for every stage handoff.
 *
 * INVARIANT: every envelope is minted here. Nothing crosses a stage boundary
 * without passing through wrap() (charged) or passThrough() (unprotected,
 * epsilon 0).
 *
 * Composition is sequential: each wrap() adds exactly its epsilon to the
 * session's spend. The charge is per envelope, not per perturbed field, even
 * though every numeric field draws its own noise. This is a policy choice;
 * per-field charging would multiply the cost by the number of numeric leaves.
 *
 * Privacy is charged at the handoff rather than at embedding time because
 * every stage that observes a value is another disclosure.
 *
 * All methods are synchronous, so a wrap() for one session can never
 * interleave with another wrap() or append() for the same session.
 */

import * as crypto from 'crypto';
import { createLogger } from './logger';
import { RandomSource, cryptoRandom, sampleLaplace, validatePrivacyParams } from './noise_engine';
import { BudgetExceededError, InvalidParameterError } from './structured_error';
import type { Envelope, EnvelopeKind, EnvelopeMeta, StageName } from './types';

const log = createLogger('privacy');

/** Absorbs float summation error so a budget of 1.0 admits ten charges of 0.1. */
const BUDGET_TOLERANCE = 1e-9;

export interface PrivacyBudgetConfig {
    /** Ceiling for the session. Infinity = accounting only, never enforced. */
    epsilon_budget: number;
    /** Warn when projected spend crosses this fraction of a finite budget (default 0.8). */
    warn_fraction?: number;
}

export interface LedgerEntry {
    session_id: string;
    envelope_id: string;
    sender: StageName;
    receiver: StageName;
    epsilon: number;
    sensitivity: number;
    fields_perturbed: number;
    spent_after: number;
    timestamp: string;
}

export interface WrapOptions {
    kind?: EnvelopeKind;
    meta?: EnvelopeMeta;
}

export interface PrivacyLedgerOptions {
    random?: RandomSource;
    clock?: () => Date;
}

interface SessionAccount {
    config: PrivacyBudgetConfig;
    spent: number;
    seq: number;
    lastCreatedAt: string | null;
    entries: LedgerEntry[];
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Adds independent noise to every finite numeric leaf, in place. Returns the number of fields touched. */
function perturbInPlace(node: unknown, noise: () => number): number {
    let count = 0;
    if (Array.isArray(node)) {
        for (let i = 0; i < node.length; i++) {
            const v: unknown = node[i];
            if (typeof v === 'number' && Number.isFinite(v)) {
                node[i] = v + noise();
                count++;
            } else {
                count += perturbInPlace(v, noise);
            }
        }
    } else if (isRecord(node)) {
        for (const key of Object.keys(node)) {
            const v = node[key];
            if (typeof v === 'number' && Number.isFinite(v)) {
                node[key] = v + noise();
                count++;
            } else {
                count += perturbInPlace(v, noise);
            }
        }
    }
    return count;
}

function monotonicNowIso(now: Date, prevIso: string | null): string {
    if (!prevIso) return now.toISOString();
    const prev = Date.parse(prevIso);
    if (!Number.isFinite(prev)) return now.toISOString();
    return new Date(Math.max(prev, now.getTime())).toISOString();
}

/* -------------------------------------------------------------------------- */
/* Ledger                                                                     */
/* -------------------------------------------------------------------------- */

export class PrivacyLedger {
    private accounts = new Map<string, SessionAccount>();
    private readonly random: RandomSource;
    private readonly clock: () => Date;

    constructor(options: PrivacyLedgerOptions = {}) {
        this.random = options.random ?? cryptoRandom;
        this.clock = options.clock ?? (() => new Date());
    }

    /** Register a session's budget before any handoff. Re-registering keeps the spend. */
    registerSession(session_id: string, config: PrivacyBudgetConfig): void {
        if (Number.isNaN(config.epsilon_budget) || config.epsilon_budget < 0) {
            throw new InvalidParameterError(`epsilon_budget must be >= 0 or Infinity, got ${config.epsilon_budget}`);
        }
        const existing = this.accounts.get(session_id);
        if (existing) {
            existing.config = config;
        } else {
            this.accounts.set(session_id, { config, spent: 0, seq: 0, lastCreatedAt: null, entries: [] });
        }
        log.debug('Session registered', { session_id, epsilon_budget: config.epsilon_budget });
    }

    isRegistered(session_id: string): boolean {
        return this.accounts.has(session_id);
    }

    /**
     * Perturb every numeric leaf of `payload` with Laplace(0, sensitivity/epsilon)
     * noise and charge `epsilon` to the session.
     *
     * The budget is checked before anything is spent; a rejected call leaves
     * the account untouched.
     */
    wrap<P>(
        session_id: string,
        sender: StageName,
        receiver: StageName,
        payload: P,
        epsilon: number,
        sensitivity: number,
        options: WrapOptions = {}
    ): Envelope<P> {
        validatePrivacyParams(sensitivity, epsilon);
        const account = this.account(session_id);

        const budget = account.config.epsilon_budget;
        const projected = account.spent + epsilon;
        if (Number.isFinite(budget) && projected - budget > BUDGET_TOLERANCE * Math.max(1, budget)) {
            log.warn('Privacy budget exceeded', { session_id, budget, spent: account.spent, requested: epsilon });
            throw new BudgetExceededError(session_id, budget, account.spent, epsilon);
        }

        const warnAt = account.config.warn_fraction ?? 0.8;
        if (Number.isFinite(budget) && projected > budget * warnAt) {
            log.warn('Privacy budget warning', { session_id, budget, projected, threshold: warnAt });
        }

        const perturbed = structuredClone(payload);
        const fields = perturbInPlace(perturbed, () => sampleLaplace(sensitivity, epsilon, this.random));

        const envelope = this.mint(account, session_id, sender, receiver, perturbed, {
            applied: true,
            epsilon,
            mechanism: 'laplace',
            sensitivity,
        }, options);

        // A charge admitted only by the tolerance lands exactly on the ceiling.
        account.spent = Number.isFinite(budget) ? Math.min(projected, budget) : projected;
        account.entries.push({
            session_id,
            envelope_id: envelope.id,
            sender,
            receiver,
            epsilon,
            sensitivity,
            fields_perturbed: fields,
            spent_after: account.spent,
            timestamp: envelope.created_at,
        });

        log.debug('Handoff wrapped', { session_id, sender, receiver, epsilon, fields, spent: account.spent });
        return envelope;
    }

    /** Envelope without perturbation or charge: diagnostics, and unprotected handoffs after a budget breach. */
    passThrough<P>(
        session_id: string,
        sender: StageName,
        receiver: StageName,
        payload: P,
        options: WrapOptions = {}
    ): Envelope<P> {
        const account = this.account(session_id);
        return this.mint(account, session_id, sender, receiver, structuredClone(payload), {
            applied: false,
            epsilon: 0,
            mechanism: 'laplace',
            sensitivity: 0,
        }, options);
    }

    /** The payload as stored. Noise is baked in and cannot be removed. */
    unwrap<P>(envelope: Envelope<P>): P {
        return envelope.payload;
    }

    spent(session_id: string): number {
        return this.accounts.get(session_id)?.spent ?? 0;
    }

    /** Infinity for an unbounded session; never negative. */
    remaining(session_id: string): number {
        const account = this.accounts.get(session_id);
        if (!account) return 0;
        const budget = account.config.epsilon_budget;
        if (!Number.isFinite(budget)) return Infinity;
        return Math.max(0, budget - account.spent);
    }

    budget(session_id: string): number {
        return this.accounts.get(session_id)?.config.epsilon_budget ?? 0;
    }

    /** Full audit trail of charges for a session. */
    getLedger(session_id: string): LedgerEntry[] {
        return [...(this.accounts.get(session_id)?.entries ?? [])];
    }

    releaseSession(session_id: string): LedgerEntry[] {
        const entries = this.getLedger(session_id);
        this.accounts.delete(session_id);
        log.debug('Session released', { session_id, total_charges: entries.length });
        return entries;
    }

    private account(session_id: string): SessionAccount {
        const account = this.accounts.get(session_id);
        if (!account) {
            throw new InvalidParameterError(`PrivacyLedger: session ${session_id} not registered`, { session_id });
        }
        return account;
    }

    private mint<P>(
        account: SessionAccount,
        session_id: string,
        sender: StageName,
        receiver: StageName,
        payload: P,
        privacy: Envelope<P>['privacy'],
        options: WrapOptions
    ): Envelope<P> {
        const created_at = monotonicNowIso(this.clock(), account.lastCreatedAt);
        account.lastCreatedAt = created_at;
        account.seq += 1;
        return {
            id: crypto.randomUUID(),
            seq: account.seq,
            session_id,
            sender,
            receiver,
            kind: options.kind ?? 'handoff',
            created_at,
            meta: { ...(options.meta ?? {}) },
            payload,
            privacy,
        };
    }
}
