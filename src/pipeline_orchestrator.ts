/**
 * PipelineOrchestrator
 *
 * Drives one session through GapDetector -> Debater -> HypothesisGenerator ->
 * EvolutionAgent (looped) and back to the caller.
 *
 * GUARANTEES:
 * - Every handoff between stages is minted by the privacy ledger and appended
 *   to the context store before the next stage reads it; stages read their
 *   input from the store, never from each other.
 * - Stage failures are retried on the primary backend, then on the fallback
 *   backend, then fail the session. Each retry, switch and failure leaves a
 *   diagnostic envelope in the history.
 * - A session never runs twice concurrently (per-session mutex).
 * - Cancellation is cooperative and leaves the history consistent: a model
 *   result that arrives after cancel() is discarded, not stored.
 */

import * as crypto from 'crypto';
import { LIMITS, SessionConfig } from './config';
import { BackendRegistry, InferenceBackend, ModelConfig, inferWithTimeout } from './inference';
import { Logger, createLogger } from './logger';
import {
    isDebatePayload,
    isDocumentPayload,
    isGapPayload,
    isHypothesisPayload,
} from './payload_guards';
import { Session, SessionSnapshot, isTerminal } from './session';
import { KeyedMutex } from './session_lock';
import { EvolutionResult, StageContext, StageIO, WorkerTable, WORKERS, runStage } from './stages';
import { evaluateStop } from './stop_policy';
import {
    BudgetExceededError,
    CancelledError,
    ContextForgeError,
    InvalidEnvelopeError,
    InvalidParameterError,
    StructuredError,
    isRetryable,
    toStructuredError,
} from './structured_error';
import type {
    DiagnosticEvent,
    DiagnosticPayload,
    DocumentPayload,
    Envelope,
    EnvelopeMeta,
    FinalPayload,
    HypothesisRecord,
    StageName,
    StopReason,
    WorkerKind,
} from './types';

const baseLog = createLogger('orchestrator');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

/** Receives the final snapshot of every session the orchestrator finishes. */
export interface ReportSink {
    consume(snapshot: SessionSnapshot): void | Promise<void>;
}

export interface PipelineResult {
    session_id: string;
    status: 'Finalized' | 'Failed';
    stop_reason: StopReason | null;
    cycles: number;
    /** Final hypotheses as delivered to the orchestrator (noise included). Empty on failure. */
    hypotheses: HypothesisRecord[];
    /** Best aggregate score of the last cycle, before noise. null on failure. */
    best_score: number | null;
    error: StructuredError | null;
    snapshot: SessionSnapshot;
    sink_errors: StructuredError[];
}

export interface OrchestratorOptions {
    backends: BackendRegistry;
    sinks?: ReportSink[];
    workers?: WorkerTable;
    newId?: () => string;
    /** Milliseconds clock for cycle timing. */
    now?: () => number;
    lock?: KeyedMutex;
}

interface StageInput<P> {
    envelope: Envelope;
    payload: P;
}

/* -------------------------------------------------------------------------- */
/* Orchestrator                                                               */
/* -------------------------------------------------------------------------- */

export class PipelineOrchestrator {
    private readonly backends: BackendRegistry;
    private readonly sinks: ReportSink[];
    private readonly workers: WorkerTable;
    private readonly newId: () => string;
    private readonly now: () => number;
    private readonly lock: KeyedMutex;

    constructor(options: OrchestratorOptions) {
        this.backends = options.backends;
        this.sinks = options.sinks ?? [];
        this.workers = options.workers ?? WORKERS;
        this.newId = options.newId ?? (() => crypto.randomUUID());
        this.now = options.now ?? Date.now;
        this.lock = options.lock ?? new KeyedMutex();
    }

    addSink(sink: ReportSink): this {
        this.sinks.push(sink);
        return this;
    }

    /** Create a session from `config` and run it. */
    async analyze(input: string[] | DocumentPayload, config: Partial<SessionConfig> = {}): Promise<PipelineResult> {
        return this.run(new Session({ config }), input);
    }

    /**
     * Run a fresh session to completion. Resolves with status Failed for stage,
     * budget and cancellation failures; rejects only on caller errors (bad
     * input, unknown backend, a session that already ran).
     */
    async run(session: Session, input: string[] | DocumentPayload): Promise<PipelineResult> {
        const documents: DocumentPayload = Array.isArray(input) ? { documents: input } : input;
        if (!isDocumentPayload(documents) || !documents.documents.some((d) => d.trim().length > 0)) {
            throw new InvalidParameterError('at least one non-empty document is required');
        }
        this.backends.get(session.config.primary_backend);
        if (session.config.fallback_backend !== null) this.backends.get(session.config.fallback_backend);

        return this.lock.runExclusive(session.id, () => this.execute(session, documents));
    }

    private async execute(session: Session, documents: DocumentPayload): Promise<PipelineResult> {
        if (session.state !== 'Init') {
            throw new InvalidParameterError(`session ${session.id} already ran (state ${session.state})`, {
                session_id: session.id,
                state: session.state,
            });
        }
        const log = baseLog.with({ session_id: session.id });
        log.info('Session started', {
            documents: documents.documents.length,
            epsilon_budget: session.config.epsilon_budget,
            primary: session.config.primary_backend,
            fallback: session.config.fallback_backend,
        });

        let stage: StageName = 'Orchestrator';
        try {
            session.throwIfCancelled();
            this.handoff(session, 'Orchestrator', 'GapDetector', documents);

            stage = 'GapDetector';
            session.transition('GapDetection');
            const docs = this.readInput(session, 'GapDetector', isDocumentPayload);
            const gaps = await this.runWithPolicy(session, 'GapDetector', docs.payload, docs.envelope.id, 0, log);
            this.handoff(session, 'GapDetector', 'Debater', gaps);

            stage = 'Debater';
            session.transition('Debate');
            const gapIn = this.readInput(session, 'Debater', isGapPayload);
            const debates = await this.runWithPolicy(session, 'Debater', gapIn.payload, gapIn.envelope.id, 0, log);
            this.handoff(session, 'Debater', 'HypothesisGenerator', debates);

            stage = 'HypothesisGenerator';
            session.transition('HypothesisGeneration');
            const debateIn = this.readInput(session, 'HypothesisGenerator', isDebatePayload);
            const hypotheses = await this.runWithPolicy(session, 'HypothesisGenerator', debateIn.payload, debateIn.envelope.id, 0, log);
            this.handoff(session, 'HypothesisGenerator', 'EvolutionAgent', hypotheses);

            stage = 'EvolutionAgent';
            const { final, best } = await this.evolve(session, log);
            session.finalize(final.payload.stop_reason);

            const snapshot = session.snapshot();
            return {
                session_id: session.id,
                status: 'Finalized',
                stop_reason: final.payload.stop_reason,
                cycles: session.cycle,
                hypotheses: session.ledger.unwrap(final).hypotheses,
                best_score: best,
                error: null,
                snapshot,
                sink_errors: await this.report(snapshot, log),
            };
        } catch (e) {
            if (!(e instanceof ContextForgeError) || e.code === 'INVALID_STATE_TRANSITION') {
                const message = e instanceof Error ? e.message : String(e);
                if (!isTerminal(session.state)) {
                    this.diagnostic(session, 'failure', stage, null, 0, e, message, session.cycle || undefined);
                    session.fail(toStructuredError(e));
                }
                log.error('Session aborted by an unexpected error', { stage, message });
                throw e;
            }
            return this.fail(session, stage, e, log);
        }
    }

    private async evolve(session: Session, log: Logger): Promise<{ final: Envelope<FinalPayload>; best: number }> {
        const cfg = session.config;
        let previousBest: number | null = null;

        for (;;) {
            session.throwIfCancelled();
            const cycle = session.nextCycle();
            const cycleLog = log.with({ cycle });
            const input = this.readInput(session, 'EvolutionAgent', isHypothesisPayload);

            const started = this.now();
            const result = await this.runWithPolicy(session, 'EvolutionAgent', input.payload, input.envelope.id, cycle, cycleLog);
            const elapsed = this.now() - started;

            const best = bestRefinedScore(result);
            const stop = evaluateStop({
                cycle,
                max_cycles: cfg.max_evolution_cycles,
                previous_best: previousBest,
                current_best: best,
                convergence_threshold: cfg.convergence_threshold,
                cycle_elapsed_ms: elapsed,
                cycle_time_budget_ms: cfg.cycle_time_budget_ms,
                target_score: cfg.target_score,
            });
            cycleLog.info('Evolution cycle complete', { best, previous_best: previousBest, elapsed_ms: elapsed, stop });

            if (stop !== null) {
                const final = this.handoff<FinalPayload>(
                    session,
                    'EvolutionAgent',
                    'Orchestrator',
                    { hypotheses: result.hypotheses, stop_reason: stop },
                    { cycle }
                );
                return { final, best };
            }
            this.handoff(session, 'EvolutionAgent', 'EvolutionAgent', { hypotheses: result.hypotheses }, { cycle });
            previousBest = best;
        }
    }

    /**
     * 1 + retry_count attempts on the primary backend, then the same on the
     * fallback. Non-retryable errors (budget, cancellation) propagate at once.
     */
    private async runWithPolicy<K extends WorkerKind>(
        session: Session,
        kind: K,
        input: StageIO[K]['input'],
        source_id: string,
        cycle: number,
        log: Logger
    ): Promise<StageIO[K]['output']> {
        const cfg = session.config;
        const chain = cfg.fallback_backend === null ? [cfg.primary_backend] : [cfg.primary_backend, cfg.fallback_backend];
        const stageLog = log.with({ stage: kind });
        let lastError: unknown = null;

        for (let b = 0; b < chain.length; b++) {
            const backend = this.backends.get(chain[b]);
            if (b > 0) {
                stageLog.warn('Switching to fallback backend', { backend: backend.id });
                this.diagnostic(session, 'fallback', kind, backend.id, 0, lastError, `switching to fallback backend ${backend.id}`, cycle);
            }

            for (let attempt = 1; attempt <= cfg.retry_count + 1; attempt++) {
                session.throwIfCancelled();
                try {
                    const output = await runStage(kind, input, this.stageContext(session, backend, source_id, cycle), this.workers);
                    if (session.cancelled) {
                        this.diagnostic(session, 'late_result_discarded', kind, backend.id, attempt, null, 'result arrived after cancellation', cycle);
                        session.throwIfCancelled();
                    }
                    stageLog.debug('Stage complete', { backend: backend.id, attempt });
                    return output;
                } catch (e) {
                    if (!isRetryable(e)) throw e;
                    lastError = e;
                    stageLog.warn('Stage attempt failed', {
                        backend: backend.id,
                        attempt,
                        error: e instanceof Error ? e.message : String(e),
                    });
                    if (attempt <= cfg.retry_count) {
                        this.diagnostic(session, 'retry', kind, backend.id, attempt, e, `attempt ${attempt} on ${backend.id} failed; retrying`, cycle);
                    }
                }
            }
        }
        throw lastError;
    }

    private stageContext(session: Session, backend: InferenceBackend, source_id: string, cycle: number): StageContext {
        const cfg = session.config;
        return {
            infer: (prompt, system) => inferWithTimeout(backend, prompt, modelConfigFor(cfg, system), cfg.per_stage_timeout_ms),
            newId: this.newId,
            source_id,
            cycle,
            max_gaps: cfg.max_gaps,
        };
    }

    private readInput<P>(session: Session, stage: WorkerKind, guard: (value: unknown) => value is P): StageInput<P> {
        const envelope = session.store.latest(session.id, stage);
        if (!envelope) {
            throw new InvalidEnvelopeError(`no input envelope for ${stage}`, { session_id: session.id, stage });
        }
        const payload = session.ledger.unwrap(envelope);
        if (!guard(payload)) {
            throw new InvalidEnvelopeError(`input envelope for ${stage} has the wrong shape`, { session_id: session.id, stage, id: envelope.id });
        }
        return { envelope, payload };
    }

    /** Charge, mint and store one handoff, applying the session's budget policy. */
    private handoff<P>(session: Session, sender: StageName, receiver: StageName, payload: P, meta: EnvelopeMeta = {}): Envelope<P> {
        const cfg = session.config;
        let envelope: Envelope<P>;
        try {
            envelope = session.ledger.wrap(session.id, sender, receiver, payload, cfg.handoff_epsilon, cfg.handoff_sensitivity, { meta });
        } catch (e) {
            if (!(e instanceof BudgetExceededError) || cfg.on_budget_exceeded === 'abort') throw e;
            this.diagnostic(session, 'budget_warning', sender, null, 0, e, `handoff ${sender} -> ${receiver} stored without noise`, meta.cycle);
            envelope = session.ledger.passThrough(session.id, sender, receiver, payload, { meta });
        }
        session.store.append(envelope);
        return envelope;
    }

    private diagnostic(
        session: Session,
        event: DiagnosticEvent,
        stage: StageName,
        backend: string | null,
        attempt: number,
        error: unknown,
        note: string,
        cycle?: number
    ): void {
        const payload: DiagnosticPayload = {
            stage,
            backend,
            attempt,
            error: error === null ? null : toStructuredError(error),
            note,
        };
        const meta: EnvelopeMeta = cycle ? { event, cycle } : { event };
        session.store.append(session.ledger.passThrough(session.id, 'Orchestrator', 'Orchestrator', payload, { kind: 'diagnostic', meta }));
    }

    private async fail(session: Session, stage: StageName, err: ContextForgeError, log: Logger): Promise<PipelineResult> {
        const error = toStructuredError(err);
        const event: DiagnosticEvent = err instanceof CancelledError ? 'cancelled' : 'failure';
        const backend = typeof err.context.backend === 'string' ? err.context.backend : null;
        this.diagnostic(session, event, stage, backend, 0, err, err.message, session.cycle || undefined);
        session.fail(error);
        log.error('Session failed', { stage, code: error.code, message: error.message });

        const snapshot = session.snapshot();
        return {
            session_id: session.id,
            status: 'Failed',
            stop_reason: null,
            cycles: session.cycle,
            hypotheses: [],
            best_score: null,
            error,
            snapshot,
            sink_errors: await this.report(snapshot, log),
        };
    }

    private async report(snapshot: SessionSnapshot, log: Logger): Promise<StructuredError[]> {
        const errors: StructuredError[] = [];
        for (const sink of this.sinks) {
            try {
                await sink.consume(snapshot);
            } catch (e) {
                const error = toStructuredError(e);
                log.error('Report sink failed', { message: error.message });
                errors.push(error);
            }
        }
        return errors;
    }
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function modelConfigFor(cfg: SessionConfig, system: string): ModelConfig {
    return { model: cfg.model, temperature: cfg.temperature, max_tokens: LIMITS.MAX_OUTPUT_TOKENS, system };
}

/** Highest aggregate among the hypotheses refined this cycle, read before any noise is added. */
export function bestRefinedScore(result: EvolutionResult): number {
    const refined = new Set(result.refined_ids);
    let best = 0;
    for (const h of result.hypotheses) {
        if (refined.has(h.id) && h.score && h.score.aggregate > best) best = h.score.aggregate;
    }
    return best;
}
