import type { StructuredError } from './structured_error';

export const STAGE_NAMES = ['GapDetector', 'Debater', 'HypothesisGenerator', 'EvolutionAgent', 'Orchestrator'] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/** The four reasoning stages; Orchestrator is a participant, not a stage. */
export type WorkerKind = Exclude<StageName, 'Orchestrator'>;

export function isStageName(value: unknown): value is StageName {
    return typeof value === 'string' && STAGE_NAMES.some((name) => name === value);
}

/* -------------------------------------------------------------------------- */
/* Envelope                                                                   */
/* -------------------------------------------------------------------------- */

export interface PrivacyStamp {
    applied: boolean;
    epsilon: number;
    mechanism: 'laplace';
    sensitivity: number;
}

export type EnvelopeKind = 'handoff' | 'diagnostic';

export type DiagnosticEvent =
    | 'retry'
    | 'fallback'
    | 'failure'
    | 'budget_warning'
    | 'cancelled'
    | 'late_result_discarded';

export interface EnvelopeMeta {
    cycle?: number;
    event?: DiagnosticEvent;
}

export interface Envelope<P = unknown> {
    id: string;
    seq: number;
    session_id: string;
    sender: StageName;
    receiver: StageName;
    kind: EnvelopeKind;
    created_at: string;
    meta: EnvelopeMeta;
    payload: P;
    privacy: PrivacyStamp;
}

/* -------------------------------------------------------------------------- */
/* Stage records                                                              */
/* -------------------------------------------------------------------------- */

export interface GapRecord {
    id: string;
    text: string;
    /** Id of the envelope that carried the source documents. */
    lineage: string;
}

export interface DebateRecord {
    id: string;
    gap_id: string;
    gap: string;
    pro_arguments: string;
    con_arguments: string;
    /** How well the gap survived the debate, 0..1. */
    strength: number;
    lineage: string;
}

export interface HypothesisScore {
    novelty: number;
    feasibility: number;
    impact: number;
    aggregate: number;
}

export interface HypothesisRecord {
    id: string;
    text: string;
    gap: string;
    methodology: string;
    /** Debate id for a generated hypothesis, previous version id for an evolved one. */
    lineage: string;
    score?: HypothesisScore;
}

/* -------------------------------------------------------------------------- */
/* Stage payloads                                                             */
/* -------------------------------------------------------------------------- */

export interface DocumentPayload {
    documents: string[];
    /** Chunk embeddings from the document source, when it supplies them. */
    embeddings?: number[][];
}

export interface GapPayload {
    gaps: GapRecord[];
}

export interface DebatePayload {
    debates: DebateRecord[];
}

export interface HypothesisPayload {
    hypotheses: HypothesisRecord[];
}

export type StopReason = 'max_cycles' | 'converged' | 'cycle_time_budget' | 'target_reached';

export interface FinalPayload {
    hypotheses: HypothesisRecord[];
    stop_reason: StopReason;
}

export interface DiagnosticPayload {
    stage: StageName;
    backend: string | null;
    attempt: number;
    error: StructuredError | null;
    note: string;
}
