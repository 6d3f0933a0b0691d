import type {
    DebatePayload,
    DocumentPayload,
    GapPayload,
    HypothesisPayload,
    HypothesisRecord,
    WorkerKind,
} from '../types';

/**
 * What a worker may touch while it runs. Workers never see the envelope
 * store or the ledger; they get their input payload and this context.
 */
export interface StageContext {
    /** One model call; retries and fallback happen outside the worker. */
    infer(prompt: string, system: string): Promise<string>;
    newId(): string;
    /** Id of the envelope the input was read from; becomes the lineage of first-level records. */
    source_id: string;
    /** Evolution cycle, 1-based; 0 outside the evolution loop. */
    cycle: number;
    max_gaps: number;
}

export interface EvolutionResult {
    /** Every hypothesis of the cycle, refined or carried forward, in input order. */
    hypotheses: HypothesisRecord[];
    /** Ids of the records the model refined this cycle. */
    refined_ids: string[];
}

export interface StageIO {
    GapDetector: { input: DocumentPayload; output: GapPayload };
    Debater: { input: GapPayload; output: DebatePayload };
    HypothesisGenerator: { input: DebatePayload; output: HypothesisPayload };
    EvolutionAgent: { input: HypothesisPayload; output: EvolutionResult };
}

export interface StageWorker<I, O> {
    readonly kind: WorkerKind;
    run(input: I, ctx: StageContext): Promise<O>;
}

export type WorkerTable = { [K in WorkerKind]: StageWorker<StageIO[K]['input'], StageIO[K]['output']> };
