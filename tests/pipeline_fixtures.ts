// Scripted backends and canned model replies shared by the pipeline tests.

import type { InferenceBackend, ModelConfig } from '../src/inference';
import { BackendRegistry } from '../src/inference';
import { DEBATE_SYSTEM, EVOLUTION_SYSTEM, GAP_DETECTION_SYSTEM, HYPOTHESIS_SYSTEM } from '../src/prompts';
import type { WorkerKind } from '../src/types';

export type Reply = string | Error | ((signal?: AbortSignal) => Promise<string>);

export type Script = Partial<Record<WorkerKind, Reply[]>>;

const SYSTEM_TO_KIND: Record<string, WorkerKind> = {
    [GAP_DETECTION_SYSTEM]: 'GapDetector',
    [DEBATE_SYSTEM]: 'Debater',
    [HYPOTHESIS_SYSTEM]: 'HypothesisGenerator',
    [EVOLUTION_SYSTEM]: 'EvolutionAgent',
};

export const GAPS_REPLY = [
    '1. No long-term studies of sleep spindles in older adults',
    '2. Few controlled trials on evening light exposure',
].join('\n');

export const DEBATE_REPLY = [
    'GAP 1',
    'PRO: Ageing populations make this urgent',
    'CON: Confounders are hard to control',
    'STRENGTH: 8',
    '',
    'GAP 2',
    'PRO: Screens are everywhere',
    'CON: Effects may be small',
    'STRENGTH: 6',
].join('\n');

export const HYPOTHESIS_REPLY = [
    'HYPOTHESIS 1: Spindle density predicts memory decline',
    'METHODOLOGY: Five-year cohort with yearly sleep recordings',
    '',
    'HYPOTHESIS 2: Evening light delays memory consolidation',
    'METHODOLOGY: Randomized crossover trial',
].join('\n');

/** Refines hypothesis 1 only, rating every dimension `rating`; the aggregate equals `rating`. */
export function evolutionReply(rating: string): string {
    return [
        'HYPOTHESIS 1: Spindle density predicts memory decline after sixty',
        'METHODOLOGY: Cohort with yearly sleep recordings',
        `NOVELTY: ${rating}`,
        `FEASIBILITY: ${rating}`,
        `IMPACT: ${rating}`,
    ].join('\n');
}

export function happyScript(evolution: string[] = ['0.5']): Script {
    return {
        GapDetector: [GAPS_REPLY],
        Debater: [DEBATE_REPLY],
        HypothesisGenerator: [HYPOTHESIS_REPLY],
        EvolutionAgent: evolution.map(evolutionReply),
    };
}

/** Never answers; rejects once the caller aborts. */
export function hang(): Reply {
    return (signal) =>
        new Promise<string>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
}

/**
 * Answers by stage (recognised from the system prompt). Each stage consumes
 * its replies in order; the last one repeats.
 */
export class ScriptedBackend implements InferenceBackend {
    readonly calls: WorkerKind[] = [];
    private readonly cursor = new Map<WorkerKind, number>();

    constructor(readonly id: string, private readonly script: Script) {}

    async infer(_prompt: string, config: ModelConfig, signal?: AbortSignal): Promise<string> {
        const kind = SYSTEM_TO_KIND[config.system ?? ''];
        if (!kind) throw new Error(`unexpected system prompt: ${config.system}`);
        this.calls.push(kind);

        const replies = this.script[kind] ?? [];
        if (replies.length === 0) throw new Error(`no scripted reply for ${kind}`);
        const i = this.cursor.get(kind) ?? 0;
        this.cursor.set(kind, i + 1);
        const reply = replies[Math.min(i, replies.length - 1)];

        if (reply instanceof Error) throw reply;
        if (typeof reply === 'function') return reply(signal);
        return reply;
    }

    callsFor(kind: WorkerKind): number {
        return this.calls.filter((k) => k === kind).length;
    }
}

export function registry(...backends: InferenceBackend[]): BackendRegistry {
    const r = new BackendRegistry();
    for (const b of backends) r.register(b);
    return r;
}

/** Deterministic ids: id-1, id-2, ... */
export function sequentialIds(): () => string {
    let n = 0;
    return () => `id-${++n}`;
}
