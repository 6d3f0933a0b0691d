/**
 * Stage workers, keyed by kind. runStage() is the single entry point the
 * orchestrator uses, so input and output types stay tied to the kind.
 */

import type { WorkerKind } from '../types';
import { debater } from './debater';
import { evolutionAgent } from './evolution_agent';
import { gapDetector } from './gap_detector';
import { hypothesisGenerator } from './hypothesis_generator';
import type { StageContext, StageIO, StageWorker, WorkerTable } from './types';

export const WORKERS: WorkerTable = {
    GapDetector: gapDetector,
    Debater: debater,
    HypothesisGenerator: hypothesisGenerator,
    EvolutionAgent: evolutionAgent,
};

export function runStage<K extends WorkerKind>(
    kind: K,
    input: StageIO[K]['input'],
    ctx: StageContext,
    workers: WorkerTable = WORKERS
): Promise<StageIO[K]['output']> {
    const worker: StageWorker<StageIO[K]['input'], StageIO[K]['output']> = workers[kind];
    return worker.run(input, ctx);
}

export type { EvolutionResult, StageContext, StageIO, StageWorker, WorkerTable } from './types';
export { aggregateScore, heuristicRatings, scoreHypothesis, SCORE_WEIGHTS } from './scoring';
export { parseRating, readFields, splitBlocks, splitListItems } from './response_parser';
