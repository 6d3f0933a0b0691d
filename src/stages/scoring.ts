/**
 * Hypothesis scoring.
 *
 * Deterministic: the same text and ratings always give the same score. Model
 * ratings win; a dimension the model did not rate falls back to a keyword
 * heuristic over the hypothesis text and methodology.
 */

import type { HypothesisScore } from '../types';
import { clamp01, round4 } from './response_parser';

export const SCORE_WEIGHTS = { novelty: 0.4, feasibility: 0.3, impact: 0.3 } as const;

export interface Ratings {
    novelty?: number | null;
    feasibility?: number | null;
    impact?: number | null;
}

const NOVELTY_MARKERS = ['novel', 'new', 'first', 'unexplored', 'unprecedented', 'cross-domain', 'alternative', 'previously'];
const METHOD_MARKERS = ['experiment', 'dataset', 'measure', 'benchmark', 'survey', 'trial', 'controlled', 'evaluate'];
const SPECULATIVE_MARKERS = ['might', 'could', 'possibly', 'speculative', 'theoretical'];
const IMPACT_MARKERS = ['improve', 'reduce', 'scale', 'enable', 'accelerate', 'safety', 'privacy', 'generaliz', 'robust'];

/** Number of markers that occur in `text` at least once. */
function countMarkers(text: string, markers: readonly string[]): number {
    return markers.filter((m) => text.includes(m)).length;
}

export function heuristicRatings(text: string, methodology: string): Omit<HypothesisScore, 'aggregate'> {
    const body = `${text} ${methodology}`.toLowerCase();
    return {
        novelty: round4(clamp01(0.35 + 0.15 * countMarkers(body, NOVELTY_MARKERS))),
        feasibility: round4(clamp01(0.5 + 0.1 * countMarkers(body, METHOD_MARKERS) - 0.1 * countMarkers(body, SPECULATIVE_MARKERS))),
        impact: round4(clamp01(0.35 + 0.15 * countMarkers(body, IMPACT_MARKERS))),
    };
}

export function aggregateScore(novelty: number, feasibility: number, impact: number): number {
    return round4(
        SCORE_WEIGHTS.novelty * novelty + SCORE_WEIGHTS.feasibility * feasibility + SCORE_WEIGHTS.impact * impact
    );
}

export function scoreHypothesis(text: string, methodology: string, ratings: Ratings = {}): HypothesisScore {
    const fallback = heuristicRatings(text, methodology);
    const novelty = ratings.novelty ?? fallback.novelty;
    const feasibility = ratings.feasibility ?? fallback.feasibility;
    const impact = ratings.impact ?? fallback.impact;
    return { novelty, feasibility, impact, aggregate: aggregateScore(novelty, feasibility, impact) };
}
