/**
 * Evolution Prompt
 * Hypotheses (with prior scores) -> refined hypotheses with ratings
 */

import type { HypothesisRecord } from '../types';

export const EVOLUTION_SYSTEM = `You are a Hypothesis Evolution Specialist. You refine research proposals through critique and enhancement, and rate them honestly.`;

function formatScore(h: HypothesisRecord): string {
    if (!h.score) return 'not yet scored';
    return `novelty ${h.score.novelty.toFixed(2)}, feasibility ${h.score.feasibility.toFixed(2)}, impact ${h.score.impact.toFixed(2)}`;
}

export function getEvolutionPrompt(hypotheses: HypothesisRecord[], cycle: number): string {
    const list = hypotheses
        .map((h, i) => `HYPOTHESIS ${i + 1}: ${h.text}\nMETHODOLOGY: ${h.methodology || 'unspecified'}\nPREVIOUS RATING: ${formatScore(h)}`)
        .join('\n\n');

    return `Refinement cycle ${cycle}. Improve each hypothesis below: sharpen the claim, address the weakest point of the previous rating, keep it testable.

Answer in exactly this format, one block per hypothesis, keeping the numbering:

HYPOTHESIS <number>: <refined hypothesis>
METHODOLOGY: <refined methodology>
NOVELTY: <0.0-1.0>
FEASIBILITY: <0.0-1.0>
IMPACT: <0.0-1.0>

${list}`;
}
