// evolution_agent.ts - one refinement cycle over the current hypotheses
//
// HYPOTHESIS n in the response refines input n. Refined records get a fresh
// id with lineage pointing at the version they replace; inputs the model
// skipped are carried forward unchanged.

import { EVOLUTION_SYSTEM, getEvolutionPrompt } from '../prompts';
import { MalformedResponseError, sanitizeSnippet } from '../structured_error';
import type { HypothesisPayload, HypothesisRecord } from '../types';
import { cleanInline, parseRating, readFields, splitBlocks } from './response_parser';
import { scoreHypothesis } from './scoring';
import type { EvolutionResult, StageWorker } from './types';

const FIELDS = ['METHODOLOGY', 'NOVELTY', 'FEASIBILITY', 'IMPACT'] as const;

export const evolutionAgent: StageWorker<HypothesisPayload, EvolutionResult> = {
    kind: 'EvolutionAgent',

    async run(input, ctx) {
        const raw = await ctx.infer(getEvolutionPrompt(input.hypotheses, ctx.cycle), EVOLUTION_SYSTEM);

        const refined = new Map<number, HypothesisRecord>();
        for (const block of splitBlocks(raw, 'HYPOTHESIS')) {
            const previous = input.hypotheses[block.index - 1];
            if (!previous || refined.has(block.index)) continue;

            const fields = readFields(block.lines, FIELDS);
            const text = cleanInline(`${block.head} ${fields.get('') ?? ''}`);
            if (!text) continue;

            const methodology = fields.get('METHODOLOGY') || previous.methodology;
            refined.set(block.index, {
                id: ctx.newId(),
                text,
                gap: previous.gap,
                methodology,
                lineage: previous.id,
                score: scoreHypothesis(text, methodology, {
                    novelty: parseRating(fields.get('NOVELTY')),
                    feasibility: parseRating(fields.get('FEASIBILITY')),
                    impact: parseRating(fields.get('IMPACT')),
                }),
            });
        }

        if (refined.size === 0) {
            throw new MalformedResponseError('EvolutionAgent', 'no refined HYPOTHESIS block in model response', sanitizeSnippet(raw));
        }

        return {
            hypotheses: input.hypotheses.map((h, i) => refined.get(i + 1) ?? h),
            refined_ids: [...refined.values()].map((h) => h.id),
        };
    },
};
