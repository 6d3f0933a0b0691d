// hypothesis_generator.ts - debates -> testable hypotheses

import { HYPOTHESIS_SYSTEM, getHypothesisPrompt } from '../prompts';
import { MalformedResponseError, sanitizeSnippet } from '../structured_error';
import type { DebatePayload, HypothesisPayload, HypothesisRecord } from '../types';
import { cleanInline, readFields, splitBlocks } from './response_parser';
import type { StageWorker } from './types';

export const hypothesisGenerator: StageWorker<DebatePayload, HypothesisPayload> = {
    kind: 'HypothesisGenerator',

    async run(input, ctx) {
        const raw = await ctx.infer(getHypothesisPrompt(input.debates), HYPOTHESIS_SYSTEM);

        const hypotheses: HypothesisRecord[] = [];
        const seen = new Set<number>();
        for (const block of splitBlocks(raw, 'HYPOTHESIS')) {
            const debate = input.debates[block.index - 1];
            if (!debate || seen.has(block.index)) continue;

            const fields = readFields(block.lines, ['METHODOLOGY']);
            const text = cleanInline(`${block.head} ${fields.get('') ?? ''}`);
            if (!text) continue;

            seen.add(block.index);
            hypotheses.push({
                id: ctx.newId(),
                text,
                gap: debate.gap,
                methodology: fields.get('METHODOLOGY') ?? '',
                lineage: debate.id,
            });
        }

        if (hypotheses.length === 0) {
            throw new MalformedResponseError('HypothesisGenerator', 'no HYPOTHESIS block in model response', sanitizeSnippet(raw));
        }
        return { hypotheses };
    },
};
