// debater.ts - gaps -> pro/con debates with a strength rating

import { DEBATE_SYSTEM, getDebatePrompt } from '../prompts';
import { MalformedResponseError, sanitizeSnippet } from '../structured_error';
import type { DebatePayload, DebateRecord, GapPayload } from '../types';
import { parseRating, readFields, splitBlocks } from './response_parser';
import type { StageWorker } from './types';

const FIELDS = ['PRO', 'CON', 'STRENGTH'] as const;

export const debater: StageWorker<GapPayload, DebatePayload> = {
    kind: 'Debater',

    async run(input, ctx) {
        const raw = await ctx.infer(getDebatePrompt(input.gaps), DEBATE_SYSTEM);

        const debates: DebateRecord[] = [];
        const seen = new Set<number>();
        for (const block of splitBlocks(raw, 'GAP')) {
            const gap = input.gaps[block.index - 1];
            if (!gap || seen.has(block.index)) continue;

            // A debate needs both sides and a rating; partial blocks are dropped.
            const fields = readFields(block.lines, FIELDS);
            const pro = fields.get('PRO');
            const con = fields.get('CON');
            const strength = parseRating(fields.get('STRENGTH'));
            if (!pro || !con || strength === null) continue;

            seen.add(block.index);
            debates.push({
                id: ctx.newId(),
                gap_id: gap.id,
                gap: gap.text,
                pro_arguments: pro,
                con_arguments: con,
                strength,
                lineage: gap.id,
            });
        }

        if (debates.length === 0) {
            throw new MalformedResponseError('Debater', 'no complete GAP block (PRO, CON, STRENGTH) in model response', sanitizeSnippet(raw));
        }
        return { debates };
    },
};
