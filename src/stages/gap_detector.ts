// gap_detector.ts - documents -> research gaps

import { LIMITS } from '../config';
import { GAP_DETECTION_SYSTEM, getGapDetectionPrompt } from '../prompts';
import { MalformedResponseError, sanitizeSnippet } from '../structured_error';
import type { DocumentPayload, GapPayload } from '../types';
import { splitListItems } from './response_parser';
import type { StageWorker } from './types';

export const gapDetector: StageWorker<DocumentPayload, GapPayload> = {
    kind: 'GapDetector',

    async run(input, ctx) {
        const documents = input.documents.filter((d) => d.trim().length > 0);
        const raw = await ctx.infer(
            getGapDetectionPrompt(documents, ctx.max_gaps, LIMITS.MAX_DOCUMENT_CHARS),
            GAP_DETECTION_SYSTEM
        );

        const seen = new Set<string>();
        const texts: string[] = [];
        for (const item of splitListItems(raw)) {
            const key = item.toLowerCase();
            if (seen.has(key)) continue;
            seen.add(key);
            texts.push(item);
        }
        if (texts.length === 0) {
            throw new MalformedResponseError('GapDetector', 'no gaps in model response', sanitizeSnippet(raw));
        }

        return {
            gaps: texts.slice(0, ctx.max_gaps).map((text) => ({ id: ctx.newId(), text, lineage: ctx.source_id })),
        };
    },
};
