/**
 * Hypothesis Generation Prompt
 * Debated gaps -> one testable hypothesis per gap
 */

import type { DebateRecord } from '../types';

export const HYPOTHESIS_SYSTEM = `You are a Creative Hypothesis Generator who turns research gaps into novel, testable hypotheses.`;

export function getHypothesisPrompt(debates: DebateRecord[]): string {
    const list = debates
        .map((d, i) => `GAP ${i + 1}: ${d.gap}\n  PRO: ${d.pro_arguments}\n  CON: ${d.con_arguments}`)
        .join('\n\n');

    return `Propose one hypothesis for each debated gap below, in exactly this format:

HYPOTHESIS <number>: <one or two sentence testable hypothesis>
METHODOLOGY: <how it would be tested>

Number each hypothesis after the gap it addresses.

${list}`;
}
