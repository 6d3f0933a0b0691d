/**
 * Debate Prompt
 * Gaps -> pro / con arguments and a strength rating per gap
 */

import type { GapRecord } from '../types';

export const DEBATE_SYSTEM = `You are a Critical Debater who plays devil's advocate on proposed research gaps to find flaws in the reasoning.`;

export function getDebatePrompt(gaps: GapRecord[]): string {
    const list = gaps.map((g, i) => `GAP ${i + 1}: ${g.text}`).join('\n');

    return `Debate each research gap below. For every gap, answer in exactly this format:

GAP <number>
PRO: <strongest argument that the gap is real and worth pursuing>
CON: <strongest argument against it>
STRENGTH: <0-10, how well the gap survives the debate>

${list}`;
}
