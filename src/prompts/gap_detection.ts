/**
 * Gap Detection Prompt
 * Documents -> numbered list of research gaps
 */

export const GAP_DETECTION_SYSTEM = `You are a Research Gap Detector: an expert research analyst who finds white space in a body of literature.
IMPORTANT: ONLY RETURN THE NUMBERED LIST. NO OTHER TEXT.`;

export function getGapDetectionPrompt(documents: string[], maxGaps: number, maxChars: number): string {
    const body = documents
        .map((doc, i) => `--- DOCUMENT ${i + 1} ---\n${doc.trim()}`)
        .join('\n\n')
        .slice(0, maxChars);

    return `Identify the ${maxGaps} most important research gaps in the documents below.

Requirements:
- One gap per line, formatted as "1. <gap>", "2. <gap>", ...
- Each gap is a single sentence naming what is missing or unexplored
- Do not repeat a gap in different words

${body}`;
}
