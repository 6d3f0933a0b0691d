// response_parser.ts - turns free-form model text into list items, numbered blocks and labelled fields
//
// Models drift from the requested format: markdown bold, code fences,
// "1)" instead of "1.", wrapped lines. Everything here tolerates that and
// returns what it can; deciding whether "nothing usable" is an error is the
// caller's job.

const LIST_ITEM = /^\s*(?:\d+\s*[.)]|[-*•])\s+(.*)$/;
const FIELD = /^\s*[-*]*\s*\**\s*([A-Za-z][A-Za-z ]*?)\s*\**\s*:\s*\**\s*(.*)$/;

export function round4(n: number): number {
    return Math.round(n * 10_000) / 10_000;
}

export function clamp01(n: number): number {
    return Math.min(1, Math.max(0, n));
}

export function stripCodeFences(text: string): string {
    return text.replace(/```[A-Za-z]*\r?\n?/g, '');
}

/** Collapse whitespace and drop markdown emphasis. */
export function cleanInline(text: string): string {
    return text.replace(/\*\*/g, '').replace(/\s+/g, ' ').trim();
}

/**
 * Items of a numbered or bulleted list. Wrapped lines join the item above;
 * a blank line ends it. With no list markers at all, falls back to every
 * non-trivial line (more than five characters).
 */
export function splitListItems(text: string): string[] {
    const lines = stripCodeFences(text).split(/\r?\n/);
    const items: string[] = [];
    let current: string | null = null;

    for (const line of lines) {
        const match = LIST_ITEM.exec(line);
        if (match) {
            if (current !== null) items.push(current);
            current = match[1];
        } else if (line.trim() === '') {
            if (current !== null) items.push(current);
            current = null;
        } else if (current !== null) {
            current += ' ' + line.trim();
        }
    }
    if (current !== null) items.push(current);

    const cleaned = items.map(cleanInline).filter((s) => s.length > 0);
    if (cleaned.length > 0) return cleaned;
    return lines.map(cleanInline).filter((s) => s.length > 5);
}

export interface Block {
    /** The number after the keyword, 1-based as the model wrote it. */
    index: number;
    /** Text on the header line after the number. */
    head: string;
    lines: string[];
}

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Split on header lines like `HYPOTHESIS 2: ...` or `**GAP 1**`. Text before the first header is dropped. */
export function splitBlocks(text: string, keyword: string): Block[] {
    const header = new RegExp(
        `^\\s*(?:#+\\s*)?\\**\\s*${escapeRegExp(keyword)}\\s*#?(\\d+)\\s*\\**\\s*[:.)-]?\\s*\\**\\s*(.*)$`,
        'i'
    );
    const blocks: Block[] = [];
    let current: Block | null = null;

    for (const line of stripCodeFences(text).split(/\r?\n/)) {
        const match = header.exec(line);
        if (match) {
            current = { index: parseInt(match[1], 10), head: cleanInline(match[2]), lines: [] };
            blocks.push(current);
        } else if (current !== null) {
            current.lines.push(line);
        }
    }
    return blocks;
}

/**
 * Map of LABEL -> value for the given labels (upper-cased). Lines that are not
 * a known label continue the previous field; lines before the first label are
 * collected under the empty key.
 */
export function readFields(lines: string[], labels: readonly string[]): Map<string, string> {
    const known = new Set(labels.map((l) => l.toUpperCase()));
    const fields = new Map<string, string>();
    let key = '';

    for (const line of lines) {
        if (line.trim() === '') continue;
        const match = FIELD.exec(line);
        const label = match ? match[1].trim().toUpperCase() : '';
        if (match && known.has(label)) {
            key = label;
            fields.set(key, cleanInline(match[2]));
        } else {
            const prev = fields.get(key);
            const text = cleanInline(line);
            fields.set(key, prev ? `${prev} ${text}` : text);
        }
    }
    return fields;
}

/**
 * A 0..1 rating from text such as "0.7", "7", "7/10", "3/5" or "70%".
 * Bare values above 1 are read as a 0-10 scale. Null when no number is
 * present or the denominator is zero.
 */
export function parseRating(raw: string | undefined): number | null {
    if (raw === undefined) return null;
    const match = /(-?\d+(?:\.\d+)?)\s*(?:\/\s*(\d+(?:\.\d+)?)|(%))?/.exec(raw);
    if (!match) return null;
    let n = parseFloat(match[1]);
    if (match[2] !== undefined) {
        const denominator = parseFloat(match[2]);
        if (denominator === 0) return null;
        n = n / denominator;
    } else if (match[3] === '%') n = n / 100;
    else if (n > 1) n = n / 10;
    return round4(clamp01(n));
}
