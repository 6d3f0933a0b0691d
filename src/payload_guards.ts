/**
 * Runtime shape checks for payloads read back out of the context store.
 * Noise changes numbers, never shapes, so a failed check means a wiring bug.
 */

import type {
    DebatePayload,
    DebateRecord,
    DocumentPayload,
    GapPayload,
    GapRecord,
    HypothesisPayload,
    HypothesisRecord,
    HypothesisScore,
} from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isNumberMatrix(value: unknown): value is number[][] {
    return Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((v) => typeof v === 'number'));
}

function hasStrings(value: Record<string, unknown>, keys: readonly string[]): boolean {
    return keys.every((k) => typeof value[k] === 'string');
}

function isScore(value: unknown): value is HypothesisScore {
    return (
        isRecord(value) &&
        typeof value.novelty === 'number' &&
        typeof value.feasibility === 'number' &&
        typeof value.impact === 'number' &&
        typeof value.aggregate === 'number'
    );
}

export function isGapRecord(value: unknown): value is GapRecord {
    return isRecord(value) && hasStrings(value, ['id', 'text', 'lineage']);
}

export function isDebateRecord(value: unknown): value is DebateRecord {
    return (
        isRecord(value) &&
        hasStrings(value, ['id', 'gap_id', 'gap', 'pro_arguments', 'con_arguments', 'lineage']) &&
        typeof value.strength === 'number'
    );
}

export function isHypothesisRecord(value: unknown): value is HypothesisRecord {
    return (
        isRecord(value) &&
        hasStrings(value, ['id', 'text', 'gap', 'methodology', 'lineage']) &&
        (value.score === undefined || isScore(value.score))
    );
}

export function isDocumentPayload(value: unknown): value is DocumentPayload {
    return (
        isRecord(value) &&
        isStringArray(value.documents) &&
        (value.embeddings === undefined || isNumberMatrix(value.embeddings))
    );
}

export function isGapPayload(value: unknown): value is GapPayload {
    return isRecord(value) && Array.isArray(value.gaps) && value.gaps.every(isGapRecord);
}

export function isDebatePayload(value: unknown): value is DebatePayload {
    return isRecord(value) && Array.isArray(value.debates) && value.debates.every(isDebateRecord);
}

export function isHypothesisPayload(value: unknown): value is HypothesisPayload {
    return isRecord(value) && Array.isArray(value.hypotheses) && value.hypotheses.every(isHypothesisRecord);
}
