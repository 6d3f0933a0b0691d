import test from 'node:test';
import assert from 'node:assert/strict';

import { DEBATE_SYSTEM, GAP_DETECTION_SYSTEM } from '../src/prompts';
import { runStage } from '../src/stages';
import { debater } from '../src/stages/debater';
import { evolutionAgent } from '../src/stages/evolution_agent';
import { gapDetector } from '../src/stages/gap_detector';
import { hypothesisGenerator } from '../src/stages/hypothesis_generator';
import { aggregateScore, scoreHypothesis } from '../src/stages/scoring';
import type { StageContext } from '../src/stages/types';
import { MalformedResponseError } from '../src/structured_error';
import type { DebateRecord, GapRecord, HypothesisRecord } from '../src/types';

interface Call {
    prompt: string;
    system: string;
}

function context(response: string, overrides: Partial<StageContext> = {}): { ctx: StageContext; calls: Call[] } {
    const calls: Call[] = [];
    let next = 0;
    const ctx: StageContext = {
        infer: async (prompt, system) => {
            calls.push({ prompt, system });
            return response;
        },
        newId: () => `id-${++next}`,
        source_id: 'src-env',
        cycle: 0,
        max_gaps: 3,
        ...overrides,
    };
    return { ctx, calls };
}

const gaps: GapRecord[] = [
    { id: 'g1', text: 'Gap A', lineage: 'src-env' },
    { id: 'g2', text: 'Gap B', lineage: 'src-env' },
];

const debates: DebateRecord[] = [
    { id: 'd1', gap_id: 'g1', gap: 'Gap A', pro_arguments: 'p', con_arguments: 'c', strength: 0.8, lineage: 'g1' },
];

const hypotheses: HypothesisRecord[] = [
    { id: 'h1', text: 'First claim', gap: 'Gap A', methodology: 'Cohort study', lineage: 'd1' },
    { id: 'h2', text: 'Second claim', gap: 'Gap A', methodology: 'Crossover trial', lineage: 'd1' },
];

test('gap detector dedupes, caps at max_gaps and links gaps to the source envelope', async () => {
    const { ctx, calls } = context('1. Gap A\n2. Gap B\n3. gap a\n4. Gap C', { max_gaps: 2 });
    const out = await gapDetector.run({ documents: ['doc one', '  '] }, ctx);

    assert.deepEqual(out.gaps, [
        { id: 'id-1', text: 'Gap A', lineage: 'src-env' },
        { id: 'id-2', text: 'Gap B', lineage: 'src-env' },
    ]);
    assert.equal(calls.length, 1);
    assert.equal(calls[0].system, GAP_DETECTION_SYSTEM);
    assert.match(calls[0].prompt, /doc one/);
});

test('gap detector rejects an empty response', async () => {
    const { ctx } = context('   ');
    await assert.rejects(gapDetector.run({ documents: ['doc'] }, ctx), MalformedResponseError);
});

test('debater keeps only complete blocks for known gaps', async () => {
    const response = [
        'GAP 1',
        'PRO: p1',
        'CON: c1',
        'STRENGTH: 8',
        '',
        'GAP 2',
        'PRO: p2',
        'STRENGTH: 5',
        'GAP 9',
        'PRO: x',
        'CON: y',
        'STRENGTH: 1',
    ].join('\n');
    const { ctx, calls } = context(response);
    const out = await debater.run({ gaps }, ctx);

    assert.deepEqual(out.debates, [
        { id: 'id-1', gap_id: 'g1', gap: 'Gap A', pro_arguments: 'p1', con_arguments: 'c1', strength: 0.8, lineage: 'g1' },
    ]);
    assert.equal(calls[0].system, DEBATE_SYSTEM);
});

test('debater fails when no block has PRO, CON and STRENGTH', async () => {
    const { ctx } = context('GAP 1\nPRO: only one side');
    await assert.rejects(debater.run({ gaps }, ctx), MalformedResponseError);
});

test('hypothesis generator maps blocks onto debates', async () => {
    const { ctx } = context('HYPOTHESIS 1: Claim one\nthat wraps\nMETHODOLOGY: Do a trial\nHYPOTHESIS 4: orphan');
    const out = await hypothesisGenerator.run({ debates }, ctx);

    assert.deepEqual(out.hypotheses, [
        { id: 'id-1', text: 'Claim one that wraps', gap: 'Gap A', methodology: 'Do a trial', lineage: 'd1' },
    ]);
});

test('hypothesis generator fails without any HYPOTHESIS block', async () => {
    const { ctx } = context('I cannot help with that.');
    await assert.rejects(hypothesisGenerator.run({ debates }, ctx), MalformedResponseError);
});

test('evolution refines the numbered hypotheses and carries the rest forward', async () => {
    const { ctx, calls } = context('HYPOTHESIS 2: Sharper two\nNOVELTY: 0.9\nFEASIBILITY: 0.6\nIMPACT: 0.7', { cycle: 2 });
    const out = await evolutionAgent.run({ hypotheses }, ctx);

    assert.equal(out.hypotheses.length, 2);
    assert.equal(out.hypotheses[0], hypotheses[0]);
    assert.deepEqual(out.hypotheses[1], {
        id: 'id-1',
        text: 'Sharper two',
        gap: 'Gap A',
        methodology: 'Crossover trial',
        lineage: 'h2',
        score: { novelty: 0.9, feasibility: 0.6, impact: 0.7, aggregate: 0.75 },
    });
    assert.deepEqual(out.refined_ids, ['id-1']);
    assert.match(calls[0].prompt, /Refinement cycle 2/);
});

test('evolution scores unrated dimensions with the keyword heuristic', async () => {
    const { ctx } = context('HYPOTHESIS 1: A novel benchmark to reduce error\nMETHODOLOGY: none given\nNOVELTY: 0.9');
    const out = await evolutionAgent.run({ hypotheses: [hypotheses[0]] }, ctx);
    const heuristic = scoreHypothesis('A novel benchmark to reduce error', 'none given');

    assert.deepEqual(out.hypotheses[0].score, {
        novelty: 0.9,
        feasibility: heuristic.feasibility,
        impact: heuristic.impact,
        aggregate: aggregateScore(0.9, heuristic.feasibility, heuristic.impact),
    });
});

test('evolution fails when nothing was refined', async () => {
    const { ctx } = context('NOVELTY: 0.9');
    await assert.rejects(evolutionAgent.run({ hypotheses }, ctx), MalformedResponseError);
});

test('heuristic scoring counts markers and weights 0.4 / 0.3 / 0.3', () => {
    assert.deepEqual(scoreHypothesis('A novel benchmark to reduce error', ''), {
        novelty: 0.5,
        feasibility: 0.6,
        impact: 0.5,
        aggregate: 0.53,
    });
    assert.equal(aggregateScore(0.5, 0.5, 0.5), 0.5);
});

test('runStage dispatches on the worker kind', async () => {
    const { ctx } = context('1. Only gap');
    const out = await runStage('GapDetector', { documents: ['doc'] }, ctx);
    assert.deepEqual(out.gaps.map((g) => g.text), ['Only gap']);
});
