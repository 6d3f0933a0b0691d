import test from 'node:test';
import assert from 'node:assert/strict';

import { cleanInline, parseRating, readFields, splitBlocks, splitListItems } from '../src/stages/response_parser';

test('list items: numbered and bulleted, wrapped lines joined, preamble ignored', () => {
    const text = 'Here are the gaps:\n1. First gap\n2) Second gap\n   continues here\n\n- Third **bold** gap';
    assert.deepEqual(splitListItems(text), ['First gap', 'Second gap continues here', 'Third bold gap']);
});

test('list items: code fences are transparent', () => {
    assert.deepEqual(splitListItems('```\n1. A gap\n```'), ['A gap']);
});

test('list items: falls back to non-trivial lines when there is no list', () => {
    assert.deepEqual(splitListItems('Gap one is here\nok\nGap two is here'), ['Gap one is here', 'Gap two is here']);
    assert.deepEqual(splitListItems(''), []);
});

test('blocks split on numbered headers in any emphasis or case', () => {
    const text = [
        'Intro line',
        'HYPOTHESIS 1: Alpha claim',
        'METHODOLOGY: m1',
        '**HYPOTHESIS 2:** Beta claim',
        'NOVELTY: 7/10',
        'Hypothesis 3 - gamma',
    ].join('\n');

    assert.deepEqual(splitBlocks(text, 'HYPOTHESIS'), [
        { index: 1, head: 'Alpha claim', lines: ['METHODOLOGY: m1'] },
        { index: 2, head: 'Beta claim', lines: ['NOVELTY: 7/10'] },
        { index: 3, head: 'gamma', lines: [] },
    ]);
});

test('fields: known labels start a field, anything else continues it', () => {
    const fields = readFields(['PRO: good', 'more pro', '', 'CON: bad', 'Note: aside', '**STRENGTH:** 8'], ['PRO', 'CON', 'STRENGTH']);
    assert.equal(fields.get('PRO'), 'good more pro');
    assert.equal(fields.get('CON'), 'bad Note: aside');
    assert.equal(fields.get('STRENGTH'), '8');
});

test('fields: text before the first label is kept under the empty key', () => {
    const fields = readFields(['extra words', 'methodology: x'], ['METHODOLOGY']);
    assert.equal(fields.get(''), 'extra words');
    assert.equal(fields.get('METHODOLOGY'), 'x');
});

test('ratings accept 0-1, 0-10, n/10 and percentages', () => {
    assert.equal(parseRating('0.85'), 0.85);
    assert.equal(parseRating('7'), 0.7);
    assert.equal(parseRating('7/10'), 0.7);
    assert.equal(parseRating('70%'), 0.7);
    assert.equal(parseRating('1'), 1);
    assert.equal(parseRating('15'), 1);
    assert.equal(parseRating('-3'), 0);
    assert.equal(parseRating('high'), null);
    assert.equal(parseRating(undefined), null);
});

test('ratings honour any denominator', () => {
    assert.equal(parseRating('3/5'), 0.6);
    assert.equal(parseRating('4 / 5'), 0.8);
    assert.equal(parseRating('STRENGTH 2.5/4'), 0.625);
    assert.equal(parseRating('9/4'), 1);
    assert.equal(parseRating('3/0'), null);
});

test('inline cleanup collapses whitespace and emphasis', () => {
    assert.equal(cleanInline('  **a**   b\tc '), 'a b c');
});
