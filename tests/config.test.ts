import test from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_SESSION_CONFIG, resolveSessionConfig } from '../src/config';
import { InvalidConfigError } from '../src/structured_error';

test('overrides are merged onto the defaults', () => {
    const cfg = resolveSessionConfig({ epsilon_budget: 4, max_evolution_cycles: 2, fallback_backend: null });
    assert.equal(cfg.epsilon_budget, 4);
    assert.equal(cfg.max_evolution_cycles, 2);
    assert.equal(cfg.fallback_backend, null);
    assert.equal(cfg.handoff_epsilon, DEFAULT_SESSION_CONFIG.handoff_epsilon);
    assert.equal(cfg.on_budget_exceeded, 'abort');
});

test('an unbounded budget is accepted', () => {
    assert.equal(resolveSessionConfig({ epsilon_budget: Infinity }).epsilon_budget, Infinity);
});

test('invalid fields are rejected with the field name', () => {
    const cases: Array<[string, () => unknown]> = [
        ['epsilon_budget', () => resolveSessionConfig({ epsilon_budget: 0 })],
        ['handoff_epsilon', () => resolveSessionConfig({ handoff_epsilon: -1 })],
        ['max_evolution_cycles', () => resolveSessionConfig({ max_evolution_cycles: 6 })],
        ['max_evolution_cycles', () => resolveSessionConfig({ max_evolution_cycles: 1.5 })],
        ['retry_count', () => resolveSessionConfig({ retry_count: -1 })],
        ['target_score', () => resolveSessionConfig({ target_score: 1.5 })],
        ['fallback_backend', () => resolveSessionConfig({ primary_backend: 'ollama', fallback_backend: 'ollama' })],
        ['temperature', () => resolveSessionConfig({ temperature: 3 })],
    ];
    for (const [field, fn] of cases) {
        assert.throws(fn, (err: unknown) => err instanceof InvalidConfigError && err.context.field === field, field);
    }
});
