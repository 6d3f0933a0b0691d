import test from 'node:test';
import assert from 'node:assert/strict';

import { ContextStore } from '../src/context_store';
import { InvalidEnvelopeError } from '../src/structured_error';
import type { Envelope } from '../src/types';

let counter = 0;

function envelope(overrides: Partial<Envelope> = {}): Envelope {
    counter += 1;
    return {
        id: `env-${counter}`,
        seq: counter,
        session_id: 's1',
        sender: 'Orchestrator',
        receiver: 'GapDetector',
        kind: 'handoff',
        created_at: '2026-03-01T10:00:00.000Z',
        meta: {},
        payload: { documents: ['doc'] },
        privacy: { applied: true, epsilon: 1, mechanism: 'laplace', sensitivity: 0.01 },
        ...overrides,
    };
}

test('latest returns the most recent envelope addressed to a stage', () => {
    const store = new ContextStore();
    const a = envelope({ id: 'a', receiver: 'Debater', created_at: '2026-03-01T10:00:01.000Z' });
    const b = envelope({ id: 'b', receiver: 'Debater', created_at: '2026-03-01T10:00:02.000Z' });
    const c = envelope({ id: 'c', receiver: 'HypothesisGenerator', created_at: '2026-03-01T10:00:03.000Z' });
    store.append(a);
    store.append(b);
    store.append(c);

    assert.equal(store.latest('s1', 'Debater')?.id, 'b');
    assert.equal(store.latest('s1', 'HypothesisGenerator')?.id, 'c');
    assert.equal(store.latest('s1', 'EvolutionAgent'), undefined);
    assert.deepEqual(store.byStage('s1', 'Debater').map((e) => e.id), ['a', 'b']);
});

test('history orders by created_at and keeps insertion order for ties', () => {
    const store = new ContextStore();
    store.append(envelope({ id: 'late', created_at: '2026-03-01T10:00:05.000Z' }));
    store.append(envelope({ id: 'early-1', created_at: '2026-03-01T10:00:01.000Z' }));
    store.append(envelope({ id: 'early-2', created_at: '2026-03-01T10:00:01.000Z' }));

    assert.deepEqual(store.history('s1').map((e) => e.id), ['early-1', 'early-2', 'late']);
});

test('stored envelopes are deep-frozen', () => {
    const store = new ContextStore();
    const e = envelope({ id: 'frozen', payload: { gaps: [{ id: 'g1', text: 'gap', lineage: 'x' }] } });
    store.append(e);

    const stored = store.get('s1', 'frozen');
    assert.ok(stored);
    assert.ok(Object.isFrozen(stored));
    assert.ok(Object.isFrozen(stored.payload));
    assert.ok(Object.isFrozen(stored.privacy));
    assert.ok(Object.isFrozen(stored.meta));
});

test('an envelope frozen only at the top level is frozen all the way down once stored', () => {
    const store = new ContextStore();
    store.append(Object.freeze(envelope({ id: 'shallow', payload: { gaps: ['a'] } })));

    const stored = store.get('s1', 'shallow');
    assert.ok(stored);
    const gaps: unknown = Reflect.get(Object(stored.payload), 'gaps');
    assert.ok(Array.isArray(gaps));
    assert.ok(Object.isFrozen(stored.payload));
    assert.ok(Object.isFrozen(gaps));
    assert.ok(Object.isFrozen(stored.privacy));
    assert.ok(Object.isFrozen(stored.meta));
    assert.throws(() => gaps.push('injected'), TypeError);
    assert.deepEqual(stored.payload, { gaps: ['a'] });
});

test('duplicate ids and malformed envelopes are rejected', () => {
    const store = new ContextStore();
    store.append(envelope({ id: 'dup' }));
    assert.throws(() => store.append(envelope({ id: 'dup' })), InvalidEnvelopeError);
    assert.throws(() => store.append(envelope({ id: '' })), InvalidEnvelopeError);
    assert.throws(() => store.append(envelope({ created_at: 'yesterday' })), InvalidEnvelopeError);
    assert.equal(store.history('s1').length, 1);
});

test('stats average epsilon over noised envelopes only', () => {
    const store = new ContextStore();
    store.append(envelope({ sender: 'Orchestrator', receiver: 'GapDetector', privacy: { applied: true, epsilon: 1, mechanism: 'laplace', sensitivity: 0.01 } }));
    store.append(envelope({ sender: 'GapDetector', receiver: 'Debater', privacy: { applied: true, epsilon: 0.5, mechanism: 'laplace', sensitivity: 0.01 } }));
    store.append(envelope({
        sender: 'Orchestrator',
        receiver: 'Orchestrator',
        kind: 'diagnostic',
        privacy: { applied: false, epsilon: 0, mechanism: 'laplace', sensitivity: 0 },
    }));

    const stats = store.stats('s1');
    assert.equal(stats.count, 3);
    assert.deepEqual(stats.by_sender, { Orchestrator: 2, GapDetector: 1 });
    assert.deepEqual(stats.by_receiver, { GapDetector: 1, Debater: 1, Orchestrator: 1 });
    assert.equal(stats.epsilon_total, 1.5);
    assert.equal(stats.avg_epsilon, 0.75);

    assert.equal(new ContextStore().stats('s1').avg_epsilon, 0);
});

test('sessions are isolated and can be cleared', () => {
    const store = new ContextStore();
    store.append(envelope({ session_id: 's1' }));
    store.append(envelope({ session_id: 's2' }));
    store.append(envelope({ session_id: 's2' }));

    assert.equal(store.history('s1').length, 1);
    assert.equal(store.history('s2').length, 2);
    assert.deepEqual(store.sessions().sort(), ['s1', 's2']);

    store.clear('s2');
    assert.deepEqual(store.history('s2'), []);
    assert.equal(store.history('s1').length, 1);
});
