import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  applyActions,
  identityState,
  invertSequence,
  isKernelErrorCode,
  stateEquals,
  transform,
  type CornerAction,
  type CornerState,
} from '../../../src/kernel/index.js';

describe('transform', () => {
  it('applies R as a relocation followed by destination-keyed twists', () => {
    const next = transform(identityState(), 'R');
    assert.deepEqual(next.cornerPos, [0, 5, 1, 3, 4, 6, 2, 7]);
    assert.deepEqual(next.cornerOrt, [0, 2, 1, 0, 0, 1, 2, 0]);
  });

  it('applies T as a pure top-layer cycle', () => {
    const next = transform(identityState(), 'T');
    assert.deepEqual(next.cornerPos, [1, 2, 3, 0, 4, 5, 6, 7]);
    assert.deepEqual(next.cornerOrt, [0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('applies B to the back slots', () => {
    const next = transform(identityState(), 'B');
    assert.deepEqual(next.cornerPos, [0, 1, 6, 2, 4, 5, 7, 3]);
    assert.deepEqual(next.cornerOrt, [0, 0, 2, 1, 0, 0, 1, 2]);
  });

  it('applies r along the reversed cycle', () => {
    const next = transform(identityState(), 'r');
    assert.deepEqual(next.cornerPos, [0, 2, 6, 3, 4, 1, 5, 7]);
    assert.deepEqual(next.cornerOrt, [0, 2, 1, 0, 0, 1, 2, 0]);
  });

  it('equals three quarter turns the other way', () => {
    for (const [generator, inverse] of [['R', 'r'], ['T', 't'], ['B', 'b']] as const) {
      const viaInverse = transform(identityState(), inverse);
      const viaGenerator = applyActions(identityState(), [generator, generator, generator]);
      assert.equal(stateEquals(viaInverse, viaGenerator), true, `${generator}^3 should equal ${inverse}`);
    }
  });

  it('returns a frozen state and leaves the input untouched', () => {
    const input: CornerState = { cornerPos: [0, 1, 2, 3, 4, 5, 6, 7], cornerOrt: [0, 0, 0, 0, 0, 0, 0, 0] };
    const next = transform(input, 'B');
    assert.equal(Object.isFrozen(next), true);
    assert.equal(Object.isFrozen(next.cornerPos), true);
    assert.equal(Object.isFrozen(next.cornerOrt), true);
    assert.deepEqual(input.cornerPos, [0, 1, 2, 3, 4, 5, 6, 7]);
  });

  it('fails fast on a state with the wrong slot count', () => {
    const short: CornerState = { cornerPos: [0, 1, 2], cornerOrt: [0, 0, 0] };
    assert.throws(() => transform(short, 'R'), (error: unknown) => isKernelErrorCode(error, 'INVALID_STATE'));
  });

  it('fails fast on an unknown action', () => {
    const bogus = 'Q' as unknown as CornerAction;
    assert.throws(() => transform(identityState(), bogus), (error: unknown) => isKernelErrorCode(error, 'INVALID_ACTION'));
  });
});

describe('action sequences', () => {
  it('applyActions folds transform left to right', () => {
    const expected = transform(transform(identityState(), 'R'), 'T');
    assert.equal(stateEquals(applyActions(identityState(), ['R', 'T']), expected), true);
    assert.equal(applyActions(identityState(), []), identityState());
  });

  it('invertSequence reverses and inverts', () => {
    assert.deepEqual(invertSequence(['R', 'T', 'b']), ['B', 't', 'r']);
    assert.deepEqual(invertSequence([]), []);
  });

  it('a sequence followed by its inversion is the identity', () => {
    const sequence: readonly CornerAction[] = ['R', 'T', 'B', 'B', 'r', 't', 'R'];
    const scrambled = applyActions(identityState(), sequence);
    assert.equal(stateEquals(applyActions(scrambled, invertSequence(sequence)), identityState()), true);
  });
});
