import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  CORNER_ACTIONS,
  GENERATOR_ACTIONS,
  inverseAction,
  isCornerAction,
  isGeneratorAction,
  isKernelErrorCode,
  type CornerAction,
} from '../../../src/kernel/index.js';

describe('corner action alphabet', () => {
  it('lists three generators followed by their inverses', () => {
    assert.deepEqual(CORNER_ACTIONS, ['R', 'T', 'B', 'r', 't', 'b']);
    assert.deepEqual(GENERATOR_ACTIONS, ['R', 'T', 'B']);
    assert.equal(CORNER_ACTIONS.filter(isGeneratorAction).length, 3);
  });

  it('pairs every generator with its inverse', () => {
    assert.equal(inverseAction('R'), 'r');
    assert.equal(inverseAction('T'), 't');
    assert.equal(inverseAction('B'), 'b');
    assert.equal(inverseAction('r'), 'R');
    assert.equal(inverseAction('t'), 'T');
    assert.equal(inverseAction('b'), 'B');
  });

  it('inverseAction is an involution without fixed points', () => {
    for (const action of CORNER_ACTIONS) {
      assert.equal(inverseAction(inverseAction(action)), action);
      assert.notEqual(inverseAction(action), action);
    }
  });

  it('isCornerAction accepts exactly the six actions', () => {
    for (const action of CORNER_ACTIONS) {
      assert.equal(isCornerAction(action), true);
    }
    for (const value of ['U', 'R+', '', 'toString', 3, null, undefined]) {
      assert.equal(isCornerAction(value), false);
    }
  });

  it('rejects values outside the alphabet with INVALID_ACTION', () => {
    const bogus = 'X' as unknown as CornerAction;
    assert.throws(() => inverseAction(bogus), (error: unknown) => isKernelErrorCode(error, 'INVALID_ACTION'));
  });
});
