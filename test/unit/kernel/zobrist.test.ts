import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  CORNER_ACTIONS,
  computeStateHash,
  createZobristTable,
  identityState,
  transform,
  updateStateHash,
  zobristKey,
} from '../../../src/kernel/index.js';

describe('zobrist hashing', () => {
  const table = createZobristTable('cube2x2');

  it('derives the table deterministically from the puzzle name', () => {
    assert.deepEqual(createZobristTable('cube2x2'), table);
    assert.notEqual(createZobristTable('cube2x2-variant').seed, table.seed);
    assert.match(table.fingerprint, /^zobrist-fingerprint-v1\npuzzle=cube2x2\n/u);
  });

  it('keys are distinct per slot, corner and orientation', () => {
    const keys = new Set<bigint>();
    for (let slot = 0; slot < 8; slot += 1) {
      for (let corner = 0; corner < 8; corner += 1) {
        for (const orientation of [0, 1, 2] as const) {
          keys.add(zobristKey(table, { slot, corner, orientation }));
        }
      }
    }
    assert.equal(keys.size, 192);
  });

  it('distinguishes each single move from the identity', () => {
    const solvedHash = computeStateHash(table, identityState());
    for (const action of CORNER_ACTIONS) {
      assert.notEqual(computeStateHash(table, transform(identityState(), action)), solvedHash);
    }
  });

  it('incremental updates match a full recompute', () => {
    let state = identityState();
    let hash = computeStateHash(table, state);
    for (const action of ['R', 'T', 'b', 'B', 'r', 'R', 't', 'B'] as const) {
      const next = transform(state, action);
      hash = updateStateHash(table, hash, state, next);
      state = next;
      assert.equal(hash, computeStateHash(table, state));
    }
  });

  it('returns to the solved hash after undoing a move', () => {
    const solvedHash = computeStateHash(table, identityState());
    const turned = transform(identityState(), 'R');
    const back = transform(turned, 'r');
    const hash = updateStateHash(table, updateStateHash(table, solvedHash, identityState(), turned), turned, back);
    assert.equal(hash, solvedHash);
  });
});
