import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  CORNER_ACTIONS,
  formatActionSequence,
  parseAction,
  parseActionSequence,
  renderAction,
} from '../../../src/kernel/index.js';

describe('action notation', () => {
  it('renders each action as a face letter and a sign', () => {
    assert.deepEqual(CORNER_ACTIONS.map(renderAction), ['R+', 'U+', 'B+', 'R-', 'U-', 'B-']);
  });

  it('parses every rendered token back to its action', () => {
    for (const action of CORNER_ACTIONS) {
      assert.equal(parseAction(renderAction(action)), action);
    }
  });

  it('returns null for unrecognized tokens', () => {
    for (const token of ['ZZ', '', 'R', 'r+', 'T+', ' R+', 'R+ ', 'U--', 'toString']) {
      assert.equal(parseAction(token), null, `token ${JSON.stringify(token)}`);
    }
  });

  it('parses whitespace-separated sequences', () => {
    assert.deepEqual(parseActionSequence('R+ U-  B+\nR-'), ['R', 't', 'B', 'r']);
    assert.deepEqual(parseActionSequence('   '), []);
    assert.equal(parseActionSequence('R+ X+'), null);
  });

  it('formats sequences with single spaces', () => {
    assert.equal(formatActionSequence(['R', 't', 'b']), 'R+ U- B-');
    assert.equal(formatActionSequence([]), '');
  });
});
