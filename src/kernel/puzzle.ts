import { parseAction, renderAction } from './action-notation.js';
import { CORNER_ACTIONS, inverseAction } from './actions.js';
import { transform } from './apply-move.js';
import { encode, ENCODED_SHAPE } from './encode.js';
import { render } from './render.js';
import { identityState, isGoal } from './state.js';
import type { CornerAction, CornerState, EncodedFeature, PuzzleDefinition, RenderedState } from './types.js';

export type CornerCubePuzzle = PuzzleDefinition<CornerState, CornerAction, RenderedState, EncodedFeature>;

export const CUBE_2X2_PUZZLE_NAME = 'cube2x2';

/**
 * Registration record handed to search and training harnesses.
 */
export const cube2x2Puzzle: CornerCubePuzzle = Object.freeze({
  name: CUBE_2X2_PUZZLE_NAME,
  initialState: identityState(),
  isGoal,
  actions: CORNER_ACTIONS,
  transform,
  inverseAction,
  render: (state: CornerState): RenderedState => render(state),
  renderAction,
  parseAction,
  encodedShape: ENCODED_SHAPE,
  encode,
});
