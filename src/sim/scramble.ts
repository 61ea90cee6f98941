import {
  CORNER_ACTIONS,
  CUBE_2X2_PUZZLE_NAME,
  computeStateHash,
  createZobristTable,
  identityState,
  inverseAction,
  isGoal,
  pickAction,
  renderAction,
  seedRng,
  transform,
  updateStateHash,
} from '../kernel/index.js';
import type { ActionToken, CornerAction, CornerState } from '../kernel/index.js';
import type { ScrambleLogger } from './scramble-logger.js';

const ZOBRIST_TABLE = createZobristTable(CUBE_2X2_PUZZLE_NAME);

export interface ScrambleOptions {
  readonly avoidImmediateInverse?: boolean;
  readonly logger?: ScrambleLogger;
}

export interface ScrambleTrace {
  readonly seed: number;
  readonly depth: number;
  readonly actions: readonly CornerAction[];
  readonly tokens: readonly ActionToken[];
  /** State after each action; `states[i]` follows `actions[i]`. */
  readonly states: readonly CornerState[];
  readonly finalState: CornerState;
  readonly stateHash: bigint;
}

const validateDepth = (depth: number): void => {
  if (!Number.isSafeInteger(depth) || depth < 0) {
    throw new RangeError(`depth must be a non-negative safe integer, received ${String(depth)}`);
  }
};

const candidateActions = (previous: CornerAction | undefined, avoidImmediateInverse: boolean): readonly CornerAction[] => {
  if (previous === undefined || !avoidImmediateInverse) {
    return CORNER_ACTIONS;
  }
  const undo = inverseAction(previous);
  return CORNER_ACTIONS.filter((action) => action !== undo);
};

export const randomScramble = (seed: number, depth: number, options: ScrambleOptions = {}): ScrambleTrace => {
  let rng = seedRng(seed);
  validateDepth(depth);
  const avoidImmediateInverse = options.avoidImmediateInverse ?? true;
  const logger = options.logger;

  logger?.logScrambleStarted({ seed, depth });

  let state = identityState();
  let stateHash = computeStateHash(ZOBRIST_TABLE, state);
  const actions: CornerAction[] = [];
  const tokens: ActionToken[] = [];
  const states: CornerState[] = [];

  for (let index = 0; index < depth; index += 1) {
    const [action, nextRng] = pickAction(rng, candidateActions(actions.at(-1), avoidImmediateInverse));
    rng = nextRng;

    const nextState = transform(state, action);
    stateHash = updateStateHash(ZOBRIST_TABLE, stateHash, state, nextState);
    state = nextState;

    const token = renderAction(action);
    actions.push(action);
    tokens.push(token);
    states.push(state);
    logger?.logStep({ index, token, state });
  }

  const solved = isGoal(state);
  if (depth > 0 && solved) {
    logger?.logWarning(`scramble seed=${seed} depth=${depth} returned to the solved state`);
  }
  logger?.logScrambleFinished({ seed, tokens, stateHash, solved });

  return {
    seed,
    depth,
    actions,
    tokens,
    states,
    finalState: state,
    stateHash,
  };
};

export const runScrambles = (
  seeds: readonly number[],
  depth: number,
  options: ScrambleOptions = {},
): readonly ScrambleTrace[] => seeds.map((seed) => randomScramble(seed, depth, options));
