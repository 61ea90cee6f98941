import { generatorOf, isCornerAction } from './actions.js';
import { invalidActionError } from './runtime-error.js';
import { negateOrientation } from './state.js';
import type { CornerAction, GeneratorAction, InverseAction, MoveTable, OrientationTwist } from './types.js';

const freezeMoveTable = (table: MoveTable): MoveTable =>
  Object.freeze({
    cycle: Object.freeze(table.cycle.map((step) => Object.freeze({ ...step }))),
    twists: Object.freeze(table.twists.map((twist) => Object.freeze({ ...twist }))),
  });

// Twists are keyed by the slot a corner lands in, applied after relocation.
export const GENERATOR_MOVE_TABLES: Readonly<Record<GeneratorAction, MoveTable>> = Object.freeze({
  R: freezeMoveTable({
    cycle: [
      { from: 1, to: 2 },
      { from: 2, to: 6 },
      { from: 6, to: 5 },
      { from: 5, to: 1 },
    ],
    twists: [
      { slot: 1, delta: 2 },
      { slot: 2, delta: 1 },
      { slot: 5, delta: 1 },
      { slot: 6, delta: 2 },
    ],
  }),
  T: freezeMoveTable({
    cycle: [
      { from: 0, to: 3 },
      { from: 1, to: 0 },
      { from: 2, to: 1 },
      { from: 3, to: 2 },
    ],
    twists: [],
  }),
  B: freezeMoveTable({
    cycle: [
      { from: 2, to: 3 },
      { from: 3, to: 7 },
      { from: 7, to: 6 },
      { from: 6, to: 2 },
    ],
    twists: [
      { slot: 2, delta: 2 },
      { slot: 3, delta: 1 },
      { slot: 6, delta: 1 },
      { slot: 7, delta: 2 },
    ],
  }),
});

/**
 * Builds the table that undoes `table`. The cycle runs backwards, and the twist
 * a corner received on landing in `slot` is removed at the slot that corner
 * returns to.
 */
export const deriveInverseMoveTable = (table: MoveTable): MoveTable => {
  const twists = table.twists.map((twist): OrientationTwist => {
    const arrival = table.cycle.find((step) => step.to === twist.slot);
    return {
      slot: arrival === undefined ? twist.slot : arrival.from,
      delta: negateOrientation(twist.delta),
    };
  });

  return freezeMoveTable({
    cycle: table.cycle.map((step) => ({ from: step.to, to: step.from })),
    twists,
  });
};

const inverseTableFor = (action: InverseAction): MoveTable =>
  deriveInverseMoveTable(GENERATOR_MOVE_TABLES[generatorOf(action)]);

export const MOVE_TABLES: Readonly<Record<CornerAction, MoveTable>> = Object.freeze({
  ...GENERATOR_MOVE_TABLES,
  r: inverseTableFor('r'),
  t: inverseTableFor('t'),
  b: inverseTableFor('b'),
});

export const moveTableFor = (action: CornerAction): MoveTable => {
  if (!isCornerAction(action)) {
    throw invalidActionError(action);
  }
  return MOVE_TABLES[action];
};
