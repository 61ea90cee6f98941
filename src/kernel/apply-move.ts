import { inverseAction } from './actions.js';
import { moveTableFor } from './move-tables.js';
import { addOrientation, assertStateShape, freezeState, readSlot } from './state.js';
import type { CornerAction, CornerState } from './types.js';

export const transform = (state: CornerState, action: CornerAction): CornerState => {
  assertStateShape(state);
  const table = moveTableFor(action);
  const cornerPos = [...state.cornerPos];
  const cornerOrt = [...state.cornerOrt];

  for (const step of table.cycle) {
    cornerPos[step.to] = readSlot(state.cornerPos, step.from);
    cornerOrt[step.to] = readSlot(state.cornerOrt, step.from);
  }

  for (const twist of table.twists) {
    cornerOrt[twist.slot] = addOrientation(readSlot(cornerOrt, twist.slot), twist.delta);
  }

  return freezeState(cornerPos, cornerOrt);
};

export const applyActions = (state: CornerState, actions: readonly CornerAction[]): CornerState =>
  actions.reduce<CornerState>((current, action) => transform(current, action), state);

export const invertSequence = (actions: readonly CornerAction[]): readonly CornerAction[] =>
  [...actions].reverse().map(inverseAction);
