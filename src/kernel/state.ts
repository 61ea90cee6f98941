import { invalidStateError } from './runtime-error.js';
import { ORIENTATION_COUNT, SLOT_COUNT } from './types.js';
import type { CornerState, Orientation } from './types.js';

export const toOrientation = (value: number): Orientation => {
  const normalized = ((value % ORIENTATION_COUNT) + ORIENTATION_COUNT) % ORIENTATION_COUNT;
  return normalized === 0 ? 0 : normalized === 1 ? 1 : 2;
};

export const addOrientation = (left: Orientation, right: Orientation): Orientation => toOrientation(left + right);

export const negateOrientation = (value: Orientation): Orientation => toOrientation(-value);

export const readSlot = <T>(values: readonly T[], slot: number): T => {
  const value = values[slot];
  if (value === undefined) {
    throw new RangeError(`slot ${slot} is outside 0..${values.length - 1}`);
  }
  return value;
};

export const freezeState = (cornerPos: readonly number[], cornerOrt: readonly Orientation[]): CornerState =>
  Object.freeze({
    cornerPos: Object.freeze([...cornerPos]),
    cornerOrt: Object.freeze([...cornerOrt]),
  });

const IDENTITY_STATE = freezeState(
  Array.from({ length: SLOT_COUNT }, (_, slot) => slot),
  Array.from({ length: SLOT_COUNT }, (): Orientation => 0),
);

export const identityState = (): CornerState => IDENTITY_STATE;

/**
 * Length check only. Full permutation checks live in `validateState`.
 */
export const assertStateShape = (state: CornerState): void => {
  if (state.cornerPos.length === SLOT_COUNT && state.cornerOrt.length === SLOT_COUNT) {
    return;
  }
  throw invalidStateError('Corner state must hold exactly 8 slots', [
    {
      code: 'STATE_SLOT_COUNT_INVALID',
      path: state.cornerPos.length === SLOT_COUNT ? 'state.cornerOrt' : 'state.cornerPos',
      severity: 'error',
      message: `Expected ${SLOT_COUNT} slots, received cornerPos=${state.cornerPos.length} cornerOrt=${state.cornerOrt.length}.`,
    },
  ]);
};

const sequencesEqual = (left: readonly number[], right: readonly number[]): boolean => {
  if (left.length !== right.length) {
    return false;
  }
  for (let index = 0; index < left.length; index += 1) {
    if (left[index] !== right[index]) {
      return false;
    }
  }
  return true;
};

export const stateEquals = (left: CornerState, right: CornerState): boolean =>
  sequencesEqual(left.cornerPos, right.cornerPos) && sequencesEqual(left.cornerOrt, right.cornerOrt);

export const isGoal = (state: CornerState): boolean => stateEquals(state, IDENTITY_STATE);

export const totalOrientation = (state: CornerState): Orientation =>
  toOrientation(state.cornerOrt.reduce<number>((sum, value) => sum + value, 0));
