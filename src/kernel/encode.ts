import type { Diagnostic } from './diagnostics.js';
import { invalidStateError, kernelRuntimeError } from './runtime-error.js';
import { assertStateShape, freezeState, negateOrientation, readSlot, toOrientation } from './state.js';
import { ORIENTATION_COUNT, SLOT_COUNT } from './types.js';
import type { CornerState, EncodedFeature, FeatureBit, Orientation } from './types.js';

export const ENCODED_ROWS = SLOT_COUNT - 1;
export const ENCODED_COLUMNS = SLOT_COUNT * ORIENTATION_COUNT;
export const ENCODED_SHAPE: readonly [number, number] = Object.freeze([ENCODED_ROWS, ENCODED_COLUMNS] as const);
export const ENCODED_SIZE = ENCODED_ROWS * ENCODED_COLUMNS;

export interface EncodedCell {
  readonly row: number;
  readonly column: number;
}

// The last corner is implied by the other seven, so it gets no row.
const encodedCells = (state: CornerState): readonly EncodedCell[] => {
  assertStateShape(state);
  return Array.from({ length: ENCODED_ROWS }, (_, corner): EncodedCell => {
    const slot = state.cornerPos.indexOf(corner);
    if (slot < 0) {
      throw invalidStateError(`Corner ${corner} is missing from the state`, [
        {
          code: 'STATE_CORNER_MISSING',
          path: 'state.cornerPos',
          severity: 'error',
          message: `Corner ${corner} does not occupy any slot.`,
        },
      ]);
    }
    return { row: corner, column: slot * ORIENTATION_COUNT + readSlot(state.cornerOrt, slot) };
  });
};

export const encode = (state: CornerState): EncodedFeature => {
  const rows = Array.from({ length: ENCODED_ROWS }, () => new Array<FeatureBit>(ENCODED_COLUMNS).fill(0));
  for (const { row, column } of encodedCells(state)) {
    readSlot(rows, row)[column] = 1;
  }
  return Object.freeze(rows.map((row) => Object.freeze(row)));
};

/**
 * Writes the row-major encoding of `state` into `target[offset .. offset + 168)`.
 * The window is cleared first, so batches can reuse one buffer.
 */
export const encodeInto = (target: Uint8Array, state: CornerState, offset = 0): void => {
  if (!Number.isSafeInteger(offset) || offset < 0 || offset + ENCODED_SIZE > target.length) {
    throw new RangeError(
      `encodeInto needs ${ENCODED_SIZE} cells at offset ${String(offset)}, target length is ${target.length}`,
    );
  }
  const cells = encodedCells(state);
  target.fill(0, offset, offset + ENCODED_SIZE);
  for (const { row, column } of cells) {
    target[offset + row * ENCODED_COLUMNS + column] = 1;
  }
};

export interface DecodeFeatureResult {
  readonly state: CornerState | null;
  readonly diagnostics: readonly Diagnostic[];
}

const readHotColumn = (row: readonly number[], rowIndex: number, diagnostics: Diagnostic[]): number | null => {
  if (row.length !== ENCODED_COLUMNS) {
    diagnostics.push({
      code: 'FEATURE_ROW_LENGTH_INVALID',
      path: `feature[${rowIndex}]`,
      severity: 'error',
      message: `Expected ${ENCODED_COLUMNS} columns, received ${row.length}.`,
    });
    return null;
  }
  const hot: number[] = [];
  row.forEach((value, column) => {
    if (value === 1) {
      hot.push(column);
    } else if (value !== 0) {
      hot.push(-1);
    }
  });
  const column = hot[0];
  if (hot.length !== 1 || column === undefined || column < 0) {
    diagnostics.push({
      code: 'FEATURE_ROW_NOT_ONE_HOT',
      path: `feature[${rowIndex}]`,
      severity: 'error',
      message: 'Each row must hold exactly one 1 and zeros elsewhere.',
    });
    return null;
  }
  return column;
};

export const decodeFeature = (feature: readonly (readonly number[])[]): DecodeFeatureResult => {
  if (feature.length !== ENCODED_ROWS) {
    return {
      state: null,
      diagnostics: [
        {
          code: 'FEATURE_ROW_COUNT_INVALID',
          path: 'feature',
          severity: 'error',
          message: `Expected ${ENCODED_ROWS} rows, received ${feature.length}.`,
        },
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const cornerPos = new Array<number>(SLOT_COUNT).fill(-1);
  const cornerOrt = new Array<Orientation>(SLOT_COUNT).fill(0);

  feature.forEach((row, corner) => {
    const column = readHotColumn(row, corner, diagnostics);
    if (column === null) {
      return;
    }
    const slot = Math.floor(column / ORIENTATION_COUNT);
    if (readSlot(cornerPos, slot) !== -1) {
      diagnostics.push({
        code: 'FEATURE_SLOT_CONFLICT',
        path: `feature[${corner}]`,
        severity: 'error',
        message: `Corner ${corner} claims slot ${slot}, already held by corner ${readSlot(cornerPos, slot)}.`,
      });
      return;
    }
    cornerPos[slot] = corner;
    cornerOrt[slot] = toOrientation(column % ORIENTATION_COUNT);
  });

  if (diagnostics.length > 0) {
    return { state: null, diagnostics };
  }

  const lastSlot = cornerPos.indexOf(-1);
  cornerPos[lastSlot] = ENCODED_ROWS;
  cornerOrt[lastSlot] = negateOrientation(toOrientation(cornerOrt.reduce<number>((sum, value) => sum + value, 0)));

  return { state: freezeState(cornerPos, cornerOrt), diagnostics: [] };
};

export const requireDecodedFeature = (feature: readonly (readonly number[])[]): CornerState => {
  const { state, diagnostics } = decodeFeature(feature);
  if (state === null) {
    throw kernelRuntimeError('INVALID_ENCODED_FEATURE', 'Encoded feature does not describe a corner state', {
      diagnostics,
    });
  }
  return state;
};
