import { GENERATOR_MOVE_TABLES } from './move-tables.js';
import { assertStateShape, readSlot } from './state.js';
import type { CornerState, ZobristFeature, ZobristTable } from './types.js';

const MASK_64 = (1n << 64n) - 1n;
const FNV_OFFSET_BASIS_64 = 0xcbf29ce484222325n;
const FNV_PRIME_64 = 0x100000001b3n;
const encoder = new TextEncoder();

const fnv1a64 = (input: string): bigint => {
  const bytes = encoder.encode(input);
  let hash = FNV_OFFSET_BASIS_64;

  for (const byte of bytes) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME_64) & MASK_64;
  }

  return hash;
};

const canonicalizeFingerprint = (puzzleName: string): string => {
  const generators = Object.entries(GENERATOR_MOVE_TABLES)
    .map(([action, table]) => {
      const cycle = table.cycle.map((step) => `${step.from}>${step.to}`).join(',');
      const twists = table.twists.map((twist) => `${twist.slot}:${twist.delta}`).join(',');
      return `id=${action}|cycle=${cycle}|twists=${twists}`;
    })
    .sort();

  return ['zobrist-fingerprint-v1', `puzzle=${puzzleName}`, `generators=[${generators.join(';')}]`].join('\n');
};

const encodeFeature = (feature: ZobristFeature): string =>
  `slot=${feature.slot}|corner=${feature.corner}|orientation=${feature.orientation}`;

export const createZobristTable = (puzzleName: string): ZobristTable => {
  const fingerprint = canonicalizeFingerprint(puzzleName);
  const seed = fnv1a64(`table-seed|fingerprint=${fingerprint}`);
  return { seed, fingerprint };
};

export const zobristKey = (table: ZobristTable, feature: ZobristFeature): bigint =>
  fnv1a64(`zobrist-key-v1|seed=${table.seed.toString(16)}|${encodeFeature(feature)}`);

const slotFeature = (state: CornerState, slot: number): ZobristFeature => ({
  slot,
  corner: readSlot(state.cornerPos, slot),
  orientation: readSlot(state.cornerOrt, slot),
});

export const computeStateHash = (table: ZobristTable, state: CornerState): bigint => {
  assertStateShape(state);
  let hash = 0n;
  for (let slot = 0; slot < state.cornerPos.length; slot += 1) {
    hash ^= zobristKey(table, slotFeature(state, slot));
  }
  return hash;
};

/**
 * Rehashes only the slots whose occupant or orientation differs between
 * `before` and `after`.
 */
export const updateStateHash = (
  table: ZobristTable,
  hash: bigint,
  before: CornerState,
  after: CornerState,
): bigint => {
  assertStateShape(before);
  assertStateShape(after);
  let next = hash;
  for (let slot = 0; slot < before.cornerPos.length; slot += 1) {
    const previous = slotFeature(before, slot);
    const current = slotFeature(after, slot);
    if (previous.corner !== current.corner || previous.orientation !== current.orientation) {
      next ^= zobristKey(table, previous) ^ zobristKey(table, current);
    }
  }
  return next;
};
