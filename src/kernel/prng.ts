import type { CornerAction, Rng } from './types.js';

// PCG-DXSM over a 128-bit LCG. Generators are immutable values; each draw
// hands back the advanced generator alongside its result.
const WORD_MASK = (1n << 64n) - 1n;
const WORD_RANGE = 1n << 64n;
const LCG_MASK = (1n << 128n) - 1n;
const LCG_MULTIPLIER = 0x2360ed051fc65da44385df649fccf645n;
const DXSM_MULTIPLIER = 0xda942042e4dd58b5n;
const SEED_MIX = 0x9e3779b97f4a7c15f39cc0605cedc835n;
const STREAM_SALT = 0xda3e39cb94b95bdbn;

const toWord = (value: bigint): bigint => value & WORD_MASK;
const toLcg = (value: bigint): bigint => value & LCG_MASK;

const permuteOutput = (lcg: bigint): bigint => {
  const high = toWord(lcg >> 64n);
  const low = toWord(lcg) | 1n;
  const mixed = toWord((high ^ (high >> 32n)) * DXSM_MULTIPLIER);
  return toWord(toWord(mixed ^ (mixed >> 48n)) * low);
};

/** Seeds a generator from a scramble seed. Negative seeds are valid. */
export const seedRng = (seed: number): Rng => {
  if (!Number.isSafeInteger(seed)) {
    throw new RangeError(`seed must be a safe integer, received ${String(seed)}`);
  }
  const wide = toLcg(BigInt(seed));
  return Object.freeze({
    lcg: toLcg(wide ^ SEED_MIX),
    increment: toLcg((wide << 1n) ^ STREAM_SALT) | 1n,
  });
};

export const nextWord = (rng: Rng): readonly [bigint, Rng] => [
  permuteOutput(rng.lcg),
  Object.freeze({ lcg: toLcg(rng.lcg * LCG_MULTIPLIER + rng.increment), increment: rng.increment }),
];

/** Uniform index in `[0, count)`; words past the last whole multiple of `count` are redrawn. */
export const nextIndex = (rng: Rng, count: number): readonly [number, Rng] => {
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new RangeError(`nextIndex needs a positive safe integer count, received ${String(count)}`);
  }
  const span = BigInt(count);
  const limit = WORD_RANGE - (WORD_RANGE % span);
  let cursor = rng;
  for (;;) {
    const [word, next] = nextWord(cursor);
    cursor = next;
    if (word < limit) {
      return [Number(word % span), cursor];
    }
  }
};

export const pickAction = (rng: Rng, candidates: readonly CornerAction[]): readonly [CornerAction, Rng] => {
  const [index, next] = nextIndex(rng, candidates.length);
  const action = candidates[index];
  if (action === undefined) {
    throw new RangeError(`pickAction drew index ${index} from ${candidates.length} candidates`);
  }
  return [action, next];
};
