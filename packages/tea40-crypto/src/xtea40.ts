import type { Block, Key, Word } from "@tea40/interface";
import { mask40, mask48, wrap64 } from "@tea40/interface";

import { assertKey, assertRounds } from "./internal/util.js";

export const DELTA: Word = 0x9e38538a49n;
export const DEFAULT_ROUNDS = 32;

/**
 * The mixing function. Every intermediate is kept in 64-bit storage; the
 * right shift sees only the low 40 bits of `x`, which is what keeps bits above
 * bit 39 from ever reaching the low 40 bits of a result.
 */
export function roundFunction(x: Word, sum: Word, k: Word): Word {
  const mixed = wrap64(((wrap64(x << 4n) ^ (mask40(x) >> 5n)) + x));
  return mixed ^ wrap64(sum + k);
}

// Key word for the v0 half-round: low two bits of the sum.
function lowKey(key: Key, sum: Word): Word {
  return key[Number(sum & 3n)];
}

// Key word for the v1 half-round: bits 11..12 of the sum.
function highKey(key: Key, sum: Word): Word {
  return key[Number((sum >> 11n) & 3n)];
}

export function encipher(rounds: number, block: Block, key: Key, delta: Word = DELTA): Block {
  assertRounds(rounds);
  const k = assertKey(key);

  let { v0, v1 } = block;
  let sum = 0n;
  for (let i = 0; i < rounds; i += 1) {
    v0 = wrap64(v0 + roundFunction(v1, sum, lowKey(k, sum)));
    sum = mask48(sum + delta);
    v1 = wrap64(v1 + roundFunction(v0, sum, highKey(k, sum)));
  }
  return { v0: mask40(v0), v1: mask40(v1) };
}

/**
 * Exact inverse of {@link encipher} on the low 40 bits.
 *
 * The starting sum is `delta * rounds` truncated to 40 bits rather than 48.
 * Only bits 0..12 of the sum select key words and nothing above bit 39 feeds
 * back into the low 40 bits of a word, so the narrower start still lines up
 * with where the forward pass ended.
 */
export function decipher(rounds: number, block: Block, key: Key, delta: Word = DELTA): Block {
  assertRounds(rounds);
  const k = assertKey(key);

  let { v0, v1 } = block;
  let sum = mask40(delta * BigInt(rounds));
  for (let i = 0; i < rounds; i += 1) {
    v1 = wrap64(v1 - roundFunction(v0, sum, highKey(k, sum)));
    sum = mask48(sum - delta);
    v0 = wrap64(v0 - roundFunction(v1, sum, lowKey(k, sum)));
  }
  return { v0: mask40(v0), v1: mask40(v1) };
}
