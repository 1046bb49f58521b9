import type { Key, Word } from "@tea40/interface";

export const KEY_WORDS = 4;

export function assertKey(key: readonly Word[], field = "key"): Key {
  if (key.length !== KEY_WORDS) {
    throw new Error(`InvalidKeyLength: ${field}: expected ${KEY_WORDS} words, got ${key.length}`);
  }
  for (const [i, w] of key.entries()) {
    if (typeof w !== "bigint" || w < 0n) throw new Error(`InvalidKeyLength: ${field}[${i}] must be an unsigned bigint`);
  }
  const [k0, k1, k2, k3] = key;
  return [k0, k1, k2, k3];
}

export function assertRounds(rounds: number, field = "rounds"): number {
  if (!Number.isSafeInteger(rounds) || rounds < 0) {
    throw new Error(`InvalidRounds: ${field} must be a non-negative integer, got ${rounds}`);
  }
  return rounds;
}
