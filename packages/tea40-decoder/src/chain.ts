import type { Block, Chain, CipherParams, Word } from "@tea40/interface";
import { assertKey, assertRounds, decipher, encipher } from "@tea40/crypto";

export function assertChain(words: Chain, field = "chain", minWords = 1): Chain {
  if (words.length < minWords) {
    throw new Error(`InvalidChainLength: ${field}: expected at least ${minWords} words, got ${words.length}`);
  }
  return words;
}

function setBlock(words: Word[], i: number, block: Block): void {
  words[i] = block.v0;
  words[i + 1] = block.v1;
}

/**
 * Decrypt a chain whose blocks overlap: block `i` is `(words[i], words[i + 1])`.
 *
 * Blocks are deciphered from index `N - 2` down to `0`. Each step reads
 * `words[i + 1]` after the step above it has already rewritten that word, so
 * the descending order is part of the contract; walking the chain in any other
 * order silently produces garbage. The last word is the chain root and never
 * starts a block.
 *
 * Returns a new array; the input is left untouched.
 */
export function decryptChain(words: Chain, params: CipherParams): Word[] {
  const key = assertKey(params.key);
  const rounds = assertRounds(params.rounds);

  const out = Array.from(words);
  for (let i = out.length - 2; i >= 0; i -= 1) {
    setBlock(out, i, decipher(rounds, { v0: out[i], v1: out[i + 1] }, key, params.delta));
  }
  return out;
}

/** Inverse of {@link decryptChain}: enciphers blocks from index `0` up to `N - 2`. */
export function encryptChain(words: Chain, params: CipherParams): Word[] {
  const key = assertKey(params.key);
  const rounds = assertRounds(params.rounds);

  const out = Array.from(words);
  for (let i = 0; i + 1 < out.length; i += 1) {
    setBlock(out, i, encipher(rounds, { v0: out[i], v1: out[i + 1] }, key, params.delta));
  }
  return out;
}
