// Cipher words are unsigned values kept in 64-bit storage. Only the low 40 bits
// carry meaning for block values; the round sum keeps 48.
export type Word = bigint;

export type Block = {
  v0: Word;
  v1: Word;
};

export type Key = readonly [Word, Word, Word, Word];

/**
 * An ordered word sequence. Block `i` of a chain is the overlapping pair
 * `(words[i], words[i + 1])`, so a chain of N words has N - 1 blocks and the
 * last word (the root) never starts one.
 */
export type Chain = readonly Word[];

export type Glyph = string;

/** Byte value -> glyph. Bytes at or past `length` render as the sentinel. */
export type GlyphTable = readonly Glyph[];

export type CipherParams = {
  key: Key;
  rounds: number;
  delta?: Word;
};

export type CipherProfile = {
  key: Key;
  chain: Chain;
  rounds: number;
  delta: Word;
  glyphs: GlyphTable;
};

export * from "./words.js";
