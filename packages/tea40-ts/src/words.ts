import type { Word } from "./index.js";

export const WORD_BITS = 40;
export const SUM_BITS = 48;

export const MASK40: Word = (1n << 40n) - 1n;
export const MASK48: Word = (1n << 48n) - 1n;
const MAX_U64: Word = (1n << 64n) - 1n;

export function mask40(x: Word): Word {
  return x & MASK40;
}

export function mask48(x: Word): Word {
  return x & MASK48;
}

/** Reduce to the 64-bit storage every intermediate lives in (also folds negatives). */
export function wrap64(x: Word): Word {
  return BigInt.asUintN(64, x);
}

function stripHexPrefix(hex: string): string {
  return hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
}

/**
 * Parse a word from a profile or the command line.
 *
 * Accepts:
 * - `0x`-prefixed hex strings (`"0x0c1d00050f"`)
 * - decimal strings
 * - safe-integer numbers and bigints
 */
export function parseWord(val: unknown, field: string): Word {
  let v: Word;
  if (typeof val === "bigint") {
    v = val;
  } else if (typeof val === "number") {
    if (!Number.isSafeInteger(val)) throw new Error(`InvalidWord: ${field} must be a safe integer, got ${val}`);
    v = BigInt(val);
  } else if (typeof val === "string") {
    const raw = val.trim();
    if (raw.length === 0) throw new Error(`InvalidWord: ${field} must not be empty`);
    if (raw.startsWith("0x") || raw.startsWith("0X")) {
      const clean = stripHexPrefix(raw).replace(/_/g, "");
      if (!/^[0-9a-fA-F]+$/.test(clean)) throw new Error(`InvalidWord: ${field} is not valid hex: ${raw}`);
      v = BigInt(`0x${clean}`);
    } else {
      if (!/^\d+$/.test(raw)) throw new Error(`InvalidWord: ${field} must be hex (0x...) or decimal, got: ${raw}`);
      v = BigInt(raw);
    }
  } else {
    throw new Error(`InvalidWord: ${field} must be a string, number or bigint`);
  }

  if (v < 0n || v > MAX_U64) throw new Error(`InvalidWord: ${field} out of u64 range: ${v}`);
  return v;
}

export function wordToHex(word: Word, digits = WORD_BITS / 4): string {
  return `0x${word.toString(16).padStart(digits, "0")}`;
}

// Big-endian: index 0 is the most significant byte.
export function wordToBytes(word: Word): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, wrap64(word), false);
  return out;
}

export function wordFromBytes(bytes: Uint8Array): Word {
  if (bytes.length > 8) throw new Error(`InvalidWord: expected at most 8 bytes, got ${bytes.length}`);
  let n = 0n;
  for (const b of bytes) n = (n << 8n) | BigInt(b);
  return n;
}
