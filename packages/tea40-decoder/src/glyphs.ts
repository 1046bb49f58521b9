import { readFileSync } from "node:fs";

import type { Chain, Glyph, GlyphTable, Word } from "@tea40/interface";
import { wordFromBytes, wordToBytes } from "@tea40/interface";

export const SENTINEL_GLYPH: Glyph = "?";

// Characters packed into each word by encodeGlyphs (40 bits / 8).
export const GLYPHS_PER_WORD = 5;

const MAX_TABLE_LEN = 256;

export type RenderOptions = {
  lowerCase?: boolean;
};

export function createGlyphTable(glyphs: readonly unknown[], field = "glyphs"): GlyphTable {
  if (glyphs.length === 0) throw new Error(`InvalidGlyphTable: ${field} must not be empty`);
  if (glyphs.length > MAX_TABLE_LEN) {
    throw new Error(`InvalidGlyphTable: ${field}: expected at most ${MAX_TABLE_LEN} entries, got ${glyphs.length}`);
  }

  const table: Glyph[] = [];
  for (const [i, g] of glyphs.entries()) {
    if (typeof g !== "string" || Array.from(g).length !== 1) {
      throw new Error(`InvalidGlyphTable: ${field}[${i}] must be a single character`);
    }
    table.push(g);
  }
  return Object.freeze(table);
}

let defaultTable: GlyphTable | null = null;

export function loadDefaultGlyphTable(): GlyphTable {
  if (defaultTable) return defaultTable;
  const raw: unknown = JSON.parse(readFileSync(new URL("../data/glyphs.json", import.meta.url), "utf8"));
  if (!Array.isArray(raw)) throw new Error("InvalidGlyphTable: data/glyphs.json must be a JSON array");
  defaultTable = createGlyphTable(raw, "data/glyphs.json");
  return defaultTable;
}

export function lookupGlyph(table: GlyphTable, byte: number): Glyph {
  return byte < table.length ? table[byte] : SENTINEL_GLYPH;
}

function toLowerAscii(g: Glyph): Glyph {
  return g >= "A" && g <= "Z" ? g.toLowerCase() : g;
}

/**
 * Each word is read as 8 bytes, most significant first. Zero bytes are
 * dropped without a placeholder; bytes past the end of the table render as
 * {@link SENTINEL_GLYPH}.
 */
export function renderGlyphs(words: Chain, table: GlyphTable, opts: RenderOptions = {}): Glyph[] {
  const out: Glyph[] = [];
  for (const word of words) {
    for (const byte of wordToBytes(word)) {
      if (byte === 0) continue;
      const g = lookupGlyph(table, byte);
      out.push(opts.lowerCase ? toLowerAscii(g) : g);
    }
  }
  return out;
}

export function renderGlyphLine(words: Chain, table: GlyphTable, opts: RenderOptions = {}): string {
  return `${renderGlyphs(words, table, opts).join("")}\n`;
}

/**
 * Pack text into 40-bit words, five glyphs per word, first glyph in the most
 * significant byte. Characters the table lacks encode as its last entry; a
 * short final word is padded with byte 0.
 */
export function encodeGlyphs(text: string, table: GlyphTable): Word[] {
  const index = new Map<Glyph, number>();
  table.forEach((g, i) => {
    if (!index.has(g)) index.set(g, i);
  });
  const fallback = table.length - 1;

  const bytes = Array.from(text, (ch) => index.get(ch) ?? fallback);
  const words: Word[] = [];
  for (let i = 0; i < bytes.length; i += GLYPHS_PER_WORD) {
    const chunk = new Uint8Array(GLYPHS_PER_WORD);
    chunk.set(bytes.slice(i, i + GLYPHS_PER_WORD));
    words.push(wordFromBytes(chunk));
  }
  return words;
}
