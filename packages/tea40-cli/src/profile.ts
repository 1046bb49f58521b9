import { readFileSync } from "node:fs";

import type { CipherProfile, GlyphTable, Word } from "@tea40/interface";
import { parseWord } from "@tea40/interface";
import { DEFAULT_ROUNDS, DELTA, assertKey, assertRounds } from "@tea40/crypto";
import { assertChain, createGlyphTable, loadDefaultGlyphTable } from "@tea40/decoder";

export const PROFILE_ENV_VAR = "TEA40_PROFILE";

export const REFERENCE_PROFILE_URL = new URL("../profiles/reference.json", import.meta.url);

function assertRecord(val: unknown, ctx: string): Record<string, unknown> {
  if (!val || typeof val !== "object" || Array.isArray(val)) throw new Error(`InvalidProfile: ${ctx} must be a JSON object`);
  return Object.fromEntries(Object.entries(val));
}

function assertArray(val: unknown, field: string): unknown[] {
  if (!Array.isArray(val)) throw new Error(`InvalidProfile: ${field} must be an array`);
  return val;
}

function parseWords(val: unknown, field: string): Word[] {
  return assertArray(val, field).map((w, i) => parseWord(w, `${field}[${i}]`));
}

/**
 * Validate a decoded profile document. `rounds` and `delta` fall back to the
 * reference values; `glyphs` falls back to the bundled table.
 */
export function parseCipherProfile(raw: unknown, source = "profile"): CipherProfile {
  const doc = assertRecord(raw, source);

  const rawRounds = doc.rounds ?? DEFAULT_ROUNDS;
  if (typeof rawRounds !== "number") throw new Error(`InvalidProfile: ${source}.rounds must be a number`);
  const rounds = assertRounds(rawRounds, `${source}.rounds`);

  const delta = doc.delta === undefined ? DELTA : parseWord(doc.delta, `${source}.delta`);
  const key = assertKey(parseWords(doc.key, `${source}.key`), `${source}.key`);
  const chain = assertChain(parseWords(doc.chain, `${source}.chain`), `${source}.chain`);

  const glyphs: GlyphTable =
    doc.glyphs === undefined
      ? loadDefaultGlyphTable()
      : createGlyphTable(assertArray(doc.glyphs, `${source}.glyphs`), `${source}.glyphs`);

  return Object.freeze({
    key: Object.freeze(key),
    chain: Object.freeze([...chain]),
    rounds,
    delta,
    glyphs,
  });
}

export function loadCipherProfile(file: string | URL): CipherProfile {
  const source = typeof file === "string" ? file : file.pathname;
  const text = readFileSync(file, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`InvalidProfile: ${source} is not valid JSON`, { cause: err });
  }
  return parseCipherProfile(raw, source);
}

/** `--profile` wins over the environment, which wins over the bundled reference profile. */
export function resolveProfileLocation(opts: {
  profile?: string;
  env?: Record<string, string | undefined>;
}): string | URL {
  if (opts.profile && opts.profile.length > 0) return opts.profile;
  const fromEnv = opts.env?.[PROFILE_ENV_VAR]?.trim();
  if (fromEnv && fromEnv.length > 0) return fromEnv;
  return REFERENCE_PROFILE_URL;
}
