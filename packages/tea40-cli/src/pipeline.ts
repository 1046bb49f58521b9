import type { CipherProfile, Word } from "@tea40/interface";
import { mask40, wordToHex } from "@tea40/interface";
import type { RenderOptions } from "@tea40/decoder";
import { decryptChain, encodeGlyphs, encryptChain, renderGlyphLine } from "@tea40/decoder";

export const VERIFY_OK_MESSAGE = "NOW MARCH BEYOND, AND REVIVE THE LEGACY.";
export const VERIFY_FAIL_MESSAGE = "THAT IS NOT CORRECT. TRY AGAIN :D";

export type DecryptResult = {
  words: Word[];
  line: string;
};

export function decryptProfile(profile: CipherProfile, opts: RenderOptions = {}): DecryptResult {
  const words = decryptChain(profile.chain, profile);
  return { words, line: renderGlyphLine(words, profile.glyphs, opts) };
}

export function encryptText(profile: CipherProfile, text: string): Word[] {
  return encryptChain(encodeGlyphs(text, profile.glyphs), profile);
}

export function verifyText(profile: CipherProfile, text: string): boolean {
  const encrypted = encryptText(profile, text);
  if (encrypted.length !== profile.chain.length) return false;
  return encrypted.every((w, i) => w === mask40(profile.chain[i]));
}

export function formatTrace(profile: CipherProfile, decrypted: readonly Word[]): string[] {
  return [
    "--- key",
    ...profile.key.map((w) => wordToHex(w)),
    "--- stored chain",
    ...profile.chain.map((w) => wordToHex(w)),
    "--- decrypted chain",
    ...decrypted.map((w) => wordToHex(w)),
  ];
}
