export { assertChain, decryptChain, encryptChain } from "./chain.js";
export {
  GLYPHS_PER_WORD,
  SENTINEL_GLYPH,
  createGlyphTable,
  encodeGlyphs,
  loadDefaultGlyphTable,
  lookupGlyph,
  renderGlyphLine,
  renderGlyphs,
} from "./glyphs.js";
export type { RenderOptions } from "./glyphs.js";
