export { DEFAULT_ROUNDS, DELTA, decipher, encipher, roundFunction } from "./xtea40.js";
export { KEY_WORDS, assertKey, assertRounds } from "./internal/util.js";
