export { buildProgram, processIo, runCli } from "./program.js";
export type { CliIo } from "./program.js";
export {
  PROFILE_ENV_VAR,
  REFERENCE_PROFILE_URL,
  loadCipherProfile,
  parseCipherProfile,
  resolveProfileLocation,
} from "./profile.js";
export {
  VERIFY_FAIL_MESSAGE,
  VERIFY_OK_MESSAGE,
  decryptProfile,
  encryptText,
  formatTrace,
  verifyText,
} from "./pipeline.js";
export type { DecryptResult } from "./pipeline.js";
