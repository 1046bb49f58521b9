import { Command, CommanderError } from "commander";

import { wordToHex } from "@tea40/interface";

import { decryptProfile, encryptText, formatTrace, verifyText, VERIFY_FAIL_MESSAGE, VERIFY_OK_MESSAGE } from "./pipeline.js";
import { loadCipherProfile, PROFILE_ENV_VAR, resolveProfileLocation } from "./profile.js";

export type CliIo = {
  stdout: (chunk: string) => void;
  stderr: (chunk: string) => void;
  env: Record<string, string | undefined>;
};

export const processIo: CliIo = {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
  env: process.env,
};

type DecryptCommandOptions = {
  profile?: string;
  lowerCase?: boolean;
  trace?: boolean;
};

type ProfileCommandOptions = {
  profile?: string;
};

const PROFILE_OPTION_HELP = `cipher profile JSON (default: $${PROFILE_ENV_VAR}, else the bundled reference profile)`;

export function buildProgram(io: CliIo, setExitCode: (code: number) => void): Command {
  const log = (line: string) => io.stdout(`${line}\n`);
  const trace = (line: string) => io.stderr(`${line}\n`);
  const load = (profile?: string) => loadCipherProfile(resolveProfileLocation({ profile, env: io.env }));

  const program = new Command()
    .name("tea40")
    .description("Decrypt a chained 40-bit XTEA-style ciphertext and print it through the glyph table.")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program
    .command("decrypt", { isDefault: true })
    .description("decrypt the profile's chain (last block first) and print the glyph line")
    .option("--profile <file>", PROFILE_OPTION_HELP)
    .option("--lower-case", "print ASCII capitals in lower case")
    .option("--trace", "dump key, stored chain and decrypted chain to stderr")
    .action((opts: DecryptCommandOptions) => {
      const profile = load(opts.profile);
      const result = decryptProfile(profile, { lowerCase: opts.lowerCase ?? false });
      if (opts.trace) formatTrace(profile, result.words).forEach(trace);
      io.stdout(result.line);
    });

  program
    .command("encrypt")
    .description("encode text through the glyph table, encrypt it as a chain and print the words")
    .argument("<text>", "plaintext to encode")
    .option("--profile <file>", PROFILE_OPTION_HELP)
    .action((text: string, opts: ProfileCommandOptions) => {
      const profile = load(opts.profile);
      for (const word of encryptText(profile, text)) log(wordToHex(word));
    });

  program
    .command("verify")
    .description("check whether text encrypts to the profile's chain")
    .argument("<text>", "candidate plaintext")
    .option("--profile <file>", PROFILE_OPTION_HELP)
    .action((text: string, opts: ProfileCommandOptions) => {
      const profile = load(opts.profile);
      if (verifyText(profile, text)) {
        log(VERIFY_OK_MESSAGE);
      } else {
        log(VERIFY_FAIL_MESSAGE);
        setExitCode(1);
      }
    });

  return program;
}

/** Run the CLI in-process. Resolves to the exit code instead of exiting. */
export async function runCli(argv: string[], io: CliIo = processIo): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
  return exitCode;
}
