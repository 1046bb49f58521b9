import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterAll, beforeAll, expect, test } from "vitest";

import { wordToHex } from "@tea40/interface";

import { encryptText, VERIFY_FAIL_MESSAGE, VERIFY_OK_MESSAGE } from "../src/pipeline.js";
import { parseCipherProfile, PROFILE_ENV_VAR } from "../src/profile.js";
import type { CliIo } from "../src/program.js";
import { runCli } from "../src/program.js";

const FLAG = "D3CTF(TECH-EV0LVE,EMBR@C3-PR0GR3SS)";

const REFERENCE_CHAIN_HEX = [
  "0x058b0e5eda",
  "0xf48afab6bb",
  "0xf47bfb8cbf",
  "0x5fb0c2b766",
  "0x8a6528f759",
  "0x7acea379b5",
  "0xc0850d08ce",
];

type CapturedRun = { code: number; stdout: string; stderr: string };

async function run(argv: string[], env: Record<string, string | undefined> = {}): Promise<CapturedRun> {
  let stdout = "";
  let stderr = "";
  const io: CliIo = {
    stdout: (chunk) => {
      stdout += chunk;
    },
    stderr: (chunk) => {
      stderr += chunk;
    },
    env,
  };
  const code = await runCli(argv, io);
  return { code, stdout, stderr };
}

let tmpDir = "";

beforeAll(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "tea40-cli-"));
});

afterAll(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function writeJson(name: string, doc: unknown): Promise<string> {
  const file = path.join(tmpDir, name);
  await fs.writeFile(file, JSON.stringify(doc), "utf8");
  return file;
}

async function writeHelloProfile(name: string): Promise<string> {
  const base = { key: ["0x1", "0x2", "0x3", "0x4"], rounds: 8 };
  const chain = encryptText(parseCipherProfile({ ...base, chain: ["0x0"] }), "HELLO WORLD");
  return await writeJson(name, { ...base, chain: chain.map((w) => wordToHex(w)) });
}

test("cli: no arguments prints the decrypted reference line", async () => {
  const res = await run([]);
  expect(res).toEqual({ code: 0, stdout: `${FLAG}\n`, stderr: "" });
});

test("cli: repeated runs print byte-identical output", async () => {
  const a = await run([]);
  const b = await run(["decrypt"]);
  expect(b.stdout).toBe(a.stdout);
});

test("cli: --lower-case lowers ASCII capitals only", async () => {
  const res = await run(["--lower-case"]);
  expect(res.code).toBe(0);
  expect(res.stdout).toBe("d3ctf(tech-ev0lve,embr@c3-pr0gr3ss)\n");
});

test("cli: --trace dumps the chain to stderr", async () => {
  const res = await run(["decrypt", "--trace"]);
  expect(res.stdout).toBe(`${FLAG}\n`);
  expect(res.stderr.split("\n")).toEqual([
    "--- key",
    "0x0c1d00050f",
    "0x0001000137",
    "0x000400022f",
    "0x0065000027",
    "--- stored chain",
    ...REFERENCE_CHAIN_HEX,
    "--- decrypted chain",
    "0x0421031706",
    "0x2a17050308",
    "0x2d05191e0d",
    "0x190529050e",
    "0x0213340321",
    "0x2d11131e07",
    "0x132116162b",
    "",
  ]);
});

test("cli: encrypt reproduces the reference chain from the plaintext", async () => {
  const res = await run(["encrypt", FLAG]);
  expect(res.code).toBe(0);
  expect(res.stdout).toBe(`${REFERENCE_CHAIN_HEX.join("\n")}\n`);
});

test("cli: verify accepts the plaintext and rejects anything else", async () => {
  expect(await run(["verify", FLAG])).toEqual({ code: 0, stdout: `${VERIFY_OK_MESSAGE}\n`, stderr: "" });
  expect(await run(["verify", FLAG.replace("EV0LVE", "EVOLVE")])).toEqual({
    code: 1,
    stdout: `${VERIFY_FAIL_MESSAGE}\n`,
    stderr: "",
  });
  expect((await run(["verify", "D3CTF"])).stdout).toBe(`${VERIFY_FAIL_MESSAGE}\n`);
});

test("cli: --profile retargets the program to another chain and key", async () => {
  const file = await writeHelloProfile("hello.json");
  const res = await run(["--profile", file]);
  expect(res).toEqual({ code: 0, stdout: "HELLOWORLD\n", stderr: "" });
  expect((await run(["verify", "HELLO WORLD", "--profile", file])).code).toBe(0);
});

test("cli: profile can come from the environment", async () => {
  const file = await writeHelloProfile("hello-env.json");
  const res = await run([], { [PROFILE_ENV_VAR]: file });
  expect(res.stdout).toBe("HELLOWORLD\n");
});

test("cli: invalid profiles exit 1 with the error on stderr", async () => {
  const shortKey = await writeJson("short-key.json", { key: [1, 2, 3], chain: [1] });
  expect(await run(["--profile", shortKey])).toEqual({
    code: 1,
    stdout: "",
    stderr: `InvalidKeyLength: ${shortKey}.key: expected 4 words, got 3\n`,
  });

  const notJson = path.join(tmpDir, "broken.json");
  await fs.writeFile(notJson, "{ nope", "utf8");
  expect((await run(["--profile", notJson])).stderr).toBe(`InvalidProfile: ${notJson} is not valid JSON\n`);

  const missing = await run(["--profile", path.join(tmpDir, "missing.json")]);
  expect(missing.code).toBe(1);
  expect(missing.stderr).toMatch(/^ENOENT: no such file or directory/);
});

test("cli: --help exits 0", async () => {
  const res = await run(["--help"]);
  expect(res.code).toBe(0);
  expect(res.stdout).toMatch(/^Usage: tea40 /);
});
