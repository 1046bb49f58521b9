#!/usr/bin/env node
import { runCli } from "./program.js";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
