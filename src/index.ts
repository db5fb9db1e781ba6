#!/usr/bin/env node
import { handleCommandError } from "./cli/error-handler.js";
import { loadConfig, validateConfig } from "./config.js";
import { createRunner, run } from "./program.js";

async function main(): Promise<number> {
  const config = loadConfig();
  validateConfig(config);
  return run(process.argv, createRunner(config));
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.exitCode = handleCommandError(err);
  },
);
