#!/usr/bin/env node
/**
 * notekeep CLI. Manages tenant notes and images on disk directly.
 *
 * Loads config (NOTEKEEP_DATA_DIR/config.yml or --config), makes sure every
 * tenant root exists, routes store logging to the JSONL log (and to stdio
 * with --verbose), then runs one command. See `notekeep help`.
 */

import fs from "node:fs";
import { loadConfig, ensureDataDirs } from "./config.js";
import { createAppLogger, installConsoleFileLogging } from "./logger.js";
import { createStores } from "./stores.js";
import { parseArgs, runCommand, USAGE } from "./commands.js";

const VERSION: unknown = JSON.parse(
  fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8"),
).version;

const argv = process.argv.slice(2);
const { positionals, flags, options } = parseArgs(argv);

function out(line: string): void {
  process.stdout.write(line + "\n");
}

function err(line: string): void {
  process.stderr.write(line + "\n");
}

function main(): number {
  if (flags.has("--version")) {
    out(String(VERSION));
    return 0;
  }
  if (positionals.length === 0 || positionals[0] === "help") {
    out(USAGE);
    return 0;
  }

  const config = loadConfig(options.get("--config"));
  ensureDataDirs(config);
  installConsoleFileLogging(createAppLogger(config.data_dir, config.log.level), {
    stdio: flags.has("--verbose"),
  });

  return runCommand(argv, { stores: createStores(config), out, err });
}

try {
  process.exitCode = main();
} catch (error) {
  err(`notekeep: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
