#!/usr/bin/env node
/**
 * bbdb - inspect a game's instruction database.
 */

import { DEFAULT_DB_DIR, GameDatabase } from "./database/database.js";
import { describeInstruction, listDatabase, lookupInstruction } from "./listing.js";

const VERSION = "0.1.0";

function printUsage(): void {
  console.log(`
bbdb v${VERSION} - Instruction database inspector

Usage:
  bbdb [options] <game> [opcode|name]

Options:
  -h, --help       Show this help message
  -v, --version    Show version
  -d, --db <dir>   Database directory (default: ${DEFAULT_DB_DIR})

Examples:
  bbdb sample              List every instruction of sample.json
  bbdb sample 0x12         Describe opcode 0x12
  bbdb sample setState     Describe the instruction named setState
  bbdb -d ./db sample      Read databases from ./db
`);
}

function printVersion(): void {
  console.log(`bbdb ${VERSION}`);
}

function main(): void {
  const args = process.argv.slice(2);
  let dbDir: string | undefined;
  const positional: string[] = [];

  // Parse arguments
  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      printUsage();
      process.exit(0);
    } else if (arg === "-v" || arg === "--version") {
      printVersion();
      process.exit(0);
    } else if (arg === "-d" || arg === "--db") {
      i++;
      if (i >= args.length) {
        console.error("Error: --db requires an argument");
        process.exit(1);
      }
      dbDir = args[i];
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      printUsage();
      process.exit(1);
    } else {
      positional.push(arg);
    }
    i++;
  }

  if (positional.length < 1 || positional.length > 2) {
    printUsage();
    process.exit(1);
  }
  const game = positional[0];
  const query: string | undefined = positional[1];

  try {
    const db = GameDatabase.load(game, { dbDir });
    const lines = query === undefined ? listDatabase(db) : describeInstruction(lookupInstruction(db, query));
    for (const line of lines) {
      console.log(line);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
  }
}

main();
