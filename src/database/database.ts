/**
 * Per-game instruction database.
 */

import * as fs from "fs";
import * as path from "path";
import { GameDatabaseNotFoundError, UnknownInstructionError, formatOpcode } from "../errors.js";
import type { Instruction } from "../instruction/instruction.js";
import { parseInstructionTable } from "./loader.js";

/** Directory searched for game databases when none is given. */
export const DEFAULT_DB_DIR = "static_db";

/** File extension of game databases. */
export const DEFAULT_DB_EXTENSION = ".json";

/**
 * Database location options.
 */
export interface DatabaseOptions {
  /** Directory holding one file per game (default: `static_db`). */
  dbDir?: string;
  /** Extension appended to the game name (default: `.json`). */
  extension?: string;
}

/**
 * Path of the database file for `game`.
 */
export function databasePath(game: string, options: DatabaseOptions = {}): string {
  const dir = options.dbDir ?? DEFAULT_DB_DIR;
  const ext = options.extension ?? DEFAULT_DB_EXTENSION;
  return path.join(dir, `${game}${ext}`);
}

/**
 * Ordered instruction definitions for one game.
 *
 * Ids are not required to be unique; lookups return the first definition in
 * declaration order.
 */
export class GameDatabase implements Iterable<Instruction> {
  readonly game: string;
  readonly instructions: readonly Instruction[];

  private byId: Map<number, Instruction> = new Map();
  private byName: Map<string, Instruction> = new Map();

  constructor(game: string, instructions: Instruction[]) {
    this.game = game;
    this.instructions = Object.freeze([...instructions]);

    for (const instr of this.instructions) {
      if (!this.byId.has(instr.id)) {
        this.byId.set(instr.id, instr);
      }
      if (!this.byName.has(instr.name)) {
        this.byName.set(instr.name, instr);
      }
    }
  }

  /**
   * Load the database for `game` from disk.
   * @throws GameDatabaseNotFoundError when the file does not exist
   * @throws DatabaseFormatError when the file is not a valid instruction table
   */
  static load(game: string, options: DatabaseOptions = {}): GameDatabase {
    const file = databasePath(game, options);
    let source: string;
    try {
      source = fs.readFileSync(file, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        throw new GameDatabaseNotFoundError(file);
      }
      throw err;
    }
    return GameDatabase.fromSource(game, source, file);
  }

  /**
   * Build a database from JSON text.
   */
  static fromSource(game: string, source: string, origin: string = "<input>"): GameDatabase {
    return new GameDatabase(game, parseInstructionTable(source, origin));
  }

  /** Number of instruction definitions. */
  get size(): number {
    return this.instructions.length;
  }

  /**
   * @throws UnknownInstructionError
   */
  findById(id: number): Instruction {
    const instr = this.byId.get(id);
    if (instr === undefined) {
      throw new UnknownInstructionError(formatOpcode(id));
    }
    return instr;
  }

  /**
   * @throws UnknownInstructionError
   */
  findByName(name: string): Instruction {
    const instr = this.byName.get(name);
    if (instr === undefined) {
      throw new UnknownInstructionError(name);
    }
    return instr;
  }

  hasId(id: number): boolean {
    return this.byId.has(id);
  }

  hasName(name: string): boolean {
    return this.byName.has(name);
  }

  [Symbol.iterator](): Iterator<Instruction> {
    return this.instructions[Symbol.iterator]();
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
