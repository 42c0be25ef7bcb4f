/**
 * Database module exports.
 */

export { GameDatabase, DEFAULT_DB_DIR, DEFAULT_DB_EXTENSION, databasePath } from "./database.js";
export type { DatabaseOptions } from "./database.js";

export { parseInstructionTable } from "./loader.js";
