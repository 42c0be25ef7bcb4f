/**
 * Instruction database and argument layout decoder for game script bytecode.
 *
 * @packageDocumentation
 */

// Error exports
export {
  GameDatabaseNotFoundError,
  DatabaseFormatError,
  UnknownInstructionError,
  NoAssociatedValueError,
  NamedValueConflictError,
  formatOpcode,
} from "./errors.js";
export type { NamedValueConflict } from "./errors.js";

// Instruction exports
export * from "./instruction/index.js";

// Database exports
export * from "./database/index.js";

// Listing exports
export {
  summarizeInstruction,
  listDatabase,
  describeInstruction,
  parseOpcode,
  lookupInstruction,
} from "./listing.js";
