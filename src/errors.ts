/**
 * Errors raised while loading and querying an instruction database.
 */

/**
 * No database source exists for the requested game.
 */
export class GameDatabaseNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Game database not found: ${path}`);
    this.name = "GameDatabaseNotFoundError";
  }
}

/**
 * The database source exists but is not a valid instruction table.
 */
export class DatabaseFormatError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly location: string,
    options?: { cause?: unknown }
  ) {
    super(`${message} at ${location} in ${path}`, options);
    this.name = "DatabaseFormatError";
  }
}

/**
 * Lookup by opcode id or name found no instruction.
 */
export class UnknownInstructionError extends Error {
  constructor(public readonly instruction: string) {
    super(`Unknown instruction: ${instruction}`);
    this.name = "UnknownInstructionError";
  }
}

/**
 * A symbolic operand name has no raw value in its argument slot.
 */
export class NoAssociatedValueError extends Error {
  constructor(
    public readonly slot: number,
    public readonly valueName: string
  ) {
    super(`No value associated with "${valueName}" in argument ${slot}`);
    this.name = "NoAssociatedValueError";
  }
}

/**
 * Which side of a named-value binding was already taken.
 */
export type NamedValueConflict = "duplicate-value" | "duplicate-name";

/**
 * A named-value binding reuses a value or name within its argument slot.
 */
export class NamedValueConflictError extends Error {
  constructor(
    public readonly conflict: NamedValueConflict,
    public readonly index: number,
    public readonly slot: number,
    public readonly value: number,
    public readonly valueName: string
  ) {
    super(
      conflict === "duplicate-value"
        ? `value ${value} is already named in slot ${slot}`
        : `name "${valueName}" is already bound in slot ${slot}`
    );
    this.name = "NamedValueConflictError";
  }
}

const U32_MAX = 0xffffffff;

/**
 * Format an opcode id the way lookup errors report it: `0x` and uppercase hex
 * for unsigned 32-bit ids, plain decimal for anything else.
 */
export function formatOpcode(id: number): string {
  if (!Number.isInteger(id) || id < 0 || id > U32_MAX) {
    return String(id);
  }
  return `0x${id.toString(16).toUpperCase()}`;
}
