/**
 * Instruction records.
 */

import { NoAssociatedValueError } from "../errors.js";
import { type Arg, argSize, decodeArgs } from "./args.js";
import { NamedValueMap } from "./named-values.js";

/**
 * Role of an instruction in the script's block structure.
 */
export enum CodeBlock {
  Begin = "Begin",
  BeginJumpEntry = "BeginJumpEntry",
  End = "End",
  NoBlock = "NoBlock",
}

/**
 * Fields of an instruction definition as declared in the database.
 */
export interface InstructionInfo {
  /** Opcode id (unsigned 32-bit). */
  id: number;
  /** Total encoded size in bytes, including the 4-byte header. */
  size: number;
  /** Argument layout descriptor. */
  args: string;
  /** Display name (may be empty). */
  name: string;
  /** Block role. */
  codeBlock: CodeBlock;
}

/**
 * One opcode definition.
 */
export class Instruction {
  readonly id: number;
  readonly size: number;
  readonly args: string;
  readonly name: string;
  readonly codeBlock: CodeBlock;
  readonly namedValues: NamedValueMap;

  private decoded: readonly Arg[] | null = null;

  constructor(info: InstructionInfo, namedValues: NamedValueMap = new NamedValueMap()) {
    this.id = info.id;
    this.size = info.size;
    this.args = info.args;
    this.name = info.name;
    this.codeBlock = info.codeBlock;
    this.namedValues = namedValues;
  }

  /**
   * Raw value bound to `name` in argument `slot`.
   * @throws NoAssociatedValueError when the name is not bound in that slot
   */
  getValue(slot: number, name: string): number {
    const value = this.namedValues.getValue(slot, name);
    if (value === undefined) {
      throw new NoAssociatedValueError(slot, name);
    }
    return value;
  }

  /**
   * Name bound to `value` in argument `slot`, if any.
   */
  getName(slot: number, value: number): string | undefined {
    return this.namedValues.getName(slot, value);
  }

  /**
   * Name for listings; falls back to `Unknown<id>` for unnamed opcodes.
   */
  displayName(): string {
    return this.name === "" ? `Unknown${this.id}` : this.name;
  }

  isJumpEntry(): boolean {
    return this.codeBlock === CodeBlock.BeginJumpEntry;
  }

  isBlockBegin(): boolean {
    return this.codeBlock === CodeBlock.Begin || this.codeBlock === CodeBlock.BeginJumpEntry;
  }

  isBlockEnd(): boolean {
    return this.codeBlock === CodeBlock.End;
  }

  /**
   * Decoded operand list. Computed on first use; later calls return the same array.
   */
  decodeArgs(): readonly Arg[] {
    if (this.decoded === null) {
      this.decoded = Object.freeze(decodeArgs(this.args, this.size));
    }
    return this.decoded;
  }

  /**
   * Total operand bytes, excluding the header.
   */
  argsSize(): number {
    return this.decodeArgs().reduce((total, arg) => total + argSize(arg), 0);
  }

  /**
   * Slots that have named values but no decoded operand.
   */
  unresolvedSlots(): number[] {
    const count = this.decodeArgs().length;
    return this.namedValues.slots().filter((slot) => slot >= count);
  }
}
