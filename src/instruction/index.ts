/**
 * Instruction module exports.
 */

export { ArgKind, HEADER_SIZE, argSize, decodeArgs, formatArg } from "./args.js";
export type { Arg } from "./args.js";

export { NamedValueMap } from "./named-values.js";
export type { NamedValue } from "./named-values.js";

export { CodeBlock, Instruction } from "./instruction.js";
export type { InstructionInfo } from "./instruction.js";
