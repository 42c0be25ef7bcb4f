/**
 * Text listings of instruction databases.
 */

import { formatOpcode } from "./errors.js";
import type { GameDatabase } from "./database/database.js";
import { formatArg } from "./instruction/args.js";
import type { Instruction } from "./instruction/instruction.js";

/**
 * One-line summary: `0x12  setState  size=12  args=int int`.
 */
export function summarizeInstruction(instr: Instruction): string {
  const args = instr.decodeArgs().map(formatArg).join(" ");
  return `${formatOpcode(instr.id)}  ${instr.displayName()}  size=${instr.size}  args=${args || "-"}`;
}

/**
 * Summary lines for every instruction in declaration order.
 */
export function listDatabase(db: GameDatabase): string[] {
  return db.instructions.map(summarizeInstruction);
}

/**
 * Detailed description of one instruction.
 */
export function describeInstruction(instr: Instruction): string[] {
  const lines = [
    `${instr.displayName()} (${formatOpcode(instr.id)})`,
    `  size:      ${instr.size}`,
    `  args:      ${JSON.stringify(instr.args)}`,
    `  codeBlock: ${instr.codeBlock}`,
  ];

  instr.decodeArgs().forEach((arg, slot) => {
    lines.push(`  [${slot}] ${formatArg(arg)}`);
    for (const nv of instr.namedValues.all()) {
      if (nv.slot === slot) {
        lines.push(`      ${nv.value} = ${nv.name}`);
      }
    }
  });

  const unresolved = instr.unresolvedSlots();
  if (unresolved.length > 0) {
    lines.push(`  warning: named values for missing argument(s) ${unresolved.join(", ")}`);
  }
  return lines;
}

/**
 * Parse an opcode written in decimal or as `0x`-prefixed hex.
 * Returns null for anything else, so the text can be treated as a name.
 */
export function parseOpcode(text: string): number | null {
  if (/^0x[0-9a-f]+$/i.test(text)) {
    return parseInt(text.slice(2), 16);
  }
  if (/^[0-9]+$/.test(text)) {
    return parseInt(text, 10);
  }
  return null;
}

/**
 * Resolve a user-supplied opcode or name.
 * @throws UnknownInstructionError
 */
export function lookupInstruction(db: GameDatabase, query: string): Instruction {
  const id = parseOpcode(query);
  if (id !== null && !db.hasName(query)) {
    return db.findById(id);
  }
  return db.findByName(query);
}
