/**
 * Reading instruction tables from their JSON source.
 *
 * The source is a single object with a `functions` array. Each entry declares
 * `id`, `size`, `args`, `name`, `codeBlock` and, optionally, `namedValues`, a
 * list of `[[slot, value], [slot, name]]` pairs.
 *
 * Named values must form a one-to-one mapping per slot, and both halves of a
 * pair must name the same slot. A repeated value or name, or a pair whose slots
 * differ, is a format error here; it does not replace the earlier binding.
 */

import { DatabaseFormatError, NamedValueConflictError } from "../errors.js";
import { CodeBlock, Instruction } from "../instruction/instruction.js";
import { type NamedValue, NamedValueMap } from "../instruction/named-values.js";

const U32_MAX = 0xffffffff;
const I32_MIN = -0x80000000;
const I32_MAX = 0x7fffffff;

const CODE_BLOCKS: ReadonlySet<string> = new Set(Object.values(CodeBlock));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCodeBlock(value: unknown): value is CodeBlock {
  return typeof value === "string" && CODE_BLOCKS.has(value);
}

/**
 * Converts parsed JSON into instruction records, reporting the first structural error.
 */
class TableReader {
  constructor(private readonly origin: string) {}

  private fail(message: string, location: string): never {
    throw new DatabaseFormatError(message, this.origin, location);
  }

  private integer(value: unknown, min: number, max: number, location: string): number {
    if (typeof value !== "number" || !Number.isInteger(value)) {
      this.fail("expected an integer", location);
    }
    if (value < min || value > max) {
      this.fail(`integer ${value} out of range [${min}, ${max}]`, location);
    }
    return value;
  }

  private string(value: unknown, location: string): string {
    if (typeof value !== "string") {
      this.fail("expected a string", location);
    }
    return value;
  }

  private pair(value: unknown, location: string): [unknown, unknown] {
    if (!Array.isArray(value) || value.length !== 2) {
      this.fail("expected a two-element array", location);
    }
    return [value[0], value[1]];
  }

  readTable(root: unknown): Instruction[] {
    if (!isRecord(root)) {
      this.fail("expected an object", "$");
    }
    const functions = root.functions;
    if (!Array.isArray(functions)) {
      this.fail("expected an array", "$.functions");
    }
    return functions.map((entry, i) => this.readInstruction(entry, `$.functions[${i}]`));
  }

  private readInstruction(entry: unknown, location: string): Instruction {
    if (!isRecord(entry)) {
      this.fail("expected an object", location);
    }

    const id = this.integer(entry.id, 0, U32_MAX, `${location}.id`);
    const size = this.integer(entry.size, 0, U32_MAX, `${location}.size`);
    const args = this.string(entry.args, `${location}.args`);
    const name = this.string(entry.name, `${location}.name`);

    const codeBlock = entry.codeBlock;
    if (!isCodeBlock(codeBlock)) {
      this.fail(`expected one of ${[...CODE_BLOCKS].join(", ")}`, `${location}.codeBlock`);
    }

    const namedValues = this.readNamedValues(entry.namedValues, `${location}.namedValues`);
    return new Instruction({ id, size, args, name, codeBlock }, namedValues);
  }

  private readNamedValues(value: unknown, location: string): NamedValueMap {
    if (value === undefined) {
      return new NamedValueMap();
    }
    if (!Array.isArray(value)) {
      this.fail("expected an array", location);
    }

    const bindings: NamedValue[] = value.map((entry, i) => {
      const at = `${location}[${i}]`;
      const [left, right] = this.pair(entry, at);
      const [valueSlot, raw] = this.pair(left, `${at}[0]`);
      const [nameSlot, name] = this.pair(right, `${at}[1]`);

      const slot = this.integer(valueSlot, 0, U32_MAX, `${at}[0][0]`);
      const rawValue = this.integer(raw, I32_MIN, I32_MAX, `${at}[0][1]`);
      if (this.integer(nameSlot, 0, U32_MAX, `${at}[1][0]`) !== slot) {
        this.fail("value and name slots differ", at);
      }
      return { slot, value: rawValue, name: this.string(name, `${at}[1][1]`) };
    });

    try {
      return new NamedValueMap(bindings);
    } catch (err) {
      if (err instanceof NamedValueConflictError) {
        throw new DatabaseFormatError(err.message, this.origin, `${location}[${err.index}]`, { cause: err });
      }
      throw err;
    }
  }
}

/**
 * Parse a JSON instruction table.
 * @param origin path or label used in error messages
 * @throws DatabaseFormatError on invalid JSON or an invalid table
 */
export function parseInstructionTable(source: string, origin: string): Instruction[] {
  let root: unknown;
  try {
    root = JSON.parse(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DatabaseFormatError(`invalid JSON (${message})`, origin, "$", { cause: err });
  }
  return new TableReader(origin).readTable(root);
}
