/**
 * Symbolic names for raw operand values.
 */

import { NamedValueConflictError } from "../errors.js";

/**
 * One binding of a raw operand value to a name, scoped to an argument slot.
 */
export interface NamedValue {
  /** Argument index within the instruction. */
  readonly slot: number;
  /** Raw signed 32-bit operand value. */
  readonly value: number;
  /** Symbolic name shown in place of the value. */
  readonly name: string;
}

/**
 * One-to-one mapping between `(slot, value)` and `(slot, name)`.
 *
 * Built once from its bindings and never changed afterwards. Within a slot no
 * two values share a name and no name maps to two values.
 */
export class NamedValueMap {
  private readonly nameByValue: Map<string, string> = new Map();
  private readonly valueByName: Map<string, number> = new Map();
  private readonly entries: readonly NamedValue[];

  /**
   * @throws NamedValueConflictError when a binding reuses a value or name within its slot
   */
  constructor(bindings: Iterable<NamedValue> = []) {
    const entries: NamedValue[] = [];
    for (const { slot, value, name } of bindings) {
      const valueKey = `${slot}:${value}`;
      const nameKey = `${slot}:${name}`;
      if (this.nameByValue.has(valueKey)) {
        throw new NamedValueConflictError("duplicate-value", entries.length, slot, value, name);
      }
      if (this.valueByName.has(nameKey)) {
        throw new NamedValueConflictError("duplicate-name", entries.length, slot, value, name);
      }
      this.nameByValue.set(valueKey, name);
      this.valueByName.set(nameKey, value);
      entries.push(Object.freeze({ slot, value, name }));
    }
    this.entries = Object.freeze(entries);
  }

  getValue(slot: number, name: string): number | undefined {
    return this.valueByName.get(`${slot}:${name}`);
  }

  getName(slot: number, value: number): string | undefined {
    return this.nameByValue.get(`${slot}:${value}`);
  }

  /** Number of bindings. */
  get size(): number {
    return this.entries.length;
  }

  /** Bindings in declaration order. */
  all(): readonly NamedValue[] {
    return this.entries;
  }

  /** Distinct slots referenced by any binding, ascending. */
  slots(): number[] {
    return [...new Set(this.entries.map((e) => e.slot))].sort((a, b) => a - b);
  }
}
