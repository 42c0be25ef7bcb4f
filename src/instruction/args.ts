/**
 * Argument layout descriptors.
 *
 * A descriptor is a compact string such as `"i16si"` listing the operands that
 * follow an instruction's 4-byte opcode header. Recognized tokens are `i`
 * (32-bit integer), `16s` and `32s` (fixed-width strings). Any other byte is
 * skipped, so separators and noise in hand-written descriptors are tolerated.
 */

/** Size in bytes of the opcode header that precedes every instruction's operands. */
export const HEADER_SIZE = 4;

/**
 * Operand kinds.
 */
export enum ArgKind {
  Int = "Int",
  String16 = "String16",
  String32 = "String32",
  Unknown = "Unknown",
}

/**
 * One decoded operand. `Unknown` covers trailing bytes the descriptor does not type.
 */
export type Arg =
  | { readonly kind: ArgKind.Int }
  | { readonly kind: ArgKind.String16 }
  | { readonly kind: ArgKind.String32 }
  | { readonly kind: ArgKind.Unknown; readonly size: number };

const INT: Arg = { kind: ArgKind.Int };
const STRING16: Arg = { kind: ArgKind.String16 };
const STRING32: Arg = { kind: ArgKind.String32 };

const CH_I = 0x69; // i
const CH_S = 0x73; // s
const CH_1 = 0x31;
const CH_2 = 0x32;
const CH_3 = 0x33;
const CH_6 = 0x36;

const encoder = new TextEncoder();

/**
 * Byte size of a single operand.
 */
export function argSize(arg: Arg): number {
  switch (arg.kind) {
    case ArgKind.Int:
      return 4;
    case ArgKind.String16:
      return 16;
    case ArgKind.String32:
      return 32;
    case ArgKind.Unknown:
      return arg.size;
  }
}

/**
 * Short label for listings.
 */
export function formatArg(arg: Arg): string {
  switch (arg.kind) {
    case ArgKind.Int:
      return "int";
    case ArgKind.String16:
      return "16s";
    case ArgKind.String32:
      return "32s";
    case ArgKind.Unknown:
      return `unknown[${arg.size}]`;
  }
}

/**
 * Decode a descriptor into its operand list.
 *
 * `declaredSize` is the instruction's full encoded size, header included. When
 * the typed operands cover less than `declaredSize - 4` bytes, the remainder is
 * appended as a single `Unknown` operand. A declared size below the header size
 * never produces padding.
 */
export function decodeArgs(descriptor: string, declaredSize: number): Arg[] {
  const bytes = encoder.encode(descriptor);
  const args: Arg[] = [];
  let consumed = 0;
  let pos = 0;

  while (pos < bytes.length) {
    // Three-byte tokens first.
    if (pos + 2 < bytes.length && bytes[pos + 2] === CH_S) {
      const a = bytes[pos];
      const b = bytes[pos + 1];
      if (a === CH_1 && b === CH_6) {
        args.push(STRING16);
        consumed += 16;
        pos += 3;
        continue;
      }
      if (a === CH_3 && b === CH_2) {
        args.push(STRING32);
        consumed += 32;
        pos += 3;
        continue;
      }
    }

    if (bytes[pos] === CH_I) {
      args.push(INT);
      consumed += 4;
    }
    pos++;
  }

  if (declaredSize >= HEADER_SIZE && consumed < declaredSize - HEADER_SIZE) {
    args.push({ kind: ArgKind.Unknown, size: declaredSize - consumed - HEADER_SIZE });
  }

  return args;
}
