/**
 * Error hierarchy for diff files and patch application.
 */

/**
 * Base class for structural problems in a diff file.
 */
export class DiffFormatError extends Error {
  /** Byte offset in the diff file where the problem was found */
  readonly offset: number;

  constructor(message: string, offset: number, options?: ErrorOptions) {
    super(message, options);
    this.name = "DiffFormatError";
    this.offset = offset;
  }
}

/**
 * The file does not start with the diff magic literal.
 */
export class InvalidMagicError extends DiffFormatError {
  constructor(offset = 0) {
    super("Not a diff file: missing MYDIFF magic", offset);
    this.name = "InvalidMagicError";
  }
}

/**
 * The diff file ends inside the header or inside an operation record.
 */
export class TruncatedDiffError extends DiffFormatError {
  /** Bytes the header or record declared */
  readonly expected: number;
  /** Bytes actually present */
  readonly available: number;
  /** Index of the affected operation, when inside the record area */
  readonly index: number | undefined;

  constructor(
    what: string,
    offset: number,
    expected: number,
    available: number,
    index?: number,
  ) {
    const at = index === undefined ? "" : ` (op #${index})`;
    super(
      `Truncated diff: ${what} at offset ${offset}${at} needs ${expected} bytes, only ${available} available`,
      offset,
    );
    this.name = "TruncatedDiffError";
    this.expected = expected;
    this.available = available;
    this.index = index;
  }
}

/**
 * A record starts with an opcode outside Insert/Delete/Change.
 */
export class UnknownOpcodeError extends DiffFormatError {
  readonly opcode: number;
  readonly index: number;

  constructor(opcode: number, offset: number, index: number) {
    super(
      `Unknown opcode 0x${opcode.toString(16).padStart(2, "0")} at offset ${offset} (op #${index})`,
      offset,
    );
    this.name = "UnknownOpcodeError";
    this.opcode = opcode;
    this.index = index;
  }
}

/**
 * A record starts before the source position where the previous record
 * ended, so the two overlap or are out of order.
 */
export class RecordOrderError extends DiffFormatError {
  readonly index: number;
  readonly position: number;
  /** Source position the previous records consumed up to */
  readonly cursor: number;

  constructor(offset: number, index: number, position: number, cursor: number) {
    super(
      `Op #${index} at offset ${offset} starts at source position ${position}, before position ${cursor} where the previous op ended`,
      offset,
    );
    this.name = "RecordOrderError";
    this.index = index;
    this.position = position;
    this.cursor = cursor;
  }
}

/**
 * The file about to be patched is not the one the diff was built from.
 */
export class ProvenanceMismatchError extends Error {
  readonly expected: Uint8Array;
  readonly actual: Uint8Array;

  constructor(path: string, expected: Uint8Array, actual: Uint8Array) {
    super(`Digest of ${path} does not match the digest recorded in the diff`);
    this.name = "ProvenanceMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Operations handed to a reconstruction function are unsorted, overlap,
 * or reach past the end of the source.
 */
export class OperationOrderError extends Error {
  readonly index: number;
  readonly position: number;
  readonly cursor: number;

  constructor(message: string, index: number, position: number, cursor: number) {
    super(message);
    this.name = "OperationOrderError";
    this.index = index;
    this.position = position;
    this.cursor = cursor;
  }
}

/**
 * The source file ran out while a patch still needed bytes from it.
 */
export class PatchApplyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PatchApplyError";
  }
}
