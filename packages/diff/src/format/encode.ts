import { concatBytes } from "@mydiff/utils/streams";
import { type DiffOp, opLength } from "../ops/index.js";
import { DIFF_MAGIC, DIGEST_SIZE, HEADER_SIZE, OpCode, RECORD_HEADER_SIZE } from "./constants.js";

function opCodeOf(op: DiffOp): OpCode {
  switch (op.type) {
    case "insert":
      return OpCode.Insert;
    case "delete":
      return OpCode.Delete;
    case "change":
      return OpCode.Change;
    default: {
      const _exhaustive: never = op;
      throw new Error(`Unknown op: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Magic literal followed by the source digest.
 */
export function encodeDiffHeader(digest: Uint8Array): Uint8Array {
  if (digest.length !== DIGEST_SIZE) {
    throw new RangeError(`Digest must be ${DIGEST_SIZE} bytes, got ${digest.length}`);
  }
  const header = new Uint8Array(HEADER_SIZE);
  header.set(DIFF_MAGIC, 0);
  header.set(digest, DIFF_MAGIC.length);
  return header;
}

/**
 * Fixed 17-byte record header: opcode, position, length.
 */
export function encodeRecordHeader(opcode: OpCode, position: number, length: number): Uint8Array {
  if (!Number.isSafeInteger(position) || position < 0) {
    throw new RangeError(`Invalid op position: ${position}`);
  }
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new RangeError(`Invalid op length: ${length}`);
  }
  const bytes = new Uint8Array(RECORD_HEADER_SIZE);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, opcode);
  view.setBigUint64(1, BigInt(position));
  view.setBigUint64(9, BigInt(length));
  return bytes;
}

/**
 * Encoded record of one op, split into header and payload without copying
 * the payload.
 */
export function encodeOpParts(op: DiffOp): Uint8Array[] {
  const header = encodeRecordHeader(opCodeOf(op), op.position, opLength(op));
  return op.type === "delete" ? [header] : [header, op.payload];
}

/**
 * Encoded record of one op.
 */
export function encodeOp(op: DiffOp): Uint8Array {
  return concatBytes(encodeOpParts(op));
}

/**
 * Encoded records of `ops`, back to back in the given order.
 */
export function encodeOps(ops: readonly DiffOp[]): Uint8Array {
  return concatBytes(ops.flatMap(encodeOpParts));
}

/**
 * A complete diff file: header followed by the records of `ops`.
 */
export function encodeDiff(digest: Uint8Array, ops: readonly DiffOp[]): Uint8Array {
  return concatBytes([encodeDiffHeader(digest), ...ops.flatMap(encodeOpParts)]);
}
