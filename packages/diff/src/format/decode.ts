import type { BufferedByteReader } from "@mydiff/utils/streams";
import {
  DiffFormatError,
  InvalidMagicError,
  TruncatedDiffError,
  UnknownOpcodeError,
} from "../common/errors.js";
import { errSingle, ok, type Result } from "../common/result.js";
import { changeOp, type DiffOp, deleteOp, insertOp } from "../ops/index.js";
import {
  DIFF_MAGIC,
  DIGEST_SIZE,
  HEADER_SIZE,
  isOpCode,
  OpCode,
  RECORD_HEADER_SIZE,
} from "./constants.js";

export interface DiffHeader {
  /** Digest of the source the diff was built from */
  digest: Uint8Array;
}

/** Fixed part of an operation record. */
export interface RecordHeader {
  opcode: OpCode;
  position: number;
  length: number;
}

/** A decoded op with its place in the diff file. */
export interface DecodedOp {
  op: DiffOp;
  /** Byte offset of the record in the diff file */
  offset: number;
  /** Zero-based index of the record */
  index: number;
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Check and parse the magic literal and digest.
 *
 * @param bytes The first `HEADER_SIZE` bytes of the file, or fewer if the file is shorter
 */
export function parseDiffHeader(bytes: Uint8Array): Result<DiffHeader, DiffFormatError> {
  const magicBytes = Math.min(bytes.length, DIFF_MAGIC.length);
  for (let i = 0; i < magicBytes; i++) {
    if (bytes[i] !== DIFF_MAGIC[i]) return errSingle(new InvalidMagicError(i));
  }
  if (bytes.length < HEADER_SIZE) {
    return errSingle(new TruncatedDiffError("header", 0, HEADER_SIZE, bytes.length));
  }
  return ok({ digest: bytes.slice(DIFF_MAGIC.length, DIFF_MAGIC.length + DIGEST_SIZE) });
}

/**
 * Parse the 17-byte fixed part of a record.
 *
 * @param bytes Exactly `RECORD_HEADER_SIZE` bytes
 * @param offset Offset of the record in the diff file, for error reports
 * @param index Index of the record, for error reports
 */
export function parseRecordHeader(
  bytes: Uint8Array,
  offset: number,
  index: number,
): Result<RecordHeader, DiffFormatError> {
  const view = new DataView(bytes.buffer, bytes.byteOffset, RECORD_HEADER_SIZE);
  const opcode = view.getUint8(0);
  if (!isOpCode(opcode)) {
    return errSingle(new UnknownOpcodeError(opcode, offset, index));
  }
  const position = view.getBigUint64(1);
  const length = view.getBigUint64(9);
  if (position > MAX_SAFE || length > MAX_SAFE) {
    return errSingle(
      new DiffFormatError(
        `Op #${index} at offset ${offset} declares a position or length beyond 2^53`,
        offset,
      ),
    );
  }
  return ok({ opcode, position: Number(position), length: Number(length) });
}

function toOp(header: RecordHeader, payload: Uint8Array): DiffOp {
  switch (header.opcode) {
    case OpCode.Insert:
      return insertOp(header.position, payload);
    case OpCode.Delete:
      return deleteOp(header.position, header.length);
    case OpCode.Change:
      return changeOp(header.position, payload);
    default: {
      const _exhaustive: never = header.opcode;
      throw new Error(`Unknown opcode: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Decode an in-memory record area one op at a time.
 *
 * Stops after the last complete record. A record cut short, an unknown
 * opcode, or an oversized field yields a single failure and ends the
 * sequence.
 *
 * @param records Bytes following the diff header
 * @param baseOffset File offset of `records[0]`, for error reports
 */
export function* decodeOps(
  records: Uint8Array,
  baseOffset: number = HEADER_SIZE,
): Generator<Result<DecodedOp, DiffFormatError>> {
  let pos = 0;
  for (let index = 0; pos < records.length; index++) {
    const offset = baseOffset + pos;
    const available = records.length - pos;
    if (available < RECORD_HEADER_SIZE) {
      yield errSingle(
        new TruncatedDiffError("record header", offset, RECORD_HEADER_SIZE, available, index),
      );
      return;
    }
    const parsed = parseRecordHeader(
      records.subarray(pos, pos + RECORD_HEADER_SIZE),
      offset,
      index,
    );
    if (!parsed.success) {
      yield parsed;
      return;
    }
    const header = parsed.value;
    pos += RECORD_HEADER_SIZE;

    let payload: Uint8Array = new Uint8Array(0);
    if (header.opcode !== OpCode.Delete) {
      if (records.length - pos < header.length) {
        yield errSingle(
          new TruncatedDiffError(
            "payload",
            baseOffset + pos,
            header.length,
            records.length - pos,
            index,
          ),
        );
        return;
      }
      payload = records.slice(pos, pos + header.length);
      pos += header.length;
    }
    yield ok({ op: toOp(header, payload), offset, index });
  }
}

/**
 * Decode a whole in-memory diff file.
 */
export function decodeDiff(
  bytes: Uint8Array,
): Result<DiffHeader & { ops: DiffOp[] }, DiffFormatError> {
  const header = parseDiffHeader(bytes.subarray(0, HEADER_SIZE));
  if (!header.success) return header;
  const ops: DiffOp[] = [];
  for (const decoded of decodeOps(bytes.subarray(HEADER_SIZE))) {
    if (!decoded.success) return decoded;
    ops.push(decoded.value.op);
  }
  return ok({ digest: header.value.digest, ops });
}

/**
 * Read the diff header from the start of a stream.
 */
export async function readDiffHeader(
  reader: BufferedByteReader,
): Promise<Result<DiffHeader, DiffFormatError>> {
  return parseDiffHeader(await reader.readAtMost(HEADER_SIZE));
}

/**
 * Pull ops from a diff stream one record at a time.
 *
 * `reader` must be positioned at the first record, normally right after
 * `readDiffHeader`; record offsets are taken from `reader.position`.
 * Only the record being decoded is held in memory. Truncation and unknown
 * opcodes are yielded as a single failure, after which the generator ends.
 */
export async function* readDiffOps(
  reader: BufferedByteReader,
): AsyncGenerator<Result<DecodedOp, DiffFormatError>> {
  for (let index = 0; ; index++) {
    const offset = reader.position;
    const head = await reader.readAtMost(RECORD_HEADER_SIZE);
    if (head.length === 0) return;
    if (head.length < RECORD_HEADER_SIZE) {
      yield errSingle(
        new TruncatedDiffError("record header", offset, RECORD_HEADER_SIZE, head.length, index),
      );
      return;
    }
    const parsed = parseRecordHeader(head, offset, index);
    if (!parsed.success) {
      yield parsed;
      return;
    }
    const header = parsed.value;

    let payload: Uint8Array = new Uint8Array(0);
    if (header.opcode !== OpCode.Delete) {
      payload = await reader.readAtMost(header.length);
      if (payload.length < header.length) {
        yield errSingle(
          new TruncatedDiffError(
            "payload",
            offset + RECORD_HEADER_SIZE,
            header.length,
            payload.length,
            index,
          ),
        );
        return;
      }
    }
    yield ok({ op: toOp(header, payload), offset, index });
  }
}
