import type { FilesApi } from "@mydiff/utils/files";
import { BufferedByteReader } from "@mydiff/utils/streams";
import { type DiffFormatError, RecordOrderError, TruncatedDiffError } from "../common/errors.js";
import { errSingle, ok, type Result } from "../common/result.js";
import { OpCode, RECORD_HEADER_SIZE, parseRecordHeader, readDiffHeader } from "../format/index.js";

/**
 * What a structurally valid diff file contains.
 */
export interface DiffInfo {
  /** Digest of the source the diff was built from */
  digest: Uint8Array;
  /** Size of the diff file in bytes */
  size: number;
  inserts: number;
  deletes: number;
  changes: number;
  /** Payload bytes carried by Insert and Change records */
  payloadBytes: number;
  /** Source bytes dropped by Delete records */
  deletedBytes: number;
}

async function walkRecords(
  reader: BufferedByteReader,
): Promise<Result<DiffInfo, DiffFormatError>> {
  const header = await readDiffHeader(reader);
  if (!header.success) return header;

  const info: DiffInfo = {
    digest: header.value.digest,
    size: 0,
    inserts: 0,
    deletes: 0,
    changes: 0,
    payloadBytes: 0,
    deletedBytes: 0,
  };

  let cursor = 0;
  for (let index = 0; ; index++) {
    const offset = reader.position;
    const head = await reader.readAtMost(RECORD_HEADER_SIZE);
    if (head.length === 0) break;
    if (head.length < RECORD_HEADER_SIZE) {
      return errSingle(
        new TruncatedDiffError("record header", offset, RECORD_HEADER_SIZE, head.length, index),
      );
    }
    const parsed = parseRecordHeader(head, offset, index);
    if (!parsed.success) return parsed;
    const { opcode, position, length } = parsed.value;

    if (position < cursor) {
      return errSingle(new RecordOrderError(offset, index, position, cursor));
    }
    cursor = position + (opcode === OpCode.Insert ? 0 : length);

    if (opcode === OpCode.Delete) {
      info.deletes++;
      info.deletedBytes += length;
      continue;
    }

    const skipped = await reader.skip(length);
    if (skipped < length) {
      const payloadOffset = offset + RECORD_HEADER_SIZE;
      return errSingle(new TruncatedDiffError("payload", payloadOffset, length, skipped, index));
    }
    info.payloadBytes += length;
    if (opcode === OpCode.Insert) info.inserts++;
    else info.changes++;
  }
  info.size = reader.position;
  return ok(info);
}

/**
 * Walk a diff file's records without decoding payloads.
 *
 * Checks the magic literal, that every opcode is known, that every record
 * starts at or after the source position where the previous one ended, and
 * that every declared payload is present. Payloads are skipped as they
 * stream past. A missing file fails with the `FilesApi`'s own not-found
 * error.
 *
 * @returns File summary, or the first structural error with its byte offset
 */
export async function validateDiff(
  files: FilesApi,
  path: string,
): Promise<Result<DiffInfo, DiffFormatError>> {
  const reader = new BufferedByteReader(files.read(path));
  try {
    return await walkRecords(reader);
  } finally {
    await reader.close();
  }
}

/**
 * Total number of records in a validated diff.
 */
export function countOperations(info: DiffInfo): number {
  return info.inserts + info.deletes + info.changes;
}
