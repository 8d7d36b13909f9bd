/**
 * Diff file layout, all integers unsigned big-endian:
 *
 * ```
 * 0..6    "MYDIFF"
 * 6..38   digest of the source file
 * 38..EOF records:
 *   0      opcode
 *   1..9   position
 *   9..17  length (payload size for Insert/Change, skip count for Delete)
 *   17..   payload (Insert/Change only)
 * ```
 */

export const DIFF_MAGIC = new TextEncoder().encode("MYDIFF");

export const DIGEST_SIZE = 32;

export const HEADER_SIZE = DIFF_MAGIC.length + DIGEST_SIZE;

export const RECORD_HEADER_SIZE = 17;

export enum OpCode {
  Insert = 0x01,
  Delete = 0x02,
  Change = 0x03,
}

export function isOpCode(value: number): value is OpCode {
  return value === OpCode.Insert || value === OpCode.Delete || value === OpCode.Change;
}
