import { OperationOrderError } from "../common/errors.js";
import { type DiffOp, sourceLength } from "../ops/index.js";

/**
 * Check that `ops` are sorted, non-overlapping and stay inside a source of
 * `sourceSize` bytes.
 *
 * @returns Size of the reconstructed output
 * @throws OperationOrderError on the first offending op
 */
export function checkOpOrder(ops: readonly DiffOp[], sourceSize: number): number {
  let cursor = 0;
  let outputSize = sourceSize;
  ops.forEach((op, index) => {
    if (!Number.isSafeInteger(op.position) || op.position < 0) {
      throw new OperationOrderError(
        `Op #${index} has invalid position ${op.position}`,
        index,
        op.position,
        cursor,
      );
    }
    if (op.position < cursor) {
      throw new OperationOrderError(
        `Op #${index} at position ${op.position} overlaps source bytes consumed up to ${cursor}`,
        index,
        op.position,
        cursor,
      );
    }
    const consumed = sourceLength(op);
    if (op.position + consumed > sourceSize) {
      throw new OperationOrderError(
        `Op #${index} at position ${op.position} reaches past the end of a ${sourceSize}-byte source`,
        index,
        op.position,
        cursor,
      );
    }
    cursor = op.position + consumed;
    outputSize += (op.type === "delete" ? 0 : op.payload.length) - consumed;
  });
  return outputSize;
}

/**
 * Apply an edit script to an in-memory source.
 *
 * All ops are checked before any output is produced.
 *
 * @throws OperationOrderError if the ops are unsorted, overlap, or reach
 * past the end of `source`
 */
export function applyOps(source: Uint8Array, ops: readonly DiffOp[]): Uint8Array {
  const output = new Uint8Array(checkOpOrder(ops, source.length));
  let cursor = 0;
  let written = 0;

  const copySource = (end: number) => {
    output.set(source.subarray(cursor, end), written);
    written += end - cursor;
    cursor = end;
  };

  for (const op of ops) {
    copySource(op.position);
    switch (op.type) {
      case "insert":
        output.set(op.payload, written);
        written += op.payload.length;
        break;
      case "delete":
        cursor += op.length;
        break;
      case "change":
        output.set(op.payload, written);
        written += op.payload.length;
        cursor += op.payload.length;
        break;
      default: {
        const _exhaustive: never = op;
        throw new Error(`Unknown op: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }
  copySource(source.length);
  return output;
}
