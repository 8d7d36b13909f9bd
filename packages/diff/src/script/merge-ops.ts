import { concatBytes } from "@mydiff/utils/streams";
import {
  type ChangeOp,
  changeOp,
  type DeleteOp,
  type DiffOp,
  deleteOp,
  type InsertOp,
  insertOp,
} from "../ops/index.js";

/**
 * Coalesce runs of Inserts at one position into a single Insert, and runs
 * of contiguous Deletes into a single Delete.
 */
export function mergeOps(ops: readonly DiffOp[]): DiffOp[] {
  const merged: DiffOp[] = [];
  let i = 0;
  while (i < ops.length) {
    const op = ops[i];
    let j = i + 1;
    switch (op.type) {
      case "insert": {
        const parts = [op.payload];
        for (; j < ops.length; j++) {
          const next = ops[j];
          if (next.type !== "insert" || next.position !== op.position) break;
          parts.push(next.payload);
        }
        merged.push(parts.length === 1 ? op : insertOp(op.position, concatBytes(parts)));
        break;
      }
      case "delete": {
        let length = op.length;
        for (; j < ops.length; j++) {
          const next = ops[j];
          if (next.type !== "delete" || next.position !== op.position + length) break;
          length += next.length;
        }
        merged.push(length === op.length ? op : deleteOp(op.position, length));
        break;
      }
      case "change":
        merged.push(op);
        break;
      default: {
        const _exhaustive: never = op;
        throw new Error(`Unknown op: ${JSON.stringify(_exhaustive)}`);
      }
    }
    i = j;
  }
  return merged;
}

interface Fusion {
  change: ChangeOp;
  rest: DiffOp | undefined;
}

/**
 * Fuse a Delete and an Insert meeting at one source boundary: either the
 * Insert lands right where the Delete's span ends, or the Delete starts
 * right where the Insert was placed.
 */
function fuse(first: DiffOp, second: DiffOp): Fusion | undefined {
  let removed: DeleteOp;
  let added: InsertOp;
  if (
    first.type === "delete" &&
    second.type === "insert" &&
    second.position === first.position + first.length
  ) {
    removed = first;
    added = second;
  } else if (
    first.type === "insert" &&
    second.type === "delete" &&
    second.position === first.position
  ) {
    added = first;
    removed = second;
  } else {
    return undefined;
  }

  const position = removed.position;
  const n = Math.min(removed.length, added.payload.length);
  const change = changeOp(position, added.payload.subarray(0, n));
  if (removed.length > n) {
    return { change, rest: deleteOp(position + n, removed.length - n) };
  }
  if (added.payload.length > n) {
    return { change, rest: insertOp(position + n, added.payload.subarray(n)) };
  }
  return { change, rest: undefined };
}

/**
 * Turn delete-plus-insert pairs into Changes.
 *
 * The fused prefix of `min(delete, insert)` bytes becomes a Change; the
 * remainder stays a Delete or Insert at the advanced position and may
 * fuse again with the op after it.
 */
export function consolidateOps(ops: readonly DiffOp[]): DiffOp[] {
  const result: DiffOp[] = [];
  let pending: DiffOp | undefined;
  for (const op of ops) {
    if (pending === undefined) {
      pending = op;
      continue;
    }
    const fusion = fuse(pending, op);
    if (fusion) {
      result.push(fusion.change);
      pending = fusion.rest;
    } else {
      result.push(pending);
      pending = op;
    }
  }
  if (pending) result.push(pending);
  return result;
}
