/**
 * Edit operations over a source byte sequence.
 *
 * `position` is an offset into the source as it stood before any operation
 * was applied. Operations in a script are sorted by position and never
 * overlap: each op's position is at or after the end of the source span
 * consumed by the op before it.
 */

/** Insert `payload` before source byte `position`. Consumes no source bytes. */
export interface InsertOp {
  type: "insert";
  position: number;
  payload: Uint8Array;
}

/** Drop `length` source bytes starting at `position`. */
export interface DeleteOp {
  type: "delete";
  position: number;
  length: number;
}

/** Replace `payload.length` source bytes starting at `position` with `payload`. */
export interface ChangeOp {
  type: "change";
  position: number;
  payload: Uint8Array;
}

export type DiffOp = InsertOp | DeleteOp | ChangeOp;

export function insertOp(position: number, payload: Uint8Array): InsertOp {
  return { type: "insert", position, payload };
}

export function deleteOp(position: number, length: number): DeleteOp {
  return { type: "delete", position, length };
}

export function changeOp(position: number, payload: Uint8Array): ChangeOp {
  return { type: "change", position, payload };
}

/**
 * Length field of an op as it appears on the wire: payload size for
 * Insert/Change, skip count for Delete.
 */
export function opLength(op: DiffOp): number {
  switch (op.type) {
    case "insert":
    case "change":
      return op.payload.length;
    case "delete":
      return op.length;
    default: {
      const _exhaustive: never = op;
      throw new Error(`Unknown op: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Number of source bytes an op consumes.
 */
export function sourceLength(op: DiffOp): number {
  switch (op.type) {
    case "insert":
      return 0;
    case "delete":
      return op.length;
    case "change":
      return op.payload.length;
    default: {
      const _exhaustive: never = op;
      throw new Error(`Unknown op: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Number of unit insert/delete steps an op stands for.
 *
 * A Change of n bytes counts as n deletions plus n insertions, so summing
 * over a consolidated script still yields the edit distance.
 */
export function editLength(op: DiffOp): number {
  switch (op.type) {
    case "insert":
      return op.payload.length;
    case "delete":
      return op.length;
    case "change":
      return 2 * op.payload.length;
    default: {
      const _exhaustive: never = op;
      throw new Error(`Unknown op: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Copy of `op` moved by `offset` source bytes.
 */
export function shiftOp(op: DiffOp, offset: number): DiffOp {
  return { ...op, position: op.position + offset };
}
