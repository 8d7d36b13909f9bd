import { Box, MidpointSearch, type Snake } from "../edit-graph/index.js";
import { type DiffOp, deleteOp, editLength, insertOp } from "../ops/index.js";
import { consolidateOps, mergeOps } from "./merge-ops.js";

type Task = { kind: "box"; box: Box } | { kind: "op"; op: DiffOp };

/**
 * Single insert or delete step a snake carries, if any.
 */
function snakeStep(snake: Snake, b: Uint8Array): DiffOp | undefined {
  const { start, finish, direction } = snake;
  const dx = finish.x - start.x;
  const dy = finish.y - start.y;
  if (dx === dy) return undefined;

  if (direction === "forward") {
    return dx > dy ? deleteOp(start.x, 1) : insertOp(start.x, b.slice(start.y, start.y + 1));
  }
  return dx > dy
    ? deleteOp(finish.x - 1, 1)
    : insertOp(finish.x, b.slice(finish.y - 1, finish.y));
}

/**
 * Raw shortest edit script turning `a` into `b`, in ascending position
 * order: single-byte steps, plus whole-span ops for boxes that collapse to
 * a row or a column.
 *
 * Boxes are resolved from an explicit work stack, left sub-box first, then
 * the snake's step, then the right sub-box.
 */
export function findPath(a: Uint8Array, b: Uint8Array): DiffOp[] {
  const ops: DiffOp[] = [];
  const search = new MidpointSearch(a, b);
  const tasks: Task[] = [{ kind: "box", box: new Box(0, 0, a.length, b.length) }];

  for (let task = tasks.pop(); task; task = tasks.pop()) {
    if (task.kind === "op") {
      ops.push(task.op);
      continue;
    }

    const { box } = task;
    if (box.size === 0) continue;
    if (box.width === 0) {
      ops.push(insertOp(box.left, b.slice(box.top, box.bottom)));
      continue;
    }
    if (box.height === 0) {
      ops.push(deleteOp(box.left, box.width));
      continue;
    }

    const snake = search.findMidpoint(box);
    if (!snake) continue;

    tasks.push({
      kind: "box",
      box: new Box(snake.finish.x, snake.finish.y, box.right, box.bottom),
    });
    const step = snakeStep(snake, b);
    if (step) tasks.push({ kind: "op", op: step });
    tasks.push({ kind: "box", box: new Box(box.left, box.top, snake.start.x, snake.start.y) });
  }
  return ops;
}

/**
 * Edit script turning `a` into `b`.
 *
 * Runs the middle-snake search, then coalesces neighbouring steps and fuses
 * delete/insert pairs into changes. Identical or empty inputs yield an
 * empty script.
 *
 * @example
 * ```typescript
 * const enc = new TextEncoder();
 * const ops = buildScript(enc.encode("abcabba"), enc.encode("cbabac"));
 * applyOps(enc.encode("abcabba"), ops); // "cbabac"
 * ```
 */
export function buildScript(a: Uint8Array, b: Uint8Array): DiffOp[] {
  return consolidateOps(mergeOps(findPath(a, b)));
}

/**
 * Length of the shortest edit script between `a` and `b`, counted in
 * single-byte insertions and deletions.
 */
export function ses(a: Uint8Array, b: Uint8Array): number {
  let total = 0;
  for (const op of buildScript(a, b)) {
    total += editLength(op);
  }
  return total;
}
