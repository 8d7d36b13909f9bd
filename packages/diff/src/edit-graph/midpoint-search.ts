import type { Box, Point } from "./box.js";

/** Which frontier discovered a snake. */
export type SnakeDirection = "forward" | "backward";

/**
 * A stretch of an optimal path through a box.
 *
 * A forward snake leaves `start` with one insert or delete step and then
 * follows matching bytes diagonally to `finish`. A backward snake follows
 * the diagonal from `start` first and ends with its single step at
 * `finish`. A snake found before any edit was spent is purely diagonal.
 */
export interface Snake {
  start: Point;
  finish: Point;
  direction: SnakeDirection;
}

type Frontier = Int32Array | Float64Array;

/**
 * Linear-space middle-snake search over the edit graph of two byte
 * sequences.
 *
 * Two frontiers advance one edit at a time, the forward one from the
 * top-left corner of a box and the backward one from its bottom-right
 * corner. Each keeps, per diagonal `k = (x - left) - (y - top)`, the
 * furthest point reached. When the frontiers cross on a diagonal the
 * snake that crossed lies on a shortest path through the box.
 *
 * The frontier arrays are allocated once, sized for the whole sequence
 * pair, and reused by every box searched afterwards.
 */
export class MidpointSearch {
  private readonly a: Uint8Array;
  private readonly b: Uint8Array;
  /** Furthest x per forward diagonal */
  private readonly forward: Frontier;
  /** Furthest (smallest) y per backward diagonal */
  private readonly backward: Frontier;
  /** Array index of diagonal 0 */
  private readonly offset: number;

  constructor(a: Uint8Array, b: Uint8Array) {
    this.a = a;
    this.b = b;
    const max = Math.ceil((a.length + b.length) / 2);
    this.offset = max;
    // Frontier values can run up to `max` past either edge of the graph.
    const wide = a.length + b.length + max >= 0x7fffffff;
    const length = 2 * max + 2;
    this.forward = wide ? new Float64Array(length) : new Int32Array(length);
    this.backward = wide ? new Float64Array(length) : new Int32Array(length);
  }

  /**
   * Find the middle snake of `box`.
   *
   * @returns `undefined` for a box of zero size
   */
  findMidpoint(box: Box): Snake | undefined {
    if (box.size === 0) return undefined;
    if (box.right > this.a.length || box.bottom > this.b.length) {
      throw new RangeError("Box exceeds the searched sequences");
    }

    const max = Math.ceil(box.size / 2);
    this.forward[this.offset + 1] = box.left;
    this.backward[this.offset + 1] = box.bottom;

    for (let d = 0; d <= max; d++) {
      const snake = this.forwardStep(box, d) ?? this.backwardStep(box, d);
      if (snake) return snake;
    }
    throw new Error(
      `No middle snake in box [${box.left}, ${box.right}) x [${box.top}, ${box.bottom})`,
    );
  }

  private forwardStep(box: Box, d: number): Snake | undefined {
    const { a, b, offset, forward, backward } = this;
    const checkOverlap = Math.abs(box.delta) % 2 === 1;

    for (let k = -d; k <= d; k += 2) {
      let x: number;
      let px: number;
      if (k === -d || (k !== d && forward[offset + k - 1] < forward[offset + k + 1])) {
        px = x = forward[offset + k + 1];
      } else {
        px = forward[offset + k - 1];
        x = px + 1;
      }

      let y = box.top + (x - box.left) - k;
      const py = d === 0 || x !== px ? y : y - 1;

      while (x < box.right && y < box.bottom && a[x] === b[y]) {
        x++;
        y++;
      }
      forward[offset + k] = x;

      const c = k - box.delta;
      if (checkOverlap && c >= -(d - 1) && c <= d - 1 && y >= backward[offset + c]) {
        return { start: { x: px, y: py }, finish: { x, y }, direction: "forward" };
      }
    }
    return undefined;
  }

  private backwardStep(box: Box, d: number): Snake | undefined {
    const { a, b, offset, forward, backward } = this;
    const checkOverlap = Math.abs(box.delta) % 2 === 0;

    for (let c = -d; c <= d; c += 2) {
      let y: number;
      let py: number;
      if (c === -d || (c !== d && backward[offset + c - 1] > backward[offset + c + 1])) {
        py = y = backward[offset + c + 1];
      } else {
        py = backward[offset + c - 1];
        y = py - 1;
      }

      const k = c + box.delta;
      let x = box.left + (y - box.top) + k;
      const px = d === 0 || y !== py ? x : x + 1;

      while (x > box.left && y > box.top && a[x - 1] === b[y - 1]) {
        x--;
        y--;
      }
      backward[offset + c] = y;

      if (checkOverlap && k >= -d && k <= d && x <= forward[offset + k]) {
        return { start: { x, y }, finish: { x: px, y: py }, direction: "backward" };
      }
    }
    return undefined;
  }
}
