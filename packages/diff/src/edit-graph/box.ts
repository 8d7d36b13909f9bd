/**
 * A point in the edit graph: `x` indexes the old sequence, `y` the new one.
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Window `[left, right) x [top, bottom)` over the old (x) and new (y)
 * sequences: the part of the edit graph still to be resolved.
 */
export class Box {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;

  constructor(left: number, top: number, right: number, bottom: number) {
    this.left = left;
    this.top = top;
    this.right = right;
    this.bottom = bottom;
  }

  /** Box between two graph points. */
  static between(start: Point, finish: Point): Box {
    return new Box(start.x, start.y, finish.x, finish.y);
  }

  get width(): number {
    return this.right - this.left;
  }

  get height(): number {
    return this.bottom - this.top;
  }

  get size(): number {
    return this.width + this.height;
  }

  /** Difference between width and height: the diagonal the bottom-right corner lies on. */
  get delta(): number {
    return this.width - this.height;
  }
}
