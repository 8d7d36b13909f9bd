import { describe, expect, it } from "vitest";
import { Box, MidpointSearch } from "../../src/edit-graph/index.js";
import { bytes, createRandom, randomBytes } from "../helpers.js";

describe("Box", () => {
  it("should derive width, height, size and delta", () => {
    const box = new Box(2, 1, 7, 4);
    expect(box.width).toBe(5);
    expect(box.height).toBe(3);
    expect(box.size).toBe(8);
    expect(box.delta).toBe(2);
  });

  it("should be built between two points", () => {
    const box = Box.between({ x: 1, y: 2 }, { x: 3, y: 5 });
    expect([box.left, box.top, box.right, box.bottom]).toEqual([1, 2, 3, 5]);
  });
});

describe("MidpointSearch", () => {
  it("should return undefined for a zero-size box", () => {
    const search = new MidpointSearch(bytes("abc"), bytes("abc"));
    expect(search.findMidpoint(new Box(1, 2, 1, 2))).toBeUndefined();
  });

  it("should cover identical sequences with one diagonal snake", () => {
    const search = new MidpointSearch(bytes("abc"), bytes("abc"));
    expect(search.findMidpoint(new Box(0, 0, 3, 3))).toEqual({
      start: { x: 0, y: 0 },
      finish: { x: 3, y: 3 },
      direction: "backward",
    });
  });

  it("should find the single step between two different bytes", () => {
    const search = new MidpointSearch(bytes("a"), bytes("b"));
    expect(search.findMidpoint(new Box(0, 0, 1, 1))).toEqual({
      start: { x: 0, y: 1 },
      finish: { x: 1, y: 1 },
      direction: "backward",
    });
  });

  it("should reject a box outside the sequences", () => {
    const search = new MidpointSearch(bytes("ab"), bytes("c"));
    expect(() => search.findMidpoint(new Box(0, 0, 3, 1))).toThrow(RangeError);
  });

  it("should always return a snake inside the box that splits it", () => {
    const random = createRandom(7);
    for (let round = 0; round < 200; round++) {
      const a = randomBytes(random, Math.floor(random() * 20), "ab");
      const b = randomBytes(random, Math.floor(random() * 20), round % 2 === 0 ? "ab" : "xy");
      const box = new Box(0, 0, a.length, b.length);
      if (box.width === 0 || box.height === 0) continue;

      const snake = new MidpointSearch(a, b).findMidpoint(box);
      if (!snake) throw new Error("expected a snake");
      const { start, finish } = snake;

      expect(start.x).toBeGreaterThanOrEqual(0);
      expect(start.y).toBeGreaterThanOrEqual(0);
      expect(finish.x).toBeLessThanOrEqual(a.length);
      expect(finish.y).toBeLessThanOrEqual(b.length);
      expect(finish.x).toBeGreaterThanOrEqual(start.x);
      expect(finish.y).toBeGreaterThanOrEqual(start.y);
      // At most one non-diagonal step between the endpoints.
      expect(Math.abs(finish.x - start.x - (finish.y - start.y))).toBeLessThanOrEqual(1);
      // Both sub-boxes are strictly smaller than the box.
      expect(start.x + start.y + (a.length - finish.x) + (b.length - finish.y)).toBeLessThan(
        box.size,
      );
    }
  });
});
