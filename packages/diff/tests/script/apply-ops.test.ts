import { describe, expect, it } from "vitest";
import {
  applyOps,
  changeOp,
  deleteOp,
  insertOp,
  OperationOrderError,
} from "../../src/index.js";
import { bytes, text } from "../helpers.js";

describe("applyOps", () => {
  it("should apply inserts, deletes and changes in order", () => {
    const output = applyOps(bytes("hello world"), [
      insertOp(0, bytes(">> ")),
      changeOp(0, bytes("J")),
      deleteOp(5, 6),
      insertOp(11, bytes("!")),
    ]);
    expect(text(output)).toBe(">> Jello!");
  });

  it("should accept an insert followed by a delete at the same position", () => {
    expect(text(applyOps(bytes("abc"), [insertOp(1, bytes("X")), deleteOp(1, 1)]))).toBe("aXc");
  });

  it("should reject unsorted ops", () => {
    expect(() => applyOps(bytes("abcdef"), [deleteOp(3, 1), insertOp(1, bytes("x"))])).toThrow(
      "Op #1 at position 1 overlaps source bytes consumed up to 4",
    );
  });

  it("should reject overlapping ops", () => {
    let caught: unknown;
    try {
      applyOps(bytes("abcdef"), [deleteOp(0, 3), changeOp(2, bytes("x"))]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(OperationOrderError);
    expect(caught).toMatchObject({ index: 1, position: 2, cursor: 3 });
  });

  it("should reject ops reaching past the end of the source", () => {
    expect(() => applyOps(bytes("abcde"), [deleteOp(4, 3)])).toThrow(
      "Op #0 at position 4 reaches past the end of a 5-byte source",
    );
  });

  it("should reject negative positions", () => {
    expect(() => applyOps(bytes("abc"), [insertOp(-1, bytes("x"))])).toThrow(
      "Op #0 has invalid position -1",
    );
  });
});
