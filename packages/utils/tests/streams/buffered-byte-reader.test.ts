/**
 * Tests for BufferedByteReader
 */

import { BufferedByteReader, collect } from "@mydiff/utils/streams";
import { describe, expect, it } from "vitest";

async function* fromChunks(...chunks: number[][]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield new Uint8Array(chunk);
  }
}

describe("BufferedByteReader", () => {
  describe("readAtMost", () => {
    it("returns fewer bytes only at end of stream", async () => {
      const reader = new BufferedByteReader(fromChunks([1, 2], [3]));
      expect(Array.from(await reader.readAtMost(2))).toEqual([1, 2]);
      expect(Array.from(await reader.readAtMost(4))).toEqual([3]);
      expect(reader.position).toBe(3);
    });

    it("reads across chunk boundaries and keeps leftover bytes", async () => {
      const reader = new BufferedByteReader(fromChunks([1, 2], [], [3, 4, 5]));
      expect(Array.from(await reader.readAtMost(4))).toEqual([1, 2, 3, 4]);
      expect(Array.from(await reader.readAtMost(4))).toEqual([5]);
      expect(await reader.readAtMost(1)).toHaveLength(0);
    });

    it("returns a copy that later reads do not alter", async () => {
      const source = new Uint8Array([7, 8, 9]);
      const reader = new BufferedByteReader(
        (async function* () {
          yield source;
        })(),
      );
      const first = await reader.readAtMost(3);
      source[0] = 0;
      expect(Array.from(first)).toEqual([7, 8, 9]);
    });
  });

  describe("skip", () => {
    it("skips across chunks and reports the count", async () => {
      const reader = new BufferedByteReader(fromChunks([1, 2], [3, 4], [5, 6]));
      expect(await reader.skip(3)).toBe(3);
      expect(Array.from(await reader.readAtMost(2))).toEqual([4, 5]);
    });

    it("stops at end of stream", async () => {
      const reader = new BufferedByteReader(fromChunks([1, 2, 3]));
      expect(await reader.skip(10)).toBe(3);
      expect(reader.position).toBe(3);
    });
  });

  describe("passThrough", () => {
    it("yields the requested span chunk by chunk", async () => {
      const reader = new BufferedByteReader(fromChunks([1, 2, 3], [4, 5, 6]));
      const parts: number[][] = [];
      for await (const part of reader.passThrough(4)) {
        parts.push(Array.from(part));
      }
      expect(parts).toEqual([[1, 2, 3], [4]]);
      expect(Array.from(await collect(reader.rest()))).toEqual([5, 6]);
    });

    it("ends early when the stream is shorter", async () => {
      const reader = new BufferedByteReader(fromChunks([1, 2]));
      const bytes = await collect(reader.passThrough(5));
      expect(Array.from(bytes)).toEqual([1, 2]);
      expect(reader.position).toBe(2);
    });
  });

  describe("close", () => {
    it("runs the source's cleanup without reading the rest", async () => {
      const events: string[] = [];
      async function* source(): AsyncGenerator<Uint8Array> {
        try {
          yield new Uint8Array([1, 2]);
          events.push("second chunk read");
          yield new Uint8Array([3]);
        } finally {
          events.push("closed");
        }
      }
      const reader = new BufferedByteReader(source());
      expect(Array.from(await reader.readAtMost(1))).toEqual([1]);
      await reader.close();
      await reader.close();
      expect(events).toEqual(["closed"]);
      expect(await reader.readAtMost(1)).toHaveLength(0);
    });

    it("does nothing once the source has ended", async () => {
      const reader = new BufferedByteReader(fromChunks([1]));
      expect(await reader.skip(5)).toBe(1);
      await expect(reader.close()).resolves.toBeUndefined();
    });
  });
});
