import { bytesToHex } from "@mydiff/utils/hex";
import { describe, expect, it } from "vitest";
import { SHA256_SIZE, sha256 } from "../src/hash/index.js";

const encoder = new TextEncoder();

describe("sha256", () => {
  it("should hash an empty stream", async () => {
    const digest = await sha256([]);
    expect(digest).toHaveLength(SHA256_SIZE);
    expect(bytesToHex(digest)).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("should not depend on how the content is chunked", async () => {
    async function* pieces(): AsyncGenerator<Uint8Array> {
      yield encoder.encode("a");
      yield encoder.encode("bc");
    }
    const expected = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";
    expect(bytesToHex(await sha256(pieces()))).toBe(expected);
    expect(bytesToHex(await sha256([encoder.encode("abc")]))).toBe(expected);
  });
});
