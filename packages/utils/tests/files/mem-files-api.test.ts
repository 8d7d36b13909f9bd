import {
  createInMemoryFilesApi,
  type FilesApi,
  NotFoundError,
  writeAtomically,
} from "@mydiff/utils/files";
import { collect } from "@mydiff/utils/streams";
import { describe, expect, it } from "vitest";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

async function readText(files: FilesApi, path: string) {
  return decoder.decode(await collect(files.read(path)));
}

describe("createInMemoryFilesApi", () => {
  it("should serve initial files", async () => {
    const files = createInMemoryFilesApi({
      "a/b.txt": "abcdefg",
      "c.bin": new Uint8Array([1, 2, 3]),
    });
    expect(await readText(files, "a/b.txt")).toBe("abcdefg");
    expect(Array.from(await collect(files.read("/c.bin")))).toEqual([1, 2, 3]);
  });

  it("should report stats for files and directories", async () => {
    const files = createInMemoryFilesApi({ "dir/file.bin": "12345" });
    expect(await files.stats("dir/file.bin")).toMatchObject({ kind: "file", size: 5 });
    expect(await files.stats("dir")).toMatchObject({ kind: "directory" });
    expect(await files.stats("missing")).toBeUndefined();
    expect(await files.exists("dir/file.bin")).toBe(true);
  });

  it("should fail reads of missing files instead of yielding nothing", async () => {
    const files = createInMemoryFilesApi();
    const error = await collect(files.read("nope")).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ code: "ENOENT", path: "nope" });
  });

  it("should fail reads of directories", async () => {
    const files = createInMemoryFilesApi({ "dir/file.bin": "x" });
    await expect(collect(files.read("dir"))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("should read an empty file as empty content", async () => {
    const files = createInMemoryFilesApi({ "empty.bin": "" });
    expect(await collect(files.read("empty.bin"))).toHaveLength(0);
  });

  it("should move and remove files", async () => {
    const files = createInMemoryFilesApi({ "a.bin": "A" });
    expect(await files.move("a.bin", "b.bin")).toBe(true);
    expect(await files.exists("a.bin")).toBe(false);
    expect(await readText(files, "b.bin")).toBe("A");
    expect(await files.move("a.bin", "c.bin")).toBe(false);
    expect(await files.remove("b.bin")).toBe(true);
    expect(await files.remove("b.bin")).toBe(false);
  });
});

describe("writeAtomically", () => {
  it("should leave only the final file behind", async () => {
    const files = createInMemoryFilesApi();
    const tempPath = await writeAtomically(files, "out.bin", [encoder.encode("hello")]);
    expect(await readText(files, "out.bin")).toBe("hello");
    expect(await files.exists(tempPath)).toBe(false);
  });

  it("should keep the previous file and drop the temp file on failure", async () => {
    const files = createInMemoryFilesApi({ "out.bin": "old" });
    async function* failing(): AsyncGenerator<Uint8Array> {
      yield encoder.encode("new");
      throw new Error("producer failed");
    }
    await expect(writeAtomically(files, "out.bin", failing())).rejects.toThrow("producer failed");
    expect(await readText(files, "out.bin")).toBe("old");
  });
});
