import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FilesApi } from "@mydiff/utils/files";
import { collect } from "@mydiff/utils/streams";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createNodeFilesApi } from "../src/files/index.js";

describe("createNodeFilesApi", () => {
  let rootDir: string;
  let files: FilesApi;

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), "mydiff-files-"));
    files = createNodeFilesApi({ rootDir });
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it("should read a file relative to the root directory", async () => {
    await writeFile(join(rootDir, "a.bin"), "0123456789");
    const bytes = await collect(files.read("a.bin"));
    expect(Buffer.from(bytes).toString("utf8")).toBe("0123456789");
  });

  it("should write content and create parent directories", async () => {
    await files.write("nested/dir/out.bin", [new Uint8Array([1, 2]), new Uint8Array([3])]);
    const written = await readFile(join(rootDir, "nested/dir/out.bin"));
    expect(Array.from(written)).toEqual([1, 2, 3]);
    expect(await files.stats("nested/dir/out.bin")).toMatchObject({ kind: "file", size: 3 });
    expect(await files.stats("nested")).toMatchObject({ kind: "directory" });
  });

  it("should fail reads of missing files with ENOENT", async () => {
    expect(await files.stats("missing.bin")).toBeUndefined();
    expect(await files.exists("missing.bin")).toBe(false);
    await expect(collect(files.read("missing.bin"))).rejects.toMatchObject({
      code: "ENOENT",
      path: "missing.bin",
    });
  });

  it("should move and remove files", async () => {
    await writeFile(join(rootDir, "from.bin"), "x");
    expect(await files.move("from.bin", "target.bin")).toBe(true);
    expect(await files.exists("from.bin")).toBe(false);
    expect(await readFile(join(rootDir, "target.bin"), "utf8")).toBe("x");
    expect(await files.move("from.bin", "again.bin")).toBe(false);
    expect(await files.remove("target.bin")).toBe(true);
    expect(await files.remove("target.bin")).toBe(false);
  });

  it("should resolve absolute paths as given", async () => {
    const otherDir = await mkdtemp(join(tmpdir(), "mydiff-other-"));
    try {
      const absolute = join(otherDir, "abs.bin");
      await writeFile(absolute, "abs");
      expect(await files.exists(absolute)).toBe(true);
      expect(Buffer.from(await collect(files.read(absolute))).toString("utf8")).toBe("abs");
    } finally {
      await rm(otherDir, { recursive: true, force: true });
    }
  });
});
