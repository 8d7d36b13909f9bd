import type { FilesApi as WebrunFilesApi } from "@statewalker/webrun-files";
import type { FileStats, FilesApi } from "./files-api.js";

/**
 * Raised by `read()` for a path that is missing or is not a file.
 */
export class NotFoundError extends Error {
  readonly code = "ENOENT";

  constructor(readonly path: string) {
    super(`ENOENT: no such file: ${path}`);
    this.name = "NotFoundError";
  }
}

export interface FilesApiAdapterOptions {
  /** Maps a caller's path to the wrapped store's path (default: unchanged) */
  resolvePath?: (path: string) => string;
  /** Settles once the wrapped store is populated; every call waits for it */
  ready?: Promise<void>;
}

/**
 * Adapts a webrun-files FilesApi to our FilesApi interface.
 *
 * webrun-files yields empty content for a missing file; this adapter checks
 * stats first and raises a `NotFoundError` instead, so a missing input is
 * never mistaken for an empty one.
 */
export class FilesApiAdapter implements FilesApi {
  private readonly resolvePath: (path: string) => string;
  private readonly ready: Promise<void>;

  constructor(
    private readonly wrapped: WebrunFilesApi,
    options: FilesApiAdapterOptions = {},
  ) {
    this.resolvePath = options.resolvePath ?? ((path) => path);
    this.ready = options.ready ?? Promise.resolve();
  }

  async *read(path: string): AsyncIterable<Uint8Array> {
    await this.ready;
    const fullPath = this.resolvePath(path);
    const info = await this.wrapped.stats(fullPath);
    if (info?.kind !== "file") {
      throw new NotFoundError(path);
    }
    yield* this.wrapped.read(fullPath);
  }

  async write(
    path: string,
    content: Iterable<Uint8Array> | AsyncIterable<Uint8Array>,
  ): Promise<void> {
    await this.ready;
    return this.wrapped.write(this.resolvePath(path), content);
  }

  async remove(path: string): Promise<boolean> {
    await this.ready;
    return this.wrapped.remove(this.resolvePath(path));
  }

  async stats(path: string): Promise<FileStats | undefined> {
    await this.ready;
    const info = await this.wrapped.stats(this.resolvePath(path));
    if (!info) return undefined;
    return {
      kind: info.kind,
      size: info.size,
      lastModified: info.lastModified,
    };
  }

  async exists(path: string): Promise<boolean> {
    await this.ready;
    return this.wrapped.exists(this.resolvePath(path));
  }

  async move(source: string, target: string): Promise<boolean> {
    await this.ready;
    return this.wrapped.move(this.resolvePath(source), this.resolvePath(target));
  }
}
