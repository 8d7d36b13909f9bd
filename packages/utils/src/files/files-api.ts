/**
 * Abstract file system interface.
 *
 * Library code depends only on this interface, never on a concrete backend,
 * so the same diff and patch code runs against an in-memory store in tests
 * and against the Node.js filesystem in the command line tool.
 */

/**
 * Metadata about a file or directory.
 */
export interface FileStats {
  /** Whether this is a file or directory */
  kind: "file" | "directory";
  /** Size in bytes (meaningful for files) */
  size?: number;
  /** Last modification timestamp in milliseconds since Unix epoch */
  lastModified?: number;
}

export interface FilesApi {
  /**
   * Stream file content.
   * Fails with an ENOENT-coded error when the file does not exist.
   */
  read(path: string): AsyncIterable<Uint8Array>;

  /** Write content to file, replacing it (creates parent dirs) */
  write(path: string, content: Iterable<Uint8Array> | AsyncIterable<Uint8Array>): Promise<void>;

  /** Remove a file. Returns false when nothing was there. */
  remove(path: string): Promise<boolean>;

  /** Get file/directory stats */
  stats(path: string): Promise<FileStats | undefined>;

  /** Check if path exists */
  exists(path: string): Promise<boolean>;

  /** Move a file, replacing the target */
  move(source: string, target: string): Promise<boolean>;
}
