/**
 * Shared fixtures for diff tests.
 */

import { createInMemoryFilesApi, type FilesApi } from "@mydiff/utils/files";
import { toChunks } from "@mydiff/utils/streams";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function text(data: Uint8Array): string {
  return decoder.decode(data);
}

/**
 * Deterministic PRNG (mulberry32) so property checks are reproducible.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random byte array of `length` bytes drawn from `alphabet`.
 */
export function randomBytes(random: () => number, length: number, alphabet: string): Uint8Array {
  const symbols = bytes(alphabet);
  const result = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    result[i] = symbols[Math.floor(random() * symbols.length)];
  }
  return result;
}

/**
 * Copy of `source` with a few random edits applied, so the pair shares
 * long common runs.
 */
export function mutate(random: () => number, source: Uint8Array, edits: number): Uint8Array {
  const result = Array.from(source);
  for (let i = 0; i < edits; i++) {
    const at = Math.floor(random() * (result.length + 1));
    const kind = Math.floor(random() * 3);
    const value = Math.floor(random() * 256);
    if (kind === 0 || result.length === 0) result.splice(at, 0, value);
    else if (kind === 1) result.splice(Math.min(at, result.length - 1), 1);
    else result[Math.min(at, result.length - 1)] = value;
  }
  return new Uint8Array(result);
}

/**
 * Reference edit distance (insertions and deletions only) from the
 * longest common subsequence, by dynamic programming.
 */
export function referenceDistance(a: Uint8Array, b: Uint8Array): number {
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return a.length + b.length - 2 * previous[b.length];
}

function delegate(files: FilesApi, read: FilesApi["read"]): FilesApi {
  return {
    read,
    write: (path, content) => files.write(path, content),
    remove: (path) => files.remove(path),
    stats: (path) => files.stats(path),
    exists: (path) => files.exists(path),
    move: (source, target) => files.move(source, target),
  };
}

/**
 * In-memory files whose reads arrive in chunks of `readChunkSize` bytes, so
 * record and payload boundaries fall across chunks.
 */
export function memFiles(
  initialFiles: Record<string, Uint8Array | string>,
  readChunkSize = 5,
): FilesApi {
  const files = createInMemoryFilesApi(initialFiles);
  return delegate(files, (path) => toChunks(files.read(path), readChunkSize));
}

/**
 * Wraps `files` and records which reads were started but not yet finished
 * or closed.
 */
export function trackOpenReads(files: FilesApi): { files: FilesApi; openReads: () => string[] } {
  const open = new Map<number, string>();
  let nextId = 0;
  async function* read(path: string): AsyncGenerator<Uint8Array> {
    const id = nextId++;
    open.set(id, path);
    try {
      yield* files.read(path);
    } finally {
      open.delete(id);
    }
  }
  return { files: delegate(files, read), openReads: () => [...open.values()] };
}
