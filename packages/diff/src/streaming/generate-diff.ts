import { type FilesApi, writeAtomically } from "@mydiff/utils/files";
import { bytesToHex } from "@mydiff/utils/hex";
import { toChunks } from "@mydiff/utils/streams";
import type { ContentDigest } from "../common/digest.js";
import type { DiffLogger } from "../common/logger.js";
import { encodeDiffHeader, encodeOps } from "../format/index.js";
import { shiftOp } from "../ops/index.js";
import { buildScript } from "../script/index.js";

/** Default size of the chunk pairs diffed independently: 1 MiB. */
export const DEFAULT_CHUNK_SIZE = 1024 * 1024;

export interface GenerateDiffOptions {
  /** Old file */
  source: string;
  /** New file */
  target: string;
  /** Diff file to write */
  output: string;
  /** Digest recorded in the header to identify `source` */
  digest: ContentDigest;
  /** Bytes per chunk read from each input (default: 1 MiB) */
  chunkSize?: number;
  logger?: DiffLogger;
}

export interface DiffSummary {
  /** Digest of the source file */
  digest: Uint8Array;
  /** Chunk pairs diffed */
  chunks: number;
  /** Records written */
  operations: number;
}

const EMPTY = new Uint8Array(0);

async function* diffRecords(
  files: FilesApi,
  options: GenerateDiffOptions,
  chunkSize: number,
  summary: DiffSummary,
): AsyncGenerator<Uint8Array> {
  yield encodeDiffHeader(summary.digest);

  const oldChunks = toChunks(files.read(options.source), chunkSize);
  const newChunks = toChunks(files.read(options.target), chunkSize);
  // Positions stay in old-file coordinates, so only old bytes advance the offset.
  let offset = 0;

  for (;;) {
    const oldNext = await oldChunks.next();
    const newNext = await newChunks.next();
    if (oldNext.done && newNext.done) break;

    const oldChunk = oldNext.done ? EMPTY : oldNext.value;
    const newChunk = newNext.done ? EMPTY : newNext.value;
    const ops = buildScript(oldChunk, newChunk);

    summary.chunks++;
    summary.operations += ops.length;
    options.logger?.debug?.("Chunk pair diffed", {
      chunk: summary.chunks,
      offset,
      oldBytes: oldChunk.length,
      newBytes: newChunk.length,
      operations: ops.length,
    });

    if (ops.length > 0) {
      yield encodeOps(ops.map((op) => shiftOp(op, offset)));
    }
    offset += oldChunk.length;
  }
}

/**
 * Write a diff turning `options.source` into `options.target`.
 *
 * Both files are read in lockstep chunks of `chunkSize` bytes and each
 * chunk pair is diffed on its own, so memory stays bounded by the chunk
 * size; matches never cross a chunk boundary. The diff is written to a
 * temporary file and moved into place once complete.
 */
export async function generateDiff(
  files: FilesApi,
  options: GenerateDiffOptions,
): Promise<DiffSummary> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isSafeInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const digest = await options.digest(files.read(options.source));
  options.logger?.debug?.("Source digest computed", {
    source: options.source,
    digest: bytesToHex(digest),
  });

  const summary: DiffSummary = { digest, chunks: 0, operations: 0 };
  await writeAtomically(files, options.output, diffRecords(files, options, chunkSize, summary));

  options.logger?.info?.("Diff written", {
    output: options.output,
    chunks: summary.chunks,
    operations: summary.operations,
  });
  return summary;
}
