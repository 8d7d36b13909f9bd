import { type FilesApi, writeAtomically } from "@mydiff/utils/files";
import { BufferedByteReader } from "@mydiff/utils/streams";
import { PatchApplyError } from "../common/errors.js";
import type { DiffLogger } from "../common/logger.js";
import { unwrap } from "../common/result.js";
import { readDiffHeader, readDiffOps } from "../format/index.js";

export interface ApplyDiffOptions {
  /** File to patch */
  source: string;
  /** Diff file */
  diff: string;
  /** Patched file to write; may equal `source` */
  output: string;
  logger?: DiffLogger;
}

export interface PatchSummary {
  operations: number;
  bytesWritten: number;
}

async function* patchedContent(
  files: FilesApi,
  options: ApplyDiffOptions,
  summary: PatchSummary,
): AsyncGenerator<Uint8Array> {
  const diff = new BufferedByteReader(files.read(options.diff));
  const source = new BufferedByteReader(files.read(options.source));
  try {
    unwrap(await readDiffHeader(diff));
    yield* patchRecords(diff, source, summary);
  } finally {
    try {
      await diff.close();
    } finally {
      await source.close();
    }
  }
}

async function* patchRecords(
  diff: BufferedByteReader,
  source: BufferedByteReader,
  summary: PatchSummary,
): AsyncGenerator<Uint8Array> {
  async function* emit(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<Uint8Array> {
    for await (const chunk of chunks) {
      summary.bytesWritten += chunk.length;
      yield chunk;
    }
  }

  async function skipSource(length: number, index: number): Promise<void> {
    const skipped = await source.skip(length);
    if (skipped < length) {
      throw new PatchApplyError(
        `Source ended at byte ${source.position} while op #${index} skips ${length} bytes`,
      );
    }
  }

  for await (const decoded of readDiffOps(diff)) {
    const { op, index } = unwrap(decoded);

    const gap = op.position - source.position;
    if (gap > 0) {
      yield* emit(source.passThrough(gap));
      if (source.position < op.position) {
        throw new PatchApplyError(
          `Source ended at byte ${source.position} before op #${index} at position ${op.position}`,
        );
      }
    }

    switch (op.type) {
      case "insert":
        summary.bytesWritten += op.payload.length;
        yield op.payload;
        break;
      case "delete":
        await skipSource(op.length, index);
        break;
      case "change":
        summary.bytesWritten += op.payload.length;
        yield op.payload;
        await skipSource(op.payload.length, index);
        break;
      default: {
        const _exhaustive: never = op;
        throw new Error(`Unknown op: ${JSON.stringify(_exhaustive)}`);
      }
    }
    summary.operations++;
  }

  yield* emit(source.rest());
}

/**
 * Apply a diff file to `options.source`, writing the result to
 * `options.output`.
 *
 * Ops are applied in file order against a cursor over the source; the
 * bytes between ops are copied as they stream in. Ops are expected sorted
 * and non-overlapping, as `generateDiff` writes them; run `verifyDiff`
 * first to rule out a damaged, reordered or mismatched diff. A decoding
 * error is thrown as its `DiffFormatError`, no output file is left behind,
 * and both inputs are closed whether or not the patch succeeds.
 */
export async function applyDiff(
  files: FilesApi,
  options: ApplyDiffOptions,
): Promise<PatchSummary> {
  const summary: PatchSummary = { operations: 0, bytesWritten: 0 };
  await writeAtomically(files, options.output, patchedContent(files, options, summary));
  options.logger?.info?.("Patch applied", {
    output: options.output,
    operations: summary.operations,
    bytesWritten: summary.bytesWritten,
  });
  return summary;
}
