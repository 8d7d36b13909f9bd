import { applyDiff, type PatchSummary, unwrap, verifyDiff } from "@mydiff/diff";
import type { FilesApi } from "@mydiff/utils/files";
import { sha256 } from "@mydiff/utils-node/hash";
import { formatTable } from "../shared/colors.js";
import { getLog, toDiffLogger } from "../shared/logger.js";
import type { CliOutput } from "../types.js";
import { requireDiffName, requireFile } from "../validate-files.js";

export interface UpdateOptions {
  /** File to patch */
  file: string;
  diff: string;
  /** Where the patched file goes (default: `file`, in place) */
  output?: string;
  color: boolean;
}

/**
 * Check the diff's structure and provenance, then apply it.
 */
export async function updateCommand(
  files: FilesApi,
  options: UpdateOptions,
  output: CliOutput,
): Promise<PatchSummary> {
  await requireFile(files, options.file);
  await requireFile(files, options.diff);
  requireDiffName(options.diff);

  for (const line of formatTable(
    [
      ["File", options.file],
      ["Diff", options.diff],
    ],
    options.color,
  )) {
    output.out(line);
  }

  unwrap(await verifyDiff(files, { source: options.file, diff: options.diff, digest: sha256 }));

  const target = options.output ?? options.file;
  const summary = await applyDiff(files, {
    source: options.file,
    diff: options.diff,
    output: target,
    logger: toDiffLogger(getLog(import.meta)),
  });
  output.out(
    `Updated ${target} (${summary.operations} operations, ${summary.bytesWritten} bytes written)`,
  );
  return summary;
}
