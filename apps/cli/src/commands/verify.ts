import { checkProvenance, countOperations, type DiffInfo, unwrap, validateDiff } from "@mydiff/diff";
import type { FilesApi } from "@mydiff/utils/files";
import { bytesToHex } from "@mydiff/utils/hex";
import { sha256 } from "@mydiff/utils-node/hash";
import { formatSize, formatTable, paint } from "../shared/colors.js";
import type { CliOutput } from "../types.js";
import { requireDiffName, requireFile } from "../validate-files.js";

export interface VerifyOptions {
  diff: string;
  /** File the diff should have been built from */
  source?: string;
  color: boolean;
}

/**
 * Check a diff's structure, and its provenance when a source is given,
 * then print what it contains.
 */
export async function verifyCommand(
  files: FilesApi,
  options: VerifyOptions,
  output: CliOutput,
): Promise<DiffInfo> {
  await requireFile(files, options.diff);
  requireDiffName(options.diff);
  if (options.source !== undefined) {
    await requireFile(files, options.source);
  }

  const info = unwrap(await validateDiff(files, options.diff));
  const rows: Array<[string, string]> = [
    ["Diff", options.diff],
    ["Size", formatSize(info.size)],
    ["Source digest", bytesToHex(info.digest)],
    ["Operations", String(countOperations(info))],
    ["Inserts", String(info.inserts)],
    ["Deletes", String(info.deletes)],
    ["Changes", String(info.changes)],
    ["Payload bytes", String(info.payloadBytes)],
    ["Deleted bytes", String(info.deletedBytes)],
  ];

  if (options.source !== undefined) {
    unwrap(await checkProvenance(files, options.source, info.digest, sha256));
    rows.push(["Source", options.source], ["Provenance", paint("match", "green", options.color)]);
  }

  for (const line of formatTable(rows, options.color)) {
    output.out(line);
  }
  return info;
}
