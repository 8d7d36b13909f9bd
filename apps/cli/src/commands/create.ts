import { join, parse } from "node:path";
import { generateDiff } from "@mydiff/diff";
import type { FilesApi } from "@mydiff/utils/files";
import { sha256 } from "@mydiff/utils-node/hash";
import { formatTable } from "../shared/colors.js";
import { getLog, toDiffLogger } from "../shared/logger.js";
import type { CliOutput } from "../types.js";
import { requireFile } from "../validate-files.js";

export interface CreateOptions {
  /** Old files, one diff each */
  oldFiles: string[];
  /** New file */
  newFile: string;
  /** Diff names without extension, matched to `oldFiles` by index */
  names: string[];
  chunkSize: number;
  /** Directory the diffs go to (default: working directory) */
  outputDir?: string;
  color: boolean;
}

/**
 * Path of the diff for the `index`-th old file: the given name, or
 * `<old>-<new>` from the file names without their extensions.
 */
export function diffPathFor(options: CreateOptions, index: number): string {
  const name =
    options.names[index] ?? `${parse(options.oldFiles[index]).name}-${parse(options.newFile).name}`;
  return join(options.outputDir ?? ".", `${name}.diff`);
}

/**
 * Create one diff per old file against the new file.
 *
 * @returns Paths of the written diffs
 */
export async function createCommand(
  files: FilesApi,
  options: CreateOptions,
  output: CliOutput,
): Promise<string[]> {
  for (const path of [...options.oldFiles, options.newFile]) {
    await requireFile(files, path);
  }

  const written: string[] = [];
  for (const [index, oldFile] of options.oldFiles.entries()) {
    const diffPath = diffPathFor(options, index);
    for (const line of formatTable(
      [
        ["Old file", oldFile],
        ["New file", options.newFile],
        ["Diff", diffPath],
      ],
      options.color,
    )) {
      output.out(line);
    }

    const summary = await generateDiff(files, {
      source: oldFile,
      target: options.newFile,
      output: diffPath,
      digest: sha256,
      chunkSize: options.chunkSize,
      logger: toDiffLogger(getLog(import.meta)),
    });
    output.out(`Created ${diffPath} (${summary.operations} operations)`);
    written.push(diffPath);
  }
  return written;
}
