import type { FilesApi } from "@mydiff/utils/files";
import { bytesEqual } from "@mydiff/utils/hex";
import type { ContentDigest } from "../common/digest.js";
import type { DiffFormatError } from "../common/errors.js";
import { ProvenanceMismatchError } from "../common/errors.js";
import { errSingle, ok, type Result } from "../common/result.js";
import { type DiffInfo, validateDiff } from "./validate-diff.js";

/**
 * Recompute the digest of `sourcePath` and compare it with the digest
 * recorded in a diff.
 *
 * @returns The recomputed digest, or a mismatch error
 */
export async function checkProvenance(
  files: FilesApi,
  sourcePath: string,
  expected: Uint8Array,
  digest: ContentDigest,
): Promise<Result<Uint8Array, ProvenanceMismatchError>> {
  const actual = await digest(files.read(sourcePath));
  if (!bytesEqual(actual, expected)) {
    return errSingle(new ProvenanceMismatchError(sourcePath, expected, actual));
  }
  return ok(actual);
}

export interface VerifyDiffOptions {
  /** File the diff is about to be applied to */
  source: string;
  /** Diff file */
  diff: string;
  digest: ContentDigest;
}

/**
 * Structural validation followed by the provenance check. A diff that
 * passes both can be applied to `source`.
 */
export async function verifyDiff(
  files: FilesApi,
  options: VerifyDiffOptions,
): Promise<Result<DiffInfo, DiffFormatError | ProvenanceMismatchError>> {
  const structure = await validateDiff(files, options.diff);
  if (!structure.success) return structure;
  const provenance = await checkProvenance(
    files,
    options.source,
    structure.value.digest,
    options.digest,
  );
  if (!provenance.success) return provenance;
  return structure;
}
