import { createHash } from "node:crypto";

/** Byte length of a SHA-256 digest. */
export const SHA256_SIZE = 32;

/**
 * SHA-256 digest of a byte stream, updated chunk by chunk so the
 * content is never held in memory at once.
 */
export async function sha256(
  content: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
): Promise<Uint8Array> {
  const hash = createHash("sha256");
  for await (const chunk of content) {
    hash.update(chunk);
  }
  return new Uint8Array(hash.digest());
}
