/**
 * Fixed-size fingerprint of a byte stream, used to tie a diff to the exact
 * source it was built from. Must be deterministic and return
 * `DIGEST_SIZE` bytes.
 */
export type ContentDigest = (content: AsyncIterable<Uint8Array>) => Promise<Uint8Array>;
