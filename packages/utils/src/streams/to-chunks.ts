/**
 * Chunks a binary stream into fixed-size blocks.
 *
 * Takes an input stream of arbitrary-sized Uint8Array chunks and yields
 * fixed-size blocks. The final block may be smaller than `size` when the
 * total stream length is not evenly divisible.
 *
 * Incoming chunks are kept in an array without copying until a full block
 * can be assembled; overflow stays as the first pending chunk.
 *
 * @example
 * ```typescript
 * for await (const block of toChunks(files.read("old.bin"), 1024 * 1024)) {
 *   await processBlock(block); // 1 MiB each, except possibly the last
 * }
 * ```
 *
 * @param stream Input binary stream (sync or async iterable)
 * @param size Block size in bytes (default: 1 MiB)
 */
export async function* toChunks(
  stream: Iterable<Uint8Array> | AsyncIterable<Uint8Array>,
  size: number = 1024 * 1024,
): AsyncGenerator<Uint8Array> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const pendingChunks: Uint8Array[] = [];
  let accumulatedSize = 0;

  for await (const chunk of stream) {
    if (chunk.length === 0) continue;

    pendingChunks.push(chunk);
    accumulatedSize += chunk.length;

    while (accumulatedSize >= size) {
      const block = new Uint8Array(size);
      let blockOffset = 0;

      while (blockOffset < size && pendingChunks.length > 0) {
        const current = pendingChunks[0];
        const bytesToCopy = Math.min(size - blockOffset, current.length);

        block.set(current.subarray(0, bytesToCopy), blockOffset);
        blockOffset += bytesToCopy;

        if (bytesToCopy < current.length) {
          pendingChunks[0] = current.subarray(bytesToCopy);
        } else {
          pendingChunks.shift();
        }
      }

      accumulatedSize -= size;
      yield block;
    }
  }

  if (accumulatedSize > 0) {
    const finalBlock = new Uint8Array(accumulatedSize);
    let offset = 0;
    for (const chunk of pendingChunks) {
      finalBlock.set(chunk, offset);
      offset += chunk.length;
    }
    yield finalBlock;
  }
}
