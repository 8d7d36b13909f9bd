/**
 * Buffered reader over an async iterator of byte chunks.
 *
 * Provides bounded reads, skips and pass-through on top of a
 * chunk-based stream. Buffers only what the current read needs; skipped and
 * passed-through bytes are never accumulated.
 *
 * Calls `iterator.next()` directly instead of `for await...of`, so leftover
 * bytes survive between sequential reads on the same iterator.
 */
export class BufferedByteReader {
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private iterator: AsyncIterator<Uint8Array>;
  private done = false;
  private consumed = 0;

  constructor(source: AsyncIterable<Uint8Array> | AsyncIterator<Uint8Array>) {
    this.iterator = Symbol.asyncIterator in source ? source[Symbol.asyncIterator]() : source;
  }

  /** Number of bytes handed out (read, skipped or passed through) so far. */
  get position(): number {
    return this.consumed;
  }

  /** Pull one more chunk into the buffer. Returns false at end of stream. */
  private async fill(): Promise<boolean> {
    while (!this.done) {
      const { value, done } = await this.iterator.next();
      if (done) {
        this.done = true;
        break;
      }
      if (value.length === 0) continue;
      this.chunks.push(value);
      this.buffered += value.length;
      return true;
    }
    return false;
  }

  /** Ensure at least `n` bytes are buffered, or the stream is exhausted. */
  private async ensureBytes(n: number): Promise<void> {
    while (this.buffered < n) {
      if (!(await this.fill())) break;
    }
  }

  /** Remove up to `n` bytes from the front of the buffer, as views. */
  private take(n: number): Uint8Array[] {
    const parts: Uint8Array[] = [];
    let remaining = Math.min(n, this.buffered);
    while (remaining > 0) {
      const head = this.chunks[0];
      if (head.length <= remaining) {
        parts.push(head);
        this.chunks.shift();
        remaining -= head.length;
        this.buffered -= head.length;
        this.consumed += head.length;
      } else {
        parts.push(head.subarray(0, remaining));
        this.chunks[0] = head.subarray(remaining);
        this.buffered -= remaining;
        this.consumed += remaining;
        remaining = 0;
      }
    }
    return parts;
  }

  /**
   * Read up to `n` bytes. The result is shorter than `n` only when the
   * stream ended first.
   */
  async readAtMost(n: number): Promise<Uint8Array> {
    await this.ensureBytes(n);
    const parts = this.take(n);
    if (parts.length === 1) return parts[0].slice();
    const total = parts.reduce((sum, part) => sum + part.length, 0);
    const result = new Uint8Array(total);
    let offset = 0;
    for (const part of parts) {
      result.set(part, offset);
      offset += part.length;
    }
    return result;
  }

  /**
   * Discard up to `n` bytes without retaining them.
   *
   * @returns Number of bytes actually skipped
   */
  async skip(n: number): Promise<number> {
    let skipped = 0;
    while (skipped < n) {
      if (this.buffered === 0 && !(await this.fill())) break;
      for (const part of this.take(n - skipped)) {
        skipped += part.length;
      }
    }
    return skipped;
  }

  /**
   * Pass up to `n` bytes through as they arrive, one buffered chunk at a
   * time. The generator stops early when the stream ends.
   */
  async *passThrough(n: number): AsyncGenerator<Uint8Array> {
    let remaining = n;
    while (remaining > 0) {
      if (this.buffered === 0 && !(await this.fill())) return;
      for (const part of this.take(Math.min(remaining, this.chunks[0].length))) {
        remaining -= part.length;
        yield part;
      }
    }
  }

  /** Pass everything left in the stream through. */
  async *rest(): AsyncGenerator<Uint8Array> {
    yield* this.passThrough(Number.POSITIVE_INFINITY);
  }

  /**
   * Release the underlying iterator without reading the rest of it, so a
   * file handle behind it is closed. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.done) return;
    this.done = true;
    this.chunks = [];
    this.buffered = 0;
    await this.iterator.return?.();
  }
}
