/**
 * Mulberry32 PRNG: fast, simple seeded random number generator.
 *
 * One instance is one reproducible stream; there is no shared or global state.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /**
   * Returns a random 32-bit unsigned integer
   */
  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /**
   * Fill a buffer with the next bytes of the stream.
   * A trailing partial word consumes a whole draw.
   */
  fillBuffer(buffer: Buffer): void {
    const wordCount = Math.floor(buffer.length / 4);
    for (let i = 0; i < wordCount; i++) {
      buffer.writeUInt32LE(this.nextUint32(), i * 4);
    }

    const remaining = buffer.length % 4;
    if (remaining > 0) {
      const last = this.nextUint32();
      for (let i = 0; i < remaining; i++) {
        buffer[wordCount * 4 + i] = (last >>> (i * 8)) & 0xff;
      }
    }
  }

  /**
   * Draw `size` bytes into a fresh buffer
   */
  nextBytes(size: number): Buffer {
    const buffer = Buffer.allocUnsafe(size);
    this.fillBuffer(buffer);
    return buffer;
  }
}
