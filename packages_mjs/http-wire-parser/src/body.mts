/**
 * Bounded body capture
 */
import { Buffer } from 'node:buffer';

/**
 * Collects body bytes up to a fixed cap; bytes past the cap are counted, not kept.
 */
export class BodyCapture {
  private readonly parts: Buffer[] = [];
  private kept = 0;
  private seen = 0;

  constructor(private readonly cap: number) {}

  push(chunk: Buffer): void {
    this.seen += chunk.length;
    const room = this.cap - this.kept;
    if (room <= 0) return;
    const slice = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.parts.push(slice);
    this.kept += slice.length;
  }

  /** Total bytes pushed, kept or not */
  get length(): number {
    return this.seen;
  }

  get truncated(): boolean {
    return this.seen > this.cap;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.parts, this.kept);
  }
}
