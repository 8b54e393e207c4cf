/**
 * Line scanning over raw bytes
 */
import type { Buffer } from 'node:buffer';

const LF = 0x0a;
const CR = 0x0d;

export interface RawLine {
  /** Line content without its terminator, decoded as latin1 */
  text: string;
  /** Offset of the first byte of the line */
  start: number;
  /** Offset of the first byte after the terminator */
  next: number;
  /** Line ended with LF alone rather than CRLF */
  bareLf: boolean;
}

/**
 * Read one line starting at `start`.
 * Returns null if no line terminator has been received yet.
 */
export function readLine(data: Buffer, start: number): RawLine | null {
  const lf = data.indexOf(LF, start);
  if (lf === -1) return null;

  const hasCr = lf > start && data[lf - 1] === CR;
  const end = hasCr ? lf - 1 : lf;

  return {
    text: data.subarray(start, end).toString('latin1'),
    start,
    next: lf + 1,
    bareLf: !hasCr,
  };
}

/**
 * Whether the byte at `offset` starts a CRLF (or bare LF) terminator.
 * Returns the terminator length, or 0 when there is none (or not enough data).
 */
export function terminatorAt(data: Buffer, offset: number): number {
  if (data[offset] === CR && data[offset + 1] === LF) return 2;
  if (data[offset] === LF) return 1;
  return 0;
}
