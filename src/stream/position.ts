import { SeekFrom, type Seekable } from './types';

/** Largest offset any stream in this toolkit can report. */
export const MAX_OFFSET = Number.MAX_SAFE_INTEGER;

/** Whether `value` is a usable stream offset. */
export function isOffset(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/** `a + b`, or undefined when the sum leaves [0, MAX_OFFSET]. */
export function checkedAdd(a: number, b: number): number | undefined {
  const sum = a + b;
  if (!Number.isSafeInteger(sum) || sum < 0 || sum > MAX_OFFSET) return undefined;
  return sum;
}

/** `a - b`, or undefined when the difference leaves [0, MAX_OFFSET]. */
export function checkedSub(a: number, b: number): number | undefined {
  return checkedAdd(a, -b);
}

/** `a + b` clamped to MAX_OFFSET. Both operands must be offsets. */
export function saturatingAdd(a: number, b: number): number {
  return a > MAX_OFFSET - b ? MAX_OFFSET : a + b;
}

/** Current absolute position, queried with a zero-length relative seek. */
export function streamPosition(stream: Seekable): number {
  return stream.seek(SeekFrom.current(0));
}

/**
 * Total length of the stream. Leaves the position where it was, using at
 * most two seeks: the restoring seek is skipped when already at the end.
 */
export function streamLength(stream: Seekable): number {
  const oldPosition = streamPosition(stream);
  const length = stream.seek(SeekFrom.end(0));
  if (oldPosition !== length) {
    stream.seek(SeekFrom.start(oldPosition));
  }
  return length;
}
