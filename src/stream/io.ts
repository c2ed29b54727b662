import { StreamError } from '../errors';
import type { ByteReader, ByteWriter } from './types';

function isInterrupted(err: unknown): boolean {
  return err instanceof StreamError && err.code === 'interrupted';
}

/**
 * Fill `buffer` completely or throw `StreamError('unexpected-eof')`.
 * Reads that fail with `interrupted` are retried.
 */
export function readExact(stream: ByteReader, buffer: Uint8Array): void {
  const filled = readBestEffort(stream, buffer);
  if (filled < buffer.length) {
    throw new StreamError(
      'unexpected-eof',
      `Unexpected end of stream: needed ${buffer.length} bytes, got ${filled}`,
    );
  }
}

/**
 * Read until `buffer` is full or the stream reports end of data.
 * Only `interrupted` failures are retried; any other error propagates.
 * Returns the number of bytes placed in `buffer`.
 */
export function readBestEffort(stream: ByteReader, buffer: Uint8Array): number {
  let filled = 0;
  while (filled < buffer.length) {
    let count: number;
    try {
      count = stream.read(buffer.subarray(filled));
    } catch (err) {
      if (isInterrupted(err)) continue;
      throw err;
    }
    if (count === 0) break;
    filled += count;
  }
  return filled;
}

/** Write every byte of `data`, retrying on `interrupted`. */
export function writeAll(stream: ByteWriter, data: Uint8Array): void {
  let written = 0;
  while (written < data.length) {
    let count: number;
    try {
      count = stream.write(data.subarray(written));
    } catch (err) {
      if (isInterrupted(err)) continue;
      throw err;
    }
    if (count === 0) {
      throw new StreamError('write-zero', `Failed to write whole buffer: ${written} of ${data.length} bytes written`);
    }
    written += count;
  }
}
