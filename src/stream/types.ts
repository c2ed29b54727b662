/**
 * Capabilities the toolkit assumes of a byte stream. Every operation is
 * synchronous; offsets are non-negative safe integers.
 */

export type SeekFrom =
  | { readonly whence: 'start'; readonly offset: number }
  | { readonly whence: 'current'; readonly offset: number }
  | { readonly whence: 'end'; readonly offset: number };

export const SeekFrom = {
  /** Absolute offset from the beginning of the stream. Must be non-negative. */
  start(offset: number): SeekFrom {
    return { whence: 'start', offset };
  },
  /** Signed offset from the current position. */
  current(offset: number): SeekFrom {
    return { whence: 'current', offset };
  },
  /** Signed offset from the end of the stream. */
  end(offset: number): SeekFrom {
    return { whence: 'end', offset };
  },
};

export interface ByteReader {
  /**
   * Read up to `buffer.length` bytes into `buffer`.
   * Returns the number of bytes read; 0 means end of stream.
   */
  read(buffer: Uint8Array): number;
}

export interface ByteWriter {
  /** Write some prefix of `data`. Returns the number of bytes written. */
  write(data: Uint8Array): number;
}

export interface Seekable {
  /** Move the cursor and return the new absolute position. */
  seek(pos: SeekFrom): number;
}

export type ReadSeeker = ByteReader & Seekable;
export type WriteSeeker = ByteWriter & Seekable;
