import * as fs from 'fs';
import { StreamError } from '../errors';
import { checkedAdd, isOffset } from './position';
import type { ByteReader, ByteWriter, SeekFrom, Seekable } from './types';

/**
 * Synchronous file-backed stream. Keeps its own cursor and issues
 * positional reads and writes, so several streams over the same path do
 * not share a file offset.
 */
export class FileStream implements ByteReader, ByteWriter, Seekable {
  private fd: number | undefined;
  private _position = 0;
  readonly path: string;

  private constructor(path: string, fd: number) {
    this.path = path;
    this.fd = fd;
  }

  /** Open `path` with Node's `fs` flags (`'r'`, `'r+'`, `'w+'`, ...). */
  static open(path: string, flags: fs.OpenMode = 'r'): FileStream {
    return new FileStream(path, wrapFs(path, () => fs.openSync(path, flags)));
  }

  get position(): number {
    return this._position;
  }

  read(buffer: Uint8Array): number {
    if (buffer.length === 0) return 0;
    const fd = this.handle();
    const count = wrapFs(this.path, () => fs.readSync(fd, buffer, 0, buffer.length, this._position));
    this._position += count;
    return count;
  }

  write(data: Uint8Array): number {
    if (data.length === 0) return 0;
    const fd = this.handle();
    const count = wrapFs(this.path, () => fs.writeSync(fd, data, 0, data.length, this._position));
    this._position += count;
    return count;
  }

  seek(pos: SeekFrom): number {
    let target: number | undefined;
    switch (pos.whence) {
      case 'start':
        target = isOffset(pos.offset) ? pos.offset : undefined;
        break;
      case 'current':
        target = checkedAdd(this._position, pos.offset);
        break;
      case 'end': {
        const fd = this.handle();
        const size = wrapFs(this.path, () => fs.fstatSync(fd).size);
        target = checkedAdd(size, pos.offset);
        break;
      }
    }
    if (target === undefined) {
      throw new StreamError(
        'invalid-input',
        `${this.path}: invalid seek to a negative or overflowing position (${pos.whence} ${pos.offset})`,
      );
    }
    this._position = target;
    return target;
  }

  /** Close the descriptor. Further operations throw. */
  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    wrapFs(this.path, () => fs.closeSync(fd));
  }

  private handle(): number {
    if (this.fd === undefined) {
      throw new StreamError('released', `${this.path}: file stream is closed`);
    }
    return this.fd;
  }
}

function wrapFs<T>(path: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    const interrupted = err instanceof Error && 'code' in err && err.code === 'EINTR';
    throw new StreamError(
      interrupted ? 'interrupted' : 'other',
      `${path}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}
