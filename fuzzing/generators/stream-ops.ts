/**
 * Random operation sequences for a BoundedStream over a ByteCursor, and a
 * reference model they are replayed against.
 *
 * The model tracks the relative position and predicts every read count,
 * every byte and every seek result. Any disagreement is reported as a
 * violation string.
 */

import { StreamError } from '../../src/errors';
import { BoundedStream } from '../../src/stream/BoundedStream';
import { ByteCursor } from '../../src/stream/ByteCursor';
import { SeekFrom } from '../../src/stream/types';
import type { WindowShape } from '../seeds';
import { Rng } from './rng';

export type StreamOp =
  | { kind: 'read'; size: number }
  | { kind: 'seek'; pos: SeekFrom }
  | { kind: 'length' };

export interface StreamCase {
  data: Uint8Array;
  start: number;
  end: number;
  ops: StreamOp[];
}

export interface CaseOptions {
  /** Maximum data length (default: 32). */
  maxData?: number;
  /** Maximum number of operations (default: 40). */
  maxOps?: number;
}

/** Random window over random data. */
export function generateCase(rng: Rng, options: CaseOptions = {}): StreamCase {
  const maxData = options.maxData ?? 32;
  const dataLength = rng.int(0, maxData);
  const start = rng.int(0, dataLength + 4);
  const end = rng.int(start, start + maxData);
  return caseFromShape(rng, { name: 'random', dataLength, start, end }, options);
}

/** Random operations over a fixed window shape. */
export function caseFromShape(rng: Rng, shape: WindowShape, options: CaseOptions = {}): StreamCase {
  const size = shape.end - shape.start;
  const ops: StreamOp[] = [];
  const count = rng.int(1, options.maxOps ?? 40);
  for (let i = 0; i < count; i++) {
    const roll = rng.next();
    if (roll < 0.45) {
      ops.push({ kind: 'read', size: rng.int(0, size + 3) });
    } else if (roll < 0.9) {
      const whence = rng.pick(['start', 'current', 'end'] as const);
      ops.push({ kind: 'seek', pos: SeekFrom[whence](rng.int(-size - 3, size + 3)) });
    } else {
      ops.push({ kind: 'length' });
    }
  }
  return { data: rng.bytes(shape.dataLength), start: shape.start, end: shape.end, ops };
}

/** Replay `c` against a real view and the model. Returns the violations found. */
export function checkCase(c: StreamCase): string[] {
  const violations: string[] = [];
  const cursor = ByteCursor.from(c.data);
  cursor.seek(SeekFrom.start(c.start));
  const view = BoundedStream.create(cursor, { start: c.start, end: c.end });
  const size = c.end - c.start;
  const dataEnd = c.data.length;
  let position = 0;

  c.ops.forEach((op, step) => {
    const where = `op ${step} (${formatOp(op)})`;
    switch (op.kind) {
      case 'read': {
        const absolute = c.start + position;
        const expected = Math.max(0, Math.min(op.size, c.end - absolute, dataEnd - absolute));
        const buf = new Uint8Array(op.size);
        const count = view.read(buf);
        if (count !== expected) {
          violations.push(`${where}: read ${count} bytes, expected ${expected}`);
          return;
        }
        for (let i = 0; i < count; i++) {
          if (buf[i] !== c.data[absolute + i]) {
            violations.push(`${where}: byte ${i} is ${buf[i]}, expected ${c.data[absolute + i]}`);
            return;
          }
        }
        position += count;
        break;
      }
      case 'seek': {
        const base = op.pos.whence === 'start' ? 0 : op.pos.whence === 'current' ? position : size;
        const relative = base + op.pos.offset;
        if (relative < 0) {
          try {
            view.seek(op.pos);
            violations.push(`${where}: seek to ${relative} succeeded`);
          } catch (err) {
            if (!(err instanceof StreamError) || err.code !== 'invalid-input') {
              violations.push(`${where}: unexpected error ${String(err)}`);
            }
          }
          break;
        }
        const expected = Math.min(relative, size);
        const landed = view.seek(op.pos);
        if (landed !== expected) {
          violations.push(`${where}: landed at ${landed}, expected ${expected}`);
        }
        position = expected;
        break;
      }
      case 'length': {
        const expected = Math.min(Math.max(dataEnd - c.start, 0), size);
        const length = view.length();
        if (length !== expected) {
          violations.push(`${where}: length ${length}, expected ${expected}`);
        }
        break;
      }
    }

    if (view.position() !== position) {
      violations.push(`${where}: position ${view.position()}, expected ${position}`);
    }
    if (cursor.position > c.end) {
      violations.push(`${where}: wrapped stream at ${cursor.position}, past window end ${c.end}`);
    }
  });

  return violations;
}

export function formatOp(op: StreamOp): string {
  switch (op.kind) {
    case 'read':
      return `read ${op.size}`;
    case 'seek':
      return `seek ${op.pos.whence} ${op.pos.offset}`;
    case 'length':
      return 'length';
  }
}
