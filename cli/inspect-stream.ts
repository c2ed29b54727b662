#!/usr/bin/env npx tsx
/**
 * CLI tool to decode a run of fixed-layout values from a window of a file.
 *
 * Usage:
 *   npx tsx cli/inspect-stream.ts <file> [--offset N] [--length N]
 *                                 [--type u8|i8|u16|...|f64|zstring]
 *                                 [--endian little|big]
 *
 * Defaults: offset 0, length up to the end of the file, type u8,
 * endian little. Each value is printed with its offset inside the window.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Endian, isEndian } from '../src/Endian';
import { ParseError } from '../src/errors';
import { BoundedStream } from '../src/stream/BoundedStream';
import { FileStream } from '../src/stream/FileStream';
import { MAX_OFFSET } from '../src/stream/position';
import { SeekFrom } from '../src/stream/types';
import type { Codec } from '../src/codecs/Codec';
import { SCALARS } from '../src/codecs/scalars';
import { ZString, zstring } from '../src/codecs/ZStringCodec';

interface Options {
  file: string;
  offset: number;
  length: number;
  type: string;
  endian: Endian;
}

const USAGE = 'Usage: npx tsx cli/inspect-stream.ts <file> [--offset N] [--length N] [--type NAME] [--endian little|big]';

function parseArgs(args: string[]): Options {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const value = args[i + 1];
      if (value === undefined) fail(`Missing value for ${arg}`);
      flags.set(arg.slice(2), value);
      i++;
    } else {
      positional.push(arg);
    }
  }
  if (positional.length !== 1) fail(USAGE);

  const endian = flags.get('endian') ?? Endian.Little;
  if (!isEndian(endian)) fail(`Unknown endian "${endian}"`);

  return {
    file: path.resolve(positional[0]),
    offset: parseCount(flags.get('offset'), 'offset', 0),
    length: parseCount(flags.get('length'), 'length', MAX_OFFSET),
    type: flags.get('type') ?? 'u8',
    endian,
  };
}

function parseCount(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) fail(`Invalid --${name}: ${raw}`);
  return value;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function formatValue(value: unknown): string {
  if (value instanceof ZString) return JSON.stringify(value.toLatin1());
  if (typeof value === 'bigint') return `${value}n`;
  return String(value);
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));

  if (!fs.existsSync(options.file)) {
    fail(`Error: file not found: ${options.file}`);
  }

  const codec: Codec<unknown> | undefined = options.type === 'zstring' ? zstring : SCALARS[options.type];
  if (!codec) {
    fail(`Unknown type "${options.type}". Known: ${[...Object.keys(SCALARS), 'zstring'].join(', ')}`);
  }

  const file = FileStream.open(options.file, 'r');
  try {
    file.seek(SeekFrom.start(options.offset));
    const window = BoundedStream.at(file, options.length);
    const total = window.length();

    console.log(`=== ${path.basename(options.file)} ===`);
    console.log(`window: [${window.start}, ${window.start + total}) type: ${options.type} endian: ${options.endian}\n`);

    let count = 0;
    while (window.position() < total) {
      const at = window.position();
      try {
        const value = codec.parse(window, options.endian);
        console.log(`${at.toString().padStart(8)}  ${formatValue(value)}`);
        count++;
      } catch (err) {
        const kind = err instanceof ParseError ? err.kind : 'error';
        const message = err instanceof Error ? err.message : String(err);
        fail(`Error at offset ${at} (absolute ${window.start + at}): ${kind}: ${message}`);
      }
    }
    console.log(`\n${count} value(s)`);
  } finally {
    file.close();
  }
}

main();
