/**
 * Window shapes that sit on the boundaries of a bounded view: empty data,
 * empty windows, and windows that start or end past the data.
 */

export interface WindowShape {
  name: string;
  dataLength: number;
  start: number;
  end: number;
}

export const WINDOW_SEEDS: readonly WindowShape[] = [
  { name: 'empty data, empty window', dataLength: 0, start: 0, end: 0 },
  { name: 'empty data, open window', dataLength: 0, start: 0, end: 16 },
  { name: 'whole data', dataLength: 12, start: 0, end: 12 },
  { name: 'inner slice', dataLength: 17, start: 4, end: 9 },
  { name: 'zero-length window mid-data', dataLength: 10, start: 5, end: 5 },
  { name: 'window running past data', dataLength: 8, start: 6, end: 20 },
  { name: 'window starting at data end', dataLength: 8, start: 8, end: 12 },
  { name: 'window starting past data', dataLength: 4, start: 9, end: 15 },
  { name: 'single byte', dataLength: 3, start: 1, end: 2 },
];
