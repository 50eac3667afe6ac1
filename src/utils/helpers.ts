import { ID_CHUNK_SIZE } from './constants';

export const sanitizeFilename = (filename: string): string => {
  return filename.replace(/[^a-zA-Z0-9._-]/g, '_');
};

/**
 * Splits an id list into ordered chunks so each `IN (...)` filter stays
 * within a bounded number of parameters.
 */
export const inChunks = <T>(ids: readonly T[], size = ID_CHUNK_SIZE): T[][] => {
  if (size < 1) throw new RangeError('Chunk size must be at least 1');
  const chunks: T[][] = [];
  for (let i = 0; i < ids.length; i += size) {
    chunks.push(ids.slice(i, i + size));
  }
  return chunks;
};

/**
 * `part / whole * 100` rounded half-up to two decimals, using integer
 * arithmetic only. A zero `whole` yields 0.
 */
export const percentageOf = (part: number, whole: number): number => {
  if (whole <= 0) return 0;
  const hundredths = Math.floor((part * 20000 + whole) / (2 * whole));
  return hundredths / 100;
};

export const compareText = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

export const uniqueSorted = (values: Iterable<string>): string[] => {
  return Array.from(new Set(values)).sort(compareText);
};
