/**
 * Row compression for reasoning prompts
 *
 * Store results are handed to the model as compact text instead of raw JSON:
 * fields whose value is the same across every record are stated once under
 * "Common", the remaining fields are listed per record under "Variants".
 */

import type { Row } from '../types.js';

export interface CompressionStats {
  originalSize: number;
  compressedSize: number;
  compressionRatio: number;
  savedChars: number;
}

export function formatValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

function formatRecord(record: Row): string {
  return Object.entries(record)
    .filter(([, v]) => isPresent(v))
    .map(([k, v]) => `${k}: ${formatValue(v)}`)
    .join(', ');
}

/**
 * Compress records into a single line of text
 *
 * @param rows - Records to compress
 * @param maxRecords - Records considered before compressing (default 10)
 */
export function compressRows(rows: readonly Row[], maxRecords = 10): string {
  if (rows.length === 0) {
    return 'No data available';
  }

  const limited = rows.slice(0, maxRecords);

  if (limited.length === 1) {
    return formatRecord(limited[0]);
  }

  // Fields with at most one distinct non-null value across all records
  const common = new Map<string, unknown>();
  for (const key of Object.keys(limited[0])) {
    const distinct = new Map<string, unknown>();
    for (const record of limited) {
      const value = record[key];
      if (isPresent(value)) distinct.set(formatValue(value), value);
    }
    if (distinct.size <= 1) {
      const [only] = distinct.values();
      common.set(key, only ?? null);
    }
  }

  if (common.size === 0) {
    return limited.slice(0, 3).map(formatRecord).join(' | ');
  }

  const varying: Row[] = [];
  for (const record of limited) {
    const fields: Row = {};
    for (const [k, v] of Object.entries(record)) {
      if (!common.has(k) && isPresent(v)) fields[k] = v;
    }
    if (Object.keys(fields).length > 0) varying.push(fields);
  }

  const commonText = [...common.entries()]
    .filter(([, v]) => isPresent(v))
    .map(([k, v]) => `${k}: ${formatValue(v)}`)
    .join(', ');
  const variantText = varying.slice(0, 5).map(formatRecord).join(' | ');

  return `Common: ${commonText} | Variants: ${variantText}`;
}

/**
 * Size comparison between raw records and their compressed text
 */
export function compressionStats(rows: readonly Row[], compressed: string): CompressionStats {
  if (rows.length === 0) {
    return { originalSize: 0, compressedSize: compressed.length, compressionRatio: 0, savedChars: 0 };
  }
  const originalSize = JSON.stringify(rows).length;
  const compressedSize = compressed.length;
  const ratio = originalSize > 0 ? (originalSize - compressedSize) / originalSize : 0;
  return {
    originalSize,
    compressedSize,
    compressionRatio: Math.round(ratio * 1000) / 1000,
    savedChars: originalSize - compressedSize,
  };
}
