/**
 * Entity helpers shared by the direct tools
 */

import type { ClassificationRecord, Row } from '../../../common/types.js';

/**
 * Values of an extracted entity as a trimmed, de-duplicated list
 */
export function entityValues(classification: ClassificationRecord, kind: string): string[] {
  const value = classification.extractedEntities[kind];
  if (value === null || value === undefined) return [];
  const values = typeof value === 'string' ? [value] : value;
  return unique(values.map((v) => v.trim()).filter((v) => v.length > 0));
}

export function hasEntity(classification: ClassificationRecord, kind: string): boolean {
  return entityValues(classification, kind).length > 0;
}

export function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/**
 * Split lookup keys by whether any row carries them in the given column
 *
 * Comparison is case-insensitive; keys keep the caller's spelling.
 */
export function partitionInputs(
  keys: readonly string[],
  rows: readonly Row[],
  column: string
): { matchedInputs: string[]; unmatchedInputs: string[] } {
  const found = new Set(
    rows
      .map((row) => row[column])
      .filter((value) => value !== null && value !== undefined)
      .map((value) => String(value).toUpperCase())
  );
  const matchedInputs: string[] = [];
  const unmatchedInputs: string[] = [];
  for (const key of keys) {
    (found.has(key.toUpperCase()) ? matchedInputs : unmatchedInputs).push(key);
  }
  return { matchedInputs, unmatchedInputs };
}
