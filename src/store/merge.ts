/**
 * Merge Rules
 *
 * Timestamped records (probes, offsets) are deduplicated by timestamp.
 * Mesh snapshots are compared by probed matrix, and only against the most
 * recent stored snapshot: a matrix that comes back after a different one
 * is recorded again.
 */

import type { MeshSnapshot, TimestampedRecord } from '../types/index.js';

/**
 * Incoming records whose timestamp is not stored yet, in incoming order.
 * Repeated timestamps within `incoming` are kept once.
 */
export function mergeByTimestamp<T extends TimestampedRecord>(existing: readonly T[], incoming: readonly T[]): T[] {
  const seen = new Set(existing.map(record => record.timestamp));
  const added: T[] = [];

  for (const record of incoming) {
    if (seen.has(record.timestamp)) continue;
    seen.add(record.timestamp);
    added.push(record);
  }

  return added;
}

export function mergeMeshByContent(existing: readonly MeshSnapshot[], incoming: MeshSnapshot): boolean {
  const last = latest(existing);
  if (!last) return true;
  return !matricesEqual(last.probed_matrix, incoming.probed_matrix);
}

export function matricesEqual(a: readonly (readonly number[])[], b: readonly (readonly number[])[]): boolean {
  if (a.length !== b.length) return false;

  for (let row = 0; row < a.length; row++) {
    const left = a[row];
    const right = b[row];
    if (left.length !== right.length) return false;
    for (let col = 0; col < left.length; col++) {
      if (left[col] !== right[col]) return false;
    }
  }

  return true;
}

/**
 * Ascending by timestamp. Stable, so equal timestamps keep their order.
 */
export function sortByTimestamp<T extends TimestampedRecord>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Most recent record by sort order
 */
export function latest<T extends TimestampedRecord>(records: readonly T[]): T | undefined {
  if (records.length === 0) return undefined;
  return sortByTimestamp(records)[records.length - 1];
}
