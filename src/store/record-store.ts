/**
 * JSON Record Store
 *
 * One JSON array per record kind. Files are rewritten whole, through a temp
 * file and a rename, so a crash mid-save leaves the previous version intact.
 * All writes to one path go through that path's exclusive section.
 *
 * A missing, unreadable or invalid file loads as an empty store. Elements
 * that fail validation are left out of `load()` but never removed from disk
 * by `append()`.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { z } from 'zod';
import type { EventBus } from '../events/bus.js';
import { MalformedStoreError } from '../infra/errors.js';
import { KeyedMutex, storeMutex } from '../infra/keyed-mutex.js';
import type { TimestampedRecord } from '../types/index.js';

export interface RecordStoreOptions<T> {
  /** Validates each stored element on load */
  schema: z.ZodType<T>;
  events?: EventBus;
  /** Lock shared by every store in the process (default: storeMutex) */
  mutex?: KeyedMutex;
}

/**
 * Parsed store file: the valid records, and every element as stored
 */
interface StoreDocument<T> {
  records: T[];
  elements: unknown[];
}

let tempCounter = 0;

export class JsonRecordStore<T extends TimestampedRecord> {
  readonly filePath: string;
  private schema: z.ZodType<T>;
  private events?: EventBus;
  private mutex: KeyedMutex;

  constructor(filePath: string, options: RecordStoreOptions<T>) {
    this.filePath = path.resolve(filePath);
    this.schema = options.schema;
    this.events = options.events;
    this.mutex = options.mutex ?? storeMutex;
  }

  /**
   * Read the stored records, in file order
   */
  async load(): Promise<T[]> {
    const document = await this.read();
    return document.records;
  }

  /**
   * Replace the stored collection, sorted ascending by timestamp
   */
  save(records: readonly T[]): Promise<void> {
    return this.mutex.runExclusive(this.filePath, () => this.write(records));
  }

  /**
   * Load, pick the records to add, and save them, as one exclusive section.
   * Nothing is written when `select` returns no records. Stored elements
   * that fail validation are written back unchanged.
   *
   * @param select - receives the valid stored records, returns the ones to append
   * @returns the appended records
   */
  append(select: (existing: readonly T[]) => T[]): Promise<T[]> {
    return this.mutex.runExclusive(this.filePath, async () => {
      const document = await this.read();
      const added = select(document.records);
      if (added.length > 0) {
        await this.write([...document.elements, ...added]);
      }
      return added;
    });
  }

  private async read(): Promise<StoreDocument<T>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return { records: [], elements: [] };
      }
      return this.recover('read failed', error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return this.recover('invalid JSON', error);
    }

    if (!Array.isArray(parsed)) {
      return this.recover('expected a JSON array');
    }

    const elements: unknown[] = parsed;
    const records: T[] = [];
    for (const element of elements) {
      const result = this.schema.safeParse(element);
      if (result.success) {
        records.push(result.data);
      }
    }

    const dropped = elements.length - records.length;
    if (dropped > 0) {
      this.events?.emit({ type: 'store:dropped-records', filePath: this.filePath, dropped });
    }

    return { records, elements };
  }

  private async write(elements: readonly unknown[]): Promise<void> {
    const ordered = orderByTimestamp(elements);
    const body = JSON.stringify(ordered, null, 2) + '\n';
    const tempPath = `${this.filePath}.${process.pid}.${++tempCounter}.tmp`;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    try {
      const handle = await fs.open(tempPath, 'w');
      try {
        await handle.writeFile(body, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    this.events?.emit({ type: 'store:saved', filePath: this.filePath, count: ordered.length });
  }

  private recover(reason: string, cause?: unknown): StoreDocument<T> {
    const error = new MalformedStoreError(this.filePath, reason, { cause });
    this.events?.emit({ type: 'store:recovered', filePath: this.filePath, error });
    return { records: [], elements: [] };
  }
}

/**
 * Ascending by timestamp, stable. An element without a numeric timestamp
 * sorts with the element before it, so it keeps its place.
 */
function orderByTimestamp(elements: readonly unknown[]): unknown[] {
  let key = -Infinity;
  const keyed = elements.map((element, index) => {
    const timestamp = timestampOf(element);
    if (timestamp !== undefined) key = timestamp;
    return { element, key, index };
  });

  keyed.sort((a, b) => (a.key === b.key ? a.index - b.index : a.key - b.key));
  return keyed.map(entry => entry.element);
}

function timestampOf(element: unknown): number | undefined {
  if (
    typeof element === 'object' && element !== null &&
    'timestamp' in element && typeof element.timestamp === 'number' &&
    Number.isFinite(element.timestamp)
  ) {
    return element.timestamp;
  }
  return undefined;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
