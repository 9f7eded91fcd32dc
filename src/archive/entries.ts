import type { HrxPath } from '../path.js';
import type { HrxEntry } from '../types.js';

/** Build a file entry; omitted arguments stay absent rather than `undefined`. */
export function fileEntry(body?: string, comment?: string): HrxEntry {
  const data = body === undefined ? { type: 'file' as const } : { type: 'file' as const, body };
  return comment === undefined ? { data } : { comment, data };
}

/** Build a directory entry. */
export function directoryEntry(comment?: string): HrxEntry {
  const data = { type: 'directory' as const };
  return comment === undefined ? { data } : { comment, data };
}

type EntryRecord = {
  path: HrxPath;
  entry: HrxEntry;
};

/**
 * Insertion-ordered entries keyed by path text.
 *
 * Iteration follows first insertion; overwriting a key keeps its position.
 */
export class HrxEntryMap implements Iterable<[HrxPath, HrxEntry]> {
  private readonly records = new Map<string, EntryRecord>();

  get size(): number {
    return this.records.size;
  }

  has(path: HrxPath | string): boolean {
    return this.records.has(path.toString());
  }

  get(path: HrxPath | string): HrxEntry | undefined {
    return this.records.get(path.toString())?.entry;
  }

  set(path: HrxPath, entry: HrxEntry): this {
    this.records.set(path.toString(), { path, entry });
    return this;
  }

  delete(path: HrxPath | string): boolean {
    return this.records.delete(path.toString());
  }

  clear(): void {
    this.records.clear();
  }

  *keys(): IterableIterator<HrxPath> {
    for (const record of this.records.values()) yield record.path;
  }

  *values(): IterableIterator<HrxEntry> {
    for (const record of this.records.values()) yield record.entry;
  }

  *entries(): IterableIterator<[HrxPath, HrxEntry]> {
    for (const record of this.records.values()) yield [record.path, record.entry];
  }

  [Symbol.iterator](): IterableIterator<[HrxPath, HrxEntry]> {
    return this.entries();
  }
}
