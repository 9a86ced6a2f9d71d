import type { CollectionRecord } from '@pzws/shared-types';
import { InvariantViolationError } from '../utils/errors';

export interface ReadonlyCollectionStore {
  readonly size: number;
  get(url: string): CollectionRecord | undefined;
  has(url: string): boolean;
  values(): CollectionRecord[];
}

export function cloneCollection(record: CollectionRecord): CollectionRecord {
  return {
    ...record,
    items: [...record.items],
    added: [...record.added],
  };
}

/**
 * `items` and `added` are sets, and every added child must also be an item.
 */
export function assertCollectionConsistent(record: CollectionRecord): void {
  const items = new Set(record.items);
  if (items.size !== record.items.length) {
    throw new InvariantViolationError(`Collection ${record.url} lists a child more than once`);
  }
  if (new Set(record.added).size !== record.added.length) {
    throw new InvariantViolationError(`Collection ${record.url} records an added child more than once`);
  }
  const stray = record.added.filter((id) => !items.has(id));
  if (stray.length > 0) {
    throw new InvariantViolationError(
      `Collection ${record.url} claims to have added ${stray.join(', ')} which it does not contain`
    );
  }
}

export class CollectionStore implements ReadonlyCollectionStore {
  private records = new Map<string, CollectionRecord>();

  constructor(records: Iterable<CollectionRecord> = []) {
    for (const record of records) {
      this.set(record);
    }
  }

  get size(): number {
    return this.records.size;
  }

  get(url: string): CollectionRecord | undefined {
    return this.records.get(url);
  }

  has(url: string): boolean {
    return this.records.has(url);
  }

  set(record: CollectionRecord): void {
    assertCollectionConsistent(record);
    this.records.set(record.url, record);
  }

  delete(url: string): boolean {
    return this.records.delete(url);
  }

  values(): CollectionRecord[] {
    return [...this.records.values()];
  }

  /**
   * Forget that any collection inserted `id`. Returns the URLs that changed.
   */
  releaseOwnership(id: string): string[] {
    const changed: string[] = [];
    for (const record of this.records.values()) {
      if (record.added.includes(id)) {
        record.added = record.added.filter((added) => added !== id);
        changed.push(record.url);
      }
    }
    return changed;
  }

  clone(): CollectionStore {
    return new CollectionStore(this.values().map(cloneCollection));
  }
}
