import type { WorkshopItem } from '@pzws/shared-types';

export interface ReadonlyMetadataStore {
  readonly size: number;
  get(id: string): WorkshopItem | undefined;
  has(id: string): boolean;
  values(): WorkshopItem[];
}

export function cloneItem(item: WorkshopItem): WorkshopItem {
  return {
    ...item,
    modIds: [...item.modIds],
    tags: [...item.tags],
    mapFolders: [...item.mapFolders],
    requires: [...item.requires],
  };
}

export class MetadataStore implements ReadonlyMetadataStore {
  private items = new Map<string, WorkshopItem>();

  constructor(items: Iterable<WorkshopItem> = []) {
    for (const item of items) {
      this.set(item);
    }
  }

  get size(): number {
    return this.items.size;
  }

  get(id: string): WorkshopItem | undefined {
    return this.items.get(id);
  }

  has(id: string): boolean {
    return this.items.has(id);
  }

  set(item: WorkshopItem): void {
    this.items.set(item.id, item);
  }

  delete(id: string): boolean {
    return this.items.delete(id);
  }

  values(): WorkshopItem[] {
    return [...this.items.values()];
  }

  /** True when an item other than `exceptId` still lists the mod ID. */
  isModIdReferenced(modId: string, exceptId?: string): boolean {
    const key = modId.toLowerCase();
    for (const item of this.items.values()) {
      if (item.id === exceptId) continue;
      if (item.modIds.some((candidate) => candidate.toLowerCase() === key)) {
        return true;
      }
    }
    return false;
  }

  clone(): MetadataStore {
    return new MetadataStore(this.values().map(cloneItem));
  }
}
