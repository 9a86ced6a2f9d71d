import type { CollectionRecord, WorkshopItem, WorkshopItemDetails } from '@pzws/shared-types';
import type { ReadonlyIdList } from './IdList';
import type { ReadonlyCollectionStore } from './CollectionStore';
import type { ReadonlyMetadataStore } from './MetadataStore';
import { cloneItem } from './MetadataStore';
import { cloneCollection } from './CollectionStore';
import type { WorkspaceData } from './WorkspaceRepository';

export function itemFromDetails(details: WorkshopItemDetails, modIds: string[]): WorkshopItem {
  const { modIdOptions: _options, ...rest } = details;
  return {
    ...rest,
    tags: [...rest.tags],
    mapFolders: [...rest.mapFolders],
    requires: [...rest.requires],
    modIds: [...modIds],
  };
}

/**
 * Mutators for one draft of the workspace. Only code running inside
 * `WorkspaceState.transact` gets a ledger, so every change here is either
 * persisted as a whole or thrown away.
 */
export class WorkshopLedger {
  private changed = false;

  constructor(private data: WorkspaceData) {}

  get dirty(): boolean {
    return this.changed;
  }

  get workshopIds(): ReadonlyIdList {
    return this.data.workshopIds;
  }

  get modIds(): ReadonlyIdList {
    return this.data.modIds;
  }

  get metadata(): ReadonlyMetadataStore {
    return this.data.metadata;
  }

  get collections(): ReadonlyCollectionStore {
    return this.data.collections;
  }

  contains(id: string): boolean {
    return this.data.workshopIds.has(id);
  }

  /**
   * Adds the Workshop ID, its metadata and its mod IDs. False when the ID is already listed.
   */
  insert(item: WorkshopItem): boolean {
    if (this.contains(item.id)) {
      return false;
    }
    this.data.workshopIds.add(item.id);
    this.data.metadata.set(cloneItem(item));
    for (const modId of item.modIds) {
      this.data.modIds.add(modId);
    }
    this.changed = true;
    return true;
  }

  /**
   * Drops the Workshop ID and its metadata. The item's mod IDs go too,
   * unless another remaining item still uses them. False when the ID is absent.
   */
  remove(id: string): boolean {
    if (!this.contains(id)) {
      return false;
    }
    this.data.workshopIds.remove(id);
    const item = this.data.metadata.get(id);
    this.data.metadata.delete(id);
    for (const modId of item?.modIds ?? []) {
      if (!this.data.metadata.isModIdReferenced(modId)) {
        this.data.modIds.remove(modId);
      }
    }
    this.changed = true;
    return true;
  }

  /**
   * Refresh scraped fields of a listed item, keeping the mod IDs chosen earlier.
   */
  updateDetails(details: WorkshopItemDetails): boolean {
    if (!this.contains(details.id)) {
      return false;
    }
    const previous = this.data.metadata.get(details.id);
    this.data.metadata.set(itemFromDetails(details, previous?.modIds ?? []));
    this.changed = true;
    return true;
  }

  getCollection(url: string): CollectionRecord | undefined {
    const record = this.data.collections.get(url);
    return record ? cloneCollection(record) : undefined;
  }

  saveCollection(record: CollectionRecord): void {
    this.data.collections.set(cloneCollection(record));
    this.changed = true;
  }

  deleteCollection(url: string): boolean {
    const deleted = this.data.collections.delete(url);
    this.changed = this.changed || deleted;
    return deleted;
  }

  releaseOwnership(id: string): string[] {
    const changed = this.data.collections.releaseOwnership(id);
    this.changed = this.changed || changed.length > 0;
    return changed;
  }
}
