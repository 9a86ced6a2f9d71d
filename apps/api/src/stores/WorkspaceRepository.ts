import type { CollectionRecord, WorkshopItem } from '@pzws/shared-types';
import { IdList } from './IdList';
import { MetadataStore, cloneItem } from './MetadataStore';
import { CollectionStore, cloneCollection } from './CollectionStore';

/**
 * Everything that is persisted, in plain form.
 */
export interface WorkspaceSnapshot {
  workshopIds: string[];
  modIds: string[];
  items: WorkshopItem[];
  collections: CollectionRecord[];
}

export interface WorkspaceRepository {
  load(): Promise<WorkspaceSnapshot>;
  /** Must either store the whole snapshot or throw, leaving the old one readable. */
  save(snapshot: WorkspaceSnapshot): Promise<void>;
}

export interface WorkspaceData {
  workshopIds: IdList;
  modIds: IdList;
  metadata: MetadataStore;
  collections: CollectionStore;
}

export function emptySnapshot(): WorkspaceSnapshot {
  return { workshopIds: [], modIds: [], items: [], collections: [] };
}

export function fromSnapshot(snapshot: WorkspaceSnapshot): WorkspaceData {
  return {
    workshopIds: new IdList(snapshot.workshopIds),
    modIds: new IdList(snapshot.modIds),
    metadata: new MetadataStore(snapshot.items.map(cloneItem)),
    collections: new CollectionStore(snapshot.collections.map(cloneCollection)),
  };
}

export function toSnapshot(data: WorkspaceData): WorkspaceSnapshot {
  return {
    workshopIds: data.workshopIds.toArray(),
    modIds: data.modIds.toArray(),
    items: data.metadata.values().map(cloneItem),
    collections: data.collections.values().map(cloneCollection),
  };
}

export function cloneWorkspace(data: WorkspaceData): WorkspaceData {
  return {
    workshopIds: data.workshopIds.clone(),
    modIds: data.modIds.clone(),
    metadata: data.metadata.clone(),
    collections: data.collections.clone(),
  };
}
