/**
 * A Workshop item as it is kept in the metadata cache.
 */
export interface WorkshopItem {
  id: string;
  modIds: string[]; // Mod IDs this item contributed to the Mod ID list
  name: string;
  buildTag: string; // e.g. "42", "41.78" or "(unknown)"
  tags: string[];
  isMap: boolean;
  mapFolders: string[];
  requires: string[]; // Workshop IDs listed under "Required items"
  link: string;
}

/**
 * Details scraped from an item page, before any mod ID has been chosen.
 */
export interface WorkshopItemDetails extends Omit<WorkshopItem, 'modIds'> {
  modIdOptions: string[];
}

export interface CollectionRecord {
  url: string;
  title: string;
  items: string[]; // every child known to belong to the collection
  added: string[]; // children this collection inserted into the ID lists
}

export interface CollectionSummary extends CollectionRecord {
  itemCount: number;
  addedCount: number;
}

export interface SingleItemPage {
  kind: 'item';
  id: string;
  details: WorkshopItemDetails;
}

/**
 * An item page carrying a "Required items" section. Never imported as a collection.
 */
export interface StandaloneRequiredItemPage {
  kind: 'standalone';
  id: string;
  details: WorkshopItemDetails;
}

export interface CollectionPage {
  kind: 'collection';
  id: string;
  url: string;
  title: string;
  childIds: string[];
}

export type WorkshopPage = SingleItemPage | StandaloneRequiredItemPage | CollectionPage;

export interface ModIdSelectionRequest {
  id: string;
  name: string;
  options: string[];
}

export interface ImportCollectionResult {
  collection: CollectionRecord;
  addedIds: string[];
  duplicateIds: string[];
  skippedIds: string[];
  pendingSelections: ModIdSelectionRequest[];
}

export interface RefreshCollectionResult extends ImportCollectionResult {
  removedIds: string[];
  unchangedIds: string[];
}

export interface DeleteCollectionResult {
  url: string;
  removedIds: string[];
}

export type AddLinkResult =
  | ({ status: 'collection-imported' } & ImportCollectionResult)
  | { status: 'collection-exists'; collection: CollectionRecord }
  | {
      status: 'item-added';
      item: WorkshopItem;
      dependenciesAdded: string[];
      dependenciesSkipped: string[];
      pendingSelections: ModIdSelectionRequest[];
    }
  | { status: 'item-duplicate'; id: string }
  | { status: 'item-skipped'; id: string; pendingSelections: ModIdSelectionRequest[] };

export type CollectionBatchResult<T> =
  | { url: string; ok: true; result: T }
  | { url: string; ok: false; error: string };

export interface RemoveItemsResult {
  removedIds: string[];
  missingIds: string[];
}

export interface RefreshDetailsResult {
  updatedIds: string[];
  failedIds: string[];
}

export interface IdLines {
  workshopIds: string;
  modIds: string;
}

export type ItemView = 'mods' | 'maps' | 'all';

export type ItemSortKey = 'name' | 'build' | 'tags' | 'link' | 'added';

export interface ListItemsQuery {
  view?: ItemView;
  sort?: ItemSortKey;
  order?: 'asc' | 'desc';
  search?: string;
}

export interface ItemRow extends WorkshopItem {
  position: number; // index in the Workshop ID list
}
