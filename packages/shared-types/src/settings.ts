import type { ItemSortKey, ItemView } from './workshop';

export interface UiSettings {
  darkMode: boolean;
  /** View shown when the item list opens */
  defaultView: ItemView;
  defaultSort: ItemSortKey;
}

export interface WorkshopSettings {
  /** Add the "Required items" of a single item along with it */
  autoAddRequirements: boolean;
  /** Reuse fetched Workshop pages for CACHE_TTL_PAGES seconds */
  cachePages: boolean;
}

export interface AppSettings {
  ui: UiSettings;
  workshop: WorkshopSettings;
}
