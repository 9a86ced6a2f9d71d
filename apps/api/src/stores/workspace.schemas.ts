import { z } from 'zod';
import type { CollectionRecord, WorkshopItem } from '@pzws/shared-types';
import { parseWorkshopId, uniqueIds, workshopItemUrl } from '../utils/workshop-ids';

const UNKNOWN = '(unknown)';

const optionalText = z.string().trim().min(1).optional().catch(undefined);
const textList = z.array(z.string()).catch([]);
const optionalFlag = z.boolean().optional().catch(undefined);

/**
 * One entry of WorkshopMeta.json. Older files used `title`, `version`,
 * `url`, `mods`, `map_folders` and `is_map`; both spellings are read.
 */
export const storedItemSchema = z.object({
  name: optionalText,
  title: optionalText,
  buildTag: optionalText,
  version: optionalText,
  link: optionalText,
  url: optionalText,
  modIds: textList.optional(),
  mods: textList.optional(),
  tags: textList,
  mapFolders: textList.optional(),
  map_folders: textList.optional(),
  requires: textList,
  isMap: optionalFlag,
  is_map: optionalFlag,
});

export const storedCollectionSchema = z.object({
  title: optionalText,
  url: optionalText,
  items: textList,
  added: textList,
});

export const storedFileSchema = z.record(z.string(), z.unknown());

export type StoredItem = z.infer<typeof storedItemSchema>;
export type StoredCollection = z.infer<typeof storedCollectionSchema>;

export function normalizeStoredItem(id: string, stored: StoredItem): WorkshopItem {
  const tags = uniqueIds(stored.tags);
  const mapFolders = uniqueIds(stored.mapFolders ?? stored.map_folders ?? []);
  const isMap = stored.isMap ?? stored.is_map ?? (mapFolders.length > 0 || tags.includes('Map'));

  return {
    id,
    modIds: uniqueIds(stored.modIds ?? stored.mods ?? []),
    name: stored.name ?? stored.title ?? UNKNOWN,
    buildTag: stored.buildTag ?? stored.version ?? UNKNOWN,
    tags,
    isMap,
    mapFolders,
    requires: uniqueIds(stored.requires, false),
    link: stored.link ?? stored.url ?? workshopItemUrl(id),
  };
}

/**
 * Older files keyed collections by their numeric ID; both forms map to the canonical URL.
 * An `added` entry outside `items` is dropped rather than trusted.
 */
export function normalizeStoredCollection(key: string, stored: StoredCollection): CollectionRecord {
  const id = parseWorkshopId(key) ?? (stored.url ? parseWorkshopId(stored.url) : null);
  const url = id ? workshopItemUrl(id) : stored.url ?? key;
  const items = uniqueIds(stored.items, false);
  const itemSet = new Set(items);

  return {
    url,
    title: stored.title ?? (id ? `Collection ${id}` : url),
    items,
    added: uniqueIds(stored.added, false).filter((child) => itemSet.has(child)),
  };
}

export function serializeItem(item: WorkshopItem): Omit<WorkshopItem, 'id'> {
  const { id: _id, ...rest } = item;
  return rest;
}
