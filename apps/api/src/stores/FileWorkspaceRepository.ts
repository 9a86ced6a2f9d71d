import * as fs from 'fs';
import * as path from 'path';
import type { CollectionRecord, WorkshopItem } from '@pzws/shared-types';
import { IdList } from './IdList';
import type { WorkspaceRepository, WorkspaceSnapshot } from './WorkspaceRepository';
import {
  normalizeStoredCollection,
  normalizeStoredItem,
  serializeItem,
  storedCollectionSchema,
  storedFileSchema,
  storedItemSchema,
} from './workspace.schemas';
import { PersistenceError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export const WORKSHOP_IDS_FILE = 'WorkshopIDs.txt';
export const MOD_IDS_FILE = 'ModIDs.txt';
export const METADATA_FILE = 'WorkshopMeta.json';
export const COLLECTIONS_FILE = 'Collections.json';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Keeps the workspace as four files in one directory, the same files a
 * server admin edits or copies by hand:
 *   - WorkshopIDs.txt / ModIDs.txt: one line, `;`-joined, insertion order
 *   - WorkshopMeta.json: Workshop ID -> metadata
 *   - Collections.json: collection URL -> { title, url, items, added }
 */
export class FileWorkspaceRepository implements WorkspaceRepository {
  private writeCounter = 0;

  constructor(private dataDir: string) {}

  async load(): Promise<WorkspaceSnapshot> {
    const [workshopText, modText, metadataText, collectionsText] = await Promise.all([
      this.readOptional(WORKSHOP_IDS_FILE),
      this.readOptional(MOD_IDS_FILE),
      this.readOptional(METADATA_FILE),
      this.readOptional(COLLECTIONS_FILE),
    ]);

    const workshopIds = IdList.parse(workshopText ?? '').toArray();
    return {
      workshopIds,
      modIds: IdList.parse(modText ?? '').toArray(),
      items: this.parseItems(metadataText),
      collections: this.dropUnlistedOwnership(this.parseCollections(collectionsText), new Set(workshopIds)),
    };
  }

  async save(snapshot: WorkspaceSnapshot): Promise<void> {
    const metadata: Record<string, Omit<WorkshopItem, 'id'>> = {};
    for (const item of snapshot.items) {
      metadata[item.id] = serializeItem(item);
    }
    const collections: Record<string, CollectionRecord> = {};
    for (const record of snapshot.collections) {
      collections[record.url] = record;
    }

    const files: Array<[string, string]> = [
      [WORKSHOP_IDS_FILE, new IdList(snapshot.workshopIds).serialize()],
      [MOD_IDS_FILE, new IdList(snapshot.modIds).serialize()],
      [METADATA_FILE, `${JSON.stringify(metadata, null, 2)}\n`],
      [COLLECTIONS_FILE, `${JSON.stringify(collections, null, 2)}\n`],
    ];

    await fs.promises.mkdir(this.dataDir, { recursive: true });

    // Stage every file first so a failed write leaves all four originals in place.
    // The renames are not atomic as a group; Collections.json goes last, and
    // ownership of IDs missing from WorkshopIDs.txt is dropped again on load.
    this.writeCounter += 1;
    const suffix = `.tmp-${process.pid}-${this.writeCounter}`;
    const staged: Array<[string, string]> = [];
    try {
      for (const [name, content] of files) {
        const target = path.join(this.dataDir, name);
        const temp = `${target}${suffix}`;
        await fs.promises.writeFile(temp, content, 'utf-8');
        staged.push([temp, target]);
      }
      for (const [temp, target] of staged) {
        await fs.promises.rename(temp, target);
      }
    } catch (error) {
      await Promise.all(staged.map(([temp]) => fs.promises.rm(temp, { force: true })));
      throw error;
    }

    logger.debug(`[FileWorkspace] Saved workspace to ${this.dataDir}`);
  }

  // A collection can only own IDs that are actually listed
  private dropUnlistedOwnership(records: CollectionRecord[], listed: Set<string>): CollectionRecord[] {
    return records.map((record) => {
      const added = record.added.filter((id) => listed.has(id));
      if (added.length === record.added.length) {
        return record;
      }
      const dropped = record.added.filter((id) => !listed.has(id));
      logger.warn(`[FileWorkspace] ${record.url} claims unlisted ${dropped.join(', ')}; dropping that ownership`);
      return { ...record, added };
    });
  }

  private async readOptional(name: string): Promise<string | null> {
    const file = path.join(this.dataDir, name);
    try {
      return await fs.promises.readFile(file, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new PersistenceError(`Could not read ${file}: ${describeError(error)}`, 'load', error);
    }
  }

  private parseJsonObject(text: string | null, name: string): Record<string, unknown> {
    if (!text || !text.trim()) {
      return {};
    }
    try {
      const parsed = storedFileSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn(`[FileWorkspace] ${name} is not a JSON object; ignoring its contents`);
    } catch (error) {
      logger.warn(`[FileWorkspace] ${name} is not valid JSON; ignoring its contents: ${describeError(error)}`);
    }
    return {};
  }

  private parseItems(text: string | null): WorkshopItem[] {
    const items: WorkshopItem[] = [];
    for (const [id, value] of Object.entries(this.parseJsonObject(text, METADATA_FILE))) {
      const parsed = storedItemSchema.safeParse(value);
      if (!parsed.success) {
        logger.warn(`[FileWorkspace] Skipping malformed metadata entry ${id}`);
        continue;
      }
      items.push(normalizeStoredItem(id, parsed.data));
    }
    return items;
  }

  private parseCollections(text: string | null): CollectionRecord[] {
    const records = new Map<string, CollectionRecord>();
    for (const [key, value] of Object.entries(this.parseJsonObject(text, COLLECTIONS_FILE))) {
      const parsed = storedCollectionSchema.safeParse(value);
      if (!parsed.success) {
        logger.warn(`[FileWorkspace] Skipping malformed collection entry ${key}`);
        continue;
      }
      const record = normalizeStoredCollection(key, parsed.data);
      records.set(record.url, record);
    }
    return [...records.values()];
  }
}
