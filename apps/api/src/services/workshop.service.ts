import type {
  AddLinkResult,
  CollectionBatchResult,
  CollectionPage,
  CollectionSummary,
  DeleteCollectionResult,
  IdLines,
  ItemRow,
  ListItemsQuery,
  ModIdSelectionRequest,
  RefreshCollectionResult,
  RefreshDetailsResult,
  RemoveItemsResult,
  WorkshopItem,
  WorkshopItemDetails,
  WorkshopSettings,
} from '@pzws/shared-types';
import type { WorkspaceState } from '../stores/WorkspaceState';
import { itemFromDetails } from '../stores/WorkshopLedger';
import { cloneCollection } from '../stores/CollectionStore';
import { cloneItem } from '../stores/MetadataStore';
import type { CollectionChild, CollectionReconciler } from './collection-reconciler.service';
import { ModIdResolver, resolveModIds } from './mod-id-resolvers';
import type { WorkshopPageSource } from './workshop-scraper.service';
import {
  NotFoundError,
  OperationCancelledError,
  PageParseError,
  describeError,
  throwIfAborted,
} from '../utils/errors';
import { collectionKey, uniqueIds, workshopItemUrl } from '../utils/workshop-ids';
import { compareBuildTags, parseVersionParts } from '../utils/version';
import { logger } from '../utils/logger';

export interface WorkshopSettingsProvider {
  getWorkshopSettings(): WorkshopSettings;
}

export interface WorkshopOperationOptions {
  resolver?: ModIdResolver;
  signal?: AbortSignal;
}

const UNKNOWN = '(unknown)';

function placeholderItem(id: string): WorkshopItem {
  return {
    id,
    modIds: [],
    name: UNKNOWN,
    buildTag: UNKNOWN,
    tags: [],
    isMap: false,
    mapFolders: [],
    requires: [],
    link: workshopItemUrl(id),
  };
}

function isMapItem(item: WorkshopItem): boolean {
  return item.isMap || item.mapFolders.length > 0;
}

function searchText(item: WorkshopItem): string {
  const parts = [item.name, item.buildTag, item.tags.join(', '), item.link];
  if (isMapItem(item)) {
    parts.push(item.mapFolders.join(', '));
  }
  return parts.join(' | ').toLowerCase();
}

function textCompare(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareRows(a: ItemRow, b: ItemRow, sort: NonNullable<ListItemsQuery['sort']>): number {
  switch (sort) {
    case 'name':
      return textCompare(a.name, b.name);
    case 'tags':
      return textCompare(a.tags.join(', '), b.tags.join(', '));
    case 'link':
      return textCompare(a.link, b.link);
    case 'build':
      return compareBuildTags(a.buildTag, b.buildTag);
    case 'added':
      return a.position - b.position;
  }
}

/**
 * What the UI drives: adding links, removing items, refreshing metadata and
 * collections, and the list views. Pages come from a WorkshopPageSource;
 * every write goes through WorkspaceState.
 */
export class WorkshopService {
  constructor(
    private state: WorkspaceState,
    private reconciler: CollectionReconciler,
    private pages: WorkshopPageSource,
    private settings: WorkshopSettingsProvider
  ) {}

  async addLink(url: string, options: WorkshopOperationOptions = {}): Promise<AddLinkResult> {
    const operation = `Adding ${url}`;
    const page = await this.pages.fetchPage(url, { signal: options.signal });
    throwIfAborted(options.signal, operation);

    if (page.kind === 'collection') {
      return this.addCollection(page, options, operation);
    }
    if (page.kind === 'standalone') {
      logger.info(`[Workshop] ${page.id} has required items; adding it as a single item`);
    }
    return this.addItem(page.details, options, operation);
  }

  /**
   * Adds each link in turn. A failing link does not stop the others; a
   * cancellation does.
   */
  async addLinks(urls: string[], options: WorkshopOperationOptions = {}): Promise<CollectionBatchResult<AddLinkResult>[]> {
    return this.runBatch(urls, (url) => this.addLink(url, options));
  }

  private async addCollection(
    page: CollectionPage,
    options: WorkshopOperationOptions,
    operation: string
  ): Promise<AddLinkResult> {
    const key = collectionKey(page.url);
    const existing = this.state.view.collections.get(key);
    if (existing) {
      logger.info(`[Workshop] Collection ${key} is already imported`);
      return { status: 'collection-exists', collection: cloneCollection(existing) };
    }

    const children = await this.scrapeChildren(page.childIds, options.signal, false, operation);
    throwIfAborted(options.signal, operation);

    const result = await this.reconciler.importCollection(key, page.title, children, {
      resolver: options.resolver,
      signal: options.signal,
    });
    return { status: 'collection-imported', ...result };
  }

  private async addItem(
    details: WorkshopItemDetails,
    options: WorkshopOperationOptions,
    operation: string
  ): Promise<AddLinkResult> {
    if (this.state.view.workshopIds.has(details.id)) {
      logger.info(`[Workshop] ${details.id} is already listed`);
      return { status: 'item-duplicate', id: details.id };
    }

    const resolution = await resolveModIds(details, undefined, options.resolver, options.signal);
    if (resolution.kind === 'skipped') {
      return { status: 'item-skipped', id: details.id, pendingSelections: [resolution.request] };
    }
    const item = itemFromDetails(details, resolution.modIds);

    const dependencies: WorkshopItem[] = [];
    const dependenciesSkipped: string[] = [];
    const pendingSelections: ModIdSelectionRequest[] = [];

    if (this.settings.getWorkshopSettings().autoAddRequirements) {
      for (const dependencyId of details.requires) {
        throwIfAborted(options.signal, operation);
        if (dependencyId === details.id || this.state.view.workshopIds.has(dependencyId)) {
          continue;
        }

        let dependency: WorkshopItemDetails;
        try {
          dependency = await this.pages.fetchItemDetails(dependencyId, { signal: options.signal });
        } catch (error) {
          if (error instanceof OperationCancelledError) throw error;
          logger.warn(`[Workshop] Could not fetch requirement ${dependencyId} of ${details.id}: ${describeError(error)}`);
          dependenciesSkipped.push(dependencyId);
          continue;
        }

        if (dependency.modIdOptions.length === 0) {
          logger.warn(`[Workshop] Requirement ${dependencyId} of ${details.id} shows no Mod ID; skipping it`);
          dependenciesSkipped.push(dependencyId);
          continue;
        }

        const dependencyResolution = await resolveModIds(dependency, undefined, options.resolver, options.signal);
        if (dependencyResolution.kind === 'skipped') {
          dependenciesSkipped.push(dependencyId);
          pendingSelections.push(dependencyResolution.request);
          continue;
        }
        dependencies.push(itemFromDetails(dependency, dependencyResolution.modIds));
      }
    }

    throwIfAborted(options.signal, operation);

    return this.state.transact<AddLinkResult>(`add of ${details.id}`, (ledger) => {
      if (!ledger.insert(item)) {
        return { status: 'item-duplicate', id: item.id };
      }
      const dependenciesAdded = dependencies.filter((dependency) => ledger.insert(dependency)).map((dependency) => dependency.id);

      logger.info(
        `[Workshop] Added ${item.id} (${item.name})${dependenciesAdded.length > 0 ? ` with requirements ${dependenciesAdded.join(', ')}` : ''}`
      );
      return { status: 'item-added', item, dependenciesAdded, dependenciesSkipped, pendingSelections };
    });
  }

  /**
   * Details for every child that is not listed yet. Listed children need no
   * scrape, since the reconciler only records them. A child whose page fails
   * goes in without details and ends up skipped.
   */
  private async scrapeChildren(
    childIds: string[],
    signal: AbortSignal | undefined,
    fresh: boolean,
    operation: string
  ): Promise<CollectionChild[]> {
    const children: CollectionChild[] = [];
    for (const id of childIds) {
      throwIfAborted(signal, operation);
      if (this.state.view.workshopIds.has(id)) {
        children.push({ id });
        continue;
      }
      try {
        children.push({ id, details: await this.pages.fetchItemDetails(id, { signal, fresh }) });
      } catch (error) {
        if (error instanceof OperationCancelledError) throw error;
        logger.warn(`[Workshop] Could not scrape collection child ${id}: ${describeError(error)}`);
        children.push({ id });
      }
    }
    return children;
  }

  async refreshCollection(url: string, options: WorkshopOperationOptions = {}): Promise<RefreshCollectionResult> {
    const key = collectionKey(url);
    const operation = `Refresh of ${key}`;
    const record = this.state.view.collections.get(key);
    if (!record) {
      throw new NotFoundError(`Collection ${key} is not tracked`);
    }

    const page = await this.pages.fetchPage(key, { fresh: true, signal: options.signal });
    if (page.kind !== 'collection') {
      throw new PageParseError(`${key} no longer reads as a collection`, key);
    }

    const children = await this.scrapeChildren(page.childIds, options.signal, true, operation);
    throwIfAborted(options.signal, operation);

    return this.reconciler.refreshCollection(cloneCollection(record), children, {
      resolver: options.resolver,
      title: page.title,
      signal: options.signal,
    });
  }

  /**
   * Refreshes the given collections, or every tracked one when the list is empty.
   */
  async refreshCollections(
    urls: string[],
    options: WorkshopOperationOptions = {}
  ): Promise<CollectionBatchResult<RefreshCollectionResult>[]> {
    const targets = urls.length > 0 ? urls : this.state.view.collections.values().map((record) => record.url);
    return this.runBatch(targets, (url) => this.refreshCollection(url, options));
  }

  async deleteCollection(url: string): Promise<DeleteCollectionResult> {
    const key = collectionKey(url);
    const record = this.state.view.collections.get(key);
    if (!record) {
      throw new NotFoundError(`Collection ${key} is not tracked`);
    }
    return this.reconciler.deleteCollection(cloneCollection(record));
  }

  async deleteCollections(urls: string[]): Promise<CollectionBatchResult<DeleteCollectionResult>[]> {
    return this.runBatch(urls, (url) => this.deleteCollection(url));
  }

  /**
   * Manual removal. The IDs also stop being owned by any collection, so a
   * later re-add by hand is never undone by a collection refresh or delete.
   */
  async removeItems(ids: string[]): Promise<RemoveItemsResult> {
    const wanted = uniqueIds(ids, false);
    return this.state.transact('manual removal', (ledger) => {
      const removedIds: string[] = [];
      const missingIds: string[] = [];
      for (const id of wanted) {
        if (ledger.remove(id)) {
          removedIds.push(id);
          ledger.releaseOwnership(id);
        } else {
          missingIds.push(id);
        }
      }
      logger.info(`[Workshop] Removed ${removedIds.length} item(s) by hand`);
      return { removedIds, missingIds };
    });
  }

  async refreshDetails(id: string, options: WorkshopOperationOptions = {}): Promise<WorkshopItem> {
    if (!this.state.view.workshopIds.has(id)) {
      throw new NotFoundError(`Workshop item ${id} is not listed`);
    }
    const details = await this.pages.fetchItemDetails(id, { fresh: true, signal: options.signal });
    await this.state.transact(`details refresh of ${id}`, (ledger) => ledger.updateDetails(details));
    return this.getItem(id);
  }

  async refreshAllDetails(options: WorkshopOperationOptions = {}): Promise<RefreshDetailsResult> {
    return this.refreshMany(this.state.view.workshopIds.toArray(), true, options.signal);
  }

  /**
   * Scrapes items that are listed but have no metadata yet, e.g. IDs that were
   * in WorkshopIDs.txt before the metadata file existed.
   */
  async refreshMissingDetails(options: WorkshopOperationOptions = {}): Promise<RefreshDetailsResult> {
    const missing = this.state.view.workshopIds.toArray().filter((id) => !this.state.view.metadata.has(id));
    if (missing.length === 0) {
      return { updatedIds: [], failedIds: [] };
    }
    logger.info(`[Workshop] Fetching metadata for ${missing.length} item(s) without any`);
    return this.refreshMany(missing, false, options.signal);
  }

  private async refreshMany(ids: string[], fresh: boolean, signal?: AbortSignal): Promise<RefreshDetailsResult> {
    const operation = 'Details refresh';
    const scraped: WorkshopItemDetails[] = [];
    const failedIds: string[] = [];

    for (const id of ids) {
      throwIfAborted(signal, operation);
      try {
        scraped.push(await this.pages.fetchItemDetails(id, { fresh, signal }));
      } catch (error) {
        if (error instanceof OperationCancelledError) throw error;
        logger.warn(`[Workshop] Could not refresh ${id}: ${describeError(error)}`);
        failedIds.push(id);
      }
    }
    throwIfAborted(signal, operation);

    const updatedIds = await this.state.transact('details refresh', (ledger) =>
      scraped.filter((details) => ledger.updateDetails(details)).map((details) => details.id)
    );
    logger.info(`[Workshop] Refreshed details of ${updatedIds.length} item(s), ${failedIds.length} failed`);
    return { updatedIds, failedIds };
  }

  getItem(id: string): WorkshopItem {
    const item = this.state.view.metadata.get(id);
    if (item) {
      return cloneItem(item);
    }
    if (this.state.view.workshopIds.has(id)) {
      return placeholderItem(id);
    }
    throw new NotFoundError(`Workshop item ${id} is not listed`);
  }

  listItems(query: ListItemsQuery = {}): ItemRow[] {
    const { view = 'all', sort = 'added', order = 'asc' } = query;
    const term = query.search?.trim().toLowerCase() ?? '';

    const rows: ItemRow[] = this.state.view.workshopIds.toArray().map((id, position) => ({
      ...this.getItem(id),
      position,
    }));

    const filtered = rows.filter((row) => {
      if (view === 'maps' && !isMapItem(row)) return false;
      if (view === 'mods' && isMapItem(row)) return false;
      return !term || searchText(row).includes(term);
    });

    const direction = order === 'desc' ? -1 : 1;
    return filtered.sort((a, b) => {
      // Unknown builds stay at the bottom in both directions
      if (sort === 'build') {
        const aKnown = parseVersionParts(a.buildTag) !== null;
        const bKnown = parseVersionParts(b.buildTag) !== null;
        if (aKnown !== bKnown) return aKnown ? -1 : 1;
      }
      return compareRows(a, b, sort) * direction || a.position - b.position;
    });
  }

  getIdLines(): IdLines {
    return {
      workshopIds: this.state.view.workshopIds.toLine(),
      modIds: this.state.view.modIds.toLine(),
    };
  }

  listCollections(): CollectionSummary[] {
    return this.state.view.collections.values().map((record) => ({
      ...cloneCollection(record),
      itemCount: record.items.length,
      addedCount: record.added.length,
    }));
  }

  private async runBatch<T>(urls: string[], run: (url: string) => Promise<T>): Promise<CollectionBatchResult<T>[]> {
    const results: CollectionBatchResult<T>[] = [];
    for (const url of urls) {
      try {
        results.push({ url, ok: true, result: await run(url) });
      } catch (error) {
        if (error instanceof OperationCancelledError) throw error;
        logger.warn(`[Workshop] ${url}: ${describeError(error)}`);
        results.push({ url, ok: false, error: describeError(error) });
      }
    }
    return results;
  }
}
