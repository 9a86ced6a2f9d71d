import type { CollectionPage, WorkshopItem, WorkshopItemDetails, WorkshopPage } from '@pzws/shared-types';
import type { FetchOptions, WorkshopPageSource } from '../services/workshop-scraper.service';
import { itemFromDetails } from '../stores/WorkshopLedger';
import { FetchError } from '../utils/errors';
import { parseWorkshopId, workshopItemUrl } from '../utils/workshop-ids';

export function itemDetails(id: string, overrides: Partial<WorkshopItemDetails> = {}): WorkshopItemDetails {
  return {
    id,
    name: `Item ${id}`,
    buildTag: '42',
    tags: [],
    isMap: false,
    mapFolders: [],
    requires: [],
    link: workshopItemUrl(id),
    modIdOptions: [`mod${id}`],
    ...overrides,
  };
}

export function workshopItem(id: string, overrides: Partial<WorkshopItem> = {}): WorkshopItem {
  return { ...itemFromDetails(itemDetails(id), [`mod${id}`]), ...overrides };
}

export function collectionPage(id: string, childIds: string[], title = `Collection ${id}`): CollectionPage {
  return { kind: 'collection', id, url: workshopItemUrl(id), title, childIds };
}

/**
 * Page source backed by maps. Records every call so tests can check what was fetched.
 */
export class FakePageSource implements WorkshopPageSource {
  pages = new Map<string, WorkshopPage>();
  details = new Map<string, WorkshopItemDetails>();
  pageRequests: Array<{ id: string; options: FetchOptions }> = [];
  detailRequests: Array<{ id: string; options: FetchOptions }> = [];
  onDetails: ((id: string) => void) | null = null;

  addItem(details: WorkshopItemDetails): this {
    this.details.set(details.id, details);
    this.pages.set(details.id, { kind: 'item', id: details.id, details });
    return this;
  }

  addCollection(page: CollectionPage): this {
    this.pages.set(page.id, page);
    return this;
  }

  async fetchPage(url: string, options: FetchOptions = {}): Promise<WorkshopPage> {
    const id = parseWorkshopId(url) ?? url;
    this.pageRequests.push({ id, options });
    const page = this.pages.get(id);
    if (!page) {
      throw new FetchError(`No page for ${id}`, url, 404);
    }
    return page;
  }

  async fetchItemDetails(id: string, options: FetchOptions = {}): Promise<WorkshopItemDetails> {
    this.detailRequests.push({ id, options });
    this.onDetails?.(id);
    const details = this.details.get(id);
    if (!details) {
      throw new FetchError(`No page for ${id}`, workshopItemUrl(id), 404);
    }
    return details;
  }
}
