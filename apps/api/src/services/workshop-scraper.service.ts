import type { WorkshopItemDetails, WorkshopPage } from '@pzws/shared-types';
import type { FetchOptions, SteamWorkshopClient } from '../clients/SteamWorkshopClient';
import { classifyWorkshopPage, parseItemDetails } from '../scraping/workshopPage.parser';
import { ValidationError } from '../utils/errors';
import { parseWorkshopId, workshopItemUrl } from '../utils/workshop-ids';

export type { FetchOptions };

/**
 * Where WorkshopService gets its pages from. Tests hand in a fake.
 */
export interface WorkshopPageSource {
  fetchPage(url: string, options?: FetchOptions): Promise<WorkshopPage>;
  fetchItemDetails(id: string, options?: FetchOptions): Promise<WorkshopItemDetails>;
}

export class WorkshopScraper implements WorkshopPageSource {
  constructor(private client: SteamWorkshopClient) {}

  async fetchPage(url: string, options: FetchOptions = {}): Promise<WorkshopPage> {
    const id = parseWorkshopId(url);
    if (!id) {
      throw new ValidationError(`Not a Steam Workshop link: ${url}`);
    }
    const html = await this.client.fetchItemPage(id, options);
    return classifyWorkshopPage(workshopItemUrl(id), html);
  }

  async fetchItemDetails(id: string, options: FetchOptions = {}): Promise<WorkshopItemDetails> {
    const html = await this.client.fetchItemPage(id, options);
    return parseItemDetails(id, html);
  }
}
