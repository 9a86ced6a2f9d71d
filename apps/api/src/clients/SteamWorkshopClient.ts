import axios from 'axios';
import { HttpClient } from './base/HttpClient';
import type { CacheService } from '../services/cache.service';
import { config } from '../config/app.config';
import type { SteamConfig } from '../config/app.config';
import { FetchError, OperationCancelledError, describeError, throwIfAborted } from '../utils/errors';
import { workshopItemUrl } from '../utils/workshop-ids';

export interface FetchOptions {
  /** Skip the page cache, e.g. when refreshing a collection */
  fresh?: boolean;
  signal?: AbortSignal;
}

const ITEM_PATH = '/sharedfiles/filedetails/';

/**
 * Fetches Workshop item pages as HTML. Steam serves collections and items
 * from the same filedetails URL, so one method covers both.
 */
export class SteamWorkshopClient extends HttpClient {
  constructor(
    private cache: CacheService,
    private cachingEnabled: () => boolean = () => true,
    steam: SteamConfig = config.steam,
    private pageTTL: number = config.cache.pageTTL
  ) {
    super(
      {
        baseUrl: steam.baseUrl,
        timeout: steam.timeout,
        headers: {
          'User-Agent': steam.userAgent,
          Accept: 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-US,en;q=0.9',
        },
      },
      'Steam'
    );
  }

  async fetchItemPage(id: string, options: FetchOptions = {}): Promise<string> {
    const operation = `Fetch of Workshop item ${id}`;
    const cacheKey = `steam:page:${id}`;
    const useCache = this.cachingEnabled();

    if (useCache && !options.fresh) {
      const cached = await this.cache.get<string>(cacheKey);
      if (cached !== undefined) {
        return cached;
      }
    }

    throwIfAborted(options.signal, operation);

    let html: string;
    try {
      html = await this.getText(ITEM_PATH, { params: { id }, signal: options.signal });
    } catch (error) {
      if (axios.isCancel(error)) {
        throw new OperationCancelledError(operation);
      }
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new FetchError(
        `Could not fetch Workshop item ${id}: ${describeError(error)}`,
        workshopItemUrl(id),
        status,
        error
      );
    }

    if (useCache) {
      await this.cache.set(cacheKey, html, this.pageTTL);
    }
    return html;
  }
}
