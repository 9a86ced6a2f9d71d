import * as path from 'path';
import { CacheService } from './cache.service';
import { AppSettingsService } from './app-settings.service';
import { CollectionReconciler } from './collection-reconciler.service';
import { WorkshopPageSource, WorkshopScraper } from './workshop-scraper.service';
import { WorkshopService } from './workshop.service';
import { SteamWorkshopClient } from '../clients/SteamWorkshopClient';
import { WorkspaceState } from '../stores/WorkspaceState';
import type { WorkspaceRepository } from '../stores/WorkspaceRepository';
import { FileWorkspaceRepository } from '../stores/FileWorkspaceRepository';
import { WorkshopController } from '../controllers/workshop.controller';
import { CollectionsController } from '../controllers/collections.controller';
import { AppSettingsController } from '../controllers/app-settings.controller';
import { LogsController } from '../controllers/logs.controller';
import type { ApiControllers, HealthReport } from '../routes';
import { config } from '../config/app.config';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export const SETTINGS_FILE = 'Settings.json';

export interface ServiceOptions {
  dataDir?: string;
  // Stand-ins for tests; the defaults read and write the data directory and Steam
  repository?: WorkspaceRepository;
  pages?: WorkshopPageSource;
}

export interface ServiceContext {
  state: WorkspaceState;
  settings: AppSettingsService;
  cache: CacheService;
  workshop: WorkshopService;
  controllers: ApiControllers;
  health(): HealthReport;
  dispose(): void;
}

/**
 * Wires stores, scraper, services and controllers together for one data directory.
 */
export async function initializeServices(options: ServiceOptions = {}): Promise<ServiceContext> {
  const dataDir = options.dataDir ?? config.dataDir;
  logger.info(`Using data directory ${dataDir}`);

  const settings = new AppSettingsService(path.join(dataDir, SETTINGS_FILE));
  const cache = new CacheService(config.cache.pageTTL);

  const unsubscribe = settings.onChange((next) => {
    if (!next.workshop.cachePages) {
      cache.flush().catch((error: unknown) => logger.warn(`[Cache] Flush failed: ${describeError(error)}`));
    }
  });

  const pages =
    options.pages ??
    new WorkshopScraper(new SteamWorkshopClient(cache, () => settings.getWorkshopSettings().cachePages));

  const state = await WorkspaceState.load(options.repository ?? new FileWorkspaceRepository(dataDir));
  const reconciler = new CollectionReconciler(state);
  const workshop = new WorkshopService(state, reconciler, pages, settings);

  const controllers: ApiControllers = {
    workshop: new WorkshopController(workshop, settings),
    collections: new CollectionsController(workshop),
    settings: new AppSettingsController(settings),
    logs: new LogsController(),
  };

  return {
    state,
    settings,
    cache,
    workshop,
    controllers,
    health: () => ({
      status: 'ok',
      workshopIds: state.view.workshopIds.size,
      modIds: state.view.modIds.size,
      collections: state.view.collections.size,
      cachedPages: cache.getStats().keys,
    }),
    dispose: () => {
      unsubscribe();
      cache.close();
    },
  };
}
