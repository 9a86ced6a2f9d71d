import type { ReadonlyIdList } from './IdList';
import type { ReadonlyMetadataStore } from './MetadataStore';
import type { ReadonlyCollectionStore } from './CollectionStore';
import { WorkshopLedger } from './WorkshopLedger';
import {
  WorkspaceData,
  WorkspaceRepository,
  cloneWorkspace,
  fromSnapshot,
  toSnapshot,
} from './WorkspaceRepository';
import { PersistenceError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface WorkspaceView {
  workshopIds: ReadonlyIdList;
  modIds: ReadonlyIdList;
  metadata: ReadonlyMetadataStore;
  collections: ReadonlyCollectionStore;
}

/**
 * Owns the live ID lists, metadata and collections.
 *
 * Reads go through `view`. Writes go through `transact`, which works on a
 * cloned draft, persists it, and only then swaps it in. Transactions run one
 * at a time in the order they were started.
 */
export class WorkspaceState {
  private data: WorkspaceData;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private repository: WorkspaceRepository, data: WorkspaceData) {
    this.data = data;
  }

  static async load(repository: WorkspaceRepository): Promise<WorkspaceState> {
    const snapshot = await repository.load();
    logger.info(
      `[Workspace] Loaded ${snapshot.workshopIds.length} workshop IDs, ${snapshot.modIds.length} mod IDs, ${snapshot.collections.length} collections`
    );
    return new WorkspaceState(repository, fromSnapshot(snapshot));
  }

  get view(): WorkspaceView {
    return this.data;
  }

  transact<T>(operation: string, mutator: (ledger: WorkshopLedger) => T | Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(operation, mutator));
    // Keep the chain alive after a failed transaction
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runTransaction<T>(
    operation: string,
    mutator: (ledger: WorkshopLedger) => T | Promise<T>
  ): Promise<T> {
    const draft = cloneWorkspace(this.data);
    const ledger = new WorkshopLedger(draft);
    const result = await mutator(ledger);

    if (!ledger.dirty) {
      return result;
    }

    try {
      await this.repository.save(toSnapshot(draft));
    } catch (error) {
      logger.error(`[Workspace] ${operation} could not be saved: ${describeError(error)}`);
      throw new PersistenceError(
        `Could not save changes for ${operation}: ${describeError(error)}`,
        operation,
        error
      );
    }

    this.data = draft;
    logger.debug(`[Workspace] ${operation} committed`);
    return result;
  }
}
