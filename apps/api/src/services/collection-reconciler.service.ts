import type {
  CollectionRecord,
  DeleteCollectionResult,
  ImportCollectionResult,
  ModIdSelectionRequest,
  RefreshCollectionResult,
  WorkshopItemDetails,
} from '@pzws/shared-types';
import { WorkshopLedger, itemFromDetails } from '../stores/WorkshopLedger';
import type { WorkspaceState } from '../stores/WorkspaceState';
import { ModIdResolver, resolveModIds } from './mod-id-resolvers';
import { throwIfAborted } from '../utils/errors';
import { collectionKey } from '../utils/workshop-ids';
import { logger } from '../utils/logger';

/**
 * A child of a collection as handed over by the scraper. `details` may be left
 * out for children that are already listed, since nothing is inserted for them.
 */
export interface CollectionChild {
  id: string;
  details?: WorkshopItemDetails;
  chosenModIds?: string[];
}

export interface ReconcileOptions {
  resolver?: ModIdResolver;
  title?: string;
  // Checked after every mod ID choice; an abort throws and the draft is dropped
  signal?: AbortSignal;
}

interface Admission {
  addedIds: string[];
  duplicateIds: string[];
  skippedIds: string[];
  pendingSelections: ModIdSelectionRequest[];
}

function uniqueChildren(children: CollectionChild[]): CollectionChild[] {
  const seen = new Set<string>();
  return children.filter((child) => {
    if (seen.has(child.id)) return false;
    seen.add(child.id);
    return true;
  });
}

/**
 * Keeps a collection's recorded membership in line with its Workshop page.
 *
 * `items` is every child the collection is known to contain; `added` is the
 * subset this collection actually inserted into the ID lists. Only `added`
 * children are ever removed again, so IDs entered by hand or brought in by
 * another collection survive any refresh or delete.
 */
export class CollectionReconciler {
  constructor(private state: WorkspaceState) {}

  async importCollection(
    url: string,
    title: string,
    children: CollectionChild[],
    options: ReconcileOptions = {}
  ): Promise<ImportCollectionResult> {
    const key = collectionKey(url);

    return this.state.transact(`import of ${key}`, async (ledger) => {
      const existing = ledger.getCollection(key);
      if (existing) {
        logger.warn(`[Reconciler] ${key} is already imported; refreshing it instead`);
        const { removedIds: _removed, unchangedIds: _unchanged, ...result } = await this.reconcile(
          ledger,
          existing,
          children,
          { ...options, title }
        );
        return result;
      }

      const record: CollectionRecord = { url: key, title, items: [], added: [] };
      const admission = await this.admit(ledger, record, uniqueChildren(children), options);
      ledger.saveCollection(record);

      logger.info(
        `[Reconciler] Imported ${key}: ${admission.addedIds.length} added, ${admission.duplicateIds.length} already listed, ${admission.skippedIds.length} skipped`
      );
      return { collection: record, ...admission };
    });
  }

  async refreshCollection(
    record: CollectionRecord,
    currentChildren: CollectionChild[],
    options: ReconcileOptions = {}
  ): Promise<RefreshCollectionResult> {
    return this.state.transact(`refresh of ${record.url}`, (ledger) =>
      this.reconcile(ledger, ledger.getCollection(record.url) ?? record, currentChildren, options)
    );
  }

  async deleteCollection(record: CollectionRecord): Promise<DeleteCollectionResult> {
    return this.state.transact(`delete of ${record.url}`, (ledger) => {
      const stored = ledger.getCollection(record.url) ?? record;
      ledger.deleteCollection(stored.url);
      const removedIds = stored.added.filter((id) => this.release(ledger, stored.url, id));

      logger.info(`[Reconciler] Deleted ${stored.url}; removed ${removedIds.length} item(s) it had added`);
      return { url: stored.url, removedIds };
    });
  }

  private async reconcile(
    ledger: WorkshopLedger,
    stored: CollectionRecord,
    currentChildren: CollectionChild[],
    options: ReconcileOptions
  ): Promise<RefreshCollectionResult> {
    const children = uniqueChildren(currentChildren);
    const current = new Set(children.map((child) => child.id));
    const known = new Set(stored.items);

    // Children this collection added that are gone upstream
    const removedIds: string[] = [];
    for (const id of stored.added) {
      if (!current.has(id) && this.release(ledger, stored.url, id)) {
        removedIds.push(id);
      }
    }

    const next: CollectionRecord = {
      url: stored.url,
      title: options.title ?? stored.title,
      items: [],
      added: stored.added.filter((id) => current.has(id)),
    };

    const unchangedIds: string[] = [];
    const fresh: CollectionChild[] = [];
    for (const child of children) {
      if (known.has(child.id)) {
        unchangedIds.push(child.id);
        if (child.details) {
          ledger.updateDetails(child.details);
        }
      } else {
        fresh.push(child);
      }
    }

    // Known children keep their upstream position; admitted ones are slotted back in below
    next.items = unchangedIds.slice();
    const admission = await this.admit(ledger, next, fresh, options);
    const accepted = new Set(next.items);
    next.items = children.map((child) => child.id).filter((id) => accepted.has(id));

    ledger.saveCollection(next);

    logger.info(
      `[Reconciler] Refreshed ${stored.url}: ${admission.addedIds.length} added, ${removedIds.length} removed, ${unchangedIds.length} unchanged`
    );
    return { collection: next, ...admission, removedIds, unchangedIds };
  }

  /**
   * Gives up `url`'s claim on a child it added. When another collection still
   * lists the child, that collection takes ownership and the ID stays listed.
   * True when the ID was removed from the lists.
   */
  private release(ledger: WorkshopLedger, url: string, id: string): boolean {
    const heir = ledger.collections.values().find((record) => record.url !== url && record.items.includes(id));
    if (heir) {
      const next = ledger.getCollection(heir.url) ?? heir;
      if (!next.added.includes(id)) {
        next.added.push(id);
        ledger.saveCollection(next);
      }
      logger.info(`[Reconciler] ${id} left ${url} but stays listed; ${heir.url} owns it now`);
      return false;
    }
    return ledger.remove(id);
  }

  /**
   * Inserts children that are not listed yet and records them in `items` and
   * `added`. Listed children only join `items`. Children whose mod ID cannot
   * be settled are left out of the record entirely.
   */
  private async admit(
    ledger: WorkshopLedger,
    record: CollectionRecord,
    children: CollectionChild[],
    options: ReconcileOptions
  ): Promise<Admission> {
    const admission: Admission = { addedIds: [], duplicateIds: [], skippedIds: [], pendingSelections: [] };

    for (const child of children) {
      if (ledger.contains(child.id)) {
        record.items.push(child.id);
        admission.duplicateIds.push(child.id);
        continue;
      }

      if (!child.details) {
        logger.warn(`[Reconciler] No details for ${child.id}; leaving it out of ${record.url}`);
        admission.skippedIds.push(child.id);
        continue;
      }

      const resolution = await resolveModIds(child.details, child.chosenModIds, options.resolver, options.signal);
      throwIfAborted(options.signal, `Reconciling ${record.url}`);
      if (resolution.kind === 'skipped') {
        admission.skippedIds.push(child.id);
        admission.pendingSelections.push(resolution.request);
        continue;
      }

      ledger.insert(itemFromDetails(child.details, resolution.modIds));
      record.items.push(child.id);
      record.added.push(child.id);
      admission.addedIds.push(child.id);
    }

    return admission;
  }
}
