import type {
  AddLinkResult,
  CollectionBatchResult,
  CollectionSummary,
  DeleteCollectionResult,
  ItemRow,
  ModIdSelectionRequest,
  RefreshCollectionResult,
  RemoveItemsResult,
} from '@pzws/shared-types';

function pendingLines(pending: ModIdSelectionRequest[]): string[] {
  return pending.map((request) => `  skipped ${request.id} (${request.name}): choose one of ${request.options.join(', ')}`);
}

export function formatAddResult(result: AddLinkResult): string[] {
  switch (result.status) {
    case 'collection-imported':
      return [
        `Imported collection "${result.collection.title}": ${result.addedIds.length} added, ${result.duplicateIds.length} already listed, ${result.skippedIds.length} skipped`,
        ...pendingLines(result.pendingSelections),
      ];
    case 'collection-exists':
      return [`Collection "${result.collection.title}" is already imported; use refresh to update it`];
    case 'item-added': {
      const lines = [`Added ${result.item.id} (${result.item.name}) with Mod ID(s) ${result.item.modIds.join(', ') || 'none'}`];
      if (result.dependenciesAdded.length > 0) {
        lines.push(`  also added requirements ${result.dependenciesAdded.join(', ')}`);
      }
      if (result.dependenciesSkipped.length > 0) {
        lines.push(`  requirements not added: ${result.dependenciesSkipped.join(', ')}`);
      }
      return [...lines, ...pendingLines(result.pendingSelections)];
    }
    case 'item-duplicate':
      return [`${result.id} is already listed`];
    case 'item-skipped':
      return [`Skipped ${result.id}: no Mod ID chosen`, ...pendingLines(result.pendingSelections)];
  }
}

export function formatRefreshResult(result: RefreshCollectionResult): string[] {
  return [
    `Refreshed "${result.collection.title}": ${result.addedIds.length} added, ${result.removedIds.length} removed, ${result.unchangedIds.length} unchanged`,
    ...pendingLines(result.pendingSelections),
  ];
}

export function formatDeleteResult(result: DeleteCollectionResult): string[] {
  return [`Removed collection ${result.url} and ${result.removedIds.length} item(s) it had added`];
}

export function formatRemoveResult(result: RemoveItemsResult): string[] {
  const lines = [`Removed ${result.removedIds.length} item(s)`];
  if (result.missingIds.length > 0) {
    lines.push(`  not listed: ${result.missingIds.join(', ')}`);
  }
  return lines;
}

export function formatBatch<T>(results: CollectionBatchResult<T>[], format: (result: T) => string[]): string[] {
  return results.flatMap((entry) => (entry.ok ? format(entry.result) : [`${entry.url}: ${entry.error}`]));
}

export function formatItemRows(rows: ItemRow[]): string[] {
  if (rows.length === 0) {
    return ['(no items)'];
  }
  return rows.map((row) => `${row.id.padEnd(12)} ${row.buildTag.padEnd(9)} ${row.name}`);
}

export function formatCollections(collections: CollectionSummary[]): string[] {
  if (collections.length === 0) {
    return ['(no collections)'];
  }
  return collections.map(
    (collection) => `${collection.title}  ${collection.url}  (${collection.itemCount} items, ${collection.addedCount} added by it)`
  );
}
