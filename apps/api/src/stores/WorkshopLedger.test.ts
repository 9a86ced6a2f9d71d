import { describe, it, expect } from 'vitest';
import type { WorkshopItem } from '@pzws/shared-types';
import { WorkshopLedger } from './WorkshopLedger';
import { emptySnapshot, fromSnapshot } from './WorkspaceRepository';
import { itemDetails, workshopItem } from '../testing/fixtures';
import { InvariantViolationError } from '../utils/errors';

function ledgerWith(...items: WorkshopItem[]): WorkshopLedger {
  return new WorkshopLedger(
    fromSnapshot({
      ...emptySnapshot(),
      workshopIds: items.map((item) => item.id),
      modIds: items.flatMap((item) => item.modIds),
      items,
    })
  );
}

describe('WorkshopLedger', () => {
  it('inserts the ID, its metadata and its mod IDs once', () => {
    const ledger = ledgerWith();
    expect(ledger.insert(workshopItem('101'))).toBe(true);
    expect(ledger.insert(workshopItem('101'))).toBe(false);

    expect(ledger.workshopIds.toArray()).toEqual(['101']);
    expect(ledger.modIds.toArray()).toEqual(['mod101']);
    expect(ledger.metadata.get('101')?.name).toBe('Item 101');
    expect(ledger.dirty).toBe(true);
  });

  it('stays clean when nothing changes', () => {
    const ledger = ledgerWith(workshopItem('101'));
    expect(ledger.insert(workshopItem('101'))).toBe(false);
    expect(ledger.remove('999')).toBe(false);
    expect(ledger.dirty).toBe(false);
  });

  it('keeps a mod ID that another item still uses', () => {
    const ledger = ledgerWith(
      workshopItem('101', { modIds: ['SharedLib'] }),
      workshopItem('102', { modIds: ['SharedLib', 'Extra'] })
    );

    expect(ledger.remove('102')).toBe(true);
    expect(ledger.workshopIds.toArray()).toEqual(['101']);
    expect(ledger.modIds.toArray()).toEqual(['SharedLib']);
    expect(ledger.metadata.has('102')).toBe(false);
  });

  it('refreshes details without touching the chosen mod IDs', () => {
    const ledger = ledgerWith(workshopItem('101', { modIds: ['Chosen'] }));
    const updated = ledger.updateDetails(
      itemDetails('101', { name: 'Renamed', buildTag: '41.78', modIdOptions: ['Chosen', 'Other'] })
    );

    expect(updated).toBe(true);
    expect(ledger.metadata.get('101')).toMatchObject({ name: 'Renamed', buildTag: '41.78', modIds: ['Chosen'] });
    expect(ledger.updateDetails(itemDetails('999'))).toBe(false);
  });

  it('rejects a collection whose added children are not all items', () => {
    const ledger = ledgerWith();
    expect(() =>
      ledger.saveCollection({ url: 'https://steamcommunity.com/sharedfiles/filedetails/?id=9', title: 'x', items: ['1'], added: ['2'] })
    ).toThrow(InvariantViolationError);
  });

  it('releases ownership of an ID in every collection', () => {
    const ledger = ledgerWith();
    ledger.saveCollection({ url: 'c1', title: 'one', items: ['1', '2'], added: ['1', '2'] });
    ledger.saveCollection({ url: 'c2', title: 'two', items: ['2'], added: [] });

    expect(ledger.releaseOwnership('2')).toEqual(['c1']);
    expect(ledger.getCollection('c1')).toEqual({ url: 'c1', title: 'one', items: ['1', '2'], added: ['1'] });
  });
});
