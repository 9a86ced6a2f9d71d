import { describe, it, expect } from 'vitest';
import { collectionKey, parseWorkshopId, uniqueIds, workshopItemUrl } from './workshop-ids';

describe('parseWorkshopId', () => {
  it('reads the id parameter of a Workshop link', () => {
    expect(parseWorkshopId('https://steamcommunity.com/sharedfiles/filedetails/?id=2169435993')).toBe('2169435993');
    expect(parseWorkshopId('https://steamcommunity.com/sharedfiles/filedetails/?l=german&id=42&searchtext=')).toBe('42');
  });

  it('accepts a bare numeric ID and a link without a scheme', () => {
    expect(parseWorkshopId('  12345 ')).toBe('12345');
    expect(parseWorkshopId('steamcommunity.com/workshop/filedetails/?id=777')).toBe('777');
  });

  it('returns null when there is no numeric ID', () => {
    expect(parseWorkshopId('https://steamcommunity.com/app/108600/workshop/')).toBeNull();
    expect(parseWorkshopId('https://steamcommunity.com/sharedfiles/filedetails/?id=abc')).toBeNull();
  });
});

describe('collectionKey', () => {
  it('maps different pastes of one collection to the same key', () => {
    const key = workshopItemUrl('900');
    expect(collectionKey('http://steamcommunity.com/sharedfiles/filedetails/?id=900&searchtext=')).toBe(key);
    expect(collectionKey('900')).toBe(key);
  });

  it('keeps a link without an ID as it was pasted', () => {
    expect(collectionKey(' not-a-link ')).toBe('not-a-link');
  });
});

describe('uniqueIds', () => {
  it('keeps the first spelling and drops blanks', () => {
    expect(uniqueIds(['Alpha', ' alpha', '', 'Beta ', 'ALPHA'])).toEqual(['Alpha', 'Beta']);
  });

  it('can compare case-sensitively', () => {
    expect(uniqueIds(['Alpha', 'alpha', 'Alpha'], false)).toEqual(['Alpha', 'alpha']);
  });
});
