import { describe, it, expect } from 'vitest';
import { compareBuildTags, parseVersionParts } from './version';

describe('parseVersionParts', () => {
  it('takes every number in the tag', () => {
    expect(parseVersionParts('41.78.16')).toEqual([41, 78, 16]);
    expect(parseVersionParts('Build 42')).toEqual([42]);
    expect(parseVersionParts('(unknown)')).toBeNull();
  });
});

describe('compareBuildTags', () => {
  it('orders builds numerically', () => {
    const tags = ['42', '41.78', '(unknown)', '41.9', '41'];
    expect([...tags].sort(compareBuildTags)).toEqual(['41', '41.9', '41.78', '42', '(unknown)']);
  });

  it('treats two unknown builds as equal', () => {
    expect(compareBuildTags('(unknown)', 'n/a')).toBe(0);
  });
});
