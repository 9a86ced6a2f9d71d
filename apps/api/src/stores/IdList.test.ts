import { describe, it, expect } from 'vitest';
import { IdList } from './IdList';

describe('IdList', () => {
  it('parses the one-line format and older newline files', () => {
    expect(IdList.parse('101;102;103\n').toArray()).toEqual(['101', '102', '103']);
    expect(IdList.parse('101\r\n102\n\n103').toArray()).toEqual(['101', '102', '103']);
  });

  it('drops duplicates case-insensitively and keeps the first spelling', () => {
    const list = IdList.parse('Hydrocraft; hydrocraft;;BetterSorting');
    expect(list.toArray()).toEqual(['Hydrocraft', 'BetterSorting']);
    expect(list.add('HYDROCRAFT')).toBe(false);
    expect(list.has('bettersorting')).toBe(true);
  });

  it('keeps insertion order when removing', () => {
    const list = new IdList(['a', 'b', 'c']);
    expect(list.remove('B')).toBe(true);
    expect(list.remove('missing')).toBe(false);
    list.add('b');
    expect(list.toLine()).toBe('a;c;b');
  });

  it('serializes to one terminated line, or nothing when empty', () => {
    expect(new IdList(['1', '2']).serialize()).toBe('1;2\n');
    expect(new IdList().serialize()).toBe('');
  });

  it('clones independently', () => {
    const list = new IdList(['1']);
    const copy = list.clone();
    copy.add('2');
    expect(list.size).toBe(1);
    expect(copy.size).toBe(2);
  });
});
