import { describe, expect, test } from 'vitest';
import { RopeBuffer } from '../core/buffer/rope-buffer';
import { StringBuffer } from '../core/buffer/string-buffer';
import { OccurrenceSearch } from '../core/search/occurrence-search';
import { findAllOccurrences, findNextOccurrence, scanOccurrences } from '../core/search/occurrences';

describe('findAllOccurrences', () => {
  test('reports character indices', () => {
    const buf = new StringBuffer('😀ab 😀ab');
    expect(findAllOccurrences(buf, '😀ab')).toEqual([
      { start: 0, end: 3 },
      { start: 4, end: 7 },
    ]);
  });

  test('storage offsets come alongside', () => {
    const matches = [...scanOccurrences('😀ab 😀ab', 'ab')];
    expect(matches).toEqual([
      { start: 1, end: 3, offset: 2, endOffset: 4 },
      { start: 5, end: 7, offset: 7, endOffset: 9 },
    ]);
  });

  test('overlapping matches are all found', () => {
    const buf = new StringBuffer('aaaa');
    expect(findAllOccurrences(buf, 'aa')).toEqual([
      { start: 0, end: 2 },
      { start: 1, end: 3 },
      { start: 2, end: 4 },
    ]);
  });

  test('matches across lines', () => {
    const buf = new RopeBuffer('foo\nbar foo\nfoo');
    expect(findAllOccurrences(buf, 'foo')).toEqual([
      { start: 0, end: 3 },
      { start: 8, end: 11 },
      { start: 12, end: 15 },
    ]);
  });

  test('empty needle finds nothing', () => {
    expect(findAllOccurrences(new StringBuffer('abc'), '')).toEqual([]);
  });
});

describe('findNextOccurrence', () => {
  const buf = new StringBuffer('ab ab ab');

  test('first match at or after the start', () => {
    expect(findNextOccurrence(buf, 'ab', 3)).toEqual({ start: 3, end: 5, offset: 3, endOffset: 5 });
  });

  test('wraps to the first match', () => {
    expect(findNextOccurrence(buf, 'ab', 7)).toEqual({ start: 0, end: 2, offset: 0, endOffset: 2 });
  });

  test('null when absent', () => {
    expect(findNextOccurrence(buf, 'zz', 0)).toBeNull();
  });
});

describe('OccurrenceSearch', () => {
  const buf = new StringBuffer('ab ab ab');

  test('advances through matches and cycles', () => {
    const search = new OccurrenceSearch();
    expect(search.next(buf, 'ab', 2)?.start).toBe(3);
    expect(search.lastSearchOffset).toBe(5);
    expect(search.next(buf, 'ab', 2)?.start).toBe(6);
    expect(search.next(buf, 'ab', 2)?.start).toBe(0);
    expect(search.lastSearchOffset).toBe(2);
  });

  test('skips taken matches', () => {
    const search = new OccurrenceSearch();
    expect(search.next(buf, 'ab', 0, m => m.start === 0)?.start).toBe(3);
    expect(search.next(buf, 'ab', 0, () => true)).toBeNull();
  });

  test('a new needle restarts from the given position', () => {
    const search = new OccurrenceSearch();
    search.next(buf, 'ab', 0);
    expect(search.next(buf, 'b', 4)?.start).toBe(4);
    expect(search.needle).toBe('b');
  });

  test('reset forgets the needle', () => {
    const search = new OccurrenceSearch();
    search.next(buf, 'ab', 4);
    search.reset();
    expect(search.needle).toBeNull();
    expect(search.lastSearchOffset).toBe(0);
  });
});
