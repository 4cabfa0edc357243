import { describe, expect, test } from 'vitest';
import { toChars } from '../core/buffer/unicode';
import {
  charType, isWordBoundary, wordAt, wordEndAfter, wordRangeAt, wordStartBefore,
} from '../core/cursor/word-boundary';

describe('charType', () => {
  test('every character falls in exactly one class', () => {
    expect(charType(' ')).toBe('whitespace');
    expect(charType('\t')).toBe('whitespace');
    expect(charType('.')).toBe('punctuation');
    expect(charType('{')).toBe('punctuation');
    expect(charType('a')).toBe('word');
    expect(charType('_')).toBe('word');
    expect(charType('é')).toBe('word');
    expect(charType('😀')).toBe('word');
  });
});

describe('word boundaries', () => {
  // f o o . b a r _ _ b a z
  const chars = toChars('foo.bar  baz');

  test('boundaries sit between classes and at the ends', () => {
    expect(isWordBoundary(chars, 0)).toBe(true);
    expect(isWordBoundary(chars, 1)).toBe(false);
    expect(isWordBoundary(chars, 3)).toBe(true);
    expect(isWordBoundary(chars, 12)).toBe(true);
  });

  test('wordStartBefore skips whitespace then one run', () => {
    expect(wordStartBefore(chars, 0)).toBe(0);
    expect(wordStartBefore(chars, 12)).toBe(9);
    expect(wordStartBefore(chars, 9)).toBe(4);
    expect(wordStartBefore(chars, 4)).toBe(3);
  });

  test('wordEndAfter skips one run then whitespace', () => {
    expect(wordEndAfter(chars, 0)).toBe(3);
    expect(wordEndAfter(chars, 3)).toBe(4);
    expect(wordEndAfter(chars, 4)).toBe(9);
    expect(wordEndAfter(chars, 12)).toBe(12);
  });

  test('wordRangeAt returns the run under the column', () => {
    expect(wordRangeAt(chars, 5)).toEqual({ start: 4, end: 7 });
    expect(wordRangeAt(chars, 7)).toEqual({ start: 7, end: 9 });
    expect(wordRangeAt(chars, 12)).toEqual({ start: 9, end: 12 });
    expect(wordRangeAt([], 3)).toEqual({ start: 0, end: 0 });
  });

  test('wordAt prefers the word under the cursor, then the one before it', () => {
    expect(wordAt(chars, 5)).toEqual({ start: 4, end: 7 });
    expect(wordAt(chars, 7)).toEqual({ start: 4, end: 7 });
    expect(wordAt(chars, 3)).toEqual({ start: 0, end: 3 });
    expect(wordAt(chars, 8)).toBeNull();
  });

  test('a word start scanned forward never passes the end of the original word', () => {
    for (const text of ['foo.bar  baz', '  leading', 'a+b', 'x', '', 'end.  ']) {
      const line = toChars(text);
      for (let o = 0; o <= line.length; o++) {
        const start = wordStartBefore(line, o);
        expect(start).toBeLessThanOrEqual(o);
        expect(wordEndAfter(line, start)).toBeLessThanOrEqual(wordEndAfter(line, o));
      }
    }
  });

  test('repeated scans stop at the ends', () => {
    let pos = chars.length;
    const starts: number[] = [];
    while (pos > 0) {
      const next = wordStartBefore(chars, pos);
      expect(next).toBeLessThan(pos);
      starts.push(next);
      pos = next;
    }
    expect(starts).toEqual([9, 4, 3, 0]);
    expect(wordStartBefore(chars, 0)).toBe(0);
    expect(wordStartBefore(chars, wordStartBefore(chars, 0))).toBe(0);
    expect(wordStartBefore(chars, -3)).toBe(0);

    pos = 0;
    const ends: number[] = [];
    while (pos < chars.length) {
      pos = wordEndAfter(chars, pos);
      ends.push(pos);
    }
    expect(ends).toEqual([3, 4, 9, 12]);
    expect(wordEndAfter(chars, wordEndAfter(chars, 12))).toBe(12);
  });

  test('indices count characters', () => {
    const emoji = toChars('😀😀 x');
    expect(wordEndAfter(emoji, 0)).toBe(3);
    expect(wordStartBefore(emoji, 2)).toBe(0);
  });
});
