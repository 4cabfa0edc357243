/**
 * Word boundary detection over character arrays.
 *
 * Every character is exactly one of: whitespace, word, punctuation.
 * A word boundary is any point where the class on either side differs.
 * All indices are character indices; callers split lines with toChars().
 */

export type CharType = 'whitespace' | 'word' | 'punctuation';

const PUNCTUATION = new Set(Array.from('/:,.-(){}[];"\'<>=+*&|!@#$%^~`\\?'));
const WHITESPACE = /\s/u;

export function charType(ch: string): CharType {
  if (WHITESPACE.test(ch)) return 'whitespace';
  if (PUNCTUATION.has(ch)) return 'punctuation';
  return 'word';
}

export interface WordRange {
  start: number;
  end: number;
}

/** True at the ends of the array and wherever the classes on either side differ. */
export function isWordBoundary(chars: readonly string[], index: number): boolean {
  if (index <= 0 || index >= chars.length) return true;
  return charType(chars[index - 1]) !== charType(chars[index]);
}

/**
 * Scan left from `offset`: skip whitespace, then one run of the class found there.
 */
export function wordStartBefore(chars: readonly string[], offset: number): number {
  let pos = Math.min(offset, chars.length);
  if (pos <= 0) return 0;

  while (pos > 0 && charType(chars[pos - 1]) === 'whitespace') pos--;
  if (pos === 0) return 0;

  const type = charType(chars[pos - 1]);
  while (pos > 0 && charType(chars[pos - 1]) === type) pos--;
  return pos;
}

/**
 * Scan right from `offset`: skip the run of the class at `offset`, then any whitespace.
 */
export function wordEndAfter(chars: readonly string[], offset: number): number {
  const len = chars.length;
  let pos = Math.max(0, offset);
  if (pos >= len) return len;

  const type = charType(chars[pos]);
  while (pos < len && charType(chars[pos]) === type) pos++;
  while (pos < len && charType(chars[pos]) === 'whitespace') pos++;
  return pos;
}

/**
 * The run of same-class characters containing `column`.
 * A column at the end of the line uses the last character.
 */
export function wordRangeAt(chars: readonly string[], column: number): WordRange {
  if (chars.length === 0) return { start: 0, end: 0 };
  const col = Math.min(Math.max(0, column), chars.length - 1);
  const type = charType(chars[col]);

  let start = col;
  while (start > 0 && charType(chars[start - 1]) === type) start--;
  let end = col + 1;
  while (end < chars.length && charType(chars[end]) === type) end++;
  return { start, end };
}

/**
 * The word-class run under `column`, or the one ending right before it.
 * Null when the cursor touches no word characters.
 */
export function wordAt(chars: readonly string[], column: number): WordRange | null {
  const col = Math.max(0, column);
  if (col < chars.length && charType(chars[col]) === 'word') {
    return wordRangeAt(chars, col);
  }
  if (col > 0 && col <= chars.length && charType(chars[col - 1]) === 'word') {
    return wordRangeAt(chars, col - 1);
  }
  return null;
}
