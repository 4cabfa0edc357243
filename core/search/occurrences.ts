/**
 * Literal occurrence search with results in character indices.
 *
 * The scan runs over storage offsets; each match boundary is converted to a
 * character index incrementally from the previous match, so no whole-buffer
 * offset map is built.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import { charCount, charWidthAt } from '../buffer/unicode';

export interface Occurrence {
  /** Character index of the first matched character. */
  start: number;
  /** Character index just past the match. */
  end: number;
}

/** An occurrence together with its storage range. */
export interface OccurrenceMatch extends Occurrence {
  offset: number;
  endOffset: number;
}

/**
 * Every match of `needle` in `text`, overlapping matches included.
 */
export function* scanOccurrences(text: string, needle: string): Generator<OccurrenceMatch> {
  if (needle.length === 0) return;
  const needleChars = charCount(needle);

  let lastOffset = 0;
  let lastChar = 0;
  let from = 0;
  while (from <= text.length - needle.length) {
    const idx = text.indexOf(needle, from);
    if (idx === -1) return;

    lastChar += charCount(text.substring(lastOffset, idx));
    lastOffset = idx;
    yield {
      start: lastChar,
      end: lastChar + needleChars,
      offset: idx,
      endOffset: idx + needle.length,
    };
    // Step one character so overlapping matches are found
    from = idx + charWidthAt(text, idx);
  }
}

export function findAllOccurrences(buffer: TextBuffer, needle: string): Occurrence[] {
  const result: Occurrence[] = [];
  for (const { start, end } of scanOccurrences(buffer.getText(), needle)) {
    result.push({ start, end });
  }
  return result;
}

/**
 * First match starting at or after `fromChar`, wrapping to the first match
 * in the buffer. Null when there is none.
 */
export function findNextOccurrence(
  buffer: TextBuffer,
  needle: string,
  fromChar: number,
): OccurrenceMatch | null {
  let first: OccurrenceMatch | null = null;
  for (const match of scanOccurrences(buffer.getText(), needle)) {
    if (match.start >= fromChar) return match;
    first ??= match;
  }
  return first;
}
