/**
 * Character/storage-unit helpers.
 *
 * JavaScript strings are UTF-16. A "character" here is one Unicode scalar
 * value, which occupies one or two storage units. Storage offsets that land
 * between the two halves of a surrogate pair are rejected.
 */

export class OffsetBoundaryError extends Error {
  readonly offset: number;

  constructor(offset: number) {
    super(`Offset ${offset} splits a surrogate pair`);
    this.name = 'OffsetBoundaryError';
    this.offset = offset;
  }
}

export function isHighSurrogate(code: number): boolean {
  return code >= 0xD800 && code <= 0xDBFF;
}

export function isLowSurrogate(code: number): boolean {
  return code >= 0xDC00 && code <= 0xDFFF;
}

/** True if `offset` does not fall inside a surrogate pair of `text`. */
export function isCharBoundary(text: string, offset: number): boolean {
  if (offset <= 0 || offset >= text.length) return true;
  return !(isLowSurrogate(text.charCodeAt(offset)) && isHighSurrogate(text.charCodeAt(offset - 1)));
}

export function assertCharBoundary(text: string, offset: number): void {
  if (!isCharBoundary(text, offset)) throw new OffsetBoundaryError(offset);
}

/** Number of characters (code points) in a string. */
export function charCount(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (!isLowSurrogate(text.charCodeAt(i)) || i === 0 || !isHighSurrogate(text.charCodeAt(i - 1))) {
      count++;
    }
  }
  return count;
}

/** Storage offset of the character at index `column` (clamped to the end). */
export function charIndexToOffset(text: string, column: number): number {
  if (column <= 0) return 0;
  let chars = 0;
  let i = 0;
  while (i < text.length && chars < column) {
    i += isHighSurrogate(text.charCodeAt(i)) && i + 1 < text.length && isLowSurrogate(text.charCodeAt(i + 1)) ? 2 : 1;
    chars++;
  }
  return i;
}

/** Character index of a storage offset. Throws if the offset splits a character. */
export function offsetToCharIndex(text: string, offset: number): number {
  const clamped = Math.max(0, Math.min(offset, text.length));
  assertCharBoundary(text, clamped);
  return charCount(text.substring(0, clamped));
}

/** Storage length of a single character starting at `offset`. */
export function charWidthAt(text: string, offset: number): number {
  if (offset + 1 < text.length &&
      isHighSurrogate(text.charCodeAt(offset)) &&
      isLowSurrogate(text.charCodeAt(offset + 1))) {
    return 2;
  }
  return 1;
}

/** Split into an array of characters. */
export function toChars(text: string): string[] {
  return Array.from(text);
}

/** True if `ch` is exactly one Unicode scalar value. */
export function isSingleChar(ch: string): boolean {
  return ch.length > 0 && ch.length <= 2 && charCount(ch) === 1;
}
