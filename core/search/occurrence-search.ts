/**
 * Per-caller "next occurrence" state.
 *
 * Remembers the needle and where the previous call stopped, so repeated calls
 * advance through the matches in order and cycle back to the first.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import { type OccurrenceMatch, scanOccurrences } from './occurrences';

export class OccurrenceSearch {
  private _needle: string | null = null;
  private _lastSearchOffset = 0;

  get needle(): string | null {
    return this._needle;
  }

  /** Character index the next search starts from. */
  get lastSearchOffset(): number {
    return this._lastSearchOffset;
  }

  /**
   * Next match of `needle` at or after the last search offset, wrapping.
   * A new needle restarts the search at `startChar`. Matches for which
   * `isTaken` returns true are skipped.
   */
  next(
    buffer: TextBuffer,
    needle: string,
    startChar: number,
    isTaken: (match: OccurrenceMatch) => boolean = () => false,
  ): OccurrenceMatch | null {
    if (needle !== this._needle) {
      this._needle = needle;
      this._lastSearchOffset = startChar;
    }

    const matches = [...scanOccurrences(buffer.getText(), needle)];
    if (matches.length === 0) return null;

    let first = matches.findIndex(m => m.start >= this._lastSearchOffset);
    if (first === -1) first = 0;

    for (let i = 0; i < matches.length; i++) {
      const match = matches[(first + i) % matches.length];
      if (isTaken(match)) continue;
      this._lastSearchOffset = match.end;
      return match;
    }
    return null;
  }

  reset(): void {
    this._needle = null;
    this._lastSearchOffset = 0;
  }
}
