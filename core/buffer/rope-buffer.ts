/**
 * Large-document backend: a piece table indexed by a rope B-tree.
 *
 * Line/offset lookups descend the rope; column conversions only ever look at
 * the text of a single line.
 */

import type { Position } from '../cursor/selection';
import { PieceTable } from './piece-table';
import { Rope } from './rope';
import {
  type TextBuffer, clampOffset, leadingWhitespaceColumns,
  normalizeLineEndings, trimmedEndColumns,
} from './text-buffer';
import {
  OffsetBoundaryError, charCount, charIndexToOffset,
  isCharBoundary, isSingleChar, toChars,
} from './unicode';

export class RopeBuffer implements TextBuffer {
  private rope: Rope;

  constructor(initialContent: string = '') {
    this.rope = new Rope(new PieceTable(normalizeLineEndings(initialContent)));
  }

  getLineCount(): number {
    return this.rope.lineBreakCount + 1;
  }

  getLineLength(line: number): number {
    const text = this.getLine(line);
    return text === undefined ? 0 : charCount(text);
  }

  getLength(): number {
    return this.rope.length;
  }

  getCharCount(): number {
    return charCount(this.rope.getFullText());
  }

  charAt(line: number, column: number): string | undefined {
    if (column < 0) return undefined;
    const text = this.getLine(line);
    return text === undefined ? undefined : toChars(text)[column];
  }

  getLine(line: number): string | undefined {
    const range = this.lineRange(line);
    return range ? this.rope.getText(range.start, range.end) : undefined;
  }

  getText(): string {
    return this.rope.getFullText();
  }

  getTextRange(start: number, end: number): string {
    const s = this.checked(start);
    const e = this.checked(end);
    return s >= e ? '' : this.rope.getText(s, e);
  }

  positionToOffset(line: number, column: number): number {
    if (line < 0) return 0;
    const range = this.lineRange(line);
    if (!range) return this.rope.length;
    return range.start + charIndexToOffset(this.rope.getText(range.start, range.end), column);
  }

  offsetToPosition(offset: number): Position {
    const o = this.checked(offset);
    const line = this.rope.findOffsetLine(o);
    const lineStart = this.rope.findLineStart(line);
    return { line, column: charCount(this.rope.getText(lineStart, o)) };
  }

  firstNonWhitespaceColumn(line: number): number {
    return leadingWhitespaceColumns(this.getLine(line) ?? '');
  }

  lastNonWhitespaceColumn(line: number): number {
    return trimmedEndColumns(this.getLine(line) ?? '');
  }

  insert(offset: number, text: string): void {
    if (text.length === 0) return;
    this.rope.insert(this.checked(offset), normalizeLineEndings(text));
  }

  insertChar(offset: number, ch: string): void {
    if (!isSingleChar(ch)) throw new Error(`insertChar expects one character, got ${JSON.stringify(ch)}`);
    this.insert(offset, ch);
  }

  delete(start: number, end: number): string {
    const s = this.checked(start);
    const e = this.checked(end);
    return s >= e ? '' : this.rope.delete(s, e);
  }

  replace(start: number, end: number, text: string): string {
    const removed = this.delete(start, end);
    this.insert(Math.min(start, end), text);
    return removed;
  }

  setText(text: string): void {
    this.rope = new Rope(new PieceTable(normalizeLineEndings(text)));
  }

  /** Storage range of a line without its newline, or null if out of range. */
  private lineRange(line: number): { start: number; end: number } | null {
    const count = this.getLineCount();
    if (line < 0 || line >= count) return null;
    const start = this.rope.findLineStart(line);
    const end = line + 1 < count ? this.rope.findLineStart(line + 1) - 1 : this.rope.length;
    return { start, end };
  }

  private checked(offset: number): number {
    const clamped = clampOffset(offset, this.rope.length);
    if (clamped > 0 && clamped < this.rope.length &&
        !isCharBoundary(this.rope.getText(clamped - 1, clamped + 1), 1)) {
      throw new OffsetBoundaryError(clamped);
    }
    return clamped;
  }
}
