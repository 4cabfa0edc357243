/**
 * Flat-string backend for short, single-line inputs (modal fields, grid cells).
 *
 * Always reports exactly one line. Operations are linear in the content size,
 * which is fine for the few dozen characters these inputs hold.
 */

import type { Position } from '../cursor/selection';
import {
  type TextBuffer, clampOffset, leadingWhitespaceColumns, trimmedEndColumns,
} from './text-buffer';
import {
  assertCharBoundary, charCount, charIndexToOffset,
  isSingleChar, offsetToCharIndex, toChars,
} from './unicode';

export class StringBuffer implements TextBuffer {
  private text: string;

  constructor(initialContent: string = '') {
    this.text = initialContent;
  }

  getLineCount(): number {
    return 1;
  }

  getLineLength(line: number): number {
    return line === 0 ? charCount(this.text) : 0;
  }

  getLength(): number {
    return this.text.length;
  }

  getCharCount(): number {
    return charCount(this.text);
  }

  charAt(line: number, column: number): string | undefined {
    if (line !== 0 || column < 0) return undefined;
    return toChars(this.text)[column];
  }

  getLine(line: number): string | undefined {
    return line === 0 ? this.text : undefined;
  }

  getText(): string {
    return this.text;
  }

  getTextRange(start: number, end: number): string {
    const s = this.checked(start);
    const e = this.checked(end);
    return s >= e ? '' : this.text.substring(s, e);
  }

  positionToOffset(line: number, column: number): number {
    if (line !== 0) return line < 0 ? 0 : this.text.length;
    return charIndexToOffset(this.text, column);
  }

  offsetToPosition(offset: number): Position {
    return { line: 0, column: offsetToCharIndex(this.text, offset) };
  }

  firstNonWhitespaceColumn(line: number): number {
    return line === 0 ? leadingWhitespaceColumns(this.text) : 0;
  }

  lastNonWhitespaceColumn(line: number): number {
    return line === 0 ? trimmedEndColumns(this.text) : 0;
  }

  insert(offset: number, text: string): void {
    if (text.length === 0) return;
    const at = this.checked(offset);
    this.text = this.text.substring(0, at) + text + this.text.substring(at);
  }

  insertChar(offset: number, ch: string): void {
    if (!isSingleChar(ch)) throw new Error(`insertChar expects one character, got ${JSON.stringify(ch)}`);
    this.insert(offset, ch);
  }

  delete(start: number, end: number): string {
    const s = this.checked(start);
    const e = this.checked(end);
    if (s >= e) return '';
    const removed = this.text.substring(s, e);
    this.text = this.text.substring(0, s) + this.text.substring(e);
    return removed;
  }

  replace(start: number, end: number, text: string): string {
    const removed = this.delete(start, end);
    this.insert(Math.min(start, end), text);
    return removed;
  }

  setText(text: string): void {
    this.text = text;
  }

  private checked(offset: number): number {
    const clamped = clampOffset(offset, this.text.length);
    assertCharBoundary(this.text, clamped);
    return clamped;
  }
}
