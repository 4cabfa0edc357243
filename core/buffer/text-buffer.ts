/**
 * TextBuffer contract shared by every storage backend.
 *
 * Positions (line, column) are in characters. Offsets are storage offsets
 * (UTF-16 code units) and must always fall on a character boundary; callers
 * obtain them from positionToOffset() rather than computing them by hand.
 */

import type { Position } from '../cursor/selection';

export interface TextEdit {
  /** Storage offset where the edit starts. */
  offset: number;
  /** Number of storage units to delete starting at offset. 0 for pure insert. */
  deleteCount: number;
  /** Text to insert at offset (after deletion). Empty string for pure delete. */
  insertText: string;
}

export interface TextBuffer {
  /** Number of lines, always >= 1. */
  getLineCount(): number;
  /** Characters on a line, excluding the newline. 0 for a missing line. */
  getLineLength(line: number): number;
  /** Storage length of the whole buffer. */
  getLength(): number;
  /** Character count of the whole buffer. */
  getCharCount(): number;
  charAt(line: number, column: number): string | undefined;
  /** Line content without its newline, or undefined if there is no such line. */
  getLine(line: number): string | undefined;
  getText(): string;
  /** Text between two storage offsets [start, end). */
  getTextRange(start: number, end: number): string;
  positionToOffset(line: number, column: number): number;
  offsetToPosition(offset: number): Position;
  firstNonWhitespaceColumn(line: number): number;
  lastNonWhitespaceColumn(line: number): number;

  insert(offset: number, text: string): void;
  insertChar(offset: number, ch: string): void;
  /** Remove [start, end) and return the removed text. */
  delete(start: number, end: number): string;
  replace(start: number, end: number, text: string): string;
  setText(text: string): void;
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

export function clampOffset(offset: number, length: number): number {
  return Math.max(0, Math.min(offset, length));
}

const WHITESPACE = /\s/u;

/** Column of the first non-whitespace character (line length if blank). */
export function leadingWhitespaceColumns(line: string): number {
  let column = 0;
  for (const ch of line) {
    if (!WHITESPACE.test(ch)) break;
    column++;
  }
  return column;
}

/** Column just after the last non-whitespace character. */
export function trimmedEndColumns(line: string): number {
  const chars = Array.from(line);
  let end = chars.length;
  while (end > 0 && WHITESPACE.test(chars[end - 1])) end--;
  return end;
}
