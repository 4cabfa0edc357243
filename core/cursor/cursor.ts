/**
 * A cursor is a position plus a sticky desired column for vertical movement.
 */

import type { Position } from './selection';

export interface Cursor {
  line: number;
  column: number;
  /** Column to aim for on vertical moves; null until the first one. */
  desiredColumn: number | null;
}

export function createCursor(line: number = 0, column: number = 0): Cursor {
  return { line, column, desiredColumn: null };
}

export function cursorPosition(cursor: Cursor): Position {
  return { line: cursor.line, column: cursor.column };
}

/** Record the current column as the desired one, unless one is already set. */
export function setDesiredColumn(cursor: Cursor): void {
  if (cursor.desiredColumn === null) cursor.desiredColumn = cursor.column;
}

export function clearDesiredColumn(cursor: Cursor): void {
  cursor.desiredColumn = null;
}

export function effectiveColumn(cursor: Cursor): number {
  return cursor.desiredColumn ?? cursor.column;
}

export function cloneCursors(cursors: readonly Cursor[]): Cursor[] {
  return cursors.map(c => ({ ...c }));
}
