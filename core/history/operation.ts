/**
 * History entries: reversible edit operations and atomic multi-cursor batches.
 *
 * Undo is the application of an inverted entry; there is no separate
 * "undo operation" type.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import { type Cursor, cloneCursors } from '../cursor/cursor';

export interface EditOperation {
  kind: 'edit';
  /** Storage offset where the change starts. */
  offset: number;
  /** Text removed at `offset`; empty for a pure insert. */
  deletedText: string;
  /** Text inserted at `offset`; empty for a pure delete. */
  insertedText: string;
  /** Cursor snapshot before the change. Empty for operations inside a batch. */
  cursorsBefore: Cursor[];
  /** Cursor snapshot after the change. Empty for operations inside a batch. */
  cursorsAfter: Cursor[];
}

/**
 * Operations in the order they were applied, plus the cursor snapshot of the
 * whole transaction.
 */
export interface EditBatch {
  kind: 'batch';
  operations: EditOperation[];
  cursorsBefore: Cursor[];
  cursorsAfter: Cursor[];
}

export type HistoryEntry = EditOperation | EditBatch;

export function createOperation(
  offset: number,
  deletedText: string,
  insertedText: string,
  cursorsBefore: readonly Cursor[] = [],
  cursorsAfter: readonly Cursor[] = [],
): EditOperation {
  return {
    kind: 'edit',
    offset,
    deletedText,
    insertedText,
    cursorsBefore: cloneCursors(cursorsBefore),
    cursorsAfter: cloneCursors(cursorsAfter),
  };
}

/** Swap deleted/inserted text and the before/after snapshots. */
export function invertOperation(op: EditOperation): EditOperation {
  return {
    kind: 'edit',
    offset: op.offset,
    deletedText: op.insertedText,
    insertedText: op.deletedText,
    cursorsBefore: cloneCursors(op.cursorsAfter),
    cursorsAfter: cloneCursors(op.cursorsBefore),
  };
}

/**
 * Invert any entry. A batch's inner operations are inverted and reversed, so
 * applying the result forward undoes the original.
 */
export function invertEntry(entry: HistoryEntry): HistoryEntry {
  if (entry.kind === 'edit') return invertOperation(entry);
  return {
    kind: 'batch',
    operations: entry.operations.map(invertOperation).reverse(),
    cursorsBefore: cloneCursors(entry.cursorsAfter),
    cursorsAfter: cloneCursors(entry.cursorsBefore),
  };
}

/** The entry's operations in application order. */
export function entryOperations(entry: HistoryEntry): EditOperation[] {
  return entry.kind === 'edit' ? [entry] : entry.operations;
}

/** Replace `deletedText` at `offset` with `insertedText`. */
export function applyOperation(buffer: TextBuffer, op: EditOperation): void {
  buffer.replace(op.offset, op.offset + op.deletedText.length, op.insertedText);
}

export function applyEntry(buffer: TextBuffer, entry: HistoryEntry): void {
  for (const op of entryOperations(entry)) applyOperation(buffer, op);
}
