/**
 * Undo/redo stacks of history entries.
 *
 * Push behavior:
 * 1. Append the entry to the undo stack.
 * 2. Clear the redo stack.
 * 3. Drop the oldest entry if the stack exceeds its capacity.
 *
 * The manager only remembers what happened; applying an entry to a buffer is
 * the caller's job.
 */

import type { HistoryEntry } from './operation';

export const DEFAULT_HISTORY_CAPACITY = 1000;

export class UndoManager {
  private undoStack: HistoryEntry[] = [];
  private redoStack: HistoryEntry[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    this.capacity = Math.max(1, capacity);
  }

  push(entry: HistoryEntry): void {
    this.undoStack.push(entry);
    this.redoStack = [];
    if (this.undoStack.length > this.capacity) {
      this.undoStack.shift();
    }
  }

  /**
   * Move the newest entry to the redo stack.
   * @returns The entry to invert and apply, or null if nothing to undo.
   */
  undo(): HistoryEntry | null {
    const entry = this.undoStack.pop();
    if (!entry) return null;
    this.redoStack.push(entry);
    return entry;
  }

  /**
   * Move the newest undone entry back to the undo stack.
   * @returns The entry to re-apply, or null if nothing to redo.
   */
  redo(): HistoryEntry | null {
    const entry = this.redoStack.pop();
    if (!entry) return null;
    this.undoStack.push(entry);
    return entry;
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoCount(): number {
    return this.undoStack.length;
  }

  get redoCount(): number {
    return this.redoStack.length;
  }

  /** Clear all history. */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }
}
