/**
 * Multi-cursor management: index-aligned cursors and selections, the active
 * cursor, per-cursor movement, sorting and merging.
 *
 * After every operation cursors are sorted by position, coincident cursors
 * are collapsed into one and strictly overlapping selections are merged.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import { toChars } from '../buffer/unicode';
import {
  type Cursor,
  clearDesiredColumn,
  createCursor,
  cursorPosition,
  effectiveColumn,
  setDesiredColumn,
} from './cursor';
import {
  type Position,
  type Selection,
  collapsedSelection,
  comparePositions,
  isSelectionEmpty,
  mergeSelections,
  positionsEqual,
  selectionEnd,
  selectionStart,
  selectionsOverlap,
} from './selection';
import { wordEndAfter, wordStartBefore } from './word-boundary';

export type MoveTarget =
  | 'left' | 'right' | 'up' | 'down'
  | 'lineStart' | 'lineStartSmart' | 'lineEnd'
  | 'wordLeft' | 'wordRight'
  | 'documentStart' | 'documentEnd'
  | 'pageUp' | 'pageDown';

export interface MoveOptions {
  /** Horizontal moves wrap across lines and vertical moves are possible. */
  allowMultiline: boolean;
  /** Lines per pageUp/pageDown. */
  pageSize: number;
}

/** Coincident heads, strict overlap, or an empty selection strictly inside another. */
function shouldMerge(a: Selection, b: Selection): boolean {
  if (positionsEqual(a.head, b.head) || selectionsOverlap(a, b)) return true;
  const [empty, other] = isSelectionEmpty(a) ? [a, b] : [b, a];
  if (!isSelectionEmpty(empty) || isSelectionEmpty(other)) return false;
  return comparePositions(selectionStart(other), empty.head) < 0 &&
    comparePositions(empty.head, selectionEnd(other)) < 0;
}

interface Entry {
  cursor: Cursor;
  selection: Selection;
  active: boolean;
}

export class CursorManager {
  private _cursors: Cursor[] = [createCursor()];
  private _selections: Selection[] = [collapsedSelection({ line: 0, column: 0 })];
  private _activeIndex = 0;
  private readonly buffer: TextBuffer;

  constructor(buffer: TextBuffer) {
    this.buffer = buffer;
  }

  get cursors(): readonly Cursor[] {
    return this._cursors;
  }

  get selections(): readonly Selection[] {
    return this._selections;
  }

  get activeIndex(): number {
    return this._activeIndex;
  }

  get activeCursor(): Cursor {
    return this._cursors[this._activeIndex];
  }

  get activeSelection(): Selection {
    return this._selections[this._activeIndex];
  }

  get count(): number {
    return this._cursors.length;
  }

  /** Reset to a single collapsed cursor at `pos` (clamped). */
  reset(pos: Position): void {
    const p = this.clampPosition(pos);
    this._cursors = [createCursor(p.line, p.column)];
    this._selections = [collapsedSelection(p)];
    this._activeIndex = 0;
  }

  /**
   * Replace the whole list. Each selection's head becomes its cursor position;
   * desired columns start unset.
   */
  setSelections(selections: readonly Selection[], activeIndex: number = selections.length - 1): void {
    if (selections.length === 0) return;
    const entries = selections.map((sel, i): Entry => {
      const anchor = this.clampPosition(sel.anchor);
      const head = this.clampPosition(sel.head);
      return {
        cursor: createCursor(head.line, head.column),
        selection: { anchor, head },
        active: i === activeIndex,
      };
    });
    this.commit(entries);
  }

  /** Restore a cursor snapshot with collapsed selections. */
  restoreCursors(cursors: readonly Cursor[]): void {
    if (cursors.length === 0) return;
    const entries = cursors.map((c, i): Entry => {
      const p = this.clampPosition(cursorPosition(c));
      return {
        cursor: { line: p.line, column: p.column, desiredColumn: c.desiredColumn },
        selection: collapsedSelection(p),
        active: i === cursors.length - 1,
      };
    });
    this.commit(entries);
  }

  /** Add a cursor with the given selection and make it active. */
  addSelection(sel: Selection): void {
    const entries = this.entries();
    for (const e of entries) e.active = false;
    const head = this.clampPosition(sel.head);
    entries.push({
      cursor: createCursor(head.line, head.column),
      selection: { anchor: this.clampPosition(sel.anchor), head },
      active: true,
    });
    this.commit(entries);
  }

  /** Move every cursor. */
  move(target: MoveTarget, extend: boolean, options: MoveOptions): void {
    const entries = this.entries();
    for (const entry of entries) {
      this.moveEntry(entry, target, extend, options);
    }
    this.commit(entries);
  }

  /** Add a cursor one line above (or below) each cursor, at its desired column. */
  addCursorVertical(direction: 'above' | 'below'): boolean {
    const entries = this.entries();
    const lastLine = this.buffer.getLineCount() - 1;
    const added: Entry[] = [];
    for (const { cursor } of entries) {
      const line = direction === 'above' ? cursor.line - 1 : cursor.line + 1;
      if (line < 0 || line > lastLine) continue;
      const desired = effectiveColumn(cursor);
      const column = Math.min(desired, this.buffer.getLineLength(line));
      added.push({
        cursor: { line, column, desiredColumn: desired },
        selection: collapsedSelection({ line, column }),
        active: false,
      });
    }
    if (added.length === 0) return false;

    const before = this._cursors.length;
    // The new cursor furthest in the direction of travel becomes active
    for (const e of entries) e.active = false;
    added[direction === 'above' ? 0 : added.length - 1].active = true;
    this.commit([...entries, ...added]);
    return this._cursors.length > before;
  }

  /**
   * One cursor per line between anchor and head, each selecting the same
   * column span (clamped to the line).
   */
  selectRectangle(anchor: Position, head: Position): void {
    const a = this.clampPosition(anchor);
    const h = this.clampPosition(head);
    const step = a.line <= h.line ? 1 : -1;
    const entries: Entry[] = [];
    for (let line = a.line; ; line += step) {
      const len = this.buffer.getLineLength(line);
      const selAnchor = { line, column: Math.min(a.column, len) };
      const selHead = { line, column: Math.min(h.column, len) };
      entries.push({
        cursor: createCursor(selHead.line, selHead.column),
        selection: { anchor: selAnchor, head: selHead },
        active: line === h.line,
      });
      if (line === h.line) break;
    }
    this.commit(entries);
  }

  /** Keep only the active cursor (selection kept). */
  collapseToActive(): boolean {
    if (this._cursors.length <= 1) return false;
    this._cursors = [this._cursors[this._activeIndex]];
    this._selections = [this._selections[this._activeIndex]];
    this._activeIndex = 0;
    return true;
  }

  /** Collapse every selection onto its cursor. */
  collapseSelections(): boolean {
    let changed = false;
    this._selections = this._selections.map((sel, i) => {
      if (!isSelectionEmpty(sel)) changed = true;
      return collapsedSelection(cursorPosition(this._cursors[i]));
    });
    return changed;
  }

  clampPosition(pos: Position): Position {
    const lastLine = this.buffer.getLineCount() - 1;
    const line = Math.max(0, Math.min(pos.line, lastLine));
    const column = Math.max(0, Math.min(pos.column, this.buffer.getLineLength(line)));
    return { line, column };
  }

  private moveEntry(entry: Entry, target: MoveTarget, extend: boolean, options: MoveOptions): void {
    const { cursor, selection } = entry;

    if (!extend && !isSelectionEmpty(selection) &&
        (target === 'left' || target === 'right' || target === 'wordLeft' || target === 'wordRight')) {
      const edge = target === 'left' || target === 'wordLeft'
        ? selectionStart(selection)
        : selectionEnd(selection);
      cursor.line = edge.line;
      cursor.column = edge.column;
      clearDesiredColumn(cursor);
      entry.selection = collapsedSelection(edge);
      return;
    }

    this.moveCursor(cursor, target, options);
    const head = cursorPosition(cursor);
    entry.selection = extend
      ? { anchor: selection.anchor, head }
      : collapsedSelection(head);
  }

  private moveCursor(cursor: Cursor, target: MoveTarget, options: MoveOptions): void {
    const lastLine = this.buffer.getLineCount() - 1;
    const lineLen = this.buffer.getLineLength(cursor.line);

    switch (target) {
      case 'left':
        if (cursor.column > 0) {
          cursor.column--;
        } else if (cursor.line > 0 && options.allowMultiline) {
          cursor.line--;
          cursor.column = this.buffer.getLineLength(cursor.line);
        }
        clearDesiredColumn(cursor);
        break;

      case 'right':
        if (cursor.column < lineLen) {
          cursor.column++;
        } else if (cursor.line < lastLine && options.allowMultiline) {
          cursor.line++;
          cursor.column = 0;
        }
        clearDesiredColumn(cursor);
        break;

      case 'up':
        this.moveVertical(cursor, -1, options);
        break;

      case 'down':
        this.moveVertical(cursor, 1, options);
        break;

      case 'pageUp':
        this.moveVertical(cursor, -options.pageSize, options);
        break;

      case 'pageDown':
        this.moveVertical(cursor, options.pageSize, options);
        break;

      case 'lineStart':
        cursor.column = 0;
        clearDesiredColumn(cursor);
        break;

      case 'lineStartSmart': {
        const firstNonWs = this.buffer.firstNonWhitespaceColumn(cursor.line);
        cursor.column = cursor.column === 0 ? firstNonWs : cursor.column === firstNonWs ? 0 : firstNonWs;
        clearDesiredColumn(cursor);
        break;
      }

      case 'lineEnd':
        cursor.column = lineLen;
        clearDesiredColumn(cursor);
        break;

      case 'wordLeft':
        if (cursor.column === 0 && cursor.line > 0 && options.allowMultiline) {
          cursor.line--;
          cursor.column = this.buffer.getLineLength(cursor.line);
        } else {
          cursor.column = wordStartBefore(this.lineChars(cursor.line), cursor.column);
        }
        clearDesiredColumn(cursor);
        break;

      case 'wordRight':
        if (cursor.column >= lineLen && cursor.line < lastLine && options.allowMultiline) {
          cursor.line++;
          cursor.column = 0;
        } else {
          cursor.column = wordEndAfter(this.lineChars(cursor.line), cursor.column);
        }
        clearDesiredColumn(cursor);
        break;

      case 'documentStart':
        cursor.line = 0;
        cursor.column = 0;
        clearDesiredColumn(cursor);
        break;

      case 'documentEnd':
        cursor.line = lastLine;
        cursor.column = this.buffer.getLineLength(lastLine);
        clearDesiredColumn(cursor);
        break;
    }
  }

  private moveVertical(cursor: Cursor, delta: number, options: MoveOptions): void {
    if (!options.allowMultiline) return;
    setDesiredColumn(cursor);
    const line = Math.max(0, Math.min(cursor.line + delta, this.buffer.getLineCount() - 1));
    if (line === cursor.line) return;
    cursor.line = line;
    cursor.column = Math.min(effectiveColumn(cursor), this.buffer.getLineLength(line));
  }

  private lineChars(line: number): string[] {
    return toChars(this.buffer.getLine(line) ?? '');
  }

  private entries(): Entry[] {
    return this._cursors.map((cursor, i) => ({
      cursor: { ...cursor },
      selection: this._selections[i],
      active: i === this._activeIndex,
    }));
  }

  /** Sort, merge and store. */
  private commit(entries: Entry[]): void {
    entries.sort((a, b) =>
      comparePositions(selectionStart(a.selection), selectionStart(b.selection)) ||
      comparePositions(a.selection.head, b.selection.head));

    const merged: Entry[] = [];
    for (const entry of entries) {
      const prev = merged[merged.length - 1];
      if (prev && shouldMerge(prev.selection, entry.selection)) {
        const base = isSelectionEmpty(prev.selection) ? entry : prev;
        const other = base === prev ? entry : prev;
        const selection = isSelectionEmpty(other.selection)
          ? base.selection
          : mergeSelections(base.selection, other.selection);
        merged[merged.length - 1] = {
          cursor: {
            line: selection.head.line,
            column: selection.head.column,
            desiredColumn: base.cursor.desiredColumn,
          },
          selection,
          active: prev.active || entry.active,
        };
        continue;
      }
      merged.push(entry);
    }

    this._cursors = merged.map(e => e.cursor);
    this._selections = merged.map(e => e.selection);
    const active = merged.findIndex(e => e.active);
    this._activeIndex = active === -1 ? merged.length - 1 : active;
  }
}
