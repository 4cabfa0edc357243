/**
 * Transaction builder for atomic multi-cursor edits.
 *
 * Each cursor (or block of lines) contributes one edit plus the selections it
 * leaves behind. Result offsets are relative to the edit's start in the
 * buffer as it is right after that edit, so they can be shifted when edits
 * at lower offsets are applied afterwards.
 */

import type { TextEdit } from '../buffer/text-buffer';

export interface EditResult {
  /** Anchor offset relative to the edit start, after the edit. */
  anchor: number;
  /** Head offset relative to the edit start, after the edit. */
  head: number;
  /** Whether this result becomes the active cursor. */
  active: boolean;
}

export interface EditUnit {
  edit: TextEdit;
  results: EditResult[];
}

/** A caret `at` units past the edit start. */
export function caretAt(at: number, active: boolean = false): EditResult {
  return { anchor: at, head: at, active };
}

export class EditBuilder {
  private _units: EditUnit[] = [];
  private _committed = false;

  /** Insert text at a position. The caret lands after the inserted text by default. */
  insert(offset: number, text: string, results: EditResult[] = [caretAt(text.length)]): void {
    this.replace(offset, 0, text, results);
  }

  /** Delete text in a range. The caret lands at the range start by default. */
  delete(offset: number, length: number, results: EditResult[] = [caretAt(0)]): void {
    this.replace(offset, length, '', results);
  }

  /** Replace text in a range. */
  replace(offset: number, length: number, newText: string, results: EditResult[] = [caretAt(newText.length)]): void {
    if (this._committed) throw new Error('EditBuilder already committed');
    this._units.push({ edit: { offset, deleteCount: length, insertText: newText }, results });
  }

  /** Leave the text alone but still place cursors relative to `offset`. */
  keep(offset: number, results: EditResult[]): void {
    this.replace(offset, 0, '', results);
  }

  /**
   * Get the collected units, highest offset first; at equal offsets the
   * longer deletion comes first. Marks the builder as committed.
   */
  commit(): EditUnit[] {
    if (this._committed) throw new Error('EditBuilder already committed');
    this._committed = true;
    return [...this._units].sort((a, b) =>
      b.edit.offset - a.edit.offset || b.edit.deleteCount - a.edit.deleteCount);
  }

  /** Whether any unit changes text. */
  get hasEdits(): boolean {
    return this._units.some(u => u.edit.deleteCount > 0 || u.edit.insertText.length > 0);
  }
}
