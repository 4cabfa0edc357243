/**
 * EditableState: one buffer, its cursors and selections, edit history and
 * the constraints of the context that owns it.
 *
 * Every edit is computed per cursor against the current buffer, collected in
 * an EditBuilder, then applied highest offset first so earlier edits never
 * move the offsets of edits still pending. One successful call records one
 * history entry: an edit for a single cursor, a batch for several.
 */

import { type TextBuffer, normalizeLineEndings } from '../buffer/text-buffer';
import { charCount, charIndexToOffset, isSingleChar, toChars } from '../buffer/unicode';
import { type EditorConfig, resolveEditorConfig } from '../config/editor-config';
import {
  type EditConstraints,
  EDITOR_CONSTRAINTS,
  isCharAllowed,
  wouldExceedMaxLength,
} from '../constraints/constraints';
import { type Cursor, cloneCursors } from '../cursor/cursor';
import { CursorManager, type MoveTarget } from '../cursor/cursor-manager';
import {
  type Position,
  type Selection,
  type SelectionRange,
  isSelectionEmpty,
  isSelectionReversed,
  selectionEnd,
  selectionStart,
  toSelectionRange,
} from '../cursor/selection';
import { wordAt, wordEndAfter, wordRangeAt, wordStartBefore } from '../cursor/word-boundary';
import {
  type EditOperation,
  type HistoryEntry,
  applyEntry,
  createOperation,
  invertEntry,
} from '../history/operation';
import { UndoManager } from '../history/undo-manager';
import { OccurrenceSearch } from '../search/occurrence-search';
import { scanOccurrences } from '../search/occurrences';
import { EditBuilder, type EditResult, caretAt } from './edit-builder';

export interface EditableStateOptions {
  constraints?: EditConstraints;
  config?: Partial<EditorConfig>;
}

/** A selection with everything an edit needs, read before any mutation. */
interface Target {
  anchor: Position;
  head: Position;
  start: Position;
  end: Position;
  anchorOffset: number;
  headOffset: number;
  startOffset: number;
  endOffset: number;
  empty: boolean;
  active: boolean;
}

/** Consecutive lines covered by one or more cursors. */
interface LineBlock {
  first: number;
  last: number;
  targets: Target[];
}

/** New content for lines [from, to] and where old positions end up. */
interface LineRewrite {
  from: number;
  to: number;
  lines: string[];
  map: (pos: Position) => Position;
}

const VERTICAL_TARGETS: ReadonlySet<MoveTarget> = new Set<MoveTarget>(['up', 'down', 'pageUp', 'pageDown']);

/** Where a previously placed offset ends up after [start, end) becomes `insertedLength` units. */
function shiftOffset(offset: number, start: number, end: number, insertedLength: number): number {
  if (offset >= end) return offset + insertedLength - (end - start);
  if (offset > start) return start + insertedLength;
  return offset;
}

/** Storage offset of (line, column) inside lines joined with '\n'. */
function offsetInLines(lines: readonly string[], line: number, column: number): number {
  let offset = 0;
  for (let i = 0; i < line && i < lines.length; i++) offset += lines[i].length + 1;
  return offset + charIndexToOffset(lines[line] ?? '', column);
}

export class EditableState {
  readonly buffer: TextBuffer;
  readonly constraints: EditConstraints;
  readonly config: EditorConfig;
  private readonly cursorManager: CursorManager;
  private readonly history: UndoManager;
  private readonly occurrences = new OccurrenceSearch();
  private _version = 0;
  private _onEdit: ((entry: HistoryEntry) => void) | null = null;

  constructor(buffer: TextBuffer, options: EditableStateOptions = {}) {
    this.buffer = buffer;
    this.constraints = options.constraints ?? EDITOR_CONSTRAINTS;
    this.config = resolveEditorConfig(options.config);
    this.cursorManager = new CursorManager(buffer);
    this.history = new UndoManager(this.config.historyCapacity);
  }

  // ── Reads ──────────────────────────────────────────────────

  /** Incremented on every buffer mutation. */
  get version(): number {
    return this._version;
  }

  get cursors(): readonly Cursor[] {
    return this.cursorManager.cursors;
  }

  get selections(): readonly Selection[] {
    return this.cursorManager.selections;
  }

  get activeIndex(): number {
    return this.cursorManager.activeIndex;
  }

  get activeCursor(): Cursor {
    return this.cursorManager.activeCursor;
  }

  get canUndo(): boolean {
    return this.constraints.enableUndo && this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.constraints.enableUndo && this.history.canRedo;
  }

  get undoDepth(): number {
    return this.history.undoCount;
  }

  getText(): string {
    return this.buffer.getText();
  }

  /** Text of the active selection. */
  getSelectedText(): string {
    return this.selectionText(this.cursorManager.activeSelection);
  }

  getSelectedTexts(): string[] {
    return this.selections.map(sel => this.selectionText(sel));
  }

  hasSelection(): boolean {
    return !isSelectionEmpty(this.cursorManager.activeSelection);
  }

  getSelectionRanges(): SelectionRange[] {
    return this.selections.map(toSelectionRange);
  }

  /** Called after every buffer mutation with the entry that was applied. */
  onEdit(callback: ((entry: HistoryEntry) => void) | null): void {
    this._onEdit = callback;
  }

  // ── Movement ───────────────────────────────────────────────

  move(target: MoveTarget, extend: boolean): boolean {
    if (VERTICAL_TARGETS.has(target) && !this.constraints.allowMultiline) return false;
    return this.trackSelectionChange(() => {
      this.cursorManager.move(target, extend && this.constraints.allowSelection, {
        allowMultiline: this.constraints.allowMultiline,
        pageSize: this.config.pageSize,
      });
    });
  }

  // ── Editing ────────────────────────────────────────────────

  insertChar(ch: string): boolean {
    if (ch === '\n' || ch === '\r') return this.insertNewline();
    if (!isSingleChar(ch)) return false;
    return this.insertText(ch);
  }

  insertText(text: string): boolean {
    const normalized = normalizeLineEndings(text);
    if (normalized.length === 0) return false;
    if (!this.constraints.allowMultiline && normalized.includes('\n')) return false;
    return this.insertPerTarget(this.targets().map(() => normalized));
  }

  insertNewline(): boolean {
    if (!this.constraints.allowMultiline) return false;
    return this.insertText('\n');
  }

  deleteBackward(): boolean {
    return this.deleteTowards(pos => this.previousPosition(pos));
  }

  deleteForward(): boolean {
    return this.deleteTowards(pos => this.nextPosition(pos));
  }

  deleteWordBackward(): boolean {
    return this.deleteTowards(pos => pos.column > 0
      ? { line: pos.line, column: wordStartBefore(this.lineChars(pos.line), pos.column) }
      : this.previousPosition(pos));
  }

  deleteWordForward(): boolean {
    return this.deleteTowards(pos => pos.column < this.buffer.getLineLength(pos.line)
      ? { line: pos.line, column: wordEndAfter(this.lineChars(pos.line), pos.column) }
      : this.nextPosition(pos));
  }

  /** Remove every line touched by a cursor, newline included. */
  deleteLine(): boolean {
    if (!this.constraints.allowMultiline) return false;
    const lastLine = this.buffer.getLineCount() - 1;
    const builder = new EditBuilder();

    for (const block of this.lineBlocks()) {
      const column = block.targets[0].head.column;
      const active = block.targets.some(t => t.active);
      if (block.last < lastLine) {
        const start = this.offsetOf({ line: block.first, column: 0 });
        const end = this.offsetOf({ line: block.last + 1, column: 0 });
        const next = this.lineText(block.last + 1);
        builder.delete(start, end - start, [caretAt(charIndexToOffset(next, column), active)]);
      } else if (block.first > 0) {
        const prev = this.lineText(block.first - 1);
        const start = this.offsetOf({ line: block.first - 1, column: charCount(prev) });
        const end = this.buffer.getLength();
        builder.delete(start, end - start, [caretAt(charIndexToOffset(prev, column) - prev.length, active)]);
      } else {
        builder.delete(0, this.buffer.getLength(), [caretAt(0, active)]);
      }
    }
    return this.commitEdits(builder);
  }

  /**
   * Insert the indent unit at every collapsed cursor, or prefix every line
   * covered by a selection.
   */
  indent(): boolean {
    const unit = this.config.indentUnit;
    if (this.targets().every(t => t.empty)) return this.insertText(unit);

    const shift = charCount(unit);
    return this.rewriteBlocks(this.lineBlocks().map(block => {
      const lines = this.linesOf(block.first, block.last);
      return {
        from: block.first,
        to: block.last,
        lines: lines.map(line => unit + line),
        map: pos => pos.line >= block.first && pos.line <= block.last
          ? { line: pos.line, column: pos.column + shift }
          : pos,
      };
    }));
  }

  /** Remove one indent unit, one tab, or up to tabWidth spaces from each covered line. */
  unindent(): boolean {
    return this.rewriteBlocks(this.lineBlocks().map(block => {
      const lines = this.linesOf(block.first, block.last);
      const removed = lines.map(line => this.unindentWidth(line));
      if (removed.every(n => n === 0)) return null;
      return {
        from: block.first,
        to: block.last,
        lines: lines.map((line, i) => line.substring(removed[i])),
        map: pos => pos.line >= block.first && pos.line <= block.last
          ? { line: pos.line, column: Math.max(0, pos.column - removed[pos.line - block.first]) }
          : pos,
      };
    }));
  }

  /** Copy each cursor's line below itself, or each selection after itself. */
  duplicate(): boolean {
    const targets = this.targets();
    const builder = new EditBuilder();
    let inserted = 0;
    let lastLine = -1;
    let lineResults: EditResult[] = [];

    const flushLine = (): void => {
      if (lastLine < 0) return;
      const text = this.lineText(lastLine);
      builder.insert(this.offsetOf({ line: lastLine, column: charCount(text) }), '\n' + text, lineResults);
      inserted += charCount(text) + 1;
      lastLine = -1;
      lineResults = [];
    };

    for (const t of targets) {
      if (!t.empty) {
        flushLine();
        const text = this.buffer.getTextRange(t.startOffset, t.endOffset);
        const reversed = isSelectionReversed({ anchor: t.anchor, head: t.head });
        builder.insert(t.endOffset, text, [{
          anchor: reversed ? text.length : 0,
          head: reversed ? 0 : text.length,
          active: t.active,
        }]);
        inserted += charCount(text);
        continue;
      }
      if (!this.constraints.allowMultiline) {
        builder.keep(t.headOffset, [caretAt(0, t.active)]);
        continue;
      }
      if (t.head.line !== lastLine) flushLine();
      lastLine = t.head.line;
      lineResults.push(caretAt(1 + charIndexToOffset(this.lineText(t.head.line), t.head.column), t.active));
    }
    flushLine();

    if (this.exceedsMaxLength(0, inserted)) return false;
    return this.commitEdits(builder);
  }

  moveLineUp(): boolean {
    if (!this.constraints.allowMultiline) return false;
    return this.rewriteBlocks(this.lineBlocks().map(block => {
      if (block.first === 0) return null;
      const above = this.lineText(block.first - 1);
      return {
        from: block.first - 1,
        to: block.last,
        lines: [...this.linesOf(block.first, block.last), above],
        map: pos => {
          if (pos.line >= block.first && pos.line <= block.last) return { line: pos.line - 1, column: pos.column };
          if (pos.line === block.last + 1 && pos.column === 0) return { line: block.last, column: 0 };
          return pos;
        },
      };
    }));
  }

  moveLineDown(): boolean {
    if (!this.constraints.allowMultiline) return false;
    const lastLine = this.buffer.getLineCount() - 1;
    return this.rewriteBlocks(this.lineBlocks().map(block => {
      if (block.last >= lastLine) return null;
      const below = this.lineText(block.last + 1);
      return {
        from: block.first,
        to: block.last + 1,
        lines: [below, ...this.linesOf(block.first, block.last)],
        map: pos => {
          if (pos.line >= block.first && pos.line <= block.last) return { line: pos.line + 1, column: pos.column };
          if (pos.line === block.last + 1 && pos.column === 0) return { line: block.last + 2, column: 0 };
          return pos;
        },
      };
    }));
  }

  /**
   * Selected text joined with '\n'. With nothing selected, a multiline
   * context copies the cursors' whole lines; a single-line one copies nothing.
   */
  copy(): string | null {
    const targets = this.targets();
    const selected = targets.filter(t => !t.empty);
    if (selected.length > 0) {
      return selected.map(t => this.buffer.getTextRange(t.startOffset, t.endOffset)).join('\n');
    }
    if (!this.constraints.allowMultiline) return null;

    const lines: string[] = [];
    let lastLine = -1;
    for (const t of targets) {
      if (t.head.line === lastLine) continue;
      lastLine = t.head.line;
      lines.push(this.lineText(lastLine) + '\n');
    }
    return lines.join('');
  }

  /** Copy, then remove what was copied. */
  cut(): string | null {
    const text = this.copy();
    if (text === null) return null;

    const targets = this.targets();
    if (targets.every(t => t.empty)) {
      return this.deleteLine() ? text : null;
    }
    const builder = new EditBuilder();
    for (const t of targets) {
      if (t.empty) {
        builder.keep(t.headOffset, [caretAt(0, t.active)]);
      } else {
        builder.delete(t.startOffset, t.endOffset - t.startOffset, [caretAt(0, t.active)]);
      }
    }
    return this.commitEdits(builder) ? text : null;
  }

  /**
   * N clipboard lines over N cursors put one line at each cursor. A
   * single-line context keeps only the first line.
   */
  paste(text: string): boolean {
    const normalized = normalizeLineEndings(text);
    if (!this.constraints.allowMultiline) {
      const newline = normalized.indexOf('\n');
      return this.insertText(newline === -1 ? normalized : normalized.substring(0, newline));
    }

    const count = this.cursorManager.count;
    const body = normalized.endsWith('\n') ? normalized.slice(0, -1) : normalized;
    const lines = body.split('\n');
    if (count > 1 && lines.length === count) {
      return this.insertPerTarget(lines);
    }
    return this.insertText(normalized);
  }

  undo(): boolean {
    if (!this.constraints.enableUndo) return false;
    const entry = this.history.undo();
    if (!entry) return false;
    const inverse = invertEntry(entry);
    applyEntry(this.buffer, inverse);
    this.cursorManager.restoreCursors(inverse.cursorsAfter);
    this.afterMutation(inverse);
    return true;
  }

  redo(): boolean {
    if (!this.constraints.enableUndo) return false;
    const entry = this.history.redo();
    if (!entry) return false;
    applyEntry(this.buffer, entry);
    this.cursorManager.restoreCursors(entry.cursorsAfter);
    this.afterMutation(entry);
    return true;
  }

  /** Delete everything as one undoable edit; a single cursor remains at the origin. */
  clear(): boolean {
    const length = this.buffer.getLength();
    if (length === 0) {
      return this.trackSelectionChange(() => this.cursorManager.reset({ line: 0, column: 0 }));
    }
    const builder = new EditBuilder();
    builder.delete(0, length, [caretAt(0, true)]);
    return this.commitEdits(builder);
  }

  /**
   * Replace the content outright: cursor to the end, history cleared.
   * Single-line contexts keep only the first line.
   */
  setText(text: string): void {
    const normalized = normalizeLineEndings(text);
    const newline = this.constraints.allowMultiline ? -1 : normalized.indexOf('\n');
    this.buffer.setText(newline === -1 ? normalized : normalized.substring(0, newline));
    const lastLine = this.buffer.getLineCount() - 1;
    this.cursorManager.reset({ line: lastLine, column: this.buffer.getLineLength(lastLine) });
    this.history.clear();
    this.occurrences.reset();
    this._version++;
  }

  // ── Selection ──────────────────────────────────────────────

  selectAll(): boolean {
    if (!this.constraints.allowSelection) return false;
    const lastLine = this.buffer.getLineCount() - 1;
    return this.trackSelectionChange(() => this.cursorManager.setSelections([{
      anchor: { line: 0, column: 0 },
      head: { line: lastLine, column: this.buffer.getLineLength(lastLine) },
    }], 0));
  }

  /** Extend each selection to whole lines, including the trailing newline. */
  selectLine(): boolean {
    if (!this.constraints.allowSelection) return false;
    if (!this.constraints.allowMultiline) return this.selectAll();
    const lastLine = this.buffer.getLineCount() - 1;
    return this.trackSelectionChange(() => this.cursorManager.setSelections(
      this.selections.map(sel => {
        const start = selectionStart(sel);
        const end = selectionEnd(sel);
        return {
          anchor: { line: start.line, column: 0 },
          head: end.line < lastLine
            ? { line: end.line + 1, column: 0 }
            : { line: end.line, column: this.buffer.getLineLength(end.line) },
        };
      }),
      this.activeIndex,
    ));
  }

  /** Select the run of same-class characters under each cursor. */
  selectWord(): boolean {
    if (!this.constraints.allowSelection) return false;
    return this.trackSelectionChange(() => this.cursorManager.setSelections(
      this.cursors.map(cursor => {
        const range = wordRangeAt(this.lineChars(cursor.line), cursor.column);
        return {
          anchor: { line: cursor.line, column: range.start },
          head: { line: cursor.line, column: range.end },
        };
      }),
      this.activeIndex,
    ));
  }

  collapseSelection(): boolean {
    return this.cursorManager.collapseSelections();
  }

  /** Drop every cursor but the active one. */
  collapseCursors(): boolean {
    this.occurrences.reset();
    return this.cursorManager.collapseToActive();
  }

  addCursorAbove(): boolean {
    if (!this.constraints.allowMultiCursor || !this.constraints.allowMultiline) return false;
    return this.cursorManager.addCursorVertical('above');
  }

  addCursorBelow(): boolean {
    if (!this.constraints.allowMultiCursor || !this.constraints.allowMultiline) return false;
    return this.cursorManager.addCursorVertical('below');
  }

  /**
   * With nothing selected, select the word under the active cursor. Otherwise
   * add a cursor on the next occurrence of the selected text not yet selected,
   * wrapping to the start of the buffer.
   */
  addCursorAtNextOccurrence(): boolean {
    if (!this.constraints.allowMultiCursor || !this.constraints.allowSelection) return false;
    const active = this.cursorManager.activeSelection;

    if (isSelectionEmpty(active)) {
      const word = wordAt(this.lineChars(active.head.line), active.head.column);
      if (!word) return false;
      const selections = [...this.selections];
      selections[this.activeIndex] = {
        anchor: { line: active.head.line, column: word.start },
        head: { line: active.head.line, column: word.end },
      };
      this.cursorManager.setSelections(selections, this.activeIndex);
      this.occurrences.reset();
      return true;
    }

    const taken = new Set(this.selections.map(sel =>
      `${this.offsetOf(selectionStart(sel))}:${this.offsetOf(selectionEnd(sel))}`));
    const match = this.occurrences.next(
      this.buffer,
      this.selectionText(active),
      this.charIndexAt(selectionEnd(active)),
      m => taken.has(`${m.offset}:${m.endOffset}`),
    );
    if (!match) return false;

    this.cursorManager.addSelection({
      anchor: this.buffer.offsetToPosition(match.offset),
      head: this.buffer.offsetToPosition(match.endOffset),
    });
    return true;
  }

  /** One selection per occurrence of the selected text (or the word under the cursor). */
  addCursorsAtAllOccurrences(): boolean {
    if (!this.constraints.allowMultiCursor || !this.constraints.allowSelection) return false;
    const active = this.cursorManager.activeSelection;

    let needle = this.selectionText(active);
    if (needle.length === 0) {
      const chars = this.lineChars(active.head.line);
      const word = wordAt(chars, active.head.column);
      if (!word) return false;
      needle = chars.slice(word.start, word.end).join('');
    }

    const matches = [...scanOccurrences(this.buffer.getText(), needle)];
    if (matches.length === 0) return false;

    const activeStart = this.offsetOf(selectionStart(active));
    const activeMatch = matches.findIndex(m => m.offset <= activeStart && activeStart <= m.endOffset);
    return this.trackSelectionChange(() => this.cursorManager.setSelections(
      matches.map(m => ({
        anchor: this.buffer.offsetToPosition(m.offset),
        head: this.buffer.offsetToPosition(m.endOffset),
      })),
      activeMatch === -1 ? 0 : activeMatch,
    ));
  }

  /** One cursor per line from anchor to head, each selecting the same columns. */
  selectRectangle(anchor: Position, head: Position): boolean {
    if (!this.constraints.allowSelection) return false;
    if (anchor.line !== head.line && !this.constraints.allowMultiCursor) return false;
    return this.trackSelectionChange(() => this.cursorManager.selectRectangle(anchor, head));
  }

  // ── Internals ──────────────────────────────────────────────

  private offsetOf(pos: Position): number {
    return this.buffer.positionToOffset(pos.line, pos.column);
  }

  private charIndexAt(pos: Position): number {
    return charCount(this.buffer.getTextRange(0, this.offsetOf(pos)));
  }

  private lineText(line: number): string {
    return this.buffer.getLine(line) ?? '';
  }

  private lineChars(line: number): string[] {
    return toChars(this.lineText(line));
  }

  private linesOf(first: number, last: number): string[] {
    const lines: string[] = [];
    for (let line = first; line <= last; line++) lines.push(this.lineText(line));
    return lines;
  }

  private selectionText(sel: Selection): string {
    if (isSelectionEmpty(sel)) return '';
    return this.buffer.getTextRange(this.offsetOf(selectionStart(sel)), this.offsetOf(selectionEnd(sel)));
  }

  private previousPosition(pos: Position): Position {
    if (pos.column > 0) return { line: pos.line, column: pos.column - 1 };
    if (pos.line > 0) return { line: pos.line - 1, column: this.buffer.getLineLength(pos.line - 1) };
    return pos;
  }

  private nextPosition(pos: Position): Position {
    if (pos.column < this.buffer.getLineLength(pos.line)) return { line: pos.line, column: pos.column + 1 };
    if (pos.line < this.buffer.getLineCount() - 1) return { line: pos.line + 1, column: 0 };
    return pos;
  }

  private unindentWidth(line: string): number {
    const unit = this.config.indentUnit;
    if (line.startsWith(unit)) return unit.length;
    if (line.startsWith('\t')) return 1;
    let spaces = 0;
    while (spaces < this.config.tabWidth && line.charCodeAt(spaces) === 32) spaces++;
    return spaces;
  }

  private targets(): Target[] {
    return this.selections.map((sel, i) => {
      const start = selectionStart(sel);
      const end = selectionEnd(sel);
      return {
        anchor: sel.anchor,
        head: sel.head,
        start,
        end,
        anchorOffset: this.offsetOf(sel.anchor),
        headOffset: this.offsetOf(sel.head),
        startOffset: this.offsetOf(start),
        endOffset: this.offsetOf(end),
        empty: isSelectionEmpty(sel),
        active: i === this.activeIndex,
      };
    });
  }

  /**
   * Group targets into runs of lines. A selection ending at column 0 of a
   * later line does not cover that line. Adjacent runs are joined.
   */
  private lineBlocks(): LineBlock[] {
    const blocks: LineBlock[] = [];
    for (const t of this.targets()) {
      const first = t.start.line;
      const last = !t.empty && t.end.column === 0 && t.end.line > first ? t.end.line - 1 : t.end.line;
      const prev = blocks[blocks.length - 1];
      if (prev && first <= prev.last + 1) {
        prev.last = Math.max(prev.last, last);
        prev.targets.push(t);
      } else {
        blocks.push({ first, last, targets: [t] });
      }
    }
    return blocks;
  }

  /** Replace each target's selection (or caret) with the text at the same index. */
  private insertPerTarget(texts: readonly string[]): boolean {
    const targets = this.targets();
    for (const text of texts) {
      for (const ch of text) {
        if (!isCharAllowed(this.constraints, ch)) return false;
      }
    }

    let removed = 0;
    let inserted = 0;
    targets.forEach((t, i) => {
      if (!t.empty) removed += charCount(this.buffer.getTextRange(t.startOffset, t.endOffset));
      inserted += charCount(texts[i] ?? '');
    });
    if (this.exceedsMaxLength(removed, inserted)) return false;

    const builder = new EditBuilder();
    targets.forEach((t, i) => {
      const text = texts[i] ?? '';
      builder.replace(t.startOffset, t.endOffset - t.startOffset, text, [caretAt(text.length, t.active)]);
    });
    return this.commitEdits(builder);
  }

  /** Delete each selection, or the range between each caret and `towards(caret)`. */
  private deleteTowards(towards: (pos: Position) => Position): boolean {
    const builder = new EditBuilder();
    for (const t of this.targets()) {
      if (!t.empty) {
        builder.delete(t.startOffset, t.endOffset - t.startOffset, [caretAt(0, t.active)]);
        continue;
      }
      const other = this.offsetOf(towards(t.head));
      const from = Math.min(other, t.headOffset);
      const to = Math.max(other, t.headOffset);
      builder.delete(from, to - from, [caretAt(0, t.active)]);
    }
    return this.commitEdits(builder);
  }

  /** Apply one rewrite per block; a null rewrite leaves that block's cursors in place. */
  private rewriteBlocks(rewrites: ReadonlyArray<LineRewrite | null>): boolean {
    const blocks = this.lineBlocks();
    const builder = new EditBuilder();

    blocks.forEach((block, i) => {
      const rewrite = rewrites[i] ?? null;
      if (!rewrite) {
        for (const t of block.targets) {
          builder.keep(t.startOffset, [{
            anchor: t.anchorOffset - t.startOffset,
            head: t.headOffset - t.startOffset,
            active: t.active,
          }]);
        }
        return;
      }

      const start = this.offsetOf({ line: rewrite.from, column: 0 });
      const end = this.offsetOf({ line: rewrite.to, column: this.buffer.getLineLength(rewrite.to) });
      const text = rewrite.lines.join('\n');
      const relative = (pos: Position, offset: number): number => {
        const mapped = rewrite.map(pos);
        if (mapped.line < rewrite.from) return offset - start;
        if (mapped.line > rewrite.to) {
          return mapped.line === rewrite.to + 1 && mapped.column === 0
            ? text.length + 1
            : text.length + (offset - end);
        }
        return offsetInLines(rewrite.lines, mapped.line - rewrite.from, mapped.column);
      };
      builder.replace(start, end - start, text, block.targets.map(t => ({
        anchor: relative(t.anchor, t.anchorOffset),
        head: relative(t.head, t.headOffset),
        active: t.active,
      })));
    });

    return this.commitEdits(builder);
  }

  /**
   * Apply collected edits highest offset first, place the resulting
   * selections, and record one history entry.
   */
  private commitEdits(builder: EditBuilder): boolean {
    if (!builder.hasEdits) return false;

    const cursorsBefore = cloneCursors(this.cursors);
    const operations: EditOperation[] = [];
    const placed: EditResult[] = [];
    let lowestEdit = Number.POSITIVE_INFINITY;

    for (const { edit, results } of builder.commit()) {
      const start = edit.offset;
      const end = Math.min(start + edit.deleteCount, lowestEdit);
      const insertText = edit.insertText;

      if (end > start || insertText.length > 0) {
        if (this.buffer.getTextRange(start, end) !== insertText) {
          const deletedText = this.buffer.replace(start, end, insertText);
          for (const p of placed) {
            p.anchor = shiftOffset(p.anchor, start, end, insertText.length);
            p.head = shiftOffset(p.head, start, end, insertText.length);
          }
          operations.push(createOperation(start, deletedText, insertText));
          lowestEdit = start;
        }
      }
      for (const r of results) {
        placed.push({ anchor: start + r.anchor, head: start + r.head, active: r.active });
      }
    }

    // Every replacement matched the existing text: nothing to record, but
    // the selections still end up where the edit leaves them
    if (operations.length === 0) return this.trackSelectionChange(() => this.placeResults(placed));

    this.placeResults(placed);
    const cursorsAfter = cloneCursors(this.cursors);
    const entry: HistoryEntry = cursorsBefore.length === 1 && operations.length === 1
      ? { ...operations[0], cursorsBefore, cursorsAfter }
      : { kind: 'batch', operations, cursorsBefore, cursorsAfter };

    if (this.constraints.enableUndo) this.history.push(entry);
    this.afterMutation(entry);
    return true;
  }

  /** Results were collected highest offset first. */
  private placeResults(placed: EditResult[]): void {
    const ordered = [...placed].reverse();
    const active = ordered.findIndex(r => r.active);
    this.cursorManager.setSelections(
      ordered.map(r => ({
        anchor: this.buffer.offsetToPosition(r.anchor),
        head: this.buffer.offsetToPosition(r.head),
      })),
      active === -1 ? ordered.length - 1 : active,
    );
  }

  /** The character count is only read when a limit is set. */
  private exceedsMaxLength(removed: number, inserted: number): boolean {
    if (this.constraints.maxLength === null) return false;
    return wouldExceedMaxLength(this.constraints, this.buffer.getCharCount() - removed, inserted);
  }

  private afterMutation(entry: HistoryEntry): void {
    this.occurrences.reset();
    this._version++;
    if (this._onEdit) this._onEdit(entry);
  }

  /** Run `fn` and report whether any selection or the active index changed. */
  private trackSelectionChange(fn: () => void): boolean {
    const before = this.selectionKey();
    fn();
    return this.selectionKey() !== before;
  }

  private selectionKey(): string {
    return JSON.stringify([this.selections, this.activeIndex]);
  }
}
