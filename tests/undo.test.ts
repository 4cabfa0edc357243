import { describe, expect, test } from 'vitest';
import { RopeBuffer } from '../core/buffer/rope-buffer';
import { StringBuffer } from '../core/buffer/string-buffer';
import { defineConstraints } from '../core/constraints/constraints';
import { comparePositions } from '../core/cursor/selection';
import { EditableState } from '../core/editable/editable-state';
import {
  type HistoryEntry, applyEntry, createOperation, invertEntry, invertOperation,
} from '../core/history/operation';
import { UndoManager } from '../core/history/undo-manager';

const positions = (state: EditableState) => state.cursors.map(c => [c.line, c.column]);

describe('UndoManager', () => {
  const op = (text: string): HistoryEntry => createOperation(0, '', text);

  test('undo then redo walks the stacks', () => {
    const um = new UndoManager();
    const a = op('a');
    const b = op('b');
    um.push(a);
    um.push(b);
    expect(um.undo()).toBe(b);
    expect(um.canRedo).toBe(true);
    expect(um.redo()).toBe(b);
    expect(um.undo()).toBe(b);
    expect(um.undo()).toBe(a);
    expect(um.undo()).toBeNull();
    expect(um.redoCount).toBe(2);
  });

  test('push clears the redo stack', () => {
    const um = new UndoManager();
    um.push(op('a'));
    um.undo();
    um.push(op('b'));
    expect(um.canRedo).toBe(false);
    expect(um.redo()).toBeNull();
  });

  test('oldest entries fall off past capacity', () => {
    const um = new UndoManager(2);
    const c = op('c');
    um.push(op('a'));
    um.push(op('b'));
    um.push(c);
    expect(um.undoCount).toBe(2);
    expect(um.undo()).toBe(c);
  });

  test('clear empties both stacks', () => {
    const um = new UndoManager();
    um.push(op('a'));
    um.push(op('b'));
    um.undo();
    um.clear();
    expect(um.canUndo).toBe(false);
    expect(um.canRedo).toBe(false);
  });
});

describe('history entries', () => {
  test('inverting an operation swaps text and snapshots', () => {
    const before = [{ line: 0, column: 1, desiredColumn: null }];
    const after = [{ line: 0, column: 3, desiredColumn: null }];
    const inverse = invertOperation(createOperation(1, 'x', 'abc', before, after));
    expect(inverse).toEqual({
      kind: 'edit', offset: 1, deletedText: 'abc', insertedText: 'x',
      cursorsBefore: after, cursorsAfter: before,
    });
  });

  test('an inverted batch undoes in reverse order', () => {
    const buf = new StringBuffer('abcdef');
    const batch: HistoryEntry = {
      kind: 'batch',
      operations: [createOperation(3, '', 'X'), createOperation(0, '', 'Y')],
      cursorsBefore: [],
      cursorsAfter: [],
    };
    applyEntry(buf, batch);
    expect(buf.getText()).toBe('YabcXdef');
    applyEntry(buf, invertEntry(batch));
    expect(buf.getText()).toBe('abcdef');
  });
});

describe('EditableState history', () => {
  test('undo and redo restore text and cursors', () => {
    const state = new EditableState(new RopeBuffer('hello'));
    state.move('lineEnd', false);
    state.insertText(' world');
    expect(state.getText()).toBe('hello world');
    expect(state.undoDepth).toBe(1);

    expect(state.undo()).toBe(true);
    expect(state.getText()).toBe('hello');
    expect(positions(state)).toEqual([[0, 5]]);
    expect(state.canRedo).toBe(true);

    expect(state.redo()).toBe(true);
    expect(state.getText()).toBe('hello world');
    expect(positions(state)).toEqual([[0, 11]]);
  });

  test('a multi-cursor edit is one atomic entry', () => {
    const state = new EditableState(new RopeBuffer('a\nb\nc'));
    state.addCursorBelow();
    state.addCursorBelow();
    expect(state.cursors).toHaveLength(3);

    state.insertText('- ');
    expect(state.getText()).toBe('- a\n- b\n- c');
    expect(positions(state)).toEqual([[0, 2], [1, 2], [2, 2]]);
    expect(state.undoDepth).toBe(1);

    state.undo();
    expect(state.getText()).toBe('a\nb\nc');
    expect(positions(state)).toEqual([[0, 0], [1, 0], [2, 0]]);
  });

  test('each undo and redo bumps the version and notifies', () => {
    const state = new EditableState(new RopeBuffer(''));
    const kinds: string[] = [];
    state.onEdit(entry => kinds.push(entry.kind));
    state.insertText('x');
    state.undo();
    state.redo();
    expect(state.version).toBe(3);
    expect(kinds).toEqual(['edit', 'edit', 'edit']);

    state.onEdit(null);
    state.insertText('y');
    expect(kinds).toHaveLength(3);
  });

  test('nothing to undo', () => {
    const state = new EditableState(new RopeBuffer('abc'));
    expect(state.canUndo).toBe(false);
    expect(state.undo()).toBe(false);
    expect(state.redo()).toBe(false);
    expect(state.version).toBe(0);
  });

  test('a new edit after undo drops the redo branch', () => {
    const state = new EditableState(new RopeBuffer(''));
    state.insertText('a');
    state.undo();
    state.insertText('b');
    expect(state.canRedo).toBe(false);
    expect(state.getText()).toBe('b');
  });

  test('history capacity comes from config', () => {
    const state = new EditableState(new RopeBuffer(''), { config: { historyCapacity: 2 } });
    state.insertText('a');
    state.insertText('b');
    state.insertText('c');
    expect(state.undoDepth).toBe(2);
    state.undo();
    state.undo();
    expect(state.getText()).toBe('a');
    expect(state.undo()).toBe(false);
  });

  test('contexts without undo record nothing', () => {
    const state = new EditableState(new StringBuffer(''), {
      constraints: defineConstraints({ enableUndo: false }),
    });
    state.insertText('abc');
    expect(state.canUndo).toBe(false);
    expect(state.undo()).toBe(false);
    expect(state.getText()).toBe('abc');
  });

  test('setText clears history', () => {
    const state = new EditableState(new RopeBuffer(''));
    state.insertText('draft');
    state.setText('line one\nline two');
    expect(state.canUndo).toBe(false);
    expect(positions(state)).toEqual([[1, 8]]);
    expect(state.version).toBe(2);
  });
});

/** Small deterministic generator so a failing sequence can be replayed. */
function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r;
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

const STEPS: Array<(state: EditableState) => unknown> = [
  s => s.insertText('ab'),
  s => s.insertChar('é'),
  s => s.insertNewline(),
  s => s.deleteBackward(),
  s => s.deleteForward(),
  s => s.deleteWordBackward(),
  s => s.deleteWordForward(),
  s => s.paste('x\ny'),
  s => s.indent(),
  s => s.unindent(),
  s => s.duplicate(),
  s => s.moveLineUp(),
  s => s.moveLineDown(),
  s => s.deleteLine(),
  s => s.cut(),
  s => s.move('left', false),
  s => s.move('wordRight', true),
  s => s.move('up', false),
  s => s.move('down', true),
  s => s.move('lineEnd', false),
  s => s.move('documentStart', true),
  s => s.selectWord(),
  s => s.addCursorBelow(),
  s => s.addCursorAbove(),
  s => s.addCursorsAtAllOccurrences(),
  s => s.addCursorAtNextOccurrence(),
  s => s.collapseCursors(),
];

interface Snapshot {
  text: string;
  cursors: number[][];
}

describe('mixed edit sequences', () => {
  const snapshot = (state: EditableState): Snapshot => ({ text: state.getText(), cursors: positions(state) });

  test.each([1, 7, 42, 1234])('seed %i undoes and redoes every step exactly', seed => {
    const initial = 'alpha beta\n  gamma delta\nbeta alpha\nomega';
    const state = new EditableState(new RopeBuffer(initial));
    const random = mulberry32(seed);
    const recorded: Array<{ before: Snapshot; after: Snapshot }> = [];

    for (let i = 0; i < 150; i++) {
      const before = snapshot(state);
      const depth = state.undoDepth;
      STEPS[Math.floor(random() * STEPS.length)](state);

      const { cursors, selections } = state;
      expect(selections).toHaveLength(cursors.length);
      cursors.forEach((c, j) => {
        expect(selections[j].head).toEqual({ line: c.line, column: c.column });
        if (j > 0) expect(comparePositions(cursors[j - 1], c)).toBeLessThan(0);
      });

      if (state.undoDepth > depth) recorded.push({ before, after: snapshot(state) });
    }
    expect(recorded.length).toBeGreaterThan(0);

    for (let i = recorded.length - 1; i >= 0; i--) {
      expect(state.undo()).toBe(true);
      expect(snapshot(state)).toEqual(recorded[i].before);
    }
    expect(state.canUndo).toBe(false);
    expect(state.getText()).toBe(initial);

    for (const { after } of recorded) {
      expect(state.redo()).toBe(true);
      expect(snapshot(state)).toEqual(after);
    }
    expect(state.canRedo).toBe(false);
  });
});
