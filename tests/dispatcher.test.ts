import { describe, expect, test } from 'vitest';
import { ZodError } from 'zod';
import {
  type EditContext, constraintsForContext, contextKey, isModalContext,
} from '../core/commands/context';
import { TextEditDispatcher, type UnroutedReason, createDefaultRegistry } from '../core/commands/dispatcher';
import {
  isEditingMsg, isMovementMsg, isSelectionMsg, requiresMultiCursor, requiresMultiline,
} from '../core/commands/messages';
import { CommandRegistry, NO_CHANGE } from '../core/commands/registry';

const EDITOR: EditContext = { kind: 'editor', group: 0 };
const FIND: EditContext = { kind: 'findQuery' };
const GOTO: EditContext = { kind: 'gotoLine' };

function recordingDispatcher() {
  const reasons: UnroutedReason[] = [];
  const dispatcher = new TextEditDispatcher({ onUnrouted: (_ctx, _msg, reason) => reasons.push(reason) });
  return { dispatcher, reasons };
}

describe('contexts', () => {
  test('keys identify one live input each', () => {
    expect(contextKey({ kind: 'editor', group: 2 })).toBe('editor:2');
    expect(contextKey({ kind: 'gridCell', row: 1, column: 2 })).toBe('gridCell:1:2');
    expect(contextKey({ kind: 'gridCell', row: 2, column: 1 })).toBe('gridCell:2:1');
    expect(contextKey(FIND)).toBe('findQuery');
  });

  test('modal inputs', () => {
    expect(isModalContext(GOTO)).toBe(true);
    expect(isModalContext(EDITOR)).toBe(false);
    expect(isModalContext({ kind: 'gridCell', row: 0, column: 0 })).toBe(false);
  });

  test('each context has its constraint profile', () => {
    expect(constraintsForContext(EDITOR).allowMultiline).toBe(true);
    expect(constraintsForContext(FIND).allowMultiline).toBe(false);
    expect(constraintsForContext(GOTO).maxLength).toBe(20);
  });
});

describe('message classification', () => {
  test('editing, movement and selection messages', () => {
    expect(isEditingMsg({ type: 'undo' })).toBe(true);
    expect(isEditingMsg({ type: 'copy' })).toBe(false);
    expect(isMovementMsg({ type: 'moveWithSelection', target: 'left' })).toBe(true);
    expect(isSelectionMsg({ type: 'selectWord' })).toBe(true);
  });

  test('vertical moves need multiple lines, document moves do not', () => {
    expect(requiresMultiline({ type: 'move', target: 'up' })).toBe(true);
    expect(requiresMultiline({ type: 'move', target: 'documentEnd' })).toBe(false);
    expect(requiresMultiline({ type: 'deleteLine' })).toBe(true);
    expect(requiresMultiCursor({ type: 'addCursorsAtAllOccurrences' })).toBe(true);
    expect(requiresMultiCursor({ type: 'selectAll' })).toBe(false);
  });
});

describe('TextEditDispatcher', () => {
  test('every message type has a default handler', () => {
    expect(createDefaultRegistry().getAll()).toHaveLength(30);
  });

  test('messages reach the state of their context', () => {
    const { dispatcher } = recordingDispatcher();
    const state = dispatcher.open(EDITOR, 'hello');
    expect(dispatcher.dispatch(EDITOR, { type: 'insertChar', ch: '!' })).toEqual({ needsRedraw: true, copiedText: null });
    expect(state.getText()).toBe('hello!');
  });

  test('contexts do not share state', () => {
    const { dispatcher } = recordingDispatcher();
    dispatcher.open(EDITOR, 'left');
    dispatcher.open({ kind: 'editor', group: 1 }, 'right');
    dispatcher.dispatch(EDITOR, { type: 'insertText', text: '!' });
    expect(dispatcher.get(EDITOR)?.getText()).toBe('left!');
    expect(dispatcher.get({ kind: 'editor', group: 1 })?.getText()).toBe('right');
  });

  test('unknown contexts report no change', () => {
    const { dispatcher, reasons } = recordingDispatcher();
    expect(dispatcher.dispatch(FIND, { type: 'insertChar', ch: 'a' })).toBe(NO_CHANGE);
    expect(reasons).toEqual(['unknownContext']);
  });

  test('closed contexts are gone', () => {
    const { dispatcher, reasons } = recordingDispatcher();
    dispatcher.open(FIND);
    expect(dispatcher.close(FIND)).toBe(true);
    expect(dispatcher.isOpen(FIND)).toBe(false);
    expect(dispatcher.close(FIND)).toBe(false);
    dispatcher.dispatch(FIND, { type: 'undo' });
    expect(reasons).toEqual(['unknownContext']);
  });

  test('multiline and multi-cursor messages are refused in a query field', () => {
    const { dispatcher, reasons } = recordingDispatcher();
    dispatcher.open(FIND, 'abc');
    expect(dispatcher.dispatch(FIND, { type: 'insertNewline' })).toBe(NO_CHANGE);
    expect(dispatcher.dispatch(FIND, { type: 'move', target: 'down' })).toBe(NO_CHANGE);
    expect(dispatcher.dispatch(FIND, { type: 'addCursorAtNextOccurrence' })).toBe(NO_CHANGE);
    expect(reasons).toEqual(['requiresMultiline', 'requiresMultiline', 'requiresMultiCursor']);
    expect(dispatcher.get(FIND)?.getText()).toBe('abc');
  });

  test('a query field opens with the first line of its text', () => {
    const { dispatcher } = recordingDispatcher();
    const state = dispatcher.open(FIND, 'one\ntwo');
    expect(state.getText()).toBe('one');
    expect(state.buffer.getLineCount()).toBe(1);
    expect(state.activeCursor.column).toBe(3);
  });

  test('document moves work in a query field', () => {
    const { dispatcher } = recordingDispatcher();
    dispatcher.open(FIND, 'abc');
    expect(dispatcher.dispatch(FIND, { type: 'move', target: 'documentStart' }).needsRedraw).toBe(true);
    expect(dispatcher.get(FIND)?.activeCursor.column).toBe(0);
  });

  test('goto-line accepts digits and a colon only', () => {
    const { dispatcher } = recordingDispatcher();
    dispatcher.open(GOTO);
    expect(dispatcher.dispatch(GOTO, { type: 'insertText', text: '12:5' }).needsRedraw).toBe(true);
    expect(dispatcher.dispatch(GOTO, { type: 'insertChar', ch: 'x' }).needsRedraw).toBe(false);
    expect(dispatcher.get(GOTO)?.getText()).toBe('12:5');
  });

  test('copy and cut hand the text back', () => {
    const { dispatcher } = recordingDispatcher();
    const state = dispatcher.open(EDITOR, 'hello world');
    dispatcher.dispatch(EDITOR, { type: 'selectAll' });
    expect(dispatcher.dispatch(EDITOR, { type: 'copy' })).toEqual({ needsRedraw: false, copiedText: 'hello world' });
    expect(dispatcher.dispatch(EDITOR, { type: 'cut' })).toEqual({ needsRedraw: true, copiedText: 'hello world' });
    expect(state.getText()).toBe('');
    expect(dispatcher.dispatch(EDITOR, { type: 'paste', text: 'back' }).needsRedraw).toBe(true);
    expect(state.getText()).toBe('back');
  });

  test('copy in a single-line field with nothing selected', () => {
    const { dispatcher } = recordingDispatcher();
    dispatcher.open(FIND, 'abc');
    expect(dispatcher.dispatch(FIND, { type: 'copy' })).toEqual({ needsRedraw: false, copiedText: null });
  });

  test('undo through the dispatcher', () => {
    const { dispatcher } = recordingDispatcher();
    const state = dispatcher.open(EDITOR);
    dispatcher.dispatch(EDITOR, { type: 'insertText', text: 'abc' });
    expect(dispatcher.dispatch(EDITOR, { type: 'undo' }).needsRedraw).toBe(true);
    expect(state.getText()).toBe('');
    expect(dispatcher.dispatch(EDITOR, { type: 'undo' }).needsRedraw).toBe(false);
  });

  test('a registry without the handler reports it', () => {
    const reasons: UnroutedReason[] = [];
    const dispatcher = new TextEditDispatcher({
      registry: new CommandRegistry(),
      onUnrouted: (_ctx, _msg, reason) => reasons.push(reason),
    });
    dispatcher.open(EDITOR);
    expect(dispatcher.dispatch(EDITOR, { type: 'selectAll' })).toBe(NO_CHANGE);
    expect(reasons).toEqual(['noHandler']);
  });

  test('config is validated up front', () => {
    expect(() => new TextEditDispatcher({ config: { historyCapacity: 0 } })).toThrow(ZodError);
  });

  test('config reaches every state', () => {
    const dispatcher = new TextEditDispatcher({ config: { indentUnit: '  ' } });
    const state = dispatcher.open(EDITOR, 'x');
    dispatcher.dispatch(EDITOR, { type: 'move', target: 'lineStart' });
    dispatcher.dispatch(EDITOR, { type: 'indent' });
    expect(state.getText()).toBe('  x');
  });
});
