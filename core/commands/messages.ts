/**
 * Text edit messages: the structural commands front ends send to an
 * editing context, already resolved from keys and pointer events.
 */

import type { MoveTarget } from '../cursor/cursor-manager';
import type { Position } from '../cursor/selection';

export type { MoveTarget };

export type TextEditMsg =
  | { type: 'move'; target: MoveTarget }
  | { type: 'moveWithSelection'; target: MoveTarget }
  | { type: 'insertChar'; ch: string }
  | { type: 'insertText'; text: string }
  | { type: 'insertNewline' }
  | { type: 'deleteBackward' }
  | { type: 'deleteForward' }
  | { type: 'deleteWordBackward' }
  | { type: 'deleteWordForward' }
  | { type: 'deleteLine' }
  | { type: 'selectAll' }
  | { type: 'selectWord' }
  | { type: 'selectLine' }
  | { type: 'selectRectangle'; anchor: Position; head: Position }
  | { type: 'collapseSelection' }
  | { type: 'addCursorAbove' }
  | { type: 'addCursorBelow' }
  | { type: 'addCursorAtNextOccurrence' }
  | { type: 'addCursorsAtAllOccurrences' }
  | { type: 'collapseCursors' }
  | { type: 'copy' }
  | { type: 'cut' }
  | { type: 'paste'; text: string }
  | { type: 'undo' }
  | { type: 'redo' }
  | { type: 'indent' }
  | { type: 'unindent' }
  | { type: 'duplicate' }
  | { type: 'moveLineUp' }
  | { type: 'moveLineDown' };

export type TextEditMsgType = TextEditMsg['type'];

export type MsgOf<K extends TextEditMsgType> = Extract<TextEditMsg, { type: K }>;

export function isMsg<K extends TextEditMsgType>(msg: TextEditMsg, type: K): msg is MsgOf<K> {
  return msg.type === type;
}

const EDITING: ReadonlySet<TextEditMsgType> = new Set<TextEditMsgType>([
  'insertChar', 'insertText', 'insertNewline',
  'deleteBackward', 'deleteForward', 'deleteWordBackward', 'deleteWordForward', 'deleteLine',
  'cut', 'paste', 'undo', 'redo',
  'indent', 'unindent', 'duplicate', 'moveLineUp', 'moveLineDown',
]);

const SELECTION: ReadonlySet<TextEditMsgType> = new Set<TextEditMsgType>([
  'moveWithSelection', 'selectAll', 'selectWord', 'selectLine', 'selectRectangle',
]);

const MULTI_CURSOR: ReadonlySet<TextEditMsgType> = new Set<TextEditMsgType>([
  'addCursorAbove', 'addCursorBelow', 'addCursorAtNextOccurrence', 'addCursorsAtAllOccurrences',
]);

const MULTILINE: ReadonlySet<TextEditMsgType> = new Set<TextEditMsgType>([
  'insertNewline', 'deleteLine', 'addCursorAbove', 'addCursorBelow', 'moveLineUp', 'moveLineDown',
]);

const VERTICAL: ReadonlySet<MoveTarget> = new Set<MoveTarget>(['up', 'down', 'pageUp', 'pageDown']);

/** Messages that may change the buffer. */
export function isEditingMsg(msg: TextEditMsg): boolean {
  return EDITING.has(msg.type);
}

export function isMovementMsg(msg: TextEditMsg): boolean {
  return msg.type === 'move' || msg.type === 'moveWithSelection';
}

export function isSelectionMsg(msg: TextEditMsg): boolean {
  return SELECTION.has(msg.type);
}

export function requiresMultiCursor(msg: TextEditMsg): boolean {
  return MULTI_CURSOR.has(msg.type);
}

/** Document start/end stay available in single-line contexts. */
export function requiresMultiline(msg: TextEditMsg): boolean {
  if (msg.type === 'move' || msg.type === 'moveWithSelection') return VERTICAL.has(msg.target);
  return MULTILINE.has(msg.type);
}
