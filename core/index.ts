/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Buffer
export { type TextBuffer, type TextEdit, normalizeLineEndings } from './buffer/text-buffer';
export { RopeBuffer } from './buffer/rope-buffer';
export { StringBuffer } from './buffer/string-buffer';
export { PieceTable, type PieceDescriptor, type BufferType } from './buffer/piece-table';
export { Rope } from './buffer/rope';
export { OffsetBoundaryError, charCount, isCharBoundary } from './buffer/unicode';

// Cursor
export { CursorManager, type MoveTarget, type MoveOptions } from './cursor/cursor-manager';
export {
  type Cursor, createCursor, setDesiredColumn, clearDesiredColumn, effectiveColumn,
} from './cursor/cursor';
export {
  type Position, type Selection, type SelectionRange,
  comparePositions, positionsEqual, collapsedSelection,
  selectionStart, selectionEnd, isSelectionEmpty, isSelectionReversed,
  selectionContains, toSelectionRange, selectionsOverlap, mergeSelections,
} from './cursor/selection';
export {
  type CharType, type WordRange,
  charType, isWordBoundary, wordStartBefore, wordEndAfter, wordRangeAt, wordAt,
} from './cursor/word-boundary';

// History
export { UndoManager, DEFAULT_HISTORY_CAPACITY } from './history/undo-manager';
export {
  type EditOperation, type EditBatch, type HistoryEntry,
  createOperation, invertOperation, invertEntry, applyEntry,
} from './history/operation';

// Constraints / config
export {
  type EditConstraints, type CharFilter,
  defineConstraints, isCharAllowed, wouldExceedMaxLength,
  EDITOR_CONSTRAINTS, SINGLE_LINE_CONSTRAINTS, NUMERIC_CONSTRAINTS,
  GOTO_LINE_CONSTRAINTS, GRID_CELL_CONSTRAINTS,
} from './constraints/constraints';
export { type EditorConfig, resolveEditorConfig, DEFAULT_EDITOR_CONFIG } from './config/editor-config';

// Search
export {
  type Occurrence, type OccurrenceMatch,
  findAllOccurrences, findNextOccurrence, scanOccurrences,
} from './search/occurrences';
export { OccurrenceSearch } from './search/occurrence-search';

// Editable state
export { EditableState, type EditableStateOptions } from './editable/editable-state';
export { EditBuilder, type EditResult, type EditUnit, caretAt } from './editable/edit-builder';

// Commands
export {
  type TextEditMsg, type TextEditMsgType, type MsgOf,
  isMsg, isEditingMsg, isMovementMsg, isSelectionMsg, requiresMultiCursor, requiresMultiline,
} from './commands/messages';
export { type EditContext, contextKey, constraintsForContext, isModalContext } from './commands/context';
export { CommandRegistry, type CommandHandler, type DispatchResult, NO_CHANGE } from './commands/registry';
export {
  TextEditDispatcher, type TextEditDispatcherOptions, type UnroutedReason, createDefaultRegistry,
} from './commands/dispatcher';
