/**
 * Editing contexts: which live EditableState a message targets.
 */

import {
  type EditConstraints,
  EDITOR_CONSTRAINTS,
  GOTO_LINE_CONSTRAINTS,
  GRID_CELL_CONSTRAINTS,
  SINGLE_LINE_CONSTRAINTS,
} from '../constraints/constraints';

export type EditContext =
  | { kind: 'editor'; group: number }
  | { kind: 'commandPalette' }
  | { kind: 'gotoLine' }
  | { kind: 'findQuery' }
  | { kind: 'replaceQuery' }
  | { kind: 'gridCell'; row: number; column: number };

/** Stable string key, one per live context. */
export function contextKey(context: EditContext): string {
  switch (context.kind) {
    case 'editor':
      return `editor:${context.group}`;
    case 'gridCell':
      return `gridCell:${context.row}:${context.column}`;
    default:
      return context.kind;
  }
}

export function constraintsForContext(context: EditContext): EditConstraints {
  switch (context.kind) {
    case 'editor':
      return EDITOR_CONSTRAINTS;
    case 'gotoLine':
      return GOTO_LINE_CONSTRAINTS;
    case 'gridCell':
      return GRID_CELL_CONSTRAINTS;
    case 'commandPalette':
    case 'findQuery':
    case 'replaceQuery':
      return SINGLE_LINE_CONSTRAINTS;
  }
}

/** Inputs that live in a modal dialog. */
export function isModalContext(context: EditContext): boolean {
  return context.kind === 'commandPalette' ||
    context.kind === 'gotoLine' ||
    context.kind === 'findQuery' ||
    context.kind === 'replaceQuery';
}
