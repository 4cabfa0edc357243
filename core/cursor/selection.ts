/**
 * Positions and anchor/head selections.
 *
 * A selection is defined by an anchor (fixed end) and a head (the end that
 * follows the cursor). The "start" is min(anchor, head), "end" is max.
 */

export interface Position {
  line: number;
  column: number;
}

export interface Selection {
  anchor: Position;
  head: Position;
}

/** Normalized selection, as handed to a renderer. */
export interface SelectionRange {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

/**
 * Compare two positions. Returns negative if a < b, 0 if equal, positive if a > b.
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.column - b.column;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column;
}

export function collapsedSelection(pos: Position): Selection {
  return { anchor: { ...pos }, head: { ...pos } };
}

export function selectionStart(sel: Selection): Position {
  return comparePositions(sel.anchor, sel.head) <= 0 ? sel.anchor : sel.head;
}

export function selectionEnd(sel: Selection): Position {
  return comparePositions(sel.anchor, sel.head) <= 0 ? sel.head : sel.anchor;
}

export function isSelectionEmpty(sel: Selection): boolean {
  return positionsEqual(sel.anchor, sel.head);
}

/** True if the head sits before the anchor. */
export function isSelectionReversed(sel: Selection): boolean {
  return comparePositions(sel.head, sel.anchor) < 0;
}

/** Whether `pos` lies inside the selection (end exclusive). */
export function selectionContains(sel: Selection, pos: Position): boolean {
  return comparePositions(selectionStart(sel), pos) <= 0 &&
    comparePositions(pos, selectionEnd(sel)) < 0;
}

export function toSelectionRange(sel: Selection): SelectionRange {
  const start = selectionStart(sel);
  const end = selectionEnd(sel);
  return {
    startLine: start.line,
    startColumn: start.column,
    endLine: end.line,
    endColumn: end.column,
  };
}

/**
 * Check if two non-empty selections strictly overlap. Touching ends do not count.
 */
export function selectionsOverlap(a: Selection, b: Selection): boolean {
  if (isSelectionEmpty(a) || isSelectionEmpty(b)) return false;
  return comparePositions(selectionStart(a), selectionEnd(b)) < 0 &&
    comparePositions(selectionStart(b), selectionEnd(a)) < 0;
}

/**
 * Merge two overlapping selections into one. The result keeps the direction of `a`.
 */
export function mergeSelections(a: Selection, b: Selection): Selection {
  const startA = selectionStart(a);
  const startB = selectionStart(b);
  const endA = selectionEnd(a);
  const endB = selectionEnd(b);
  const start = comparePositions(startA, startB) <= 0 ? startA : startB;
  const end = comparePositions(endA, endB) >= 0 ? endA : endB;
  return isSelectionReversed(a)
    ? { anchor: { ...end }, head: { ...start } }
    : { anchor: { ...start }, head: { ...end } };
}
