/**
 * Edit constraints: the capability profile of an editing context.
 *
 * Editing code never branches on which context it runs in; it only consults
 * these flags. New contexts get a new preset.
 */

import { z } from 'zod';

export type CharFilter = (ch: string) => boolean;

export interface EditConstraints {
  readonly allowMultiline: boolean;
  readonly allowMultiCursor: boolean;
  readonly allowSelection: boolean;
  readonly enableUndo: boolean;
  /** Maximum content length in characters. */
  readonly maxLength: number | null;
  readonly charFilter: CharFilter | null;
}

const constraintFlagsSchema = z.object({
  allowMultiline: z.boolean().default(true),
  allowMultiCursor: z.boolean().default(true),
  allowSelection: z.boolean().default(true),
  enableUndo: z.boolean().default(true),
  maxLength: z.number().int().nonnegative().nullable().default(null),
}).strict();

/**
 * Build a profile from overrides on top of the full-editor defaults.
 * Throws a ZodError if a flag has the wrong type.
 */
export function defineConstraints(overrides: Partial<EditConstraints> = {}): EditConstraints {
  const { charFilter = null, ...flags } = overrides;
  return Object.freeze({ ...constraintFlagsSchema.parse(flags), charFilter });
}

const isDigit: CharFilter = ch => ch >= '0' && ch <= '9';

export const EDITOR_CONSTRAINTS = defineConstraints();

export const SINGLE_LINE_CONSTRAINTS = defineConstraints({
  allowMultiline: false,
  allowMultiCursor: false,
});

export const NUMERIC_CONSTRAINTS = defineConstraints({
  allowMultiline: false,
  allowMultiCursor: false,
  maxLength: 10,
  charFilter: isDigit,
});

export const GOTO_LINE_CONSTRAINTS = defineConstraints({
  allowMultiline: false,
  allowMultiCursor: false,
  maxLength: 20,
  charFilter: ch => isDigit(ch) || ch === ':',
});

export const GRID_CELL_CONSTRAINTS = defineConstraints({
  allowMultiline: false,
  allowMultiCursor: false,
});

export function isCharAllowed(constraints: EditConstraints, ch: string): boolean {
  return constraints.charFilter === null || constraints.charFilter(ch);
}

/** Lengths are in characters. */
export function wouldExceedMaxLength(
  constraints: EditConstraints,
  currentLength: number,
  insertLength: number,
): boolean {
  return constraints.maxLength !== null && currentLength + insertLength > constraints.maxLength;
}
