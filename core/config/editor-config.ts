import { z } from 'zod';
import { DEFAULT_HISTORY_CAPACITY } from '../history/undo-manager';

/**
 * Editing session configuration schema with defaults
 */
const editorConfigSchema = z.object({
  historyCapacity: z.number().int().positive().default(DEFAULT_HISTORY_CAPACITY),
  pageSize: z.number().int().positive().default(30), // lines per pageUp/pageDown
  indentUnit: z.string().min(1).default('    '),
  tabWidth: z.number().int().positive().default(4),
});

export type EditorConfig = z.infer<typeof editorConfigSchema>;

/**
 * Fill in defaults and validate. Throws a ZodError on invalid input.
 */
export function resolveEditorConfig(partial: Partial<EditorConfig> = {}): EditorConfig {
  return editorConfigSchema.parse(partial);
}

export const DEFAULT_EDITOR_CONFIG: EditorConfig = resolveEditorConfig();
