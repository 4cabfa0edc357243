/**
 * Routes (context, message) pairs to the EditableState each context owns.
 *
 * Each open context owns exactly one state; nothing is shared between
 * contexts. Routine input never throws: messages for unknown contexts or
 * disallowed by the context's constraints come back as "no change" and are
 * reported to the onUnrouted listener.
 */

import { RopeBuffer } from '../buffer/rope-buffer';
import { StringBuffer } from '../buffer/string-buffer';
import type { TextBuffer } from '../buffer/text-buffer';
import { type EditorConfig, resolveEditorConfig } from '../config/editor-config';
import { EditableState } from '../editable/editable-state';
import { registerClipboardCommands } from './clipboard';
import { type EditContext, constraintsForContext, contextKey } from './context';
import { registerEditingCommands } from './editing';
import { registerHistoryCommands } from './history';
import { type TextEditMsg, requiresMultiCursor, requiresMultiline } from './messages';
import { registerMultiCursorCommands } from './multicursor';
import { registerNavigationCommands } from './navigation';
import { CommandRegistry, type DispatchResult, NO_CHANGE } from './registry';
import { registerSelectionCommands } from './selection-cmds';

export type UnroutedReason = 'unknownContext' | 'requiresMultiline' | 'requiresMultiCursor' | 'noHandler';

export interface TextEditDispatcherOptions {
  config?: Partial<EditorConfig>;
  registry?: CommandRegistry;
  onUnrouted?: (context: EditContext, msg: TextEditMsg, reason: UnroutedReason) => void;
}

/** A registry with every command group registered. */
export function createDefaultRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registerNavigationCommands(registry);
  registerEditingCommands(registry);
  registerSelectionCommands(registry);
  registerClipboardCommands(registry);
  registerMultiCursorCommands(registry);
  registerHistoryCommands(registry);
  return registry;
}

export class TextEditDispatcher {
  private readonly states = new Map<string, EditableState>();
  private readonly registry: CommandRegistry;
  private readonly config: EditorConfig;
  private readonly onUnrouted: TextEditDispatcherOptions['onUnrouted'];

  constructor(options: TextEditDispatcherOptions = {}) {
    this.config = resolveEditorConfig(options.config);
    this.registry = options.registry ?? createDefaultRegistry();
    this.onUnrouted = options.onUnrouted;
  }

  /**
   * Start a session for `context`, replacing any existing one. Editors get
   * the rope backend, every single-line input the string backend.
   */
  open(context: EditContext, text: string = ''): EditableState {
    const buffer: TextBuffer = context.kind === 'editor' ? new RopeBuffer() : new StringBuffer();
    const state = new EditableState(buffer, {
      constraints: constraintsForContext(context),
      config: this.config,
    });
    if (text.length > 0) state.setText(text);
    this.states.set(contextKey(context), state);
    return state;
  }

  get(context: EditContext): EditableState | undefined {
    return this.states.get(contextKey(context));
  }

  close(context: EditContext): boolean {
    return this.states.delete(contextKey(context));
  }

  isOpen(context: EditContext): boolean {
    return this.states.has(contextKey(context));
  }

  dispatch(context: EditContext, msg: TextEditMsg): DispatchResult {
    const state = this.get(context);
    if (!state) return this.unrouted(context, msg, 'unknownContext');

    if (requiresMultiline(msg) && !state.constraints.allowMultiline) {
      return this.unrouted(context, msg, 'requiresMultiline');
    }
    if (requiresMultiCursor(msg) && !state.constraints.allowMultiCursor) {
      return this.unrouted(context, msg, 'requiresMultiCursor');
    }

    return this.registry.execute(state, msg) ?? this.unrouted(context, msg, 'noHandler');
  }

  private unrouted(context: EditContext, msg: TextEditMsg, reason: UnroutedReason): DispatchResult {
    if (this.onUnrouted) this.onUnrouted(context, msg, reason);
    return NO_CHANGE;
  }
}
