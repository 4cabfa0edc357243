/**
 * Editing commands: insert, delete, indent, line operations.
 */

import { type CommandRegistry, redraw } from './registry';

export function registerEditingCommands(registry: CommandRegistry): void {
  registry.register('insertChar', (state, msg) => redraw(state.insertChar(msg.ch)));
  registry.register('insertText', (state, msg) => redraw(state.insertText(msg.text)));
  registry.register('insertNewline', (state) => redraw(state.insertNewline()));

  registry.register('deleteBackward', (state) => redraw(state.deleteBackward()));
  registry.register('deleteForward', (state) => redraw(state.deleteForward()));
  registry.register('deleteWordBackward', (state) => redraw(state.deleteWordBackward()));
  registry.register('deleteWordForward', (state) => redraw(state.deleteWordForward()));
  registry.register('deleteLine', (state) => redraw(state.deleteLine()));

  registry.register('indent', (state) => redraw(state.indent()));
  registry.register('unindent', (state) => redraw(state.unindent()));

  // Line operations
  registry.register('duplicate', (state) => redraw(state.duplicate()));
  registry.register('moveLineUp', (state) => redraw(state.moveLineUp()));
  registry.register('moveLineDown', (state) => redraw(state.moveLineDown()));
}
