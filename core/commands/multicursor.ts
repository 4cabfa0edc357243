/**
 * Multi-cursor commands: add cursors vertically or on occurrences, collapse.
 */

import { type CommandRegistry, redraw } from './registry';

export function registerMultiCursorCommands(registry: CommandRegistry): void {
  registry.register('addCursorAbove', (state) => redraw(state.addCursorAbove()));
  registry.register('addCursorBelow', (state) => redraw(state.addCursorBelow()));
  registry.register('addCursorAtNextOccurrence', (state) => redraw(state.addCursorAtNextOccurrence()));
  registry.register('addCursorsAtAllOccurrences', (state) => redraw(state.addCursorsAtAllOccurrences()));
  registry.register('collapseCursors', (state) => redraw(state.collapseCursors()));
}
