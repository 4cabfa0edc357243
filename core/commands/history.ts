/**
 * History commands: undo and redo.
 */

import { type CommandRegistry, redraw } from './registry';

export function registerHistoryCommands(registry: CommandRegistry): void {
  registry.register('undo', (state) => redraw(state.undo()));
  registry.register('redo', (state) => redraw(state.redo()));
}
