/**
 * Navigation commands: move every cursor, with or without extending selections.
 */

import { type CommandRegistry, redraw } from './registry';

export function registerNavigationCommands(registry: CommandRegistry): void {
  registry.register('move', (state, msg) => redraw(state.move(msg.target, false)));

  // Degrades to a plain move where selection is disabled
  registry.register('moveWithSelection', (state, msg) => redraw(state.move(msg.target, true)));
}
