/**
 * Selection commands: select all/word/line, rectangles, collapse.
 */

import { type CommandRegistry, redraw } from './registry';

export function registerSelectionCommands(registry: CommandRegistry): void {
  registry.register('selectAll', (state) => redraw(state.selectAll()));
  registry.register('selectWord', (state) => redraw(state.selectWord()));

  // Single-line contexts select everything
  registry.register('selectLine', (state) => redraw(state.selectLine()));

  registry.register('selectRectangle', (state, msg) => redraw(state.selectRectangle(msg.anchor, msg.head)));
  registry.register('collapseSelection', (state) => redraw(state.collapseSelection()));
}
