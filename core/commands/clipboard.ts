/**
 * Clipboard commands. The host owns the clipboard: copy and cut hand text
 * back in the dispatch result, paste receives it in the message.
 */

import { type CommandRegistry, redraw } from './registry';

export function registerClipboardCommands(registry: CommandRegistry): void {
  registry.register('copy', (state) => ({ needsRedraw: false, copiedText: state.copy() }));

  registry.register('cut', (state) => {
    const text = state.cut();
    return { needsRedraw: text !== null, copiedText: text };
  });

  registry.register('paste', (state, msg) => redraw(state.paste(msg.text)));
}
