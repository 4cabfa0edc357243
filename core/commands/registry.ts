/**
 * Command registry: maps message types to handlers.
 *
 * Handlers are registered in groups (navigation, editing, selection,
 * clipboard, multicursor, history); see createDefaultRegistry().
 */

import type { EditableState } from '../editable/editable-state';
import { type MsgOf, type TextEditMsg, type TextEditMsgType, isMsg } from './messages';

export interface DispatchResult {
  /** Something visible changed: text, cursors or selections. */
  needsRedraw: boolean;
  /** Text produced by copy or cut, for the host clipboard. */
  copiedText: string | null;
}

export const NO_CHANGE: DispatchResult = Object.freeze({ needsRedraw: false, copiedText: null });

export function redraw(changed: boolean): DispatchResult {
  return changed ? { needsRedraw: true, copiedText: null } : NO_CHANGE;
}

export type CommandHandler<K extends TextEditMsgType> = (state: EditableState, msg: MsgOf<K>) => DispatchResult;

type StoredHandler = (state: EditableState, msg: TextEditMsg) => DispatchResult | null;

export class CommandRegistry {
  private handlers: Map<TextEditMsgType, StoredHandler> = new Map();

  register<K extends TextEditMsgType>(type: K, handler: CommandHandler<K>): void {
    this.handlers.set(type, (state, msg) => isMsg(msg, type) ? handler(state, msg) : null);
  }

  /** Run the handler for `msg`. Null if none is registered. */
  execute(state: EditableState, msg: TextEditMsg): DispatchResult | null {
    const handler = this.handlers.get(msg.type);
    return handler ? handler(state, msg) : null;
  }

  has(type: TextEditMsgType): boolean {
    return this.handlers.has(type);
  }

  getAll(): TextEditMsgType[] {
    return [...this.handlers.keys()];
  }
}
