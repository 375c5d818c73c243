/**
 * Command registry: maps command names to handler functions.
 *
 * Names follow the dashed convention used by key bindings
 * (next-line, buffer-list, bufed-sort-name, ...).
 */

import type { EditorEnvironment } from '../editor-environment';
import type { EditWindow } from '../window/edit-window';

export type CommandHandler = (ctx: CommandContext) => void;

/** Context passed to command handlers. */
export interface CommandContext {
  env: EditorEnvironment;
  /** Window the command was invoked from. */
  window: EditWindow;
  /** Numeric prefix argument; null when none was given. */
  argval: number | null;
}

export class CommandRegistry {
  private commands: Map<string, CommandHandler> = new Map();

  register(name: string, handler: CommandHandler): void {
    this.commands.set(name, handler);
  }

  /** Run a command. Returns false when no handler is registered. */
  execute(name: string, ctx: CommandContext): boolean {
    const handler = this.commands.get(name);
    if (!handler) return false;
    handler(ctx);
    return true;
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }
}
