/**
 * Navigation commands: move by line, buffer start/end, go to line.
 */

import type { CommandRegistry } from './registry';

export function registerNavigationCommands(registry: CommandRegistry): void {
  registry.register('next-line', (ctx) => {
    ctx.window.moveLines(ctx.argval ?? 1);
  });

  registry.register('previous-line', (ctx) => {
    ctx.window.moveLines(-(ctx.argval ?? 1));
  });

  registry.register('beginning-of-buffer', (ctx) => {
    ctx.window.gotoLine(0);
  });

  registry.register('end-of-buffer', (ctx) => {
    ctx.window.offset = ctx.window.doc.size;
    ctx.window.ensureCursorVisible();
  });

  // 1-based, as typed by the user
  registry.register('goto-line', (ctx) => {
    const line = Math.max(1, ctx.argval ?? 1) - 1;
    ctx.window.gotoLine(line);
  });
}
