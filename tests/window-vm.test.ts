import { describe, expect, test } from 'vitest';
import { createEditor } from '../core/editor';
import { Logger } from '../core/logger';
import { SortPreference } from '../core/buffer-list/sort';
import { WindowViewModel, KeyEvent, keyName } from '../view-model/window-view-model';
import { DARK_THEME, LIGHT_THEME } from '../view-model/theme';
import { styleTokens } from '../view-model/line-layout';
import { EditorDocument } from '../core/document/document';
import { tags } from '@lezer/highlight';

function key(k: string, mods: Partial<KeyEvent> = {}): KeyEvent {
  return { key: k, code: '', ctrlKey: false, shiftKey: false, altKey: false, metaKey: false, ...mods };
}

function setup() {
  const { env } = createEditor({
    config: { homeDir: '/home/user' },
    logger: new Logger({ sink: () => {} }),
    sortPreference: new SortPreference(),
  });
  const notes = env.createBuffer('notes.txt', { filename: '/home/user/notes.txt', content: 'hello\n' });
  env.createBuffer('main.ts', { filename: '/home/user/src/main.ts' });
  const window = env.openWindow(notes);
  return { env, window, vm: new WindowViewModel(env, window) };
}

describe('keyName', () => {
  test('modifiers and named keys', () => {
    expect(keyName(key('x', { ctrlKey: true }))).toBe('C-x');
    expect(keyName(key('<', { altKey: true }))).toBe('M-<');
    expect(keyName(key('Enter'))).toBe('RET');
    expect(keyName(key(' '))).toBe('SPC');
    expect(keyName(key('ArrowDown'))).toBe('down');
    expect(keyName(key('k'))).toBe('k');
    expect(keyName(key('Control', { ctrlKey: true }))).toBeNull();
  });
});

describe('styleTokens', () => {
  test('columns outside style runs get foreground tokens', () => {
    const doc = new EditorDocument('styled', { content: 'alpha beta gamma' });
    doc.setLineStyles(0, [
      { startColumn: 6, endColumn: 10, tag: tags.keyword },
      { startColumn: 0, endColumn: 5, tag: tags.comment },
    ]);
    expect(styleTokens(doc, 0, DARK_THEME)).toEqual([
      { startColumn: 0, endColumn: 5, color: DARK_THEME.tokens.comment, fontStyle: 'italic' },
      { startColumn: 5, endColumn: 6, color: DARK_THEME.foreground, fontStyle: 'normal' },
      { startColumn: 6, endColumn: 10, color: DARK_THEME.tokens.keyword, fontStyle: 'normal' },
      { startColumn: 10, endColumn: 16, color: DARK_THEME.foreground, fontStyle: 'normal' },
    ]);
  });

  test('runs past the end of the line are clipped', () => {
    const doc = new EditorDocument('styled', { content: 'abc' });
    doc.setLineStyles(0, [{ startColumn: 1, endColumn: 40, tag: tags.keyword }]);
    expect(styleTokens(doc, 0, DARK_THEME)).toEqual([
      { startColumn: 0, endColumn: 1, color: DARK_THEME.foreground, fontStyle: 'normal' },
      { startColumn: 1, endColumn: 3, color: DARK_THEME.tokens.keyword, fontStyle: 'normal' },
    ]);
  });
});

describe('WindowViewModel', () => {
  test('keys open the buffer list and render styled rows', () => {
    const { env, vm } = setup();
    expect(vm.onKeyDown(key('x', { ctrlKey: true }))).toBe(true);
    expect(vm.onKeyDown(key('b', { ctrlKey: true }))).toBe(true);

    const popup = env.windows.active;
    if (!popup) throw new Error('no active window');
    const listVm = new WindowViewModel(env, popup);
    expect(listVm.title).toBe('Buffer list');

    const lines = listVm.visibleLines;
    expect(lines).toHaveLength(3);
    expect(lines[0].tokens).toEqual([
      { startColumn: 0, endColumn: 3, color: DARK_THEME.foreground, fontStyle: 'normal' },
      { startColumn: 3, endColumn: 23, color: '#569cd6', fontStyle: 'normal' },
      { startColumn: 23, endColumn: 58, color: DARK_THEME.foreground, fontStyle: 'normal' },
      { startColumn: 58, endColumn: 69, color: '#dcdcaa', fontStyle: 'normal' },
    ]);
    expect(lines[0].decorations).toEqual([
      { startColumn: 0, endColumn: 69, type: 'highlight', color: DARK_THEME.lineHighlight },
    ]);
    expect(lines[2].tokens).toEqual([]);
  });

  test('marked rows get a background', () => {
    const { env, window, vm } = setup();
    vm.onKeyDown(key('x', { ctrlKey: true }));
    vm.onKeyDown(key('b', { ctrlKey: true }));
    const popup = env.windows.active;
    if (!popup) throw new Error('no active window');
    const listVm = new WindowViewModel(env, popup);

    listVm.onKeyDown(key('Insert'));
    const lines = listVm.visibleLines;
    expect(lines[0].decorations).toEqual([
      { startColumn: 0, endColumn: 69, type: 'background', color: DARK_THEME.markedLineBackground },
    ]);
    expect(lines[1].decorations.map(d => d.type)).toEqual(['highlight']);
    expect(window.doc.name).toBe('main.ts');
  });

  test('unbound keys report through the status message', () => {
    const { vm } = setup();
    expect(vm.onKeyDown(key('q'))).toBe(false);
    expect(vm.statusMessage).toBe('q is undefined');
    expect(vm.onKeyDown(key('Shift', { shiftKey: true }))).toBe(false);
  });

  test('listeners hear key events and theme changes', () => {
    const { vm } = setup();
    let calls = 0;
    const off = vm.onChange(() => calls++);
    vm.onKeyDown(key('n', { ctrlKey: true }));
    vm.setTheme(LIGHT_THEME);
    off();
    vm.setTheme(DARK_THEME);
    expect(calls).toBe(2);
    expect(vm.theme).toBe(DARK_THEME);
  });

  test('plain documents render in the foreground color', () => {
    const { vm } = setup();
    const lines = vm.visibleLines;
    expect(lines.map(l => l.content)).toEqual(['hello', '']);
    expect(lines[0].tokens).toEqual([
      { startColumn: 0, endColumn: 5, color: DARK_THEME.foreground, fontStyle: 'normal' },
    ]);
    expect(lines[0].decorations).toEqual([]);
  });
});
