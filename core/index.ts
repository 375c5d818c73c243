/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Buffer
export { TextBuffer, type TextEdit } from './buffer/text-buffer';
export { LineIndex } from './buffer/line-index';

// Document
export { EditorDocument, detectLanguage, type DocumentOptions, type StyleRun } from './document/document';
export { BufferRegistry, type BufferHandle } from './document/buffer-registry';
export {
  detectCharset, decodeBytes, charsetDisplayName,
  type Charset, type CharsetDetectionResult,
} from './document/encoding';

// Handles
export { Arena, sameHandle, type Handle } from './registry/arena';

// Windows
export { EditWindow, type WindowOptions } from './window/edit-window';
export { WindowManager, type WindowHandle } from './window/window-manager';

// Modes
export { ModeRegistry, type ModeDef } from './modes/mode';
export { ListMode, registerListMode, isListHost, type ListHost } from './modes/list-mode';

// Commands
export { CommandRegistry, type CommandHandler, type CommandContext } from './commands/registry';
export { Keymap, type KeyLookup } from './commands/keymap';
export { registerNavigationCommands } from './commands/navigation';

// Syntax
export { SyntaxEngine, type SyntaxMode } from './tokenizer/syntax-engine';
export { resolveTagColor, resolveTagStyle } from './tokenizer/token-theme';

// Environment
export { EditorEnvironment, type EnvironmentOptions } from './editor-environment';
export { createEditor, type Editor } from './editor';
export { resolveConfig, DEFAULT_CONFIG, type EditorConfig } from './config';
export { Logger, type LogLevel, type LogSink, type LoggerOptions } from './logger';
export { EditorError, DuplicateBufferError } from './errors';
export { declineAll, promptFrom, type ConfirmationPrompt } from './prompt/confirm';

// Buffer list
export {
  SortPreference, compareBuffers, nextSortOrder, describeSortOrder, isDescending,
  SORT_MODIFIED, SORT_TIME, SORT_NAME, SORT_FILENAME, SORT_SIZE, SORT_DESCENDING, UNSORTED,
  type SortField,
} from './buffer-list/sort';
export {
  createBufferListState, rebuildEntries, resolveEntry, entryAt, iterateSelection, toggleSelection,
  NO_INDEX, type BufferListEntry, type BufferListState,
} from './buffer-list/entries';
export {
  buildBufferList, formatRow, formatLabel, formatFlags, composeModeName, makeUserPath,
  BUFFER_LIST_STYLES, type FormattedRow, type ListBuilderContext,
} from './buffer-list/list-builder';
export {
  selectEntry, killEntries, clearModified, toggleReadOnly, refresh, setSort, toggleMark,
  bufferAtCursor, currentIndex, type SelectMode,
} from './buffer-list/actions';
export { BufferListMode, registerBufferList } from './buffer-list/buffer-list-mode';
