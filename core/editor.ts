/**
 * Editor assembly: an environment with the list mode and the buffer list
 * registered.
 */

import { EditorEnvironment, EnvironmentOptions } from './editor-environment';
import { registerListMode, ListMode } from './modes/list-mode';
import { registerBufferList, BufferListMode } from './buffer-list/buffer-list-mode';

export interface Editor {
  env: EditorEnvironment;
  listMode: ListMode;
  bufferList: BufferListMode;
}

export function createEditor(options: EnvironmentOptions = {}): Editor {
  const env = new EditorEnvironment(options);
  const listMode = registerListMode(env);
  const bufferList = registerBufferList(env, listMode);
  return { env, listMode, bufferList };
}
