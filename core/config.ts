/**
 * Editor configuration: partial overrides merged over DEFAULT_CONFIG.
 */

import { homedir } from 'os';

export interface EditorConfig {
  /** Directory abbreviated to "~" when file paths are displayed. */
  homeDir: string;
  /** Emit debug-level log lines. */
  verbose: boolean;
  /** Width of the buffer-name column in the buffer list. */
  nameColumnWidth: number;
  /** Rows given to a popup window. */
  popupHeight: number;
  /** Name of the synthetic buffer holding the buffer list. */
  listingBufferName: string;
  /** Rows of a regular window. */
  windowHeight: number;
}

export const DEFAULT_CONFIG: EditorConfig = {
  homeDir: homedir(),
  verbose: false,
  nameColumnWidth: 20,
  popupHeight: 12,
  listingBufferName: '*bufed*',
  windowHeight: 40,
};

export function resolveConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}
