/**
 * Theme system: editor chrome colors and style-tag colors.
 */

export interface TokenThemeMapping {
  keyword: string;
  string: string;
  comment: string;
  variableName: string;
  functionName: string;
  heading: string;
  meta: string;
  invalid: string;
}

export interface EditorTheme {
  background: string;
  foreground: string;
  lineHighlight: string;
  /** Background of rows marked for a multi-row command. */
  markedLineBackground: string;

  tokens: TokenThemeMapping;

}

/** Dark theme (default). */
export const DARK_THEME: EditorTheme = {
  background: '#1e1e1e',
  foreground: '#d4d4d4',
  lineHighlight: '#2a2d2e',
  markedLineBackground: '#264f78',

  tokens: {
    keyword: '#569cd6',
    string: '#ce9178',
    comment: '#6a9955',
    variableName: '#9cdcfe',
    functionName: '#dcdcaa',
    heading: '#569cd6',
    meta: '#569cd6',
    invalid: '#f44747',
  },

};

/** Light theme. */
export const LIGHT_THEME: EditorTheme = {
  background: '#ffffff',
  foreground: '#24292e',
  lineHighlight: '#f6f8fa',
  markedLineBackground: '#0366d625',

  tokens: {
    keyword: '#d73a49',
    string: '#032f62',
    comment: '#6a737d',
    variableName: '#24292e',
    functionName: '#6f42c1',
    heading: '#005cc5',
    meta: '#d73a49',
    invalid: '#cb2431',
  },

};
