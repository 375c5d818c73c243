import { parser as jsParser } from '@lezer/javascript';
import type { Parser } from '@lezer/common';

export const typescriptParser: Parser = jsParser.configure({ dialect: 'ts jsx' });

export const javascriptParser: Parser = jsParser.configure({ dialect: 'jsx' });
