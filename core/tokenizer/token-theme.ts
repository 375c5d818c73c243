/**
 * Style-tag to theme-color mapping.
 *
 * Generated buffers (the buffer list, and anything else that writes
 * StyleRuns) tag their spans with Lezer highlight tags; this module turns
 * those tags into colors and font styles from the current theme.
 */

import { tags, Tag } from '@lezer/highlight';
import type { TokenThemeMapping } from '../../view-model/theme';

export function resolveTagColor(tag: Tag, tokens: TokenThemeMapping): string {
  if (tag === tags.keyword) return tokens.keyword;
  if (tag === tags.string) return tokens.string;
  if (tag === tags.comment) return tokens.comment;
  if (tag === tags.function(tags.variableName)) return tokens.functionName;
  if (tag === tags.heading) return tokens.heading;
  if (tag === tags.meta) return tokens.meta;
  if (tag === tags.invalid) return tokens.invalid;
  return tokens.variableName;
}

export function resolveTagStyle(tag: Tag): 'normal' | 'italic' | 'bold' | 'bold-italic' {
  if (tag === tags.comment) return 'italic';
  if (tag === tags.heading || tag === tags.invalid) return 'bold';
  return 'normal';
}
