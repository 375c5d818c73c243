/**
 * Buffer list ordering.
 *
 * The sort order is a bitmask. Each sortable field owns two adjacent bits:
 * the low bit selects the field, the high bit (one of DESCENDING's bits)
 * reverses it. Selecting the active field again multiplies its value by
 * three, which sets both bits; selecting it a third time goes back to the
 * plain field value.
 */

import type { EditorDocument } from '../document/document';

export const SORT_MODIFIED = 0x0001;
export const SORT_TIME = 0x0004;
export const SORT_NAME = 0x0010;
export const SORT_FILENAME = 0x0040;
export const SORT_SIZE = 0x0100;
export const SORT_DESCENDING = 0xAAAA;

export const UNSORTED = 0;

export type SortField =
  | typeof UNSORTED
  | typeof SORT_MODIFIED
  | typeof SORT_TIME
  | typeof SORT_NAME
  | typeof SORT_FILENAME
  | typeof SORT_SIZE;

/**
 * The user's sort preference, shared by every buffer list in the process.
 * Only command handlers write it.
 */
export class SortPreference {
  private _order: number;

  constructor(order: number = UNSORTED) {
    this._order = order;
  }

  get order(): number {
    return this._order;
  }

  /** Apply a sort command for `field` and return the new order. */
  select(field: SortField): number {
    this._order = nextSortOrder(this._order, field);
    return this._order;
  }

  reset(): void {
    this._order = UNSORTED;
  }
}

/** Order after a sort command: ascending, then descending, then ascending again. */
export function nextSortOrder(current: number, field: SortField): number {
  return current === field ? field * 3 : field;
}

export function isDescending(order: number): boolean {
  return (order & SORT_DESCENDING) !== 0;
}

const collator = new Intl.Collator(undefined, { numeric: true });

function compareText(a: string, b: string): number {
  const res = collator.compare(a, b);
  if (res !== 0) return res;
  return a < b ? -1 : a > b ? 1 : 0;
}

function isSystemName(name: string): boolean {
  return name.startsWith('*');
}

/** Field comparison after the partition and modified-first rules, ascending. */
function compareFields(a: EditorDocument, b: EditorDocument, order: number): number {
  let res: number;

  if ((order & SORT_TIME) && a.mtime !== b.mtime) {
    return a.mtime < b.mtime ? -1 : 1;
  }
  if ((order & SORT_SIZE) && a.size !== b.size) {
    return a.size < b.size ? -1 : 1;
  }
  if (order & SORT_FILENAME) {
    // No file name sorts last
    res = Number(a.filename === '') - Number(b.filename === '');
    if (res !== 0) return res;
    res = compareText(a.filename, b.filename);
    if (res !== 0) return res;
  }
  res = Number(isSystemName(a.name)) - Number(isSystemName(b.name));
  if (res !== 0) return res;
  res = compareText(a.name, b.name);
  if (res !== 0) return res;
  return a.serial - b.serial;
}

/**
 * Total order on documents. System documents always come after the
 * others, and with SORT_MODIFIED set modified documents come first; the
 * descending bits reverse only the remaining fields.
 */
export function compareBuffers(a: EditorDocument, b: EditorDocument, order: number): number {
  if (a === b) return 0;
  const partition = Number(a.system) - Number(b.system);
  if (partition !== 0) return partition;
  if (order & SORT_MODIFIED) {
    const res = Number(b.modified) - Number(a.modified);
    if (res !== 0) return res;
  }
  const res = compareFields(a, b, order);
  return isDescending(order) ? -res : res;
}

const FIELD_NAMES: [number, string][] = [
  [SORT_MODIFIED, 'modified first'],
  [SORT_TIME, 'time'],
  [SORT_NAME, 'name'],
  [SORT_FILENAME, 'file name'],
  [SORT_SIZE, 'size'],
];

/** Human-readable description of a sort order, for status messages. */
export function describeSortOrder(order: number): string {
  if (order === UNSORTED) return 'unsorted';
  const fields = FIELD_NAMES.filter(([bit]) => order & bit).map(([, name]) => name);
  const label = fields.length > 0 ? fields.join(', ') : 'name';
  return isDescending(order) ? `${label} descending` : label;
}
