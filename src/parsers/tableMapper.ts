/**
 * Table Mapper
 * Librus renders record details as two-column "label | value" rows.
 * Rows carry no stable ids, so fields are matched to rows by position:
 * the caller's field order must follow the order the portal emits.
 *
 * Examples (names ["type", "date"]):
 * - <tr><td>Rodzaj</td><td>nb</td></tr><tr><td>Data</td><td>2024-03-11</td></tr>
 *     -> type: "nb", date: "2024-03-11"
 * - only the first row present -> date: null
 * - a third row -> ignored
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { logger } from '../logger.js';

// Cell 0 holds the label
const VALUE_CELL = 1;

export interface FieldDescriptor<K extends string = string> {
  name: K;
  /** Row index, or 'next' for the row after the previous descriptor's (default) */
  row?: number | 'next';
  /** Cell within the row (default 1) */
  cell?: number;
}

export type FieldValues<K extends string> = Map<K, string | null>;

/**
 * One field per row, in order, value taken from cell 1
 */
export function positional<K extends string>(names: readonly K[]): FieldDescriptor<K>[] {
  return names.map((name) => ({ name, row: 'next', cell: VALUE_CELL }));
}

/**
 * Resolve every descriptor against the rows; a missing row or cell yields null
 */
export function extractFields<K extends string>(
  $: CheerioAPI,
  rows: readonly Element[],
  descriptors: readonly FieldDescriptor<K>[],
): FieldValues<K> {
  const values: FieldValues<K> = new Map();
  let cursor = -1;

  for (const descriptor of descriptors) {
    const rowIndex = descriptor.row === undefined || descriptor.row === 'next' ? cursor + 1 : descriptor.row;
    cursor = rowIndex;

    const row = rows[rowIndex];
    if (!row) {
      values.set(descriptor.name, null);
      continue;
    }

    const cells = $(row).children('td');
    const cellIndex = descriptor.cell ?? VALUE_CELL;
    values.set(descriptor.name, cellIndex < cells.length ? cells.eq(cellIndex).text().trim() : null);
  }

  return values;
}

/**
 * Strict positional mapper: locate one table by selector and map its rows.
 * A missing table maps every name to null.
 */
export function tableMapper<K extends string>(
  $: CheerioAPI,
  selector: string,
  names: readonly K[],
  scope?: Cheerio<Element>,
): FieldValues<K> {
  const table = (scope ? scope.find(selector) : $(selector)).first();
  if (table.length === 0) {
    logger.warn('TableMapper', `Table not found using selector: ${selector}`);
    return new Map(names.map((name): [K, string | null] => [name, null]));
  }

  const values = extractFields($, table.find('tr').toArray(), positional(names));
  logger.debug('TableMapper', 'Mapped table data', Object.fromEntries(values));
  return values;
}

/**
 * Map every row under `root` to the given names
 */
export function mapTableValues<K extends string>(
  $: CheerioAPI,
  root: Cheerio<Element>,
  names: readonly K[],
): FieldValues<K> {
  return extractFields($, root.find('tr').toArray(), positional(names));
}

/**
 * True when any field resolved to null
 */
export function hasMissingFields<K extends string>(values: FieldValues<K>): boolean {
  return Array.from(values.values()).some((value) => value === null);
}
