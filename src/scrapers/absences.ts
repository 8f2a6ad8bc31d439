/**
 * Absences Scraper
 *
 * Pages:
 * - przegladaj_nb/uczen: one row per school day, grouped under "Okres N" rows
 * - przegladaj_nb/szczegoly/<id>: "label | value" table for one absence
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { LibrusError, MalformedFieldError } from '../errors.js';
import type { Transport } from '../httpAuth.js';
import { logger } from '../logger.js';
import { hasMissingFields, tableMapper, type FieldValues } from '../parsers/tableMapper.js';
import type { AbsenceDay, AbsenceDetail, AbsenceEntry } from '../types.js';

export const ABSENCE_FIELDS = [
  'type',
  'category',
  'date',
  'subject',
  'lesson_hour',
  'teacher',
  'trip',
  'added_by',
] as const;

export type AbsenceField = (typeof ABSENCE_FIELDS)[number];

const DETAIL_TABLE = 'table.decorated tbody';
const LIST_ROWS = "table.center.big.decorated tr[class*='line']";
const SEMESTER_LABEL = /^Okres\s+(\d+)$/;
const DETAIL_ID = /\/szczegoly\/(\d+)/;
const MIN_ROW_CELLS = 6;
const INFO_CELLS = 5;
const AFFIRMATIVE = ['tak', 'yes'];

export interface FallbackStrategy {
  name: string;
  applies(values: FieldValues<AbsenceField>): boolean;
  fields(fields: readonly AbsenceField[]): AbsenceField[];
}

/**
 * Some absences have no "category" row, which shifts every later row up by one.
 * When any field comes back empty, map again once without it.
 * Fires for any missing field, not only a missing category.
 */
export const withoutCategory: FallbackStrategy = {
  name: 'withoutCategory',
  applies: hasMissingFields,
  fields: (fields) => fields.filter((field) => field !== 'category'),
};

/**
 * "Tak"/"yes" (any case) → true, other strings → false, anything else by truthiness
 */
export function makeBoolean(value: unknown): boolean {
  const result = typeof value === 'string' ? AFFIRMATIVE.includes(value.toLowerCase()) : Boolean(value);
  logger.debug('Absence', `Converted '${String(value)}' to boolean: ${result}`);
  return result;
}

/**
 * Semester number of an "Okres N" separator row, null for other rows
 */
export function semesterOf($row: Cheerio<Element>): number | null {
  const label = $row.find('.center.bolded').first();
  if (label.length === 0) return null;

  const match = label.text().trim().match(SEMESTER_LABEL);
  return match ? Number(match[1]) : null;
}

export function isSemesterHeader($row: Cheerio<Element>): boolean {
  return semesterOf($row) !== null;
}

/**
 * Absence badges of one day: links whose onclick opens /szczegoly/<id>
 */
export function extractAbsences($: CheerioAPI, column: Cheerio<Element>): AbsenceEntry[] {
  const entries: AbsenceEntry[] = [];

  column.find('a').each((_, link) => {
    const onclick = $(link).attr('onclick') ?? '';
    const match = onclick.match(DETAIL_ID);
    if (!match) return;

    const id = Number(match[1]);
    if (!Number.isSafeInteger(id)) {
      throw new MalformedFieldError('absence id', match[1]);
    }
    entries.push({ type: $(link).text().trim(), id });
  });

  logger.debug('Absence', `Extracted ${entries.length} absences from cell`, entries);
  return entries;
}

export function parseAbsenceRow(
  $: CheerioAPI,
  $row: Cheerio<Element>,
  semester: number | null = null,
): AbsenceDay | null {
  const cells = $row.children('td');
  if (cells.length < MIN_ROW_CELLS) {
    logger.warn(
      'Absence',
      `Skipping row with insufficient data: expected at least ${MIN_ROW_CELLS} columns, found ${cells.length}`,
    );
    return null;
  }

  const date = cells.eq(0).text().trim();
  if (!date) {
    logger.debug('Absence', 'Skipping a row without a date');
    return null;
  }

  return {
    date,
    table: extractAbsences($, cells.eq(1)),
    info: cells
      .slice(-INFO_CELLS)
      .map((_, cell) => $(cell).text().trim())
      .get(),
    semester,
  };
}

function toAbsenceDetail(values: FieldValues<AbsenceField>): AbsenceDetail {
  const field = (name: AbsenceField) => values.get(name) ?? null;

  return {
    type: field('type'),
    ...(values.has('category') ? { category: field('category') } : {}),
    date: field('date'),
    subject: field('subject'),
    lesson_hour: field('lesson_hour'),
    teacher: field('teacher'),
    trip: makeBoolean(values.get('trip') ?? 'no'),
    added_by: field('added_by'),
  };
}

export class AbsenceScraper {
  constructor(private readonly transport: Transport) {}

  /**
   * Details of one absence, or null when the page could not be fetched
   */
  async getAbsence(id: number): Promise<AbsenceDetail | null> {
    logger.debug('Absence', `Fetching absence details for ID: ${id}`);
    const $ = await this.transport.request('GET', `przegladaj_nb/szczegoly/${id}`);
    if (!$) {
      logger.error('Absence', `Failed to retrieve absence details for ID: ${id}`);
      return null;
    }

    return this.parseAbsence($, id);
  }

  parseAbsence($: CheerioAPI, id: number): AbsenceDetail {
    let values = tableMapper($, DETAIL_TABLE, ABSENCE_FIELDS);

    if (withoutCategory.applies(values)) {
      logger.warn('Absence', `Missing data for some fields in absence ID: ${id}, applying ${withoutCategory.name}`);
      values = tableMapper($, DETAIL_TABLE, withoutCategory.fields(ABSENCE_FIELDS));
    }

    const detail = toAbsenceDetail(values);
    logger.info('Absence', `Processed absence data for ID: ${id}`, detail);
    return detail;
  }

  /**
   * Every school day with absences; [] when the page could not be fetched
   */
  async getAbsences(): Promise<AbsenceDay[]> {
    logger.debug('Absence', 'Fetching all absences');
    const $ = await this.transport.request('GET', 'przegladaj_nb/uczen');
    if (!$) {
      logger.error('Absence', 'Failed to retrieve absences');
      return [];
    }

    const absences = this.parseAbsences($);
    logger.info('Absence', `Retrieved ${absences.length} absences`);
    return absences;
  }

  parseAbsences($: CheerioAPI): AbsenceDay[] {
    const absences: AbsenceDay[] = [];
    let semester: number | null = null;

    for (const [index, row] of $(LIST_ROWS).toArray().entries()) {
      const $row = $(row);

      const header = semesterOf($row);
      if (header !== null) {
        logger.debug('Absence', `Semester ${header} starts at row ${index}`);
        semester = header;
        continue;
      }

      try {
        const day = parseAbsenceRow($, $row, semester);
        if (day) absences.push(day);
      } catch (err) {
        if (!(err instanceof LibrusError)) throw err;
        logger.error('Absence', `Error while processing row ${index}: ${err.message}`);
      }
    }

    return absences;
  }
}
