/**
 * Grades Scraper
 *
 * Scrapes przegladaj_oceny/uczen. Each subject row holds grade badges
 * (span.grade-box a) whose title attribute carries the details:
 *   "Kategoria: Kartkówka<br />Data: 2024-01-15<br />Nauczyciel: Jan Nowak"
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { MalformedFieldError, StructureNotFoundError } from '../errors.js';
import type { Transport } from '../httpAuth.js';
import { logger } from '../logger.js';
import type { Grade, SemesterGrades, SubjectGrades } from '../types.js';

const GRADE_ROWS = "table.decorated.stretch > tbody > tr[class^='line']";
const GRADE_LINKS = 'span.grade-box a';
const LINE_BREAK = '<br />';

/**
 * Split a grade's title into label → value pairs.
 * Every segment must contain a colon, so an empty title or a trailing
 * line break is malformed.
 */
export function parseTitle(title: string): Record<string, string> {
  const details: Record<string, string> = {};

  for (const part of title.split(LINE_BREAK)) {
    const colon = part.indexOf(':');
    if (colon === -1) {
      throw new MalformedFieldError('grade title', part);
    }
    const key = part.slice(0, colon).trim();
    const value = part.slice(colon + 1).trim();
    details[key] = value;
  }

  return details;
}

export function processGrade($: CheerioAPI, link: Element): Grade {
  const $link = $(link);
  const title = $link.attr('title');
  if (title === undefined) {
    throw new MalformedFieldError('grade title', $.html(link));
  }

  const grade: Grade = {
    value: $link.text().trim(),
    info: parseTitle(title),
  };
  logger.debug('Grade', 'Processed grade', grade);
  return grade;
}

function gradesIn($: CheerioAPI, scope: Cheerio<Element>): Grade[] {
  return scope
    .find(GRADE_LINKS)
    .toArray()
    .map((link) => processGrade($, link));
}

function parseAverage(cell: Cheerio<Element>, field: string): number {
  const text = cell.text().trim();
  const value = Number(text);
  if (!text || Number.isNaN(value)) {
    throw new MalformedFieldError(field, text);
  }
  return value;
}

/**
 * Grades of one semester column plus the two average columns after it
 */
export function parseSemester($: CheerioAPI, cells: Cheerio<Element>, startColumn: number): SemesterGrades {
  if (cells.length < startColumn + 3) {
    throw new StructureNotFoundError(
      'td',
      `Semester needs 3 cells from column ${startColumn}, row has ${cells.length}`,
    );
  }

  const semester: SemesterGrades = {
    grades: gradesIn($, cells.eq(startColumn)),
    tempAverage: parseAverage(cells.eq(startColumn + 1), 'temporary average'),
    average: parseAverage(cells.eq(startColumn + 2), 'average'),
  };
  logger.info('Grade', 'Semester parsed with temporary and final averages');
  return semester;
}

export class GradeScraper {
  constructor(private readonly transport: Transport) {}

  /**
   * Subjects with at least one grade; [] when the page could not be fetched
   */
  async getGrades(): Promise<SubjectGrades[]> {
    logger.info('Grade', 'Fetching all grades');
    const $ = await this.transport.request('GET', 'przegladaj_oceny/uczen');
    if (!$) {
      logger.error('Grade', 'Failed to retrieve grades');
      return [];
    }
    return this.parseGrades($);
  }

  parseGrades($: CheerioAPI): SubjectGrades[] {
    const subjects: SubjectGrades[] = [];

    $(GRADE_ROWS).each((_, row) => {
      const $row = $(row);
      const subjectCell = $row.children('td').eq(1);
      if (subjectCell.length === 0) {
        logger.warn('Grade', 'No subject cell found in row, skipping row');
        return;
      }

      const grades = gradesIn($, $row);
      // Rows without grades are left out
      if (grades.length === 0) return;

      subjects.push({ subject: subjectCell.text().trim(), grades });
    });

    logger.info('Grade', `Parsed grades for ${subjects.length} subjects`);
    return subjects;
  }
}
