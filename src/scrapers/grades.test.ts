import { describe, expect, it } from 'vitest';
import { MalformedFieldError, StructureNotFoundError } from '../errors.js';
import { loadDocument } from '../httpAuth.js';
import { FakeTransport } from '../testing/fakeTransport.js';
import { GradeScraper, parseSemester, parseTitle, processGrade } from './grades.js';

const gradeLink = (value: string, title: string) =>
  `<span class="grade-box"><a href="#" title="${title}">${value}</a></span>`;

const gradesPage = (rows: string) =>
  `<html><body><table class="decorated stretch"><tbody>${rows}</tbody></table></body></html>`;

describe('parseTitle', () => {
  it('splits on line breaks and the first colon', () => {
    expect(parseTitle('Key: Value<br />Another Key: Another Value')).toEqual({
      Key: 'Value',
      'Another Key': 'Another Value',
    });
  });

  it('keeps later colons in the value', () => {
    expect(parseTitle('Kategoria: Kartkówka<br />Data: 2024-01-15 (12:30)')).toEqual({
      Kategoria: 'Kartkówka',
      Data: '2024-01-15 (12:30)',
    });
  });

  it('splits only on the exact line break marker', () => {
    expect(parseTitle('Kategoria: Kartkówka<br>Waga: 3')).toEqual({ Kategoria: 'Kartkówka<br>Waga: 3' });
  });

  it('throws on a trailing line break', () => {
    expect(() => parseTitle('Kategoria: X<br />')).toThrow(MalformedFieldError);
  });

  it('throws on an empty title', () => {
    expect(() => parseTitle('')).toThrow(MalformedFieldError);
  });

  it('throws on a segment without a colon', () => {
    expect(() => parseTitle('Kategoria: Test<br />no separator here')).toThrow(MalformedFieldError);
  });
});

describe('processGrade', () => {
  it('reads value and title', () => {
    const $ = loadDocument("<a title='Test Title: Value'>5</a>");
    const [link] = $('a').toArray();

    expect(processGrade($, link)).toEqual({
      value: '5',
      info: { 'Test Title': 'Value' },
    });
  });

  it('throws when the title is missing', () => {
    const $ = loadDocument('<a>5</a>');
    const [link] = $('a').toArray();

    expect(() => processGrade($, link)).toThrow(MalformedFieldError);
  });
});

describe('GradeScraper.getGrades', () => {
  it('returns subjects with their grades and leaves out rows without grades', async () => {
    const html = gradesPage(
      '<tr class="line0"><td></td><td>Matematyka</td><td>' +
        gradeLink('5', 'Kategoria: Sprawdzian<br />Waga: 3') +
        gradeLink('4+', 'Kategoria: Kartkówka') +
        '</td></tr>' +
        '<tr class="line1"><td></td><td>Fizyka</td><td></td></tr>' +
        '<tr class="line0"><td></td><td>Chemia</td><td>' +
        gradeLink('3', 'Kategoria: Odpowiedź') +
        '</td></tr>' +
        '<tr class="summary"><td></td><td>Razem</td><td>' +
        gradeLink('6', 'Kategoria: Inne') +
        '</td></tr>',
    );
    const transport = new FakeTransport().page('GET', 'przegladaj_oceny/uczen', html);

    const grades = await new GradeScraper(transport).getGrades();

    expect(grades).toEqual([
      {
        subject: 'Matematyka',
        grades: [
          { value: '5', info: { Kategoria: 'Sprawdzian', Waga: '3' } },
          { value: '4+', info: { Kategoria: 'Kartkówka' } },
        ],
      },
      {
        subject: 'Chemia',
        grades: [{ value: '3', info: { Kategoria: 'Odpowiedź' } }],
      },
    ]);
  });

  it('returns [] for a page without the grades table', async () => {
    const transport = new FakeTransport().page('GET', 'przegladaj_oceny/uczen', '<html><body></body></html>');

    expect(await new GradeScraper(transport).getGrades()).toEqual([]);
  });

  it('returns [] when the page cannot be fetched', async () => {
    expect(await new GradeScraper(new FakeTransport()).getGrades()).toEqual([]);
  });

  it('fails the whole page on a malformed title', async () => {
    const html = gradesPage(
      '<tr class="line0"><td></td><td>Matematyka</td><td>' + gradeLink('5', 'broken') + '</td></tr>',
    );
    const transport = new FakeTransport().page('GET', 'przegladaj_oceny/uczen', html);

    await expect(new GradeScraper(transport).getGrades()).rejects.toThrow(MalformedFieldError);
  });
});

describe('parseSemester', () => {
  const semesterRow = (temp: string, final: string) =>
    loadDocument(
      '<table><tr><td>' + gradeLink('5', 'Test Title: Test Value') + `</td><td>${temp}</td><td>${final}</td></tr></table>`,
    );

  it('reads grades and both averages', () => {
    const $ = semesterRow('4.5', '4.0');

    expect(parseSemester($, $('td'), 0)).toEqual({
      grades: [{ value: '5', info: { 'Test Title': 'Test Value' } }],
      tempAverage: 4.5,
      average: 4,
    });
  });

  it('accepts every plain decimal spelling', () => {
    const signed = semesterRow('.5', '+4.5');
    const trailing = semesterRow('4.', '-1');

    expect(parseSemester(signed, signed('td'), 0)).toMatchObject({ tempAverage: 0.5, average: 4.5 });
    expect(parseSemester(trailing, trailing('td'), 0)).toMatchObject({ tempAverage: 4, average: -1 });
  });

  it('throws on an empty average', () => {
    const $ = semesterRow('', '4.0');

    expect(() => parseSemester($, $('td'), 0)).toThrow(MalformedFieldError);
  });

  it('throws on a non-numeric average', () => {
    const $ = semesterRow('-', '4.0');

    expect(() => parseSemester($, $('td'), 0)).toThrow(MalformedFieldError);
  });

  it('throws when the row is too short', () => {
    const $ = semesterRow('4.5', '4.0');

    expect(() => parseSemester($, $('td'), 1)).toThrow(StructureNotFoundError);
  });
});
