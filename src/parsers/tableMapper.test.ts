import { describe, expect, it } from 'vitest';
import { loadDocument } from '../httpAuth.js';
import { extractFields, hasMissingFields, mapTableValues, positional, tableMapper } from './tableMapper.js';

const page = (rows: string) =>
  `<html><body><table class="decorated"><tbody>${rows}</tbody></table></body></html>`;

const row = (label: string, value: string) => `<tr><td>${label}</td><td>${value}</td></tr>`;

describe('tableMapper', () => {
  it('maps rows to names in order, taking the second cell', () => {
    const $ = loadDocument(page(row('Rodzaj', 'nb') + row('Data', '2024-03-11')));

    const values = tableMapper($, 'table.decorated tbody', ['type', 'date']);

    expect(Object.fromEntries(values)).toEqual({ type: 'nb', date: '2024-03-11' });
  });

  it('maps names past the last row to null', () => {
    const $ = loadDocument(page(row('Rodzaj', 'nb')));

    const values = tableMapper($, 'table.decorated tbody', ['type', 'date', 'subject']);

    expect(Object.fromEntries(values)).toEqual({ type: 'nb', date: null, subject: null });
  });

  it('ignores rows past the last name', () => {
    const $ = loadDocument(page(row('Rodzaj', 'nb') + row('Data', '2024-03-11') + row('Lekcja', 'Fizyka')));

    const values = tableMapper($, 'table.decorated tbody', ['type']);

    expect(Object.fromEntries(values)).toEqual({ type: 'nb' });
  });

  it('maps a row with fewer than two cells to null', () => {
    const $ = loadDocument(page(row('Rodzaj', 'nb') + '<tr><td>Data</td></tr>' + row('Lekcja', 'Fizyka')));

    const values = tableMapper($, 'table.decorated tbody', ['type', 'date', 'subject']);

    expect(Object.fromEntries(values)).toEqual({ type: 'nb', date: null, subject: 'Fizyka' });
  });

  it('maps every name to null when the table is missing', () => {
    const $ = loadDocument('<html><body><p>nothing here</p></body></html>');

    const values = tableMapper($, 'table.decorated tbody', ['type', 'date']);

    expect(Object.fromEntries(values)).toEqual({ type: null, date: null });
    expect(hasMissingFields(values)).toBe(true);
  });

  it('searches only inside the given scope', () => {
    const $ = loadDocument(
      `<div id="a">${page(row('X', 'outside'))}</div><div id="b"><table class="decorated"><tbody>${row('X', 'inside')}</tbody></table></div>`,
    );

    const values = tableMapper($, 'table.decorated tbody', ['x'], $('#b'));

    expect(values.get('x')).toBe('inside');
  });
});

describe('mapTableValues', () => {
  it('maps every row under the root element', () => {
    const $ = loadDocument(page(row('Nadawca', 'Jan Test') + row('Temat', 'Hello')));

    const values = mapTableValues($, $('table'), ['user', 'title', 'date']);

    expect(Object.fromEntries(values)).toEqual({ user: 'Jan Test', title: 'Hello', date: null });
  });
});

describe('extractFields', () => {
  it('honours explicit rows and cells', () => {
    const $ = loadDocument(page(row('Rodzaj', 'nb') + row('Data', '2024-03-11')));
    const rows = $('tr').toArray();

    const values = extractFields($, rows, [
      { name: 'date', row: 1 },
      { name: 'label', row: 0, cell: 0 },
      { name: 'after', row: 'next' },
      { name: 'far', row: 5 },
    ]);

    expect(Object.fromEntries(values)).toEqual({
      date: '2024-03-11',
      label: 'Rodzaj',
      after: '2024-03-11',
      far: null,
    });
  });

  it('positional builds one descriptor per name', () => {
    expect(positional(['a', 'b'])).toEqual([
      { name: 'a', row: 'next', cell: 1 },
      { name: 'b', row: 'next', cell: 1 },
    ]);
  });
});
