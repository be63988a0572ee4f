/**
 * Table Extractor
 *
 * Turns every <table> into { headers, rows }. Headers come from <thead> when
 * present; otherwise the first row is taken as the header row and is not
 * repeated as data, so a data-only table loses its first row.
 */

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { isTag } from 'domhandler';
import { textOf } from './text';

export type TableRow = Record<string, string> | string[];

export interface Table {
  headers: string[];
  rows: TableRow[];
}

/**
 * Row as a list of cell texts, whichever representation it uses.
 */
export function rowCells(row: TableRow): string[] {
  return Array.isArray(row) ? row : Object.values(row);
}

/**
 * Row cells joined with spaces, lower-cased.
 */
export function rowText(row: TableRow): string {
  return rowCells(row).join(' ').toLowerCase();
}

/**
 * Headers and every cell of a table, lower-cased, for keyword screening.
 */
export function tableText(table: Table): string {
  return [table.headers.join(' '), ...table.rows.map(rowText)].join(' ').toLowerCase();
}

function cellsOf(row: Element): string[] {
  return row.children
    .filter((child): child is Element => isTag(child) && (child.name === 'td' || child.name === 'th'))
    .map((cell) => textOf(cell));
}

function zipRow(headers: string[], cells: string[]): Record<string, string> {
  const row: Record<string, string> = {};
  const width = Math.min(headers.length, cells.length);
  for (let i = 0; i < width; i++) {
    row[headers[i]] = cells[i];
  }
  return row;
}

function extractTable($: CheerioAPI, table: Element): Table | null {
  // Rows that belong to this table, not to a nested one
  const ownRows = $(table)
    .find('tr')
    .toArray()
    .filter((tr) => $(tr).closest('table').get(0) === table);

  const bodyRows = ownRows.filter((tr) => $(tr).closest('thead').length === 0);
  const thead = $(table).children('thead').first();

  let headers: string[] = [];
  let dataRows = bodyRows;

  if (thead.length > 0) {
    headers = thead
      .find('th, td')
      .toArray()
      .map((cell) => textOf(cell));
  } else if (bodyRows.length > 0) {
    headers = cellsOf(bodyRows[0]);
    dataRows = bodyRows.slice(1);
  }

  const rows: TableRow[] = [];
  for (const tr of dataRows) {
    const cells = cellsOf(tr);
    if (cells.length === 0) continue;
    rows.push(headers.length > 0 ? zipRow(headers, cells) : cells);
  }

  if (rows.length === 0) return null;
  return { headers, rows };
}

/**
 * Extract all tables in document order. Tables without data rows are dropped.
 */
export function extractTables($: CheerioAPI): Table[] {
  const tables: Table[] = [];
  for (const el of $('table').toArray()) {
    const table = extractTable($, el);
    if (table) tables.push(table);
  }
  return tables;
}
