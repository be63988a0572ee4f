/**
 * Top Holdings
 *
 * Reads holdings tables (name and weight columns identified by header
 * tokens) and, when the page has none, rows whose class mentions a holding.
 */

import type { Element } from 'domhandler';
import type { ExtractionConfig } from '../../config';
import type { Table, TableRow } from '../../document';
import { tableText, textOf } from '../../document';
import type { Holding } from '../../types';
import { defineField } from '../chain';
import { sourceDocument } from '../strategies';
import type { DocumentSource } from '../strategies';
import type { ExtractionContext, FieldEntry, Strategy, StrategyResult } from '../types';
import { ACCEPT, reject } from '../validation';
import {
  GENERIC_HOLDING_NAMES,
  HOLDING_NAME_COLUMNS,
  HOLDING_PCT,
  HOLDING_PCT_COLUMNS,
  HOLDING_ROW,
  HOLDINGS_TABLE_KEYWORDS,
} from './patterns';

function isGeneric(value: string): boolean {
  return GENERIC_HOLDING_NAMES.has(value.trim().toLowerCase());
}

function isHoldingName(value: string): boolean {
  return value.trim().length > 3 && !isGeneric(value);
}

function headerHas(header: string, tokens: readonly string[]): boolean {
  const lower = header.toLowerCase();
  return tokens.some((token) => lower.includes(token));
}

/** "8.52 %" -> "8.52%"; anything else is kept as written */
export function formatWeight(value: string): string {
  const match = HOLDING_PCT.exec(value);
  return match ? `${match[1]}%` : value.trim();
}

/**
 * Holding from one row. Header rows are read by column; plain rows take the
 * first name-like cell and the first percentage.
 */
export function holdingFromRow(row: TableRow): Holding | null {
  let name = '';
  let pct = '';

  if (Array.isArray(row)) {
    name = row.find((cell) => isHoldingName(cell) && !HOLDING_PCT.test(cell)) ?? '';
    const weight = row.find((cell) => HOLDING_PCT.test(cell));
    pct = weight ? formatWeight(weight) : '';
  } else {
    for (const [header, value] of Object.entries(row)) {
      if (isGeneric(value)) continue;
      if (headerHas(header, HOLDING_NAME_COLUMNS)) {
        if (isHoldingName(value)) name = value.trim();
      } else if (headerHas(header, HOLDING_PCT_COLUMNS)) {
        pct = formatWeight(value);
      }
    }
  }

  return name && pct && !isGeneric(name) ? { name, asset_pct: pct } : null;
}

export function holdingsFromTables(tables: readonly Table[], rowsPerTable: number): Holding[] {
  const holdings: Holding[] = [];
  for (const table of tables) {
    const content = tableText(table);
    if (!HOLDINGS_TABLE_KEYWORDS.some((keyword) => content.includes(keyword))) continue;
    for (const row of table.rows.slice(0, rowsPerTable)) {
      const holding = holdingFromRow(row);
      if (holding) holdings.push(holding);
    }
  }
  return holdings;
}

class HoldingsTableStrategy implements Strategy<Holding[]> {
  readonly id: string;

  constructor(private readonly source: DocumentSource) {
    this.id = source === 'rendered' ? 'live-holdings-table' : 'holdings-table';
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<Holding[]> | null> {
    const doc = await sourceDocument(ctx, this.source);
    if (!doc) return null;
    const holdings = holdingsFromTables(doc.tables(), ctx.config.holdingsRowsPerTable);
    return holdings.length > 0 ? { raw: holdings } : null;
  }
}

/**
 * Elements whose class mentions a holding and whose text reads
 * "<name> <weight>%". A list wrapper whose rows already match is skipped;
 * a row whose name and weight sit in holding-classed children is kept.
 */
class HoldingRowScanStrategy implements Strategy<Holding[]> {
  readonly id = 'holding-rows';

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<Holding[]> | null> {
    const $ = ctx.document.tree();
    const rows = new Map<Element, RegExpExecArray>();
    for (const el of $('[class]').toArray()) {
      if (!/holding/i.test(el.attribs.class ?? '')) continue;
      const match = HOLDING_ROW.exec(textOf(el));
      if (match) rows.set(el, match);
    }

    const holdings: Holding[] = [];
    for (const [el, match] of rows) {
      const wrapsRows = $(el)
        .find('[class]')
        .toArray()
        .some((child) => rows.has(child));
      if (wrapsRows) continue;

      const name = match.groups?.name;
      const pct = match.groups?.pct;
      if (name && pct && isHoldingName(name)) {
        holdings.push({ name: name.trim(), asset_pct: `${pct}%` });
      }
    }
    return holdings.length > 0 ? { raw: holdings } : null;
  }
}

export function holdingsFields(config: ExtractionConfig): FieldEntry[] {
  return [
    defineField<'top_5_holdings', Holding[]>({
      key: 'top_5_holdings',
      strategies: [
        new HoldingsTableStrategy('static'),
        new HoldingsTableStrategy('rendered'),
        new HoldingRowScanStrategy(),
      ],
      validate: (c) => (c.raw.length > 0 ? ACCEPT : reject('no holdings')),
      normalize: (c) => c.raw.slice(0, config.holdingsLimit),
    }),
  ];
}
