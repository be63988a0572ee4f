/**
 * Performance Fields
 *
 * Annualised returns, category averages and rank within category. All three
 * usually share one table: horizons as columns, "Fund returns",
 * "Category average" and "Rank" as rows.
 */

import type { ExtractionConfig } from '../../config';
import { HORIZONS } from '../../types';
import type { Horizon } from '../../types';
import {
  InferenceStrategy,
  LabelValueStrategy,
  TableCellStrategy,
  TextPatternStrategy,
} from '../strategies';
import type { FieldEntry } from '../types';
import { integerField, percentField, textField } from './common';
import {
  CATEGORY_LABEL,
  CATEGORY_TEXT,
  HORIZON_COLUMNS,
  HORIZON_INDEX,
  INTEGER_CELL,
  PERCENT_CELL,
  RETURNS_LABEL,
  SINCE_INCEPTION_TEXT,
  bareHorizonText,
  horizonText,
  percentRow,
  rankHorizonText,
  rankRow,
} from './patterns';

function returnsFields(): FieldEntry[] {
  const horizons = HORIZONS.map((horizon: Horizon) =>
    percentField(`returns.${horizon}`, [
      new TableCellStrategy({
        id: 'returns-table',
        tableKeywords: ['return', '1y', '3y'],
        row: /fund return/,
        column: HORIZON_COLUMNS[horizon],
        value: PERCENT_CELL,
      }),
      new LabelValueStrategy({
        id: 'returns-row',
        label: RETURNS_LABEL,
        patterns: [percentRow('Fund returns', 4, HORIZON_INDEX[horizon])],
      }),
      new TextPatternStrategy({
        id: 'returns-text',
        patterns: [horizonText('Fund returns', horizon), bareHorizonText(horizon)],
      }),
    ])
  );

  const sinceInception = percentField('returns.since_inception', [
    new TableCellStrategy({
      id: 'returns-table',
      tableKeywords: ['return', '1y', '3y'],
      row: /fund return/,
      column: HORIZON_COLUMNS.since_inception,
      value: PERCENT_CELL,
    }),
    new LabelValueStrategy({
      id: 'returns-row',
      label: RETURNS_LABEL,
      patterns: [percentRow('Fund returns', 4, HORIZON_INDEX.since_inception)],
    }),
    new TextPatternStrategy({ id: 'returns-text', patterns: SINCE_INCEPTION_TEXT }),
  ]);

  return [...horizons, sinceInception];
}

function categoryAverageFields(): FieldEntry[] {
  return HORIZONS.map((horizon: Horizon) =>
    percentField(`category_info.category_average_annualised.${horizon}`, [
      new TableCellStrategy({
        id: 'category-average-table',
        tableKeywords: ['return'],
        row: /category average/,
        column: HORIZON_COLUMNS[horizon],
        value: PERCENT_CELL,
      }),
      new LabelValueStrategy({
        id: 'category-average-row',
        label: /Category average/i,
        patterns: [percentRow('Category average', 3, HORIZON_INDEX[horizon])],
      }),
      new TextPatternStrategy({
        id: 'category-average-text',
        patterns: [horizonText('Category average', horizon)],
      }),
    ])
  );
}

function rankFields(): FieldEntry[] {
  return HORIZONS.map((horizon: Horizon) =>
    integerField(`category_info.rank_within_category.${horizon}`, [
      new TableCellStrategy({
        id: 'rank-table',
        tableKeywords: ['return', 'rank'],
        row: /rank/,
        column: HORIZON_COLUMNS[horizon],
        value: INTEGER_CELL,
      }),
      new TextPatternStrategy({
        id: 'rank-text',
        patterns: [rankRow(HORIZON_INDEX[horizon]), rankHorizonText(horizon)],
      }),
    ])
  );
}

export function performanceFields(config: ExtractionConfig): FieldEntry[] {
  const category = textField(
    'category_info.category',
    [
      new LabelValueStrategy({ id: 'category-label', label: CATEGORY_LABEL, patterns: CATEGORY_TEXT }),
      new TextPatternStrategy({ id: 'category-text', patterns: CATEGORY_TEXT }),
      new InferenceStrategy('summary-category', (resolved) =>
        resolved.get('summary.fund_category') ?? null
      ),
    ],
    { min: config.freeTextMinLength, max: config.shortTextMaxLength }
  );

  return [...returnsFields(), category, ...categoryAverageFields(), ...rankFields()];
}
