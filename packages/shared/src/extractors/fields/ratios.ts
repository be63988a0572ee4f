/**
 * Advanced Ratios
 *
 * P/E, P/B, alpha, beta, Sharpe, Sortino and top-N weights. All are read from
 * the "Advanced ratios" section first (rendered page, then static), widened
 * until it actually contains ratio labels, then from labels, tables and the
 * full text.
 */

import type { Bounds, ExtractionConfig } from '../../config';
import { LabelValueStrategy, SectionTextStrategy, TableCellStrategy, TextPatternStrategy } from '../strategies';
import type { FieldEntry, Strategy } from '../types';
import type { StringFieldKey } from './common';
import { numberField, percentField } from './common';
import {
  BARE_NUMBER,
  NUMBER_CELL,
  PB_LABEL,
  PB_VALUE,
  PE_LABEL,
  PE_VALUE,
  RATIOS_HINTS,
  RATIOS_MARKERS,
  namedRatio,
  topWeight,
} from './patterns';

function sectionStrategies(patterns: readonly RegExp[]): Strategy<string>[] {
  const section = {
    hints: RATIOS_HINTS,
    attributeHints: ['ratios'],
    expandUntil: { pattern: RATIOS_MARKERS, maxSteps: 5 },
    patterns,
  };
  return [
    new SectionTextStrategy({ id: 'live-ratios-section', source: 'rendered', ...section }),
    new SectionTextStrategy({ id: 'ratios-section', ...section }),
  ];
}

interface RatioDefinition {
  key: StringFieldKey;
  label: RegExp;
  patterns: RegExp[];
  /** Lower-cased row marker in a ratios table */
  row: RegExp;
  bounds?: Bounds;
}

function ratioField({ key, label, patterns, row, bounds }: RatioDefinition): FieldEntry {
  const id = key.split('.').pop() ?? key;
  return numberField(
    key,
    [
      ...sectionStrategies(patterns),
      new LabelValueStrategy({
        id: `${id}-label`,
        label,
        patterns: [...patterns, ...BARE_NUMBER],
      }),
      new TableCellStrategy({
        id: `${id}-table`,
        tableKeywords: ['p/e', 'p/b', 'alpha', 'beta', 'sharpe'],
        row,
        value: NUMBER_CELL,
      }),
      new TextPatternStrategy({ id: `${id}-text`, patterns }),
    ],
    bounds
  );
}

export function ratioFields(config: ExtractionConfig): FieldEntry[] {
  const ratios: RatioDefinition[] = [
    {
      key: 'advanced_ratios.pe_ratio',
      label: PE_LABEL,
      patterns: PE_VALUE,
      row: /p\/e|pe ratio|price to earnings/,
      bounds: config.peBounds,
    },
    {
      key: 'advanced_ratios.pb_ratio',
      label: PB_LABEL,
      patterns: PB_VALUE,
      row: /p\/b|pb ratio|price to book/,
      bounds: config.pbBounds,
    },
    { key: 'advanced_ratios.alpha', label: /Alpha/i, patterns: namedRatio('Alpha'), row: /alpha/ },
    { key: 'advanced_ratios.beta', label: /Beta/i, patterns: namedRatio('Beta'), row: /beta/ },
    {
      key: 'advanced_ratios.sharpe_ratio',
      label: /Sharpe/i,
      patterns: namedRatio('Sharpe(?:\\s+Ratio)?'),
      row: /sharpe/,
    },
    {
      key: 'advanced_ratios.sortino_ratio',
      label: /Sortino/i,
      patterns: namedRatio('Sortino(?:\\s+Ratio)?'),
      row: /sortino/,
    },
  ];

  const weights = ([5, 20] as const).map((count) => {
    const patterns = topWeight(count);
    return percentField(`advanced_ratios.top_${count}_weight_pct`, [
      ...sectionStrategies(patterns),
      new TextPatternStrategy({ id: `top-${count}-text`, patterns }),
    ]);
  });

  return [...ratios.map(ratioField), ...weights];
}
