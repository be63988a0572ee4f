/**
 * Summary Fields
 *
 * Category, fund type, riskometer label, lock-in period and rating. Fund
 * type, risk and lock-in fall back to inference from the fund name and
 * category when the page states nothing directly.
 */

import type { ExtractionConfig } from '../../config';
import { defineField } from '../chain';
import {
  ContainerScanStrategy,
  InferenceStrategy,
  KeyValueStrategy,
  LabelValueStrategy,
  LiveTextStrategy,
  TextPatternStrategy,
} from '../strategies';
import type { FieldEntry, ResolvedFields } from '../types';
import { ACCEPT, checkRiskLevel, cleanText, formatRiskLevel, reject } from '../validation';
import { integerField, textField } from './common';
import {
  CATEGORY_LABEL,
  CATEGORY_TEXT,
  CATEGORY_VALUE,
  FUND_TYPE_LABEL,
  FUND_TYPE_VALUE,
  LOCK_IN_LABEL,
  LOCK_IN_TEXT,
  LOCK_IN_VALUE,
  RATING_LABEL,
  RATING_VALUE,
  RISK_ANY,
  RISK_LABEL,
  RISK_LIVE,
  RISK_NEAR_LABEL,
  RISK_TEXT,
} from './patterns';

/** Fund types recognisable from the fund name or category, checked in order */
const NAMED_FUND_TYPES = ['Large Cap', 'Flexi Cap', 'Mid Cap', 'Small Cap'];

const NIL_LOCK_IN = /^(?:nil|none|no lock[- ]?in)$/i;

function fundName(resolved: ResolvedFields): string {
  return resolved.get('fund_name') ?? '';
}

function fundCategory(resolved: ResolvedFields): string {
  return resolved.get('summary.fund_category') ?? '';
}

export function inferFundType(name: string, category: string): string | null {
  if (name.toUpperCase().includes('ELSS') || category.toUpperCase().includes('ELSS')) {
    return 'ELSS';
  }
  for (const source of [name, category]) {
    const match = NAMED_FUND_TYPES.find((type) => source.includes(type));
    if (match) return match;
  }
  return null;
}

export function inferRiskLevel(name: string, category: string): string | null {
  if (name.toUpperCase().includes('ELSS') || category.includes('Equity')) return 'Very High Risk';
  if (category.includes('Debt') || category.includes('Bond')) return 'Low Risk';
  if (category.includes('Hybrid')) return 'Moderate Risk';
  return null;
}

/**
 * "3 years", "1 year" or "Nil"
 */
export function formatLockIn(raw: string): string {
  const text = raw.trim();
  if (NIL_LOCK_IN.test(text)) return 'Nil';
  const years = Number.parseInt(text, 10);
  return years === 1 ? '1 year' : `${years} years`;
}

export function summaryFields(config: ExtractionConfig): FieldEntry[] {
  const category = textField(
    'summary.fund_category',
    [
      new KeyValueStrategy({ id: 'category-pair', key: /^(?:fund )?category$/ }),
      new LabelValueStrategy({ id: 'category-label', label: CATEGORY_LABEL, patterns: CATEGORY_VALUE }),
      new TextPatternStrategy({ id: 'category-text', patterns: CATEGORY_TEXT }),
    ],
    { min: config.freeTextMinLength, max: config.shortTextMaxLength }
  );

  const fundType = textField(
    'summary.fund_type',
    [
      new KeyValueStrategy({ id: 'fund-type-pair', key: /^(?:fund|scheme) type$/ }),
      new LabelValueStrategy({ id: 'fund-type-label', label: FUND_TYPE_LABEL, patterns: FUND_TYPE_VALUE }),
      new InferenceStrategy('fund-type-inference', (resolved) =>
        inferFundType(fundName(resolved), fundCategory(resolved))
      ),
    ],
    { min: 2, max: config.shortTextMaxLength }
  );

  const riskLevel = defineField<'summary.risk_level', string>({
    key: 'summary.risk_level',
    strategies: [
      new LiveTextStrategy({ id: 'live-risk', patterns: RISK_LIVE }),
      new LabelValueStrategy({
        id: 'risk-label',
        label: RISK_LABEL,
        patterns: RISK_NEAR_LABEL,
        broadenTo: 200,
      }),
      new ContainerScanStrategy({
        id: 'riskometer',
        selector: 'div, span, svg',
        classPattern: /risk|riskometer/i,
        patterns: [RISK_ANY],
      }),
      new TextPatternStrategy({ id: 'risk-text', patterns: RISK_TEXT }),
      new InferenceStrategy('risk-inference', (resolved) =>
        inferRiskLevel(fundName(resolved), fundCategory(resolved))
      ),
    ],
    validate: (c) => checkRiskLevel(c.raw),
    normalize: (c) => formatRiskLevel(c.raw),
  });

  const lockIn = defineField<'summary.lock_in_period', string>({
    key: 'summary.lock_in_period',
    strategies: [
      new LabelValueStrategy({ id: 'lock-in-label', label: LOCK_IN_LABEL, patterns: LOCK_IN_VALUE }),
      new TextPatternStrategy({ id: 'lock-in-text', patterns: LOCK_IN_TEXT }),
      new InferenceStrategy('elss-lock-in', (resolved) =>
        fundName(resolved).toUpperCase().includes('ELSS') ? '3' : null
      ),
    ],
    validate: (c) => {
      const text = c.raw.trim();
      if (NIL_LOCK_IN.test(text)) return ACCEPT;
      const years = Number.parseInt(text, 10);
      return Number.isInteger(years) && years > 0 && years <= 10
        ? ACCEPT
        : reject(`implausible lock-in: "${c.raw}"`);
    },
    normalize: (c) => cleanText(formatLockIn(c.raw), config.shortTextMaxLength),
  });

  const rating = integerField(
    'summary.rating',
    [
      new KeyValueStrategy({ id: 'rating-pair', key: /rating/, patterns: RATING_VALUE }),
      new LabelValueStrategy({ id: 'rating-label', label: RATING_LABEL, patterns: RATING_VALUE }),
    ],
    config.ratingBounds
  );

  return [category, fundType, riskLevel, lockIn, rating];
}
