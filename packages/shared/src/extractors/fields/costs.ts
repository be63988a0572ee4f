/**
 * Cost & Tax Fields
 *
 * Expense ratio and its effective date, exit load, stamp duty and the tax
 * note. Exit load is rewritten into one of a few canonical sentences.
 */

import type { ExtractionConfig } from '../../config';
import { defineField } from '../chain';
import {
  InferenceStrategy,
  KeyValueStrategy,
  LabelValueStrategy,
  LiveTextStrategy,
  TextPatternStrategy,
} from '../strategies';
import type { Candidate, FieldEntry, Verdict } from '../types';
import { ACCEPT, parseAmount, reject } from '../validation';
import { percentField, textField } from './common';
import {
  EXIT_LOAD,
  EXIT_LOAD_LABEL,
  EXPENSE_DATE_NEAR_LABEL,
  EXPENSE_DATE_TEXT,
  EXPENSE_RATIO_KEY,
  EXPENSE_RATIO_LABEL,
  EXPENSE_RATIO_TEXT,
  PERCENT_VALUE,
  STAMP_DUTY_LABEL,
  STAMP_DUTY_TEXT,
  TAX_LABEL,
  TAX_NOTE,
} from './patterns';

/**
 * Canonical exit load sentence from the captured parts
 */
export function formatExitLoad(details: Record<string, string>): string {
  const { excess, charge, period, unit, nil } = details;
  if (nil !== undefined) return 'Nil';
  if (charge === undefined) return '';

  const within = period !== undefined ? ` within ${period} ${(unit ?? 'days').toLowerCase()}` : '';
  if (excess !== undefined && within) {
    return `Exit load for units in excess of ${excess}% of the investment, ${charge}% will be charged for redemption${within}`;
  }
  if (within) return `Exit load of ${charge}% if redeemed${within}`;
  if (parseAmount(charge) === 0) return 'Nil';
  return `Exit load of ${charge}%`;
}

function validateExitLoad(candidate: Candidate<string>): Verdict {
  const { nil, charge } = candidate.details;
  return nil !== undefined || charge !== undefined
    ? ACCEPT
    : reject('no exit load terms captured');
}

export function costFields(config: ExtractionConfig): FieldEntry[] {
  const expenseRatio = percentField('cost_and_tax.expense_ratio', [
    new KeyValueStrategy({ id: 'expense-ratio-pair', key: EXPENSE_RATIO_KEY, patterns: PERCENT_VALUE }),
    new LabelValueStrategy({
      id: 'expense-ratio-label',
      label: EXPENSE_RATIO_LABEL,
      patterns: PERCENT_VALUE,
    }),
    new TextPatternStrategy({ id: 'expense-ratio-text', patterns: EXPENSE_RATIO_TEXT }),
  ]);

  const effectiveFrom = textField(
    'cost_and_tax.expense_ratio_effective_from',
    [
      new LabelValueStrategy({
        id: 'expense-date-label',
        label: EXPENSE_RATIO_LABEL,
        patterns: EXPENSE_DATE_NEAR_LABEL,
      }),
      new TextPatternStrategy({ id: 'expense-date-text', patterns: EXPENSE_DATE_TEXT }),
      new InferenceStrategy('nav-date', (resolved) => resolved.get('nav')?.as_of || null),
    ],
    { min: 1, max: config.shortTextMaxLength }
  );

  const exitLoad = defineField<'cost_and_tax.exit_load', string>({
    key: 'cost_and_tax.exit_load',
    strategies: [
      new LiveTextStrategy({ id: 'live-exit-load', patterns: EXIT_LOAD }),
      new LabelValueStrategy({
        id: 'exit-load-label',
        label: EXIT_LOAD_LABEL,
        patterns: EXIT_LOAD,
        broadenTo: 1000,
      }),
      new TextPatternStrategy({ id: 'exit-load-text', patterns: EXIT_LOAD }),
    ],
    validate: validateExitLoad,
    normalize: (c) => formatExitLoad(c.details),
  });

  const stampDuty = percentField('cost_and_tax.stamp_duty', [
    new LabelValueStrategy({ id: 'stamp-duty-label', label: STAMP_DUTY_LABEL, patterns: PERCENT_VALUE }),
    new TextPatternStrategy({ id: 'stamp-duty-text', patterns: STAMP_DUTY_TEXT }),
  ]);

  const taxImplication = textField(
    'cost_and_tax.tax_implication',
    [
      new LabelValueStrategy({ id: 'tax-label', label: TAX_LABEL, patterns: TAX_NOTE, broadenTo: 500 }),
      new TextPatternStrategy({ id: 'tax-text', patterns: TAX_NOTE }),
    ],
    { min: config.freeTextMinLength, max: config.longTextMaxLength }
  );

  return [expenseRatio, effectiveFrom, exitLoad, stampDuty, taxImplication];
}
