/**
 * Field Table
 *
 * Every extracted field in resolution order. Fields that infer from others
 * come after the fields they read: fund name and category before fund type
 * and risk, NAV before the expense ratio date, SIP minimum before the other
 * minimums.
 */

import type { ExtractionConfig } from '../../config';
import type { FaqEntry } from '../../types';
import { defineField } from '../chain';
import { FaqSectionStrategy } from '../faq';
import type { FieldEntry } from '../types';
import { ACCEPT, reject } from '../validation';
import { costFields } from './costs';
import { holdingsFields } from './holdings';
import { identityFields } from './identity';
import { investmentFields } from './investments';
import { performanceFields } from './performance';
import { ratioFields } from './ratios';
import { summaryFields } from './summary';

function faqField(config: ExtractionConfig): FieldEntry {
  return defineField<'faq', FaqEntry[]>({
    key: 'faq',
    strategies: [new FaqSectionStrategy('rendered'), new FaqSectionStrategy('static')],
    validate: (c) => (c.raw.length > 0 ? ACCEPT : reject('no questions found')),
    normalize: (c) => c.raw.slice(0, config.faqLimit),
  });
}

export function buildFieldTable(config: ExtractionConfig): readonly FieldEntry[] {
  return [
    ...identityFields(config),
    faqField(config),
    ...summaryFields(config),
    ...investmentFields(),
    ...performanceFields(config),
    ...costFields(config),
    ...holdingsFields(config),
    ...ratioFields(config),
  ];
}

export { formatExitLoad } from './costs';
export { formatWeight, holdingFromRow, holdingsFromTables } from './holdings';
export { formatLockIn, inferFundType, inferRiskLevel } from './summary';
