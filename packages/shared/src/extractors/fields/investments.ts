/**
 * Minimum Investment Fields
 *
 * First and subsequent minimums fall back to the SIP minimum when the page
 * only states one amount.
 */

import { InferenceStrategy, LabelValueStrategy, LiveTextStrategy, TextPatternStrategy } from '../strategies';
import type { FieldEntry, ResolvedFields } from '../types';
import { rupeeField } from './common';
import {
  MIN_FIRST_LABEL,
  MIN_FIRST_TEXT,
  MIN_SIP_LABEL,
  MIN_SIP_TEXT,
  MIN_SUBSEQUENT_LABEL,
  MIN_SUBSEQUENT_TEXT,
  RUPEE_AMOUNT,
} from './patterns';

function minSip(resolved: ResolvedFields): string | null {
  return resolved.get('minimum_investments.min_sip') ?? null;
}

export function investmentFields(): FieldEntry[] {
  return [
    rupeeField('minimum_investments.min_sip', [
      new LiveTextStrategy({ id: 'live-min-sip', patterns: MIN_SIP_TEXT.slice(0, 1) }),
      new LabelValueStrategy({ id: 'min-sip-label', label: MIN_SIP_LABEL, patterns: RUPEE_AMOUNT }),
      new TextPatternStrategy({ id: 'min-sip-text', patterns: MIN_SIP_TEXT }),
    ]),
    rupeeField('minimum_investments.min_first_investment', [
      new LiveTextStrategy({ id: 'live-min-first', patterns: MIN_FIRST_TEXT }),
      new LabelValueStrategy({ id: 'min-first-label', label: MIN_FIRST_LABEL, patterns: RUPEE_AMOUNT }),
      new TextPatternStrategy({ id: 'min-first-text', patterns: MIN_FIRST_TEXT }),
      new InferenceStrategy('min-sip-fallback', minSip),
    ]),
    rupeeField('minimum_investments.min_2nd_investment_onwards', [
      new LiveTextStrategy({ id: 'live-min-subsequent', patterns: MIN_SUBSEQUENT_TEXT }),
      new LabelValueStrategy({
        id: 'min-subsequent-label',
        label: MIN_SUBSEQUENT_LABEL,
        patterns: RUPEE_AMOUNT,
      }),
      new TextPatternStrategy({ id: 'min-subsequent-text', patterns: MIN_SUBSEQUENT_TEXT }),
      new InferenceStrategy('min-sip-fallback', minSip),
    ]),
  ];
}
