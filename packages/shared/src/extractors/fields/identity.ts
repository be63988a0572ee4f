/**
 * Identity Fields
 *
 * Fund name, NAV, fund size (top of page) and AUM (Fund Objective section).
 * Fund size and AUM are both crore amounts but come from different parts of
 * the page and are never substituted for each other.
 */

import type { ExtractionConfig } from '../../config';
import type { NavValue } from '../../types';
import { defineField } from '../chain';
import {
  ContainerScanStrategy,
  LabelValueStrategy,
  LiveRegionStrategy,
  SectionTextStrategy,
  TextPatternStrategy,
} from '../strategies';
import type { FieldEntry } from '../types';
import { checkRange, formatNav } from '../validation';
import { croreField, textField } from './common';
import {
  AUM_IN_SECTION,
  AUM_IN_WINDOW,
  FUND_SIZE,
  HEADING_NAME,
  NAV_LABEL,
  NAV_TEXT,
  NAV_WITH_DATE,
  OBJECTIVE_HINTS,
  TITLE_NAME,
} from './patterns';

export function identityFields(config: ExtractionConfig): FieldEntry[] {
  const fundName = textField(
    'fund_name',
    [
      new ContainerScanStrategy({ id: 'page-title', selector: 'title', limit: 1, patterns: TITLE_NAME }),
      new ContainerScanStrategy({ id: 'heading', selector: 'h1', limit: 1, patterns: HEADING_NAME }),
    ],
    { min: 2, max: config.shortTextMaxLength }
  );

  const nav = defineField<'nav', string>({
    key: 'nav',
    strategies: [
      new LabelValueStrategy({ id: 'nav-label', label: NAV_LABEL, patterns: [NAV_WITH_DATE] }),
      new TextPatternStrategy({ id: 'nav-text', patterns: NAV_TEXT }),
    ],
    validate: (c) => checkRange(c.raw, config.navBounds),
    normalize: (c): NavValue => ({
      value: formatNav(c.raw),
      as_of: c.details.as_of ?? '',
    }),
  });

  const fundSize = croreField(
    'fund_size',
    [
      new LiveRegionStrategy({
        id: 'live-top-section',
        selector: '*',
        from: 0,
        to: config.topSectionFraction,
        mustInclude: 'Fund Size',
        mustExclude: 'Fund Objective',
        patterns: FUND_SIZE,
      }),
      new ContainerScanStrategy({
        id: 'top-containers',
        selector: 'div, section, header',
        limit: 10,
        exclude: /Fund Objective/,
        patterns: FUND_SIZE.slice(0, 1),
      }),
      new TextPatternStrategy({
        id: 'leading-text',
        scope: { kind: 'leading', fraction: config.topSectionFraction },
        patterns: FUND_SIZE.slice(0, 1),
      }),
    ],
    config.croreBounds
  );

  const objectiveSection = {
    hints: OBJECTIVE_HINTS,
    attributeHints: ['objective'],
    minLength: 500,
    patterns: AUM_IN_SECTION,
  };

  const aum = croreField(
    'aum',
    [
      new SectionTextStrategy({ id: 'live-objective-section', source: 'rendered', ...objectiveSection }),
      new SectionTextStrategy({ id: 'objective-section', ...objectiveSection }),
      new TextPatternStrategy({
        id: 'objective-window',
        scope: { kind: 'after', keyword: 'fund objective', window: config.objectiveWindowChars },
        patterns: AUM_IN_WINDOW,
      }),
    ],
    config.croreBounds
  );

  return [fundName, nav, fundSize, aum];
}
