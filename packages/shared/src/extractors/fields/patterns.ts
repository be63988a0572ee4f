/**
 * Fund Page Patterns
 *
 * Regular expressions for the labels and values found on fund detail pages.
 * A `value` named group, when present, is the raw candidate; otherwise the
 * first capture group is. Other named groups become candidate details.
 *
 * Numbers are written as they appear: "₹1,234.56", "48,870.60 Cr", "-2.3%".
 */

import type { Horizon } from '../../types';

/** Unsigned decimal */
const NUM = String.raw`\d+(?:\.\d+)?`;
/** Optionally signed decimal */
const SIGNED = String.raw`[-+]?\d+(?:\.\d+)?`;
/** Amount with thousands separators */
const AMOUNT = String.raw`[\d,]+(?:\.\d+)?`;
/** "01 Jan 2024", "1 January 2024", "01/01/2024", "2024-01-01" */
const DATE = String.raw`\d{1,2}\s+[A-Za-z]{3,9},?\s+\d{4}|\d{1,2}[/-]\d{1,2}[/-]\d{2,4}|\d{4}-\d{2}-\d{2}`;
const PERIOD_UNIT = String.raw`days?|months?|years?`;

function re(source: string, flags = 'i'): RegExp {
  return new RegExp(source, flags);
}

// ============================================================================
// Identity
// ============================================================================

/** Title suffix: "XYZ Fund - NAV, Mutual Fund Performance & Portfolio" */
export const TITLE_NAME = [/^(?<value>.+?)\s*-\s*NAV\b/i, /^(?<value>.+)$/];
export const HEADING_NAME = [/^(?<value>.+)$/];

export const NAV_LABEL = /Latest NAV|Current NAV|NAV.*as of/i;

export const NAV_WITH_DATE = re(
  String.raw`as of\s+(?<as_of>\d+\s+\w+\s+\d+).*?₹\s*(?<value>[\d,]+\.?\d{2,})`
);

export const NAV_TEXT = [
  re(String.raw`Latest NAV.*?as of\s+(?<as_of>\d+\s+\w+\s+\d+).*?₹\s*(?<value>[\d,]+\.?\d{2,})`),
  re(String.raw`(?:Latest|Current) NAV[:\s]+₹\s*(?<value>[\d,]+\.?\d{2,})`),
];

// ============================================================================
// Fund Size & AUM
// ============================================================================

export const FUND_SIZE = [
  re(String.raw`Fund Size[:\s]+₹\s*(?<value>${AMOUNT})\s*(?:Cr|Crore)`),
  re(String.raw`₹\s*(?<value>${AMOUNT})\s*(?:Cr|Crore).*?Fund Size`),
];

export const OBJECTIVE_HINTS = ['fund objective', 'investment objective'];

export const AUM_IN_SECTION = [
  re(String.raw`AUM[:\s]+₹\s*(?<value>${AMOUNT})\s*(?:Cr|Crore)`),
  re(String.raw`Assets Under Management[:\s]+₹?\s*(?<value>${AMOUNT})\s*(?:Cr|Crore)`),
  re(String.raw`AUM[:\s]+(?<value>${AMOUNT})\s*(?:Cr|Crore)`),
  re(String.raw`₹\s*(?<value>${AMOUNT})\s*(?:Cr|Crore).*?AUM`),
  re(String.raw`(?<value>${AMOUNT})\s*(?:Cr|Crore).*?Assets Under Management`),
];

export const AUM_IN_WINDOW = [
  re(String.raw`AUM[:\s]+₹\s*(?<value>${AMOUNT})\s*(?:Cr|Crore)`),
  re(String.raw`Assets Under Management[:\s]+₹\s*(?<value>${AMOUNT})\s*(?:Cr|Crore)`),
  re(String.raw`AUM[:\s]+(?<value>${AMOUNT})\s*(?:Cr|Crore)`),
];

// ============================================================================
// Summary
// ============================================================================

export const CATEGORY_LABEL = /Category/i;

export const CATEGORY_VALUE = [
  /Category[:\s]+(?<value>[A-Za-z][A-Za-z &-]{4,60})$/i,
  /^(?<value>[A-Za-z][A-Za-z &-]{4,60})$/,
];

const CATEGORY_NAMES = String.raw`Equity\s+ELSS|ELSS|(?:Equity|Debt|Hybrid)(?:\s+(?:Large|Mid|Small|Flexi|Multi)\s+Cap)?`;

export const CATEGORY_TEXT = [re(String.raw`Category[:\s]+(?<value>${CATEGORY_NAMES})`)];

export const FUND_TYPE_LABEL = /Fund Type|Scheme Type/i;

export const FUND_TYPE_VALUE = [
  /(?:Fund|Scheme) Type[:\s]+(?<value>[A-Za-z][A-Za-z &-]{1,40})$/i,
  /^(?<value>[A-Za-z][A-Za-z &-]{1,40})$/,
];

/** Longer labels first so alternation never stops at a prefix */
const RISK = 'Very High|Moderately High|Moderately Low|Low to Moderate|Moderate|High|Low';

export const RISK_LABEL = /Riskometer|Risk/i;

export const RISK_ANY = re(String.raw`(?<value>(?:${RISK}) Risk)`);

export const RISK_LIVE = [
  re(String.raw`Risk Level[:\s]+(?<value>(?:${RISK}) Risk)`),
  re(String.raw`Riskometer[:\s]+(?<value>(?:${RISK}) Risk)`),
  re(String.raw`Category.*?Risk[:\s]+(?<value>(?:${RISK}) Risk)`),
  RISK_ANY,
];

export const RISK_NEAR_LABEL = [
  re(String.raw`Risk Level[:\s]+(?<value>(?:${RISK}) Risk)`),
  re(String.raw`Riskometer[:\s]+(?<value>(?:${RISK}) Risk)`),
  RISK_ANY,
  re(String.raw`Risk[:\s]+(?<value>${RISK})\b`),
];

export const RISK_TEXT = [
  re(String.raw`Risk Level[:\s]+(?<value>(?:${RISK}) Risk)`),
  re(String.raw`Category.*?Risk[:\s]+(?<value>${RISK})\b`),
];

export const LOCK_IN_LABEL = /Lock[- ]?in/i;

export const LOCK_IN_VALUE = [
  re(String.raw`Lock[- ]?in(?: Period)?[:\s]+(?<value>\d+\s*(?:years?|Y)\b|Nil|None|No lock[- ]?in)`),
  /^(?<value>\d+\s*(?:years?|Y)|Nil|None)$/i,
];

export const LOCK_IN_TEXT = [
  re(String.raw`Lock[- ]?in(?: Period)?[:\s]+(?<value>\d+)\s*(?:years?|Y)\b`),
  re(String.raw`(?<value>\d+)\s*years?\s*lock`),
];

export const RATING_LABEL = /Rating|Star/i;

export const RATING_VALUE = [
  /(?:Rating|Rated)[:\s]+(?<value>\d+)/i,
  /(?<value>\d+)\s*(?:stars?|★)/i,
  /^(?<value>\d+)$/,
];

// ============================================================================
// Minimum Investments
// ============================================================================

export const RUPEE_AMOUNT = [/₹\s*(?<value>[\d,]+)/];

export const MIN_SIP_LABEL = /Min.*SIP|SIP.*Amount|Minimum.*SIP/i;

export const MIN_SIP_TEXT = [
  /Min(?:imum)?\.?\s*SIP(?:\s+Amount)?[:\s]+₹\s*(?<value>[\d,]+)/i,
  /SIP[:\s]+₹\s*(?<value>[\d,]+)/i,
];

export const MIN_FIRST_LABEL = /(?:First|1st|Initial)\s*(?:Investment|Amount)|Lumpsum/i;

export const MIN_FIRST_TEXT = [
  /(?:First|1st|Initial)\s*(?:Investment|Amount)[:\s]+₹\s*(?<value>[\d,]+)/i,
  /Min(?:imum)?\.?\s*Lumpsum[:\s]+₹\s*(?<value>[\d,]+)/i,
];

export const MIN_SUBSEQUENT_LABEL = /(?:Subsequent|2nd|Additional)\s*(?:Investment|Amount)/i;

export const MIN_SUBSEQUENT_TEXT = [
  /(?:Subsequent|2nd|Additional)\s*(?:Investment|Amount)[:\s]+₹\s*(?<value>[\d,]+)/i,
];

// ============================================================================
// Returns, Category Averages & Ranks
// ============================================================================

/** Column header tokens per horizon */
export const HORIZON_COLUMNS: Record<Horizon | 'since_inception', readonly string[]> = {
  '1y': ['1y', '1 year'],
  '3y': ['3y', '3 year'],
  '5y': ['5y', '5 year'],
  since_inception: ['all', 'inception'],
};

/** Position of each horizon in a "1Y 3Y 5Y All" row */
export const HORIZON_INDEX: Record<Horizon | 'since_inception', number> = {
  '1y': 0,
  '3y': 1,
  '5y': 2,
  since_inception: 3,
};

export const PERCENT_CELL = re(String.raw`(?<value>${SIGNED})\s*%`);
export const INTEGER_CELL = /(?<value>\d+)/;

export const RETURNS_LABEL = /Annualised returns|Fund returns/i;

/**
 * "<label> 12.1% 15.0% 17.9% 14.2%" with the value group on column `index`
 */
export function percentRow(label: string, columns: number, index: number): RegExp {
  const cells = Array.from({ length: columns }, (_, i) =>
    i === index ? `(?<value>${SIGNED})%` : `${SIGNED}%`
  );
  return re(`${label}\\s+${cells.join('\\s+')}`);
}

export function horizonText(prefix: string, horizon: Horizon): RegExp {
  const years = horizon.charAt(0);
  return re(String.raw`${prefix}.*?${years}\s*Y[:\s]+(?<value>${SIGNED})\s*%`);
}

export function bareHorizonText(horizon: Horizon): RegExp {
  const years = horizon.charAt(0);
  return re(String.raw`\b${years}\s*Y[:\s]+(?<value>${SIGNED})\s*%`);
}

export const SINCE_INCEPTION_TEXT = [
  re(String.raw`Fund returns.*?All[:\s]+(?<value>${SIGNED})\s*%`),
  re(String.raw`(?:Since Inception|\bAll)[:\s]+(?<value>${SIGNED})\s*%`),
];

export function rankRow(index: number): RegExp {
  const cells = Array.from({ length: 3 }, (_, i) => (i === index ? String.raw`(?<value>\d+)` : String.raw`\d+`));
  return re(String.raw`Rank.*?category\s+${cells.join(String.raw`\s+`)}`);
}

export function rankHorizonText(horizon: Horizon): RegExp {
  return re(String.raw`Rank.*?${horizon.charAt(0)}\s*Y[:\s]+(?<value>\d+)`);
}

// ============================================================================
// Costs & Tax
// ============================================================================

export const EXPENSE_RATIO_LABEL = /Expense Ratio|\bTER\b/i;
export const EXPENSE_RATIO_KEY = /expense ratio/;
export const PERCENT_VALUE = [re(String.raw`(?<value>${NUM})\s*%`)];
export const EXPENSE_RATIO_TEXT = [re(String.raw`Expense Ratio[:\s]+(?<value>${NUM})\s*%`)];

const EFFECTIVE = String.raw`(?:effective from|w\.?e\.?f\.?|as on)`;

export const EXPENSE_DATE_NEAR_LABEL = [re(String.raw`${EFFECTIVE}[:\s]+(?<value>${DATE})`)];
export const EXPENSE_DATE_TEXT = [
  re(String.raw`Expense Ratio.{0,80}?${EFFECTIVE}[:\s]+(?<value>${DATE})`),
];

export const EXIT_LOAD_LABEL = /Exit load/i;

export const EXIT_LOAD = [
  re(
    String.raw`Exit load for units in excess of (?<excess>${NUM})% of the investment[,\s]+(?<charge>${NUM})% will be charged for redemption within (?<period>\d+)\s*(?<unit>${PERIOD_UNIT})`
  ),
  re(
    String.raw`Exit load for units in excess of (?<excess>${NUM})%[^,]{0,50}?(?<charge>${NUM})%[^,]{0,100}?redemption within (?<period>\d+)\s*(?<unit>${PERIOD_UNIT})`
  ),
  re(
    String.raw`Exit load of (?<charge>${NUM})% if redeemed within (?<period>\d+)\s*(?<unit>${PERIOD_UNIT})`
  ),
  re(
    String.raw`Exit load[:\s]+(?<charge>${NUM})%[^.]{0,60}?within (?<period>\d+)\s*(?<unit>${PERIOD_UNIT})`
  ),
  re(
    String.raw`Exit load[:\s]+(?<charge>${NUM})%[^.]{0,100}?(?:if|within|redeemed|days?|months?|years?)`
  ),
  re(String.raw`Exit load[:\s]+(?<nil>Nil|N/A|None|0%)`),
];

export const STAMP_DUTY_LABEL = /Stamp duty/i;
export const STAMP_DUTY_TEXT = [re(String.raw`Stamp duty[:\s]+(?<value>${NUM})\s*%`)];

export const TAX_LABEL = /Tax implication|Taxation|\bTax\b/i;

export const TAX_NOTE = [
  /Tax implications?[:\s]+(?<value>.{20,})/i,
  /(?<value>(?:If you redeem|Returns are taxed|Taxed at).{20,})/i,
];

// ============================================================================
// Holdings
// ============================================================================

export const HOLDINGS_TABLE_KEYWORDS = ['holding', 'stock', 'company', 'instrument'];
export const HOLDING_NAME_COLUMNS = ['name', 'company', 'stock', 'holding', 'instrument', 'security'];
export const HOLDING_PCT_COLUMNS = ['weight', 'allocation', '%', 'percentage', 'asset', 'pct'];
export const GENERIC_HOLDING_NAMES = new Set(['equity', 'debt', 'cash', 'other']);
export const HOLDING_PCT = re(String.raw`(${NUM})\s*%`);
export const HOLDING_ROW = re(String.raw`^(?<name>.+?)\s+(?<pct>${NUM})\s*%$`);

// ============================================================================
// Advanced Ratios
// ============================================================================

export const RATIOS_HINTS = ['advanced ratio'];
export const RATIOS_MARKERS = /P\/E|P\/B|Top 5|Alpha|Beta/;

export const PE_LABEL = /P\/E|PE Ratio|Price to Earnings/i;
export const PE_VALUE = [
  re(String.raw`P/E(?:\s+Ratio)?[:\s]+(?<value>${NUM})`),
  re(String.raw`\bPE(?:\s+Ratio)?[:\s]+(?<value>${NUM})`),
  re(String.raw`Price.*?Earnings[:\s]+(?<value>${NUM})`),
];

export const PB_LABEL = /P\/B|PB Ratio|Price to Book/i;
export const PB_VALUE = [
  re(String.raw`P/B(?:\s+Ratio)?[:\s]+(?<value>${NUM})`),
  re(String.raw`\bPB(?:\s+Ratio)?[:\s]+(?<value>${NUM})`),
  re(String.raw`Price.*?Book[:\s]+(?<value>${NUM})`),
];

export const BARE_NUMBER = [re(String.raw`^(?<value>${SIGNED})$`)];
export const NUMBER_CELL = re(String.raw`(?<value>${SIGNED})`);

export function namedRatio(name: string): RegExp[] {
  return [re(String.raw`${name}[:\s]+(?<value>${SIGNED})`)];
}

export function topWeight(count: number): RegExp[] {
  return [re(String.raw`Top\s*${count}[:\s]+(?<value>${NUM})\s*%`)];
}
