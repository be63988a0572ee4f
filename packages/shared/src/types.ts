/**
 * Shared TypeScript Types
 *
 * The FundRecord output contract, matching docs/contracts/fund_record.schema.json
 */

// ============================================================================
// Horizons
// ============================================================================

export const HORIZONS = ['1y', '3y', '5y'] as const;

export type Horizon = (typeof HORIZONS)[number];

// ============================================================================
// Record Sections
// ============================================================================

export interface NavValue {
  value: string;
  as_of: string;
}

export interface FaqEntry {
  question: string;
  answer: string;
}

export interface Holding {
  name: string;
  asset_pct: string;
}

export interface FundSummary {
  fund_category: string;
  fund_type: string;
  risk_level: string;
  lock_in_period: string;
  /** 1-5, or empty when no rating was found */
  rating: number | '';
}

export interface MinimumInvestments {
  min_sip: string;
  min_first_investment: string;
  min_2nd_investment_onwards: string;
}

export interface FundReturns {
  '1y': string;
  '3y': string;
  '5y': string;
  since_inception: string;
}

export interface CategoryInfo {
  category: string;
  /** Only horizons that were found are present */
  category_average_annualised: Partial<Record<Horizon, string>>;
  /** Only horizons that were found are present */
  rank_within_category: Partial<Record<Horizon, number>>;
}

export interface CostAndTax {
  expense_ratio: string;
  expense_ratio_effective_from: string;
  exit_load: string;
  stamp_duty: string;
  tax_implication: string;
}

export interface AdvancedRatios {
  pe_ratio: string;
  pb_ratio: string;
  alpha: string;
  beta: string;
  sharpe_ratio: string;
  sortino_ratio: string;
  top_5_weight_pct: string;
  top_20_weight_pct: string;
}

// ============================================================================
// Fund Record
// ============================================================================

export interface FundRecord {
  fund_name: string;
  nav: NavValue;
  fund_size: string;
  aum: string;
  faq: FaqEntry[];
  summary: FundSummary;
  minimum_investments: MinimumInvestments;
  returns: FundReturns;
  category_info: CategoryInfo;
  cost_and_tax: CostAndTax;
  top_5_holdings: Holding[];
  advanced_ratios: AdvancedRatios;
  source_url: string;
  /** Capture date, YYYY-MM-DD */
  last_scraped: string;
}

/**
 * A fully shaped record with every leaf empty.
 */
export function emptyFundRecord(): FundRecord {
  return {
    fund_name: '',
    nav: { value: '', as_of: '' },
    fund_size: '',
    aum: '',
    faq: [],
    summary: {
      fund_category: '',
      fund_type: '',
      risk_level: '',
      lock_in_period: '',
      rating: '',
    },
    minimum_investments: {
      min_sip: '',
      min_first_investment: '',
      min_2nd_investment_onwards: '',
    },
    returns: { '1y': '', '3y': '', '5y': '', since_inception: '' },
    category_info: {
      category: '',
      category_average_annualised: {},
      rank_within_category: {},
    },
    cost_and_tax: {
      expense_ratio: '',
      expense_ratio_effective_from: '',
      exit_load: '',
      stamp_duty: '',
      tax_implication: '',
    },
    top_5_holdings: [],
    advanced_ratios: {
      pe_ratio: '',
      pb_ratio: '',
      alpha: '',
      beta: '',
      sharpe_ratio: '',
      sortino_ratio: '',
      top_5_weight_pct: '',
      top_20_weight_pct: '',
    },
    source_url: '',
    last_scraped: '',
  };
}

// ============================================================================
// Field Keys
// ============================================================================

type HorizonFields<P extends string, V> = { [H in Horizon as `${P}.${H}`]: V };

/**
 * Value type of every independently extracted field, keyed by its dotted
 * path in the FundRecord.
 */
export type FieldValueMap = {
  fund_name: string;
  nav: NavValue;
  fund_size: string;
  aum: string;
  faq: FaqEntry[];
  'summary.fund_category': string;
  'summary.fund_type': string;
  'summary.risk_level': string;
  'summary.lock_in_period': string;
  'summary.rating': number;
  'minimum_investments.min_sip': string;
  'minimum_investments.min_first_investment': string;
  'minimum_investments.min_2nd_investment_onwards': string;
  'returns.since_inception': string;
  'category_info.category': string;
  'cost_and_tax.expense_ratio': string;
  'cost_and_tax.expense_ratio_effective_from': string;
  'cost_and_tax.exit_load': string;
  'cost_and_tax.stamp_duty': string;
  'cost_and_tax.tax_implication': string;
  top_5_holdings: Holding[];
  'advanced_ratios.pe_ratio': string;
  'advanced_ratios.pb_ratio': string;
  'advanced_ratios.alpha': string;
  'advanced_ratios.beta': string;
  'advanced_ratios.sharpe_ratio': string;
  'advanced_ratios.sortino_ratio': string;
  'advanced_ratios.top_5_weight_pct': string;
  'advanced_ratios.top_20_weight_pct': string;
} & HorizonFields<'returns', string> &
  HorizonFields<'category_info.category_average_annualised', string> &
  HorizonFields<'category_info.rank_within_category', number>;

export type FieldKey = keyof FieldValueMap;
