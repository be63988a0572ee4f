/**
 * Fund Record Builder
 *
 * Runs every field chain against one document and assembles a fully shaped
 * FundRecord. Fields are isolated: an exhausted field keeps its empty
 * default and never affects another. Only a document that cannot be parsed
 * yields no record.
 */

import { config as defaultConfig } from '../config';
import type { ExtractionConfig } from '../config';
import { withRecordScope } from '../context';
import { Document } from '../document';
import { ParseError } from '../errors';
import { logger } from '../logger';
import { recordBuildDurationHistogram, recordsBuiltCounter } from '../metrics';
import { validateFundRecord } from '../schemas';
import { HORIZONS, emptyFundRecord } from '../types';
import type { FundRecord } from '../types';
import { buildFieldTable } from './fields';
import { LivePage } from './live';
import type { LiveHandle } from './live';
import { ResolvedFields } from './types';
import type { ExtractionContext, FieldEntry } from './types';

export interface FundRecordBuilderOptions {
  config?: ExtractionConfig;
  /** Override the field table, e.g. to run a subset */
  fields?: readonly FieldEntry[];
  /** Source of the capture date */
  clock?: () => Date;
}

export interface BuildOptions {
  sourceUrl?: string;
  /** Rendered page for scroll-dependent sections */
  liveHandle?: LiveHandle | null;
}

/**
 * Context for running field chains directly against a document
 */
export function createExtractionContext(
  document: Document,
  options: { config?: ExtractionConfig; liveHandle?: LiveHandle | null } = {}
): ExtractionContext {
  const config = options.config ?? defaultConfig;
  return {
    document,
    live: options.liveHandle ? new LivePage(options.liveHandle, config.live) : null,
    resolved: new ResolvedFields(),
    config,
  };
}

/**
 * Place resolved values into an empty record
 */
export function assembleRecord(
  resolved: ResolvedFields,
  sourceUrl: string,
  capturedAt: Date
): FundRecord {
  const record = emptyFundRecord();

  record.fund_name = resolved.get('fund_name') ?? '';
  record.nav = resolved.get('nav') ?? record.nav;
  record.fund_size = resolved.get('fund_size') ?? '';
  record.aum = resolved.get('aum') ?? '';
  record.faq = resolved.get('faq') ?? [];

  record.summary = {
    fund_category: resolved.get('summary.fund_category') ?? '',
    fund_type: resolved.get('summary.fund_type') ?? '',
    risk_level: resolved.get('summary.risk_level') ?? '',
    lock_in_period: resolved.get('summary.lock_in_period') ?? '',
    rating: resolved.get('summary.rating') ?? '',
  };

  record.minimum_investments = {
    min_sip: resolved.get('minimum_investments.min_sip') ?? '',
    min_first_investment: resolved.get('minimum_investments.min_first_investment') ?? '',
    min_2nd_investment_onwards:
      resolved.get('minimum_investments.min_2nd_investment_onwards') ?? '',
  };

  record.returns.since_inception = resolved.get('returns.since_inception') ?? '';
  record.category_info.category = resolved.get('category_info.category') ?? '';

  for (const horizon of HORIZONS) {
    record.returns[horizon] = resolved.get(`returns.${horizon}`) ?? '';

    const average = resolved.get(`category_info.category_average_annualised.${horizon}`);
    if (average !== undefined) {
      record.category_info.category_average_annualised[horizon] = average;
    }
    const rank = resolved.get(`category_info.rank_within_category.${horizon}`);
    if (rank !== undefined) {
      record.category_info.rank_within_category[horizon] = rank;
    }
  }

  record.cost_and_tax = {
    expense_ratio: resolved.get('cost_and_tax.expense_ratio') ?? '',
    expense_ratio_effective_from: resolved.get('cost_and_tax.expense_ratio_effective_from') ?? '',
    exit_load: resolved.get('cost_and_tax.exit_load') ?? '',
    stamp_duty: resolved.get('cost_and_tax.stamp_duty') ?? '',
    tax_implication: resolved.get('cost_and_tax.tax_implication') ?? '',
  };

  record.top_5_holdings = resolved.get('top_5_holdings') ?? [];

  record.advanced_ratios = {
    pe_ratio: resolved.get('advanced_ratios.pe_ratio') ?? '',
    pb_ratio: resolved.get('advanced_ratios.pb_ratio') ?? '',
    alpha: resolved.get('advanced_ratios.alpha') ?? '',
    beta: resolved.get('advanced_ratios.beta') ?? '',
    sharpe_ratio: resolved.get('advanced_ratios.sharpe_ratio') ?? '',
    sortino_ratio: resolved.get('advanced_ratios.sortino_ratio') ?? '',
    top_5_weight_pct: resolved.get('advanced_ratios.top_5_weight_pct') ?? '',
    top_20_weight_pct: resolved.get('advanced_ratios.top_20_weight_pct') ?? '',
  };

  record.source_url = sourceUrl;
  record.last_scraped = capturedAt.toISOString().slice(0, 10);
  return record;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export class FundRecordBuilder {
  private readonly config: ExtractionConfig;
  private readonly fields: readonly FieldEntry[];
  private readonly clock: () => Date;

  constructor(options: FundRecordBuilderOptions = {}) {
    this.config = options.config ?? defaultConfig;
    this.fields = options.fields ?? buildFieldTable(this.config);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Build a record from a parsed document. Never rejects because fields are
   * empty; the returned record is frozen.
   */
  async buildRecord(document: Document, options: BuildOptions = {}): Promise<FundRecord> {
    const sourceUrl = options.sourceUrl ?? '';
    const live = Boolean(options.liveHandle);

    return withRecordScope(sourceUrl, async () => {
      const startTime = Date.now();
      const endTimer = recordBuildDurationHistogram.startTimer({ live: String(live) });

      logger.info('Building fund record', { field_count: this.fields.length, live });

      if (document.looksBlocked()) {
        logger.warn('Page looks blocked or empty; extracting anyway', { title: document.title() });
      }

      const ctx = createExtractionContext(document, {
        config: this.config,
        liveHandle: options.liveHandle,
      });

      // Strictly sequential: later fields read earlier ones
      const exhausted: string[] = [];
      for (const field of this.fields) {
        if (!(await field.resolve(ctx))) exhausted.push(field.key);
      }

      const record = assembleRecord(ctx.resolved, sourceUrl, this.clock());

      // Drift is logged by the validator; the record is returned either way
      const validation = validateFundRecord(record);

      endTimer();
      recordsBuiltCounter.inc({ status: 'complete' });
      logger.info('Fund record built', {
        resolved_fields: this.fields.length - exhausted.length,
        exhausted_fields: exhausted,
        schema_valid: validation.valid,
        duration_ms: Date.now() - startTime,
      });

      return deepFreeze(record);
    });
  }

  /**
   * Parse and build in one step. Resolves to null when the HTML cannot be
   * parsed at all.
   */
  async extract(html: string, options: BuildOptions = {}): Promise<FundRecord | null> {
    let document: Document;
    try {
      document = Document.parse(html);
    } catch (error) {
      if (error instanceof ParseError) {
        recordsBuiltCounter.inc({ status: 'parse_error' });
        logger.warn('Document could not be parsed', {
          error: error.message,
          source_url: options.sourceUrl,
        });
        return null;
      }
      throw error;
    }
    return this.buildRecord(document, options);
  }
}
