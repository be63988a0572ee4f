/**
 * Field Extractor Types
 *
 * Each extracted field is a FieldSpec: an ordered list of strategies plus a
 * validator and a normalizer. The chain runner tries strategies strictly in
 * order and keeps the first candidate that validates.
 */

import type { ExtractionConfig } from '../config';
import type { Document } from '../document';
import type { FieldKey, FieldValueMap } from '../types';
import type { LivePage } from './live';

/**
 * Values resolved so far in one record build. Later fields read earlier ones
 * for inference and fallbacks.
 */
export class ResolvedFields {
  private readonly values: Partial<FieldValueMap> = {};

  get<K extends FieldKey>(key: K): FieldValueMap[K] | undefined {
    return this.values[key];
  }

  set<K extends FieldKey>(key: K, value: FieldValueMap[K]): void {
    this.values[key] = value;
  }

  has(key: FieldKey): boolean {
    return this.values[key] !== undefined;
  }

  get size(): number {
    return Object.keys(this.values).length;
  }
}

/**
 * Context passed to every strategy during one record build
 */
export interface ExtractionContext {
  document: Document;
  /** Rendered page, when the caller supplied a live handle */
  live: LivePage | null;
  resolved: ResolvedFields;
  config: ExtractionConfig;
}

/**
 * What a strategy found, before validation
 */
export interface StrategyResult<TRaw> {
  raw: TRaw;
  /** Secondary captures, e.g. the date next to a NAV */
  details?: Record<string, string>;
}

export interface Strategy<TRaw> {
  readonly id: string;
  attempt(ctx: ExtractionContext): Promise<StrategyResult<TRaw> | null>;
}

/**
 * A provisional, unvalidated extraction result
 */
export interface Candidate<TRaw> {
  raw: TRaw;
  strategyId: string;
  /** Position of the producing strategy in its chain, 0 first */
  priority: number;
  details: Record<string, string>;
}

export type Verdict = { valid: true } | { valid: false; reason: string };

export interface FieldSpec<K extends FieldKey, TRaw> {
  key: K;
  strategies: readonly Strategy<TRaw>[];
  validate(candidate: Candidate<TRaw>): Verdict;
  normalize(candidate: Candidate<TRaw>): FieldValueMap[K];
}

/**
 * A FieldSpec with its raw type erased, so specs of different raw types can
 * live in one ordered table.
 */
export interface FieldEntry {
  readonly key: FieldKey;
  readonly strategyIds: readonly string[];
  /** Run the chain and store the value; resolves to whether it succeeded */
  resolve(ctx: ExtractionContext): Promise<boolean>;
}
