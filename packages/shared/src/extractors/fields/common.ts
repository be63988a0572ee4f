/**
 * Field Kinds
 *
 * Validator/normalizer pairs for each field class, bound to a key and a
 * strategy list.
 */

import type { Bounds } from '../../config';
import type { FieldKey, FieldValueMap } from '../../types';
import { defineField } from '../chain';
import type { FieldEntry, Strategy } from '../types';
import {
  ACCEPT,
  checkInteger,
  checkNumber,
  checkRange,
  checkText,
  cleanText,
  formatCrore,
  formatPercent,
  formatRupee,
  parseAmount,
  plainNumber,
  reject,
} from '../validation';

type KeysWithValue<V> = {
  [K in FieldKey]: FieldValueMap[K] extends V ? K : never;
}[FieldKey];

export type StringFieldKey = KeysWithValue<string>;
export type NumberFieldKey = KeysWithValue<number>;

type TextStrategies = readonly Strategy<string>[];

export function textField<K extends StringFieldKey>(
  key: K,
  strategies: TextStrategies,
  length: { min: number; max: number }
): FieldEntry {
  return defineField<K, string>({
    key,
    strategies,
    validate: (c) => checkText(c.raw, length.min),
    normalize: (c) => cleanText(c.raw, length.max),
  });
}

/** Signed percentage, "number%" */
export function percentField<K extends StringFieldKey>(
  key: K,
  strategies: TextStrategies
): FieldEntry {
  return defineField<K, string>({
    key,
    strategies,
    validate: (c) => checkNumber(c.raw.replace(/%/g, '')),
    normalize: (c) => formatPercent(c.raw),
  });
}

/** Signed number kept as written */
export function numberField<K extends StringFieldKey>(
  key: K,
  strategies: TextStrategies,
  bounds?: Bounds
): FieldEntry {
  return defineField<K, string>({
    key,
    strategies,
    validate: (c) => (bounds ? checkRange(c.raw, bounds) : checkNumber(c.raw)),
    normalize: (c) => plainNumber(c.raw),
  });
}

/** Amount in crores, "₹48,870.6Cr" */
export function croreField<K extends StringFieldKey>(
  key: K,
  strategies: TextStrategies,
  bounds: Bounds
): FieldEntry {
  return defineField<K, string>({
    key,
    strategies,
    validate: (c) => checkRange(c.raw, bounds),
    normalize: (c) => {
      const value = parseAmount(c.raw);
      return value === null ? '' : formatCrore(value);
    },
  });
}

/** Rupee amount as written, "₹1,000" */
export function rupeeField<K extends StringFieldKey>(
  key: K,
  strategies: TextStrategies
): FieldEntry {
  return defineField<K, string>({
    key,
    strategies,
    validate: (c) => {
      const value = parseAmount(c.raw);
      return value !== null && value > 0 ? ACCEPT : reject(`not an amount: "${c.raw}"`);
    },
    normalize: (c) => formatRupee(c.raw),
  });
}

/** Whole number, optionally bounded */
export function integerField<K extends NumberFieldKey>(
  key: K,
  strategies: TextStrategies,
  bounds?: Bounds
): FieldEntry {
  return defineField<K, string>({
    key,
    strategies,
    validate: (c) => checkInteger(c.raw, bounds),
    normalize: (c) => Number(c.raw.trim()),
  });
}
