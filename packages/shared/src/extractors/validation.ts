/**
 * Candidate Validators & Normalizers
 *
 * Range checks and canonical formats for every field class. Validators
 * return verdicts; a failed verdict just moves the chain along.
 */

import type { Bounds } from '../config';
import { collapseWhitespace } from '../document';
import type { Verdict } from './types';

export const ACCEPT: Verdict = { valid: true };

export function reject(reason: string): Verdict {
  return { valid: false, reason };
}

// ============================================================================
// Numbers
// ============================================================================

const NUMBER_PATTERN = /^[+-]?\d+(?:\.\d+)?$/;

/**
 * Parse a number as written on the page: currency symbol, commas and
 * spaces are ignored. Returns null for anything that is not one number.
 */
export function parseAmount(raw: string): number | null {
  const cleaned = raw.replace(/[₹,\s]/g, '');
  if (!NUMBER_PATTERN.test(cleaned)) return null;
  return Number(cleaned);
}

/**
 * Signed number as written, without a leading plus sign
 */
export function plainNumber(raw: string): string {
  return raw.replace(/[,\s]/g, '').replace(/^\+/, '');
}

export function checkNumber(raw: string): Verdict {
  return parseAmount(raw) === null ? reject(`not a number: "${raw}"`) : ACCEPT;
}

export function checkRange(raw: string, bounds: Bounds): Verdict {
  const value = parseAmount(raw);
  if (value === null) return reject(`not a number: "${raw}"`);
  if (value < bounds.min || value > bounds.max) {
    return reject(`${value} outside [${bounds.min}, ${bounds.max}]`);
  }
  return ACCEPT;
}

export function checkInteger(raw: string, bounds?: Bounds): Verdict {
  const cleaned = raw.trim();
  if (!/^\d+$/.test(cleaned)) return reject(`not an integer: "${raw}"`);
  const value = Number(cleaned);
  if (bounds && (value < bounds.min || value > bounds.max)) {
    return reject(`${value} outside [${bounds.min}, ${bounds.max}]`);
  }
  return ACCEPT;
}

// ============================================================================
// Canonical Forms
// ============================================================================

/**
 * "₹" + the number as written, thousands separators removed
 */
export function formatNav(raw: string): string {
  return `₹${plainNumber(raw.replace(/₹/g, ''))}`;
}

/**
 * "₹" + the amount as written, separators kept
 */
export function formatRupee(raw: string): string {
  return `₹${raw.replace(/[₹\s]/g, '')}`;
}

/**
 * "₹" + amount grouped in thousands with at most two decimals, trailing
 * zeros and a trailing dot dropped, + "Cr"
 */
export function formatCrore(value: number): string {
  const [whole, fraction] = value.toFixed(2).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const trimmed = `${grouped}.${fraction}`.replace(/0+$/, '').replace(/\.$/, '');
  return `₹${trimmed}Cr`;
}

export function formatPercent(raw: string): string {
  return `${plainNumber(raw.replace(/%/g, ''))}%`;
}

// ============================================================================
// Free Text
// ============================================================================

/**
 * Collapse whitespace and truncate to `maxLength`, cutting back to the last
 * word boundary and appending "..."
 */
export function cleanText(text: string, maxLength: number): string {
  const collapsed = collapseWhitespace(text);
  if (collapsed.length <= maxLength) return collapsed;
  const head = collapsed.slice(0, maxLength);
  const lastSpace = head.lastIndexOf(' ');
  return `${lastSpace > 0 ? head.slice(0, lastSpace) : head}...`;
}

export function checkText(raw: string, minLength: number): Verdict {
  const length = collapseWhitespace(raw).length;
  return length >= minLength ? ACCEPT : reject(`text too short (${length} < ${minLength})`);
}

// ============================================================================
// Risk Labels
// ============================================================================

const RISK_LEVELS = [
  'Very High',
  'Moderately High',
  'High',
  'Low to Moderate',
  'Moderately Low',
  'Moderate',
  'Low',
] as const;

function riskBase(raw: string): string | null {
  const label = collapseWhitespace(raw)
    .replace(/\s*risk$/i, '')
    .toLowerCase();
  return RISK_LEVELS.find((level) => level.toLowerCase() === label) ?? null;
}

export function checkRiskLevel(raw: string): Verdict {
  return riskBase(raw) ? ACCEPT : reject(`unknown risk label: "${raw}"`);
}

/**
 * Canonical riskometer label, e.g. "very high" -> "Very High Risk"
 */
export function formatRiskLevel(raw: string): string {
  const base = riskBase(raw);
  return base ? `${base} Risk` : '';
}
