/**
 * Reusable Strategies
 *
 * The strategy shapes shared across fields: label/value, key/value pairs,
 * table lookup, section text, container scan, full-text regex, live-page
 * queries and inference. Field modules configure them; none knows about a
 * specific field.
 */

import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import type { Document } from '../document';
import {
  nextElementSibling,
  parentElement,
  rowCells,
  rowText,
  tableText,
  textOf,
} from '../document';
import type { TableRow } from '../document';
import { locateSection, widenUntilLength, widenUntilMatch } from './locators';
import type { ExtractionContext, ResolvedFields, Strategy, StrategyResult } from './types';

// ============================================================================
// Pattern Matching
// ============================================================================

/**
 * Run one pattern. The raw value is the `value` named group, else group 1,
 * else the whole match; other named groups become details.
 */
export function matchPattern(pattern: RegExp, text: string): StrategyResult<string> | null {
  const match = pattern.exec(text);
  if (!match) return null;

  const groups = match.groups ?? {};
  const raw = groups.value ?? match[1] ?? match[0];
  const details: Record<string, string> = {};
  for (const [name, captured] of Object.entries(groups)) {
    if (name !== 'value' && captured !== undefined) {
      details[name] = captured;
    }
  }
  return { raw: raw.trim(), details };
}

/**
 * First pattern that matches, in declared order
 */
export function matchFirst(
  patterns: readonly RegExp[],
  text: string
): StrategyResult<string> | null {
  for (const pattern of patterns) {
    const result = matchPattern(pattern, text);
    if (result) return result;
  }
  return null;
}

// ============================================================================
// Document Sources
// ============================================================================

/**
 * 'static' reads the parsed input; 'rendered' reads the live page after it
 * has been scrolled through, and yields nothing without a live handle.
 */
export type DocumentSource = 'static' | 'rendered';

export async function sourceDocument(
  ctx: ExtractionContext,
  source: DocumentSource
): Promise<Document | null> {
  if (source === 'static') return ctx.document;
  return ctx.live ? ctx.live.rendered() : null;
}

interface SourceOptions {
  source?: DocumentSource;
}

// ============================================================================
// Structural Text
// ============================================================================

export interface LabelValueOptions extends SourceOptions {
  id: string;
  /** Tested against individual text nodes */
  label: RegExp;
  /** Tried on each text in turn: the label's element, its next sibling, the wider context */
  patterns: readonly RegExp[];
  /** Widen the context until it holds this many characters instead of one parent up */
  broadenTo?: number;
}

/**
 * Find a text node matching a label, then read the value from the same
 * element, its next sibling, or the surrounding text, in that order.
 */
export class LabelValueStrategy implements Strategy<string> {
  readonly id: string;

  constructor(private readonly options: LabelValueOptions) {
    this.id = options.id;
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<string> | null> {
    const doc = await sourceDocument(ctx, this.options.source ?? 'static');
    if (!doc) return null;
    const { label, patterns, broadenTo } = this.options;

    for (const node of doc.textNodes()) {
      if (!label.test(node.data)) continue;
      const element = parentElement(node);
      if (!element) continue;

      const contexts: Element[] = [element];
      const sibling = nextElementSibling(element);
      if (sibling) contexts.push(sibling);
      const wider = broadenTo ? widenUntilLength(element, broadenTo) : parentElement(element);
      if (wider && wider !== element) contexts.push(wider);

      for (const context of contexts) {
        const result = matchFirst(patterns, textOf(context));
        if (result) return result;
      }
    }
    return null;
  }
}

// ============================================================================
// Key/Value Pairs
// ============================================================================

export interface KeyValueOptions extends SourceOptions {
  id: string;
  /** Tested against lower-cased keys */
  key: RegExp;
  /** Read the value through these patterns; without them the whole value is taken */
  patterns?: readonly RegExp[];
}

export class KeyValueStrategy implements Strategy<string> {
  readonly id: string;

  constructor(private readonly options: KeyValueOptions) {
    this.id = options.id;
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<string> | null> {
    const doc = await sourceDocument(ctx, this.options.source ?? 'static');
    if (!doc) return null;
    const { key, patterns } = this.options;

    for (const [pairKey, value] of doc.keyValuePairs()) {
      if (!key.test(pairKey)) continue;
      if (!patterns) {
        if (value) return { raw: value };
        continue;
      }
      const result = matchFirst(patterns, value);
      if (result) return result;
    }
    return null;
  }
}

// ============================================================================
// Tables
// ============================================================================

export interface TableCellOptions extends SourceOptions {
  id: string;
  /** A table qualifies when its text contains any of these */
  tableKeywords: readonly string[];
  /** Row selector, tested against the lower-cased row text */
  row: RegExp;
  /** Header tokens of the wanted column; without them every cell is scanned */
  column?: readonly string[];
  value: RegExp;
}

function headerMatches(header: string, tokens: readonly string[]): boolean {
  const lower = header.toLowerCase();
  return tokens.some((token) => lower.includes(token));
}

/**
 * Cells of `row` to inspect: the wanted column for header rows, every cell
 * otherwise. Plain rows carry no headers, so a column lookup skips them.
 */
function cellsToScan(row: TableRow, column: readonly string[] | undefined): string[] {
  if (!column) return rowCells(row);
  if (Array.isArray(row)) return [];
  return Object.entries(row)
    .filter(([header]) => headerMatches(header, column))
    .map(([, cell]) => cell);
}

/**
 * Screen tables by keyword, pick the first row matching `row`, and read the
 * value from the first qualifying cell.
 */
export class TableCellStrategy implements Strategy<string> {
  readonly id: string;

  constructor(private readonly options: TableCellOptions) {
    this.id = options.id;
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<string> | null> {
    const doc = await sourceDocument(ctx, this.options.source ?? 'static');
    if (!doc) return null;
    const { tableKeywords, row: rowPattern, column, value } = this.options;

    for (const table of doc.tables()) {
      const content = tableText(table);
      if (!tableKeywords.some((keyword) => content.includes(keyword))) continue;

      for (const row of table.rows) {
        if (!rowPattern.test(rowText(row))) continue;
        for (const cell of cellsToScan(row, column)) {
          const result = matchPattern(value, cell);
          if (result) return result;
        }
      }
    }
    return null;
  }
}

// ============================================================================
// Sections & Containers
// ============================================================================

export interface SectionTextOptions extends SourceOptions {
  id: string;
  hints: readonly string[];
  attributeHints?: readonly string[];
  patterns: readonly RegExp[];
  /** Widen a short section until it holds this many characters */
  minLength?: number;
  /** Widen up to `maxSteps` ancestors until the text matches */
  expandUntil?: { pattern: RegExp; maxSteps: number };
  textCap?: number;
}

/**
 * Locate a named section and run the patterns over its text.
 */
export class SectionTextStrategy implements Strategy<string> {
  readonly id: string;

  constructor(private readonly options: SectionTextOptions) {
    this.id = options.id;
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<string> | null> {
    const doc = await sourceDocument(ctx, this.options.source ?? 'static');
    if (!doc) return null;
    const { hints, attributeHints, patterns, minLength, expandUntil } = this.options;

    let section = locateSection(doc, hints, {
      attributeHints,
      textCap: this.options.textCap ?? ctx.config.sectionTextCap,
    });
    if (!section) return null;

    if (minLength !== undefined) {
      section = widenUntilLength(section, minLength);
    }
    if (expandUntil) {
      section = widenUntilMatch(section, expandUntil.pattern, expandUntil.maxSteps);
    }
    return matchFirst(patterns, textOf(section));
  }
}

export interface ContainerScanOptions extends SourceOptions {
  id: string;
  selector: string;
  patterns: readonly RegExp[];
  /** Only the first N matching elements are scanned */
  limit?: number;
  /** Tested against the class attribute */
  classPattern?: RegExp;
  /** Elements whose text matches are skipped */
  exclude?: RegExp;
}

/**
 * Scan elements matching a selector in document order.
 */
export class ContainerScanStrategy implements Strategy<string> {
  readonly id: string;

  constructor(private readonly options: ContainerScanOptions) {
    this.id = options.id;
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<string> | null> {
    const doc = await sourceDocument(ctx, this.options.source ?? 'static');
    if (!doc) return null;
    const { selector, patterns, limit, classPattern, exclude } = this.options;

    let elements = doc
      .tree()(selector)
      .toArray()
      .filter(isTag)
      .filter((el) => !classPattern || classPattern.test(el.attribs.class ?? ''));
    if (limit !== undefined) elements = elements.slice(0, limit);

    for (const el of elements) {
      const text = textOf(el);
      if (exclude && exclude.test(text)) continue;
      const result = matchFirst(patterns, text);
      if (result) return result;
    }
    return null;
  }
}

// ============================================================================
// Full Text
// ============================================================================

export type TextScope =
  | { kind: 'all' }
  /** `window` characters starting at the first occurrence of `keyword` */
  | { kind: 'after'; keyword: string; window: number }
  /** The leading fraction of the text */
  | { kind: 'leading'; fraction: number };

export interface TextPatternOptions extends SourceOptions {
  id: string;
  patterns: readonly RegExp[];
  scope?: TextScope;
}

export function scopeText(text: string, scope: TextScope): string | null {
  switch (scope.kind) {
    case 'after': {
      const position = text.toLowerCase().indexOf(scope.keyword.toLowerCase());
      return position >= 0 ? text.slice(position, position + scope.window) : null;
    }
    case 'leading':
      return text.length > 100 ? text.slice(0, Math.floor(text.length * scope.fraction)) : text;
    case 'all':
    default:
      return text;
  }
}

/**
 * Last-resort regex over the flattened text.
 */
export class TextPatternStrategy implements Strategy<string> {
  readonly id: string;

  constructor(private readonly options: TextPatternOptions) {
    this.id = options.id;
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<string> | null> {
    const doc = await sourceDocument(ctx, this.options.source ?? 'static');
    if (!doc) return null;
    const scoped = scopeText(doc.text(), this.options.scope ?? { kind: 'all' });
    return scoped === null ? null : matchFirst(this.options.patterns, scoped);
  }
}

// ============================================================================
// Live Page
// ============================================================================

export interface LiveRegionOptions {
  id: string;
  selector: string;
  /** Vertical band as fractions of the scroll height */
  from: number;
  to: number;
  /** Only elements whose text contains this */
  mustInclude?: string;
  /** Elements whose text contains this are ignored */
  mustExclude?: string;
  patterns: readonly RegExp[];
}

/**
 * Join the text of rendered elements in a vertical band and match it.
 */
export class LiveRegionStrategy implements Strategy<string> {
  readonly id: string;

  constructor(private readonly options: LiveRegionOptions) {
    this.id = options.id;
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<string> | null> {
    if (!ctx.live) return null;
    const { selector, from, to, mustInclude, mustExclude, patterns } = this.options;

    const elements = await ctx.live.elementsWithin(selector, from, to);
    const text = elements
      .map((el) => el.text)
      .filter(
        (t) => (!mustInclude || t.includes(mustInclude)) && (!mustExclude || !t.includes(mustExclude))
      )
      .join(' ');
    return text ? matchFirst(patterns, text) : null;
  }
}

/**
 * Match against the rendered page's inner text.
 */
export class LiveTextStrategy implements Strategy<string> {
  readonly id: string;

  constructor(private readonly options: { id: string; patterns: readonly RegExp[] }) {
    this.id = options.id;
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<string> | null> {
    if (!ctx.live) return null;
    return matchFirst(this.options.patterns, await ctx.live.innerText());
  }
}

// ============================================================================
// Inference
// ============================================================================

/**
 * Derive a value from fields resolved earlier in the build. Lowest priority.
 */
export class InferenceStrategy<TRaw> implements Strategy<TRaw> {
  constructor(
    readonly id: string,
    private readonly infer: (resolved: ResolvedFields, doc: Document) => TRaw | null
  ) {}

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<TRaw> | null> {
    const raw = this.infer(ctx.resolved, ctx.document);
    return raw === null ? null : { raw };
  }
}
