/**
 * Document Model
 *
 * An immutable parsed page plus its derived projections. Every projection is
 * computed on first use and memoized; nothing re-parses.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isTag } from 'domhandler';
import type { AnyNode, Element, Text } from 'domhandler';
import { ParseError } from '../errors';
import { extractKeyValuePairs } from './key-values';
import { extractTables } from './tables';
import type { Table } from './tables';
import { collapseWhitespace, collectTextNodes, textOf } from './text';

const MARKUP_PATTERN = /<[a-z!]/i;
const BLOCKED_TITLE = /blocked|access denied|captcha/i;
const FUND_CONTAINER_CLASS = /fund|scheme|details/i;
const FUND_WIDGET_CLASS = /nav|aum|expense|holding/i;

export class Document {
  private readonly $: CheerioAPI;

  private textCache?: string;
  private titleCache?: string;
  private tablesCache?: readonly Table[];
  private pairsCache?: ReadonlyMap<string, string>;
  private elementsCache?: readonly Element[];
  private textNodesCache?: readonly Text[];

  private constructor($: CheerioAPI) {
    this.$ = $;
  }

  /**
   * Parse raw HTML. Fails only when the input is empty or has no markup.
   */
  static parse(html: string): Document {
    if (typeof html !== 'string' || html.trim() === '') {
      throw new ParseError('Empty document');
    }
    if (!MARKUP_PATTERN.test(html)) {
      throw new ParseError('Input does not look like HTML');
    }
    try {
      return new Document(cheerio.load(html));
    } catch (error) {
      throw new ParseError(
        `Could not parse document: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /** Structural query API over the parsed tree */
  tree(): CheerioAPI {
    return this.$;
  }

  /** The <body> element, which the parser always creates */
  body(): Element | null {
    return this.$('body').get(0) ?? null;
  }

  /** Flattened, whitespace-normalized body text */
  text(): string {
    if (this.textCache === undefined) {
      const body = this.body();
      this.textCache = body ? textOf(body) : '';
    }
    return this.textCache;
  }

  title(): string {
    if (this.titleCache === undefined) {
      this.titleCache = collapseWhitespace(this.$('title').first().text());
    }
    return this.titleCache;
  }

  tables(): readonly Table[] {
    if (!this.tablesCache) {
      this.tablesCache = extractTables(this.$);
    }
    return this.tablesCache;
  }

  keyValuePairs(): ReadonlyMap<string, string> {
    if (!this.pairsCache) {
      this.pairsCache = extractKeyValuePairs(this.$);
    }
    return this.pairsCache;
  }

  /** Every element under <body>, in document order */
  elements(): readonly Element[] {
    if (!this.elementsCache) {
      this.elementsCache = this.$('body *').toArray();
    }
    return this.elementsCache;
  }

  /** Visible text nodes under <body>, in document order */
  textNodes(): readonly Text[] {
    if (!this.textNodesCache) {
      const body = this.body();
      this.textNodesCache = body ? collectTextNodes(body) : [];
    }
    return this.textNodesCache;
  }

  textOf(node: AnyNode): string {
    return textOf(node);
  }

  /**
   * Heuristic for interstitials and empty shells: a blocking title, or no
   * fund container and no fund widget anywhere on the page.
   */
  looksBlocked(): boolean {
    if (BLOCKED_TITLE.test(this.title())) return true;

    const hasClass = (selector: string, pattern: RegExp): boolean =>
      this.$(selector)
        .toArray()
        .filter(isTag)
        .some((el) => pattern.test(el.attribs.class ?? ''));

    if (hasClass('main[class], div[class]', FUND_CONTAINER_CLASS)) return false;
    return !hasClass('table[class], div[class]', FUND_WIDGET_CLASS);
  }
}
