/**
 * Key/Value Pair Harvesting
 *
 * Collects label/value pairs from the three shapes these pages use:
 * <dt>/<dd>, a label-like div followed by a value element, and
 * span.label + span.value. Keys are lower-cased; the first occurrence wins.
 */

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { textOf } from './text';

const LABEL_DIV_CLASS = /label|key|field/i;
const LABEL_SPAN_CLASS = /label|key/i;
const VALUE_SPAN_CLASS = /value|data/i;

function classMatches(el: Element, pattern: RegExp): boolean {
  return pattern.test(el.attribs.class ?? '');
}

export function extractKeyValuePairs($: CheerioAPI): Map<string, string> {
  const pairs = new Map<string, string>();

  const add = (keyEl: Element, valueEl: Element | undefined): void => {
    if (!valueEl) return;
    const key = textOf(keyEl).toLowerCase();
    if (!key || pairs.has(key)) return;
    pairs.set(key, textOf(valueEl));
  };

  // <dt>Key</dt><dd>Value</dd>
  for (const dt of $('dt').toArray()) {
    add(dt, $(dt).nextAll('dd').get(0));
  }

  // <div class="label">Key</div><div>Value</div>
  for (const div of $('div[class]').toArray()) {
    if (!classMatches(div, LABEL_DIV_CLASS)) continue;
    add(div, $(div).nextAll('div, span, p').get(0));
  }

  // <span class="label">Key</span><span class="value">Value</span>
  for (const span of $('span[class]').toArray()) {
    if (!classMatches(span, LABEL_SPAN_CLASS)) continue;
    const value = $(span)
      .nextAll('span')
      .toArray()
      .find((sibling) => classMatches(sibling, VALUE_SPAN_CLASS));
    add(span, value);
  }

  return pairs;
}
