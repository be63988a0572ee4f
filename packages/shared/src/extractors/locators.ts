/**
 * Section Locators
 *
 * Find a named section ("Fund Objective", "FAQ", "Advanced ratios") and
 * return its nearest container. Hints are matched case-insensitively against
 * headings, then class/id attributes, then short elements' text.
 */

import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import type { Document } from '../document';
import { compact, compactAttributes, parentElement, textOf } from '../document';

export const CONTAINER_SELECTOR = 'div, section, article';

const HEADING_SELECTOR = 'h2, h3, h4, h5, h6';

export interface LocateOptions {
  /** Extra hints tried only against class/id attributes */
  attributeHints?: readonly string[];
  /** Text length below which an element counts as a label, not a page container */
  textCap?: number;
}

/**
 * Nearest div/section/article at or above `el`.
 */
export function closestContainer(doc: Document, el: Element): Element | null {
  return doc.tree()(el).closest(CONTAINER_SELECTOR).toArray().find(isTag) ?? null;
}

function containsHint(text: string, hints: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return hints.some((hint) => lower.includes(hint.toLowerCase()));
}

function firstContainer(
  doc: Document,
  candidates: readonly Element[],
  matches: (el: Element) => boolean
): Element | null {
  for (const el of candidates) {
    if (!matches(el)) continue;
    const container = closestContainer(doc, el);
    if (container) return container;
  }
  return null;
}

/**
 * Locate a section by name hints. Returns null when nothing matches.
 */
export function locateSection(
  doc: Document,
  hints: readonly string[],
  options: LocateOptions = {}
): Element | null {
  const textCap = options.textCap ?? 200;
  const $ = doc.tree();

  const byHeading = firstContainer(doc, $(HEADING_SELECTOR).toArray(), (el) =>
    containsHint(textOf(el), hints)
  );
  if (byHeading) return byHeading;

  const attributeHints = [...hints, ...(options.attributeHints ?? [])].map(compact);
  const byAttribute = firstContainer(doc, doc.elements(), (el) => {
    const attrs = compactAttributes(el);
    return attrs !== '' && attributeHints.some((hint) => attrs.includes(hint));
  });
  if (byAttribute) return byAttribute;

  return firstContainer(doc, doc.elements(), (el) => {
    const text = textOf(el);
    return text.length < textCap && containsHint(text, hints);
  });
}

/**
 * Walk up from `el` until its text reaches `minLength` characters or the
 * root is reached.
 */
export function widenUntilLength(el: Element, minLength: number): Element {
  let current = el;
  while (textOf(current).length < minLength) {
    const parent = parentElement(current);
    if (!parent) break;
    current = parent;
  }
  return current;
}

/**
 * Walk up at most `maxSteps` ancestors until the text matches `pattern`.
 * Returns `el` itself when no ancestor does.
 */
export function widenUntilMatch(el: Element, pattern: RegExp, maxSteps: number): Element {
  let current: Element | null = el;
  for (let step = 0; step <= maxSteps && current; step++) {
    if (pattern.test(textOf(current))) return current;
    current = parentElement(current);
  }
  return el;
}
