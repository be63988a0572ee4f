/**
 * Text Projection Helpers
 *
 * Flattens DOM subtrees into whitespace-normalized text. Text nodes are
 * joined with a single space so adjacent cells and spans never fuse.
 */

import type { AnyNode, Element, Text } from 'domhandler';
import { hasChildren, isTag, isText } from 'domhandler';

/** Elements whose text never belongs to the visible projection */
const NON_TEXT_TAGS = new Set(['script', 'style', 'noscript', 'template']);

/**
 * Collapse runs of whitespace to one space and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Collect visible text nodes under `node` in document order.
 */
export function collectTextNodes(node: AnyNode, out: Text[] = []): Text[] {
  if (isText(node)) {
    out.push(node);
    return out;
  }
  if (isTag(node) && NON_TEXT_TAGS.has(node.name)) {
    return out;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectTextNodes(child, out);
    }
  }
  return out;
}

const textMemo = new WeakMap<AnyNode, string>();

/**
 * Whitespace-normalized text of a subtree. Memoized per node; documents are
 * never mutated after parsing.
 */
export function textOf(node: AnyNode): string {
  const cached = textMemo.get(node);
  if (cached !== undefined) return cached;

  const text = collapseWhitespace(
    collectTextNodes(node)
      .map((t) => t.data)
      .join(' ')
  );
  textMemo.set(node, text);
  return text;
}

/**
 * Next sibling that is an element, skipping text and comments.
 */
export function nextElementSibling(el: Element): Element | null {
  let sibling = el.nextSibling;
  while (sibling) {
    if (isTag(sibling)) return sibling;
    sibling = sibling.nextSibling;
  }
  return null;
}

/**
 * Parent element, or null at the document root.
 */
export function parentElement(node: AnyNode): Element | null {
  const parent = node.parent;
  return parent && isTag(parent) ? parent : null;
}

/**
 * class and id attributes, lower-cased and compacted (no spaces, dashes or
 * underscores) for fuzzy hint matching.
 */
export function compactAttributes(el: Element): string {
  return compact(`${el.attribs.class ?? ''} ${el.attribs.id ?? ''}`);
}

export function compact(value: string): string {
  return value.toLowerCase().replace(/[\s_-]+/g, '');
}
