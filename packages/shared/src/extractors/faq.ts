/**
 * FAQ Extractor
 *
 * Locates the FAQ section (heading, then accordion markup, then a question
 * near the bottom of the page), then reads question/answer pairs from it in
 * document order.
 */

import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import type { Document } from '../document';
import { nextElementSibling, parentElement, textOf } from '../document';
import type { FaqEntry } from '../types';
import { closestContainer, locateSection } from './locators';
import { sourceDocument } from './strategies';
import type { DocumentSource } from './strategies';
import type { ExtractionContext, Strategy, StrategyResult } from './types';

export const FAQ_HINTS = ['frequently asked', 'faq'] as const;

const ACCORDION_SELECTOR =
  '[class*="accordion"], [class*="Accordion"], [class*="collapse"], [class*="Collapse"], details, summary';

/** Question shapes, tried one at a time until one yields questions */
const QUESTION_SELECTORS = [
  'h3',
  'h4',
  'h5',
  'h6',
  'button[aria-expanded]',
  'summary',
  '[class*="question"]',
  '[class*="Question"]',
  '[class*="faq"]',
  '[class*="FAQ"]',
  '[role="button"]',
] as const;

const POSITIONAL_SELECTOR = 'h2, h3, h4, h5, h6, p, div, span, button, summary, li';

const QUESTION_WORDS = new Set([
  'what',
  'how',
  'why',
  'when',
  'where',
  'who',
  'which',
  'can',
  'is',
  'are',
  'does',
  'do',
]);

const MAX_ANSWER_LENGTH = 500;

// ============================================================================
// Section Location
// ============================================================================

/**
 * Text that reads like a question: contains "?", 16-199 characters, and
 * opens with an interrogative word.
 */
export function looksLikeQuestion(text: string): boolean {
  if (!text.includes('?') || text.length <= 15 || text.length >= 200) return false;
  const firstWord = text.toLowerCase().split(/[\s?]/)[0];
  return QUESTION_WORDS.has(firstWord);
}

function containerAround(doc: Document, el: Element): Element | null {
  return closestContainer(doc, parentElement(el) ?? el);
}

function accordionSection(doc: Document): Element | null {
  const accordion = doc.tree()(ACCORDION_SELECTOR).get(0);
  return accordion ? containerAround(doc, accordion) : null;
}

/**
 * First question-like element in the last part of the document, by
 * document order.
 */
function positionalSection(doc: Document, start: number): Element | null {
  const elements = doc.elements();
  for (const el of elements.slice(Math.floor(elements.length * start))) {
    if (looksLikeQuestion(textOf(el))) return containerAround(doc, el);
  }
  return null;
}

/**
 * Same rule against rendered offsets: the first question-like element at or
 * below `start` of the scroll height, mapped back into the rendered document.
 */
async function livePositionalSection(
  ctx: ExtractionContext,
  doc: Document,
  start: number
): Promise<Element | null> {
  if (!ctx.live) return null;
  const candidates = await ctx.live.elementsWithin(POSITIONAL_SELECTOR, start, Infinity);
  const anchor = candidates.find((el) => looksLikeQuestion(el.text));
  if (!anchor) return null;

  const match = doc
    .elements()
    .find((el) => el.name === anchor.tagName && textOf(el) === anchor.text);
  return match ? containerAround(doc, match) : null;
}

// ============================================================================
// Question/Answer Pairs
// ============================================================================

function isQuestion(text: string): boolean {
  return text.includes('?') && text.length > 10 && text.length < 250;
}

/**
 * Answer for a question element: next sibling, else the parent's next
 * sibling, else whatever follows the question inside the parent, up to the
 * next "?" and at most three sentences.
 */
export function answerFor(question: Element, questionText: string): string {
  let answer = '';

  const sibling = nextElementSibling(question);
  if (sibling) answer = textOf(sibling);

  const parent = parentElement(question);
  if (!answer && parent) {
    const parentSibling = nextElementSibling(parent);
    if (parentSibling) answer = textOf(parentSibling);
  }

  if (!answer && parent) {
    const parentText = textOf(parent);
    const index = parentText.indexOf(questionText);
    if (index >= 0) {
      answer = parentText.slice(index + questionText.length).trim();
      const nextQuestion = answer.indexOf('?');
      if (nextQuestion > 0) answer = answer.slice(0, nextQuestion).trim();
      answer = answer
        .split(/[.!?]/)
        .map((sentence) => sentence.trim())
        .filter((sentence) => sentence !== '')
        .slice(0, 3)
        .join('. ');
    }
  }

  return answer.slice(0, MAX_ANSWER_LENGTH).trim();
}

/**
 * Question/answer pairs inside `section` from the first question shape that
 * yields any, in document order, deduplicated by question text and capped at
 * `limit`.
 */
export function extractFaqs(doc: Document, section: Element, limit: number): FaqEntry[] {
  const $ = doc.tree();

  for (const selector of QUESTION_SELECTORS) {
    const faqs: FaqEntry[] = [];
    const seen = new Set<string>();

    for (const el of $(section).find(selector).toArray().filter(isTag)) {
      if (faqs.length >= limit) break;
      // Wrappers defer to the question element inside them
      if ($(el).find(selector).length > 0) continue;

      const question = textOf(el);
      if (!isQuestion(question) || seen.has(question)) continue;
      seen.add(question);
      faqs.push({ question, answer: answerFor(el, question) });
    }
    if (faqs.length > 0) return faqs;
  }
  return [];
}

// ============================================================================
// Strategy
// ============================================================================

export class FaqSectionStrategy implements Strategy<FaqEntry[]> {
  readonly id: string;

  constructor(private readonly source: DocumentSource) {
    this.id = source === 'rendered' ? 'live-faq-section' : 'faq-section';
  }

  async attempt(ctx: ExtractionContext): Promise<StrategyResult<FaqEntry[]> | null> {
    const doc = await sourceDocument(ctx, this.source);
    if (!doc) return null;
    const { faqLimit, faqPositionalStart, sectionTextCap } = ctx.config;

    const section =
      locateSection(doc, FAQ_HINTS, { textCap: sectionTextCap }) ??
      accordionSection(doc) ??
      (this.source === 'rendered'
        ? await livePositionalSection(ctx, doc, faqPositionalStart)
        : positionalSection(doc, faqPositionalStart));
    if (!section) return null;

    const faqs = extractFaqs(doc, section, faqLimit);
    return faqs.length > 0 ? { raw: faqs } : null;
  }
}
