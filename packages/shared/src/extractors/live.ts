/**
 * Live Page Handle
 *
 * Some sections are only populated after scroll-triggered lazy loading, so
 * strategies may consult a rendered page. The engine depends on the
 * LiveHandle interface only; a browser-automation adapter satisfies it in
 * production and an in-process stub in tests.
 */

import type { LiveSettings } from '../config';
import { Document } from '../document';
import { logger } from '../logger';
import { liveCallsCounter } from '../metrics';

export interface LiveElement {
  /** Lower-case tag name */
  tagName: string;
  /** Whitespace-normalized text content */
  text: string;
  /** Offset from the top of the document, in pixels */
  offsetTop: number;
}

export interface LiveHandle {
  scrollTo(y: number): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;
  /** Evaluate a script expression and return its result as text */
  evaluate(script: string): Promise<string>;
  querySelectorAll(selector: string): Promise<LiveElement[]>;
}

/** Script expressions the engine evaluates through a handle */
export const LIVE_SCRIPTS = {
  scrollHeight: 'document.body.scrollHeight',
  outerHtml: 'document.documentElement.outerHTML',
  innerText: 'document.body.innerText',
} as const;

/**
 * Wraps a LiveHandle and memoizes what several strategies share: the scroll
 * height, the inner text, and the fully scrolled, re-parsed document.
 */
export class LivePage {
  private scrollHeightPromise?: Promise<number>;
  private innerTextPromise?: Promise<string>;
  private renderedPromise?: Promise<Document | null>;

  constructor(
    private readonly handle: LiveHandle,
    private readonly settings: LiveSettings
  ) {}

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn();
      liveCallsCounter.inc({ operation, status: 'ok' });
      return result;
    } catch (error) {
      liveCallsCounter.inc({ operation, status: 'error' });
      throw error;
    }
  }

  scrollHeight(): Promise<number> {
    if (!this.scrollHeightPromise) {
      this.scrollHeightPromise = this.call('evaluate', () =>
        this.handle.evaluate(LIVE_SCRIPTS.scrollHeight)
      ).then((raw) => {
        const height = Number(raw);
        return Number.isFinite(height) && height > 0 ? height : 0;
      });
    }
    return this.scrollHeightPromise;
  }

  innerText(): Promise<string> {
    if (!this.innerTextPromise) {
      this.innerTextPromise = this.call('evaluate', () =>
        this.handle.evaluate(LIVE_SCRIPTS.innerText)
      );
    }
    return this.innerTextPromise;
  }

  query(selector: string): Promise<LiveElement[]> {
    return this.call('querySelectorAll', () => this.handle.querySelectorAll(selector));
  }

  /**
   * Elements matching `selector` whose top offset lies within
   * [from, to) of the scroll height, as fractions.
   */
  async elementsWithin(selector: string, from: number, to: number): Promise<LiveElement[]> {
    const height = await this.scrollHeight();
    if (height <= 0) return [];
    const elements = await this.query(selector);
    return elements.filter(
      (el) => el.offsetTop >= height * from && el.offsetTop < height * to
    );
  }

  /**
   * Scroll through the page to trigger lazy sections, then parse the
   * rendered DOM. Resolves to null when the handle fails.
   */
  rendered(): Promise<Document | null> {
    if (!this.renderedPromise) {
      this.renderedPromise = this.render().catch((error: unknown) => {
        logger.warn('Live page render failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      });
    }
    return this.renderedPromise;
  }

  private scroll(y: number): Promise<void> {
    return this.call('scrollTo', () => this.handle.scrollTo(y));
  }

  private wait(ms: number): Promise<void> {
    return this.call('waitForTimeout', () => this.handle.waitForTimeout(ms));
  }

  private async render(): Promise<Document> {
    const { scrollSteps, stepWaitMs, initialWaitMs, bottomScrolls, bottomWaitMs, settleWaitMs } =
      this.settings;
    const height = await this.scrollHeight();

    for (let step = 1; step <= scrollSteps; step++) {
      await this.scroll((height * step) / scrollSteps);
      await this.wait(stepWaitMs);
    }

    await this.scroll(0);
    await this.wait(initialWaitMs);

    for (let i = 0; i < bottomScrolls; i++) {
      // Height grows as lazy sections load
      const bottom = Number(
        await this.call('evaluate', () => this.handle.evaluate(LIVE_SCRIPTS.scrollHeight))
      );
      await this.scroll(Number.isFinite(bottom) && bottom > 0 ? bottom : height);
      await this.wait(bottomWaitMs);
    }

    await this.wait(settleWaitMs);

    const html = await this.call('evaluate', () => this.handle.evaluate(LIVE_SCRIPTS.outerHtml));
    return Document.parse(html);
  }
}
