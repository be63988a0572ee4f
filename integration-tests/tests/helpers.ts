/**
 * Test Helpers
 *
 * In-process stand-in for a browser page and fixture loading.
 */

import fs from 'fs';
import path from 'path';
import { LIVE_SCRIPTS } from '@fundlens/shared';
import type { Document, LiveElement, LiveHandle } from '@fundlens/shared';
import { isTag } from 'domhandler';
import type { Element } from 'domhandler';

export interface StubPage {
  /** What document.body.scrollHeight evaluates to */
  height: string;
  /** Rendered outerHTML after scrolling */
  html: string;
  innerText?: string;
  elements?: LiveElement[];
}

/**
 * Live handle that answers from a fixed page and records every call.
 */
export class StubLiveHandle implements LiveHandle {
  readonly scrolls: number[] = [];
  readonly waits: number[] = [];
  readonly scripts: string[] = [];
  readonly selectors: string[] = [];

  constructor(private readonly page: StubPage) {}

  async scrollTo(y: number): Promise<void> {
    this.scrolls.push(y);
  }

  async waitForTimeout(ms: number): Promise<void> {
    this.waits.push(ms);
  }

  async evaluate(script: string): Promise<string> {
    this.scripts.push(script);
    switch (script) {
      case LIVE_SCRIPTS.scrollHeight:
        return this.page.height;
      case LIVE_SCRIPTS.outerHtml:
        return this.page.html;
      case LIVE_SCRIPTS.innerText:
        return this.page.innerText ?? '';
      default:
        throw new Error(`Unexpected script: ${script}`);
    }
  }

  async querySelectorAll(selector: string): Promise<LiveElement[]> {
    this.selectors.push(selector);
    return this.page.elements ?? [];
  }
}

/**
 * Live handle whose page has gone away
 */
export class ClosedLiveHandle implements LiveHandle {
  async scrollTo(): Promise<void> {}

  async waitForTimeout(): Promise<void> {}

  async evaluate(): Promise<string> {
    throw new Error('Target page has been closed');
  }

  async querySelectorAll(): Promise<LiveElement[]> {
    throw new Error('Target page has been closed');
  }
}

export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, '../fixtures', name), 'utf-8');
}

/**
 * First element matching `selector`; fails the test when there is none
 */
export function select(doc: Document, selector: string): Element {
  const el = doc.tree()(selector).toArray().find(isTag);
  if (!el) throw new Error(`No element matches ${selector}`);
  return el;
}
