/**
 * Live Page Tests
 *
 * Scroll sequence, memoization and failure handling against a stub handle.
 */

import { LIVE_SCRIPTS, LivePage, liveCallsCounter } from '@fundlens/shared';
import type { LiveSettings } from '@fundlens/shared';
import { ClosedLiveHandle, StubLiveHandle } from './helpers';

const settings: LiveSettings = {
  scrollSteps: 2,
  stepWaitMs: 10,
  initialWaitMs: 20,
  bottomScrolls: 1,
  bottomWaitMs: 30,
  settleWaitMs: 40,
};

const renderedHtml =
  '<html><body><section><h2>FAQs</h2><h3>What is the minimum SIP amount?</h3></section></body></html>';

describe('LivePage', () => {
  it('should scroll through the page before reading the rendered DOM', async () => {
    const handle = new StubLiveHandle({ height: '1000', html: renderedHtml });
    const page = new LivePage(handle, settings);

    const doc = await page.rendered();

    expect(doc?.text()).toBe('FAQs What is the minimum SIP amount?');
    expect(handle.scrolls).toEqual([500, 1000, 0, 1000]);
    expect(handle.waits).toEqual([10, 10, 20, 30, 40]);
    expect(handle.scripts).toEqual([
      LIVE_SCRIPTS.scrollHeight,
      LIVE_SCRIPTS.scrollHeight,
      LIVE_SCRIPTS.outerHtml,
    ]);
  });

  it('should render only once', async () => {
    const handle = new StubLiveHandle({ height: '1000', html: renderedHtml });
    const page = new LivePage(handle, settings);

    const first = await page.rendered();
    const second = await page.rendered();

    expect(second).toBe(first);
    expect(handle.scripts.filter((s) => s === LIVE_SCRIPTS.outerHtml)).toHaveLength(1);
  });

  it('should filter elements to a vertical band of the page', async () => {
    const handle = new StubLiveHandle({
      height: '2000',
      html: renderedHtml,
      elements: [
        { tagName: 'div', text: 'top', offsetTop: 0 },
        { tagName: 'div', text: 'upper', offsetTop: 599 },
        { tagName: 'div', text: 'middle', offsetTop: 600 },
        { tagName: 'div', text: 'bottom', offsetTop: 1900 },
      ],
    });
    const page = new LivePage(handle, settings);

    const top = await page.elementsWithin('*', 0, 0.3);
    const rest = await page.elementsWithin('*', 0.3, Infinity);

    expect(top.map((el) => el.text)).toEqual(['top', 'upper']);
    expect(rest.map((el) => el.text)).toEqual(['middle', 'bottom']);
  });

  it('should treat an unusable scroll height as an empty page', async () => {
    const handle = new StubLiveHandle({ height: 'undefined', html: renderedHtml });
    const page = new LivePage(handle, settings);

    expect(await page.scrollHeight()).toBe(0);
    expect(await page.elementsWithin('*', 0, 1)).toEqual([]);
    expect(handle.selectors).toEqual([]);
  });

  it('should resolve the rendered document to null when the handle fails', async () => {
    const page = new LivePage(new ClosedLiveHandle(), settings);

    expect(await page.rendered()).toBeNull();

    const metric = await liveCallsCounter.get();
    const failures = metric.values.find(
      (v) => v.labels.operation === 'evaluate' && v.labels.status === 'error'
    );
    expect(failures?.value).toBe(1);
  });
});
