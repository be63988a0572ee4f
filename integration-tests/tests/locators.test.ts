/**
 * Section Locator Tests
 */

import { Document, locateSection, widenUntilLength, widenUntilMatch } from '@fundlens/shared';
import { select } from './helpers';

const doc = Document.parse(`
  <body>
    <div class="wrapper">
      <section class="intro"><h2>Fund Objective</h2><p>Short.</p></section>
      <div id="advanced-ratios-panel"><span>P/E 20</span></div>
      <article><span>Riskometer</span><p>Very High</p></article>
    </div>
  </body>
`);

describe('locateSection', () => {
  it('should prefer a matching heading', () => {
    expect(locateSection(doc, ['fund objective'])).toBe(select(doc, 'section.intro'));
  });

  it('should match compacted class and id attributes', () => {
    const section = locateSection(doc, ['advanced ratio'], { attributeHints: ['ratios'] });

    expect(section).toBe(select(doc, '#advanced-ratios-panel'));
  });

  it('should fall back to the first short element mentioning a hint', () => {
    expect(locateSection(doc, ['riskometer'])).toBe(select(doc, 'div.wrapper'));
    expect(locateSection(doc, ['riskometer'], { textCap: 20 })).toBe(select(doc, 'article'));
  });

  it('should return null when nothing matches', () => {
    expect(locateSection(doc, ['holdings'])).toBeNull();
  });
});

describe('Widening', () => {
  it('should walk up until the text is long enough', () => {
    const span = select(doc, '#advanced-ratios-panel span');

    expect(widenUntilLength(span, 4)).toBe(span);
    expect(widenUntilLength(span, 10)).toBe(select(doc, 'div.wrapper'));
  });

  it('should stop at the first ancestor whose text matches', () => {
    const heading = select(doc, 'h2');

    expect(widenUntilMatch(heading, /Very High/, 1)).toBe(heading);
    expect(widenUntilMatch(heading, /Very High/, 2)).toBe(select(doc, 'div.wrapper'));
  });
});
