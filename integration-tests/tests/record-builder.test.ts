/**
 * Fund Record Builder Tests
 *
 * Whole-record behavior: shape, determinism, field isolation, the live
 * handle and parse failures.
 */

import {
  Document,
  FundRecordBuilder,
  emptyFundRecord,
  currentScope,
  getMetrics,
  validateFundRecord,
} from '@fundlens/shared';
import type { FieldEntry, FundRecord, RecordScope } from '@fundlens/shared';
import { ClosedLiveHandle, StubLiveHandle, loadFixture } from './helpers';

const clock = () => new Date('2024-03-15T10:00:00Z');
const SOURCE_URL = 'https://example.com/mutual-funds/acme-bluechip-fund-direct-growth';

function builder(): FundRecordBuilder {
  return new FundRecordBuilder({ clock });
}

describe('Record shape', () => {
  it('should return every key with empty defaults for an empty page', async () => {
    const record = await builder().extract('<html></html>');

    expect(record).toEqual({ ...emptyFundRecord(), last_scraped: '2024-03-15' });
    expect(Object.keys(record ?? {})).toEqual([
      'fund_name',
      'nav',
      'fund_size',
      'aum',
      'faq',
      'summary',
      'minimum_investments',
      'returns',
      'category_info',
      'cost_and_tax',
      'top_5_holdings',
      'advanced_ratios',
      'source_url',
      'last_scraped',
    ]);
  });

  it('should freeze the record', async () => {
    const record = await builder().extract('<html></html>');

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record?.summary)).toBe(true);
    expect(Object.isFrozen(record?.faq)).toBe(true);
  });

  it('should stamp the source URL and capture date', async () => {
    const record = await builder().extract('<html><body></body></html>', { sourceUrl: SOURCE_URL });

    expect(record?.source_url).toBe(SOURCE_URL);
    expect(record?.last_scraped).toBe('2024-03-15');
  });
});

describe('Parse failures', () => {
  it('should yield no record for unparseable input', async () => {
    await expect(builder().extract('')).resolves.toBeNull();
    await expect(builder().extract('not markup at all')).resolves.toBeNull();

    expect(await getMetrics()).toContain('fundlens_records_built_total{status="parse_error"} 2');
  });
});

describe('NAV scenario', () => {
  const page = (nav: string) =>
    `<html><head><title>XYZ Fund - NAV, Mutual Fund Performance</title></head>` +
    `<body><div>Latest NAV as of 01 Jan 2024 ₹${nav}</div></body></html>`;

  it('should read the fund name and dated NAV', async () => {
    const record = await builder().extract(page('145.20'));

    expect(record?.fund_name).toBe('XYZ Fund');
    expect(record?.nav).toEqual({ value: '₹145.20', as_of: '01 Jan 2024' });
    expect(record?.cost_and_tax.expense_ratio_effective_from).toBe('01 Jan 2024');
  });

  it('should leave an out-of-bounds NAV empty', async () => {
    const record = await builder().extract(page('99999.00'));

    expect(record?.fund_name).toBe('XYZ Fund');
    expect(record?.nav).toEqual({ value: '', as_of: '' });
    expect(record?.cost_and_tax.expense_ratio_effective_from).toBe('');
  });
});

describe('Sample fund page', () => {
  const html = loadFixture('sample-fund.html');

  it('should extract every section', async () => {
    const record = await builder().extract(html, { sourceUrl: SOURCE_URL });

    const expected: FundRecord = {
      fund_name: 'Acme Bluechip Fund Direct Growth',
      nav: { value: '₹1234.56', as_of: '12 Mar 2024' },
      fund_size: '₹48,870.6Cr',
      aum: '₹45,000Cr',
      faq: [
        {
          question: 'How do I invest in this fund?',
          answer: 'You can invest online through any registered distributor.',
        },
        {
          question: 'What is the benchmark of this fund?',
          answer: 'The fund is benchmarked against a broad market index.',
        },
        {
          question: 'Can I sell my units on any day?',
          answer: 'Yes, units can be sold on any business day.',
        },
      ],
      summary: {
        fund_category: 'Equity Large Cap',
        fund_type: 'Large Cap',
        risk_level: 'Very High Risk',
        lock_in_period: 'Nil',
        rating: 4,
      },
      minimum_investments: {
        min_sip: '₹500',
        min_first_investment: '₹1,000',
        min_2nd_investment_onwards: '₹500',
      },
      returns: { '1y': '12.1%', '3y': '15.0%', '5y': '17.9%', since_inception: '14.2%' },
      category_info: {
        category: 'Equity Large Cap',
        category_average_annualised: { '1y': '10.5%', '3y': '13.2%', '5y': '15.1%' },
        rank_within_category: { '1y': 3, '3y': 5, '5y': 2 },
      },
      cost_and_tax: {
        expense_ratio: '0.65%',
        expense_ratio_effective_from: '12 Mar 2024',
        exit_load: 'Exit load of 1% if redeemed within 1 year',
        stamp_duty: '0.005%',
        tax_implication: 'Returns are taxed at 20% if you redeem within one year.',
      },
      top_5_holdings: [
        { name: 'Northwind Bank Ltd.', asset_pct: '9.85%' },
        { name: 'Contoso Infotech Ltd.', asset_pct: '8.40%' },
        { name: 'Fabrikam Energy Ltd.', asset_pct: '7.12%' },
        { name: 'Tailspin Motors Ltd.', asset_pct: '5.60%' },
        { name: 'Litware Pharma Ltd.', asset_pct: '4.95%' },
      ],
      advanced_ratios: {
        pe_ratio: '24.5',
        pb_ratio: '3.8',
        alpha: '1.25',
        beta: '0.92',
        sharpe_ratio: '1.1',
        sortino_ratio: '1.6',
        top_5_weight_pct: '38.4%',
        top_20_weight_pct: '71.2%',
      },
      source_url: SOURCE_URL,
      last_scraped: '2024-03-15',
    };

    expect(record).toEqual(expected);
    expect(validateFundRecord(record)).toEqual({ valid: true });
  });

  it('should be byte-identical across runs', async () => {
    const first = await builder().extract(html, { sourceUrl: SOURCE_URL });
    const second = await builder().extract(html, { sourceUrl: SOURCE_URL });

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('should reuse one parsed document', async () => {
    const doc = Document.parse(html);

    const first = await builder().buildRecord(doc);
    const second = await builder().buildRecord(doc);

    expect(second).toEqual(first);
  });
});

describe('Explicit and inferred signals', () => {
  const html =
    '<html><head><title>Demo ELSS Tax Saver Fund Direct Growth - NAV &amp; Returns</title></head><body>' +
    '<main class="fund-details">' +
    '<div>Latest NAV as of 12 Mar 2024 ₹45.10</div>' +
    '<table><thead><tr><th>Name</th><th>1Y</th><th>3Y</th><th>5Y</th><th>All</th></tr></thead><tbody>' +
    '<tr><td>Fund returns</td><td>-4.2%</td><td>8.0%</td><td>11.5%</td><td>9.3%</td></tr>' +
    '<tr><td>Rank within category</td><td>0</td><td>5</td><td>2</td><td>-</td></tr>' +
    '</tbody></table>' +
    '<div><span>Expense ratio</span><span>0.72%</span><span>effective from 01 Feb 2024</span></div>' +
    '</main></body></html>';

  it('should infer the ELSS lock-in when the page states none', async () => {
    const record = await builder().extract(html);

    expect(record?.fund_name).toBe('Demo ELSS Tax Saver Fund Direct Growth');
    expect(record?.summary.lock_in_period).toBe('3 years');
  });

  it('should prefer an explicit expense ratio date over the NAV date', async () => {
    const record = await builder().extract(html);

    expect(record?.nav).toEqual({ value: '₹45.10', as_of: '12 Mar 2024' });
    expect(record?.cost_and_tax.expense_ratio).toBe('0.72%');
    expect(record?.cost_and_tax.expense_ratio_effective_from).toBe('01 Feb 2024');
  });

  it('should keep negative returns and zero ranks from the returns table', async () => {
    const record = await builder().extract(html);

    expect(record?.returns).toEqual({ '1y': '-4.2%', '3y': '8.0%', '5y': '11.5%', since_inception: '9.3%' });
    expect(record?.category_info.rank_within_category).toEqual({ '1y': 0, '3y': 5, '5y': 2 });
    expect(record && validateFundRecord(record)).toEqual({ valid: true });
  });
});

describe('Holding rows', () => {
  it('should read rows whose name and weight sit in classed children', async () => {
    const html =
      '<html><body><section class="holdings"><div class="holdings-list">' +
      '<div class="holding-row"><span class="holding-name">Northwind Bank</span>' +
      '<span class="holding-weight">9.85%</span></div>' +
      '<div class="holding-row"><span class="holding-name">Contoso Infotech</span>' +
      '<span class="holding-weight">8.40%</span></div>' +
      '</div></section></body></html>';

    const record = await builder().extract(html);

    expect(record?.top_5_holdings).toEqual([
      { name: 'Northwind Bank', asset_pct: '9.85%' },
      { name: 'Contoso Infotech', asset_pct: '8.40%' },
    ]);
  });

  it('should read flat rows', async () => {
    const html =
      '<html><body><ul><li class="holding-item">Fabrikam Energy 7.12 %</li>' +
      '<li class="holding-item">Cash 2.00%</li></ul></body></html>';

    const record = await builder().extract(html);

    expect(record?.top_5_holdings).toEqual([{ name: 'Fabrikam Energy', asset_pct: '7.12%' }]);
  });
});

describe('Field isolation', () => {
  it('should run fields inside the record scope', async () => {
    const seen: Array<RecordScope | undefined> = [];
    const recorder: FieldEntry = {
      key: 'fund_name',
      strategyIds: ['scope-recorder'],
      async resolve() {
        seen.push(currentScope());
        return false;
      },
    };

    await new FundRecordBuilder({ clock, fields: [recorder] }).extract('<p>x</p>', {
      sourceUrl: SOURCE_URL,
    });

    expect(seen).toHaveLength(1);
    expect(seen[0]?.sourceUrl).toBe(SOURCE_URL);
    expect(seen[0]?.correlationId).toHaveLength(26);
  });
});

describe('Live handle', () => {
  const staticHtml =
    '<html><head><title>Demo Fund</title></head><body><div class="fund-details"><h1>Demo Fund</h1></div></body></html>';
  const renderedHtml =
    '<html><body><div class="fund-details"><h1>Demo Fund</h1></div>' +
    '<section><h2>FAQs</h2><div><h3>What is the minimum SIP amount?</h3>' +
    '<p>The minimum SIP amount is ₹100.</p></div></section></body></html>';

  it('should read lazy sections from the rendered page', async () => {
    const handle = new StubLiveHandle({
      height: '2000',
      html: renderedHtml,
      innerText: 'Risk Level: Moderately High Risk',
      elements: [
        { tagName: 'div', text: 'Fund Size ₹1,200.5 Cr', offsetTop: 100 },
        { tagName: 'section', text: 'Fund Objective Fund Size ₹9 Cr', offsetTop: 300 },
        { tagName: 'div', text: 'Fund Size ₹7 Cr', offsetTop: 1500 },
      ],
    });

    const record = await builder().extract(staticHtml, { liveHandle: handle });

    expect(record?.fund_name).toBe('Demo Fund');
    expect(record?.fund_size).toBe('₹1,200.5Cr');
    expect(record?.summary.risk_level).toBe('Moderately High Risk');
    expect(record?.faq).toEqual([
      { question: 'What is the minimum SIP amount?', answer: 'The minimum SIP amount is ₹100.' },
    ]);
    expect(handle.scrolls).toEqual([400, 800, 1200, 1600, 2000, 0, 2000, 2000, 2000]);
  });

  it('should fall back to the static page when the handle fails', async () => {
    const record = await builder().extract(staticHtml, { liveHandle: new ClosedLiveHandle() });

    expect(record?.fund_name).toBe('Demo Fund');
    expect(record?.fund_size).toBe('');
    expect(record?.faq).toEqual([]);
  });
});
