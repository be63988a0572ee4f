/**
 * Configuration & Contract Tests
 */

import {
  FundRecordBuilder,
  emptyFundRecord,
  getMetrics,
  getMetricsContentType,
  loadConfig,
  schemas,
  validateFundRecord,
} from '@fundlens/shared';

describe('loadConfig', () => {
  it('should use defaults when nothing is set', () => {
    const config = loadConfig({});

    expect(config.navBounds).toEqual({ min: 1, max: 10000 });
    expect(config.croreBounds).toEqual({ min: 0.1, max: 1000000 });
    expect(config.faqLimit).toBe(10);
    expect(config.holdingsLimit).toBe(5);
    expect(config.live.scrollSteps).toBe(5);
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({ NAV_MAX: '5000', FAQ_LIMIT: '3', LIVE_SCROLL_STEPS: '2' });

    expect(config.navBounds).toEqual({ min: 1, max: 5000 });
    expect(config.faqLimit).toBe(3);
    expect(config.live.scrollSteps).toBe(2);
  });

  it('should ignore unusable values', () => {
    const config = loadConfig({ SECTION_TEXT_CAP: 'wide', HOLDINGS_LIMIT: '-2', FAQ_LIMIT: '2.5' });

    expect(config.sectionTextCap).toBe(200);
    expect(config.holdingsLimit).toBe(5);
    expect(config.faqLimit).toBe(10);
  });

  it('should apply configured bounds during extraction', async () => {
    const html =
      '<html><head><title>XYZ Fund</title></head>' +
      '<body><div>Latest NAV as of 01 Jan 2024 ₹145.20</div></body></html>';

    const strict = new FundRecordBuilder({ config: loadConfig({ NAV_MAX: '100' }) });
    const record = await strict.extract(html);

    expect(record?.nav).toEqual({ value: '', as_of: '' });
  });
});

describe('FundRecord contract', () => {
  const valid = { ...emptyFundRecord(), last_scraped: '2024-03-15' };

  it('should accept an empty record', () => {
    expect(validateFundRecord(valid)).toEqual({ valid: true });
  });

  it('should require a capture date', () => {
    const result = validateFundRecord(emptyFundRecord());

    expect(result.valid).toBe(false);
    expect(result.errors).toContain('/last_scraped: must match format "date"');
  });

  it('should reject unknown keys and out-of-range ratings', () => {
    expect(validateFundRecord({ ...valid, extra: 1 }).valid).toBe(false);
    expect(
      validateFundRecord({ ...valid, summary: { ...valid.summary, rating: 7 } }).valid
    ).toBe(false);
  });

  it('should reject malformed amounts', () => {
    expect(validateFundRecord({ ...valid, aum: '45,000 Cr' }).valid).toBe(false);
    expect(validateFundRecord({ ...valid, aum: '₹45,000Cr' }).valid).toBe(true);
  });

  it('should expose the schema', () => {
    expect(schemas.fundRecord).toMatchObject({ title: 'FundRecord' });
  });
});

describe('Metrics exposition', () => {
  it('should serve Prometheus text with its content type', async () => {
    await new FundRecordBuilder().extract('<html><body><h1>Demo Fund</h1></body></html>');

    expect(getMetricsContentType()).toMatch(/^text\/plain; version=0\.0\.4/);
    expect(await getMetrics()).toContain('# TYPE fundlens_records_built_total counter');
  });
});
