/**
 * Record Output Tests
 */

import { emptyFundRecord, fundSlugFromUrl, serializeFundRecord } from '@fundlens/shared';

describe('fundSlugFromUrl', () => {
  it('should take the last path segment', () => {
    expect(fundSlugFromUrl('https://example.com/mutual-funds/xyz-fund-direct-growth')).toBe(
      'xyz-fund-direct-growth'
    );
  });

  it('should ignore trailing slashes, queries and fragments', () => {
    expect(fundSlugFromUrl('https://example.com/funds/xyz-fund/')).toBe('xyz-fund');
    expect(fundSlugFromUrl('https://example.com/funds/xyz-fund?tab=returns#faq')).toBe('xyz-fund');
  });

  it('should accept relative paths', () => {
    expect(fundSlugFromUrl('funds/abc-fund')).toBe('abc-fund');
  });

  it('should fall back to unknown', () => {
    expect(fundSlugFromUrl('https://example.com')).toBe('unknown');
    expect(fundSlugFromUrl('')).toBe('unknown');
  });
});

describe('serializeFundRecord', () => {
  it('should write a single-element JSON array keyed by slug', () => {
    const record = {
      ...emptyFundRecord(),
      fund_name: 'XYZ Fund',
      source_url: 'https://example.com/mutual-funds/xyz-fund',
      last_scraped: '2024-03-15',
    };

    const { slug, json } = serializeFundRecord(record);

    expect(slug).toBe('xyz-fund');
    expect(JSON.parse(json)).toEqual([record]);
    expect(json.startsWith('[\n  {\n    "fund_name": "XYZ Fund",')).toBe(true);
  });
});
