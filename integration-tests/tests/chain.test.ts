/**
 * Strategy Chain Tests
 *
 * Declared order, validation fallthrough and failure isolation.
 */

import {
  Document,
  FundRecordBuilder,
  checkText,
  createExtractionContext,
  defineField,
  extractCandidate,
  getMetrics,
  strategyAttemptsCounter,
} from '@fundlens/shared';
import type { FieldSpec, StrategyResult } from '@fundlens/shared';

function fixed(id: string, raw: string | null, details?: Record<string, string>) {
  return {
    id,
    attempt: jest.fn(async (): Promise<StrategyResult<string> | null> =>
      raw === null ? null : { raw, details }
    ),
  };
}

function exploding(id: string) {
  return {
    id,
    attempt: jest.fn(async (): Promise<StrategyResult<string> | null> => {
      throw new Error('selector blew up');
    }),
  };
}

function nameSpec(strategies: FieldSpec<'fund_name', string>['strategies']): FieldSpec<'fund_name', string> {
  return {
    key: 'fund_name',
    strategies,
    validate: (c) => checkText(c.raw, 2),
    normalize: (c) => c.raw.toUpperCase(),
  };
}

const doc = Document.parse('<html><body><p>placeholder</p></body></html>');

describe('extractCandidate', () => {
  it('should keep the first valid candidate and never run later strategies', async () => {
    const first = fixed('first', 'alpha');
    const second = fixed('second', 'beta');

    const resolution = await extractCandidate(createExtractionContext(doc), nameSpec([first, second]));

    expect(resolution?.value).toBe('ALPHA');
    expect(resolution?.candidate.strategyId).toBe('first');
    expect(resolution?.candidate.priority).toBe(0);
    expect(second.attempt).not.toHaveBeenCalled();
  });

  it('should fall through rejected and empty candidates', async () => {
    const empty = fixed('empty', null);
    const tooShort = fixed('too-short', 'x');
    const good = fixed('good', 'beta');

    const resolution = await extractCandidate(
      createExtractionContext(doc),
      nameSpec([empty, tooShort, good])
    );

    expect(resolution?.value).toBe('BETA');
    expect(resolution?.candidate.priority).toBe(2);
  });

  it('should treat a throwing strategy as no candidate', async () => {
    const broken = exploding('exploding');
    const good = fixed('fallback', 'gamma');

    const resolution = await extractCandidate(createExtractionContext(doc), nameSpec([broken, good]));

    expect(resolution?.value).toBe('GAMMA');
    expect(broken.attempt).toHaveBeenCalledTimes(1);

    const metric = await strategyAttemptsCounter.get();
    const errors = metric.values.find(
      (v) => v.labels.strategy === 'exploding' && v.labels.outcome === 'error'
    );
    expect(errors?.value).toBe(1);
  });

  it('should treat a throwing normalizer as no candidate', async () => {
    const spec: FieldSpec<'fund_name', string> = {
      ...nameSpec([fixed('bad-shape', 'delta'), fixed('good-shape', 'epsilon')]),
      normalize: (c) => {
        if (c.strategyId === 'bad-shape') throw new Error('cannot normalize');
        return c.raw;
      },
    };

    const resolution = await extractCandidate(createExtractionContext(doc), spec);

    expect(resolution?.value).toBe('epsilon');
  });

  it('should resolve to null when every strategy fails', async () => {
    const resolution = await extractCandidate(
      createExtractionContext(doc),
      nameSpec([fixed('none', null), exploding('broken'), fixed('short', 'y')])
    );

    expect(resolution).toBeNull();
    expect(await getMetrics()).toContain('fundlens_fields_exhausted_total{field="fund_name"}');
  });

  it('should pass strategy details to the candidate', async () => {
    const resolution = await extractCandidate(
      createExtractionContext(doc),
      nameSpec([fixed('with-date', 'zeta', { as_of: '01 Jan 2024' })])
    );

    expect(resolution?.candidate.details).toEqual({ as_of: '01 Jan 2024' });
  });
});

describe('defineField', () => {
  it('should store the resolved value in the context', async () => {
    const ctx = createExtractionContext(doc);
    const field = defineField(nameSpec([fixed('first', 'alpha')]));

    expect(field.key).toBe('fund_name');
    expect(field.strategyIds).toEqual(['first']);
    expect(await field.resolve(ctx)).toBe(true);
    expect(ctx.resolved.get('fund_name')).toBe('ALPHA');
  });

  it('should leave the context untouched when exhausted', async () => {
    const ctx = createExtractionContext(doc);
    const field = defineField(nameSpec([fixed('none', null)]));

    expect(await field.resolve(ctx)).toBe(false);
    expect(ctx.resolved.has('fund_name')).toBe(false);
    expect(ctx.resolved.size).toBe(0);
  });
});

describe('Strategy priority on a real page', () => {
  it('should prefer a structural pair over a full-text match elsewhere', async () => {
    const html = `
      <html><body>
        <p>Expense Ratio: 1.20% for the regular plan</p>
        <dl><dt>Expense Ratio</dt><dd>0.65%</dd></dl>
      </body></html>
    `;

    const record = await new FundRecordBuilder().extract(html);

    expect(record?.cost_and_tax.expense_ratio).toBe('0.65%');
  });
});
