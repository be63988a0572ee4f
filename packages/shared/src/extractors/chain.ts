/**
 * Strategy Chain Runner
 *
 * Runs a field's strategies strictly in declared order. The first candidate
 * that validates and normalizes wins; later strategies never run. Anything a
 * strategy, validator or normalizer throws counts as "no candidate".
 */

import { logger } from '../logger';
import { fieldsExhaustedCounter, strategyAttemptsCounter } from '../metrics';
import type { StrategyOutcome } from '../metrics';
import type { FieldKey, FieldValueMap } from '../types';
import type { Candidate, ExtractionContext, FieldEntry, FieldSpec } from './types';

export interface Resolution<K extends FieldKey, TRaw> {
  candidate: Candidate<TRaw>;
  value: FieldValueMap[K];
}

function record(field: string, strategy: string, outcome: StrategyOutcome): void {
  strategyAttemptsCounter.inc({ field, strategy, outcome });
}

/**
 * Run the chain for one field. Resolves to null when every strategy failed.
 */
export async function extractCandidate<K extends FieldKey, TRaw>(
  ctx: ExtractionContext,
  spec: FieldSpec<K, TRaw>
): Promise<Resolution<K, TRaw> | null> {
  for (const [priority, strategy] of spec.strategies.entries()) {
    try {
      const result = await strategy.attempt(ctx);
      if (!result) {
        record(spec.key, strategy.id, 'empty');
        continue;
      }

      const candidate: Candidate<TRaw> = {
        raw: result.raw,
        strategyId: strategy.id,
        priority,
        details: result.details ?? {},
      };

      const verdict = spec.validate(candidate);
      if (!verdict.valid) {
        record(spec.key, strategy.id, 'rejected');
        logger.debug('Candidate rejected', {
          field: spec.key,
          strategy: strategy.id,
          reason: verdict.reason,
        });
        continue;
      }

      const value = spec.normalize(candidate);
      record(spec.key, strategy.id, 'accepted');
      return { candidate, value };
    } catch (error) {
      record(spec.key, strategy.id, 'error');
      logger.warn('Strategy failed', {
        field: spec.key,
        strategy: strategy.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  fieldsExhaustedCounter.inc({ field: spec.key });
  logger.debug('Strategies exhausted', {
    field: spec.key,
    strategies: spec.strategies.map((s) => s.id),
  });
  return null;
}

/**
 * Erase a spec's raw type so it can sit in the field table. Resolving stores
 * the normalized value in the context.
 */
export function defineField<K extends FieldKey, TRaw>(spec: FieldSpec<K, TRaw>): FieldEntry {
  return {
    key: spec.key,
    strategyIds: spec.strategies.map((s) => s.id),
    async resolve(ctx: ExtractionContext): Promise<boolean> {
      const resolution = await extractCandidate(ctx, spec);
      if (!resolution) return false;
      ctx.resolved.set(spec.key, resolution.value);
      return true;
    },
  };
}
