/**
 * Prometheus Metrics
 *
 * Strategy outcomes, exhausted fields and record build timings. The host
 * process decides how to expose them.
 */

import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Strategy Chain Metrics
// ============================================================================

export type StrategyOutcome = 'accepted' | 'rejected' | 'empty' | 'error';

export const strategyAttemptsCounter = new promClient.Counter({
  name: 'fundlens_strategy_attempts_total',
  help: 'Strategy attempts by field, strategy and outcome',
  labelNames: ['field', 'strategy', 'outcome'],
  registers: [register],
});

export const fieldsExhaustedCounter = new promClient.Counter({
  name: 'fundlens_fields_exhausted_total',
  help: 'Fields for which every strategy failed',
  labelNames: ['field'],
  registers: [register],
});

// ============================================================================
// Record Metrics
// ============================================================================

export const recordsBuiltCounter = new promClient.Counter({
  name: 'fundlens_records_built_total',
  help: 'Total number of fund records built',
  labelNames: ['status'],
  registers: [register],
});

export const recordBuildDurationHistogram = new promClient.Histogram({
  name: 'fundlens_record_build_duration_seconds',
  help: 'Duration of one record build',
  labelNames: ['live'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 15, 30],
  registers: [register],
});

// ============================================================================
// Live Handle Metrics
// ============================================================================

export const liveCallsCounter = new promClient.Counter({
  name: 'fundlens_live_calls_total',
  help: 'Calls issued to the live page handle',
  labelNames: ['operation', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics text
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
