/**
 * Record Scope
 *
 * Each record build runs inside its own AsyncLocalStorage scope holding a
 * correlation ID and the page being extracted, so log lines from nested
 * strategies can be joined back to one record.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RecordScope {
  correlationId: string;
  sourceUrl?: string;
}

const scopeStorage = new AsyncLocalStorage<RecordScope>();

/**
 * Scope of the record build in progress, if any
 */
export function currentScope(): RecordScope | undefined {
  return scopeStorage.getStore();
}

/**
 * Correlation ID of the current record build, or a fresh one outside a build
 */
export function getCorrelationId(): string {
  return currentScope()?.correlationId || ulid();
}

/**
 * Run one record build under a new correlation ID. An empty URL is left out
 * of the scope.
 */
export async function withRecordScope<T>(sourceUrl: string, fn: () => Promise<T>): Promise<T> {
  const scope: RecordScope = { correlationId: ulid() };
  if (sourceUrl) scope.sourceUrl = sourceUrl;
  return scopeStorage.run(scope, fn);
}
