import type { SearchClientLogger } from '@obitsweep/obituary-client';
import type { ReconcileLogger } from '@obitsweep/reconcile';
import type { Logger } from 'pino';

export function createReconcileLogger(logger: Logger): ReconcileLogger {
  return {
    info: (message) => logger.info({ event: 'reconcile_stage' }, message),
    warn: (message) => logger.warn({ event: 'reconcile_stage' }, message),
    error: (message) => logger.error({ event: 'reconcile_stage' }, message),
  };
}

export function createSearchClientLogger(logger: Logger): SearchClientLogger {
  return {
    warn: (message) => logger.warn({ event: 'search_retry' }, message),
  };
}
