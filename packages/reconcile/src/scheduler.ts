import pLimit from 'p-limit';
import type { SearchResult, SearchTerminalError } from '@obitsweep/obituary-client';
import { DEFAULT_EXPIRATION_YEAR_CUTOFF, selectEligibleCandidates, selectResumableCandidates } from './eligibility.js';
import { evaluateEntries } from './evaluate.js';
import { partitionOutcome } from './partition.js';
import type { Candidate, InputRow, OutputRow, ProgressState, ReconcileLogger, RunOptions, RunSummary } from './types.js';

const DEFAULT_BATCH_SIZE = 20;
const DEFAULT_CONCURRENCY = 2;
const DEFAULT_BATCH_PAUSE_MS = 2000;

const defaultLogger: ReconcileLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

type BatchResult =
  | { kind: 'written'; kept: number; removed: number; softFailures: number }
  | { kind: 'halted'; error: SearchTerminalError; candidate: Candidate };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function positiveInt(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value < 1) {
    return fallback;
  }

  return Math.floor(value);
}

export function sliceBatches<T>(items: readonly T[], batchSize: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    batches.push(items.slice(start, start + batchSize));
  }
  return batches;
}

/**
 * Look up every candidate of one batch under the concurrency cap.
 *
 * Results come back in batch order whatever order the requests finish in. The
 * first terminal failure aborts the shared signal: requests in flight stop and
 * queued ones return `cancelled` without touching the network.
 */
async function searchBatch(
  batch: Candidate[],
  options: RunOptions,
  concurrency: number,
  log: (message: string) => void,
): Promise<SearchResult[]> {
  const limit = pLimit(concurrency);
  const controller = new AbortController();

  return Promise.all(
    batch.map((candidate) =>
      limit(async (): Promise<SearchResult> => {
        if (controller.signal.aborted) {
          return { status: 'cancelled', attempts: 0 };
        }

        let result: SearchResult;
        try {
          result = await options.searcher.search(
            { firstName: candidate.firstName, lastName: candidate.lastName },
            controller.signal,
          );
        } catch (error) {
          log(`search for row ${candidate.sourceIndex} threw: ${toMessage(error)}`);
          result = { status: 'soft_failure', reason: toMessage(error), attempts: 1 };
        }

        if (result.status === 'hard_failure' && !controller.signal.aborted) {
          controller.abort();
        }

        return result;
      }),
    ),
  );
}

function persistFailureMessage(key: string, error: unknown): string {
  return `[reconcile:${key}] Checkpoint save failed: ${toMessage(error)}`;
}

/**
 * Drive one input file through search → match → partition in sequential batches.
 *
 * Batch N+1 starts only once batch N has been written and checkpointed. A
 * terminal search failure stops the run with the last completed batch's
 * checkpoint plus `lastError`; ordinary failures count as "no results".
 */
export async function runReconciliation(
  rows: readonly InputRow[],
  initial: ProgressState,
  options: RunOptions,
): Promise<RunSummary> {
  const { checkpointKey: key, checkpoints, logger = defaultLogger } = options;
  const start = performance.now();
  const batchSize = positiveInt(options.batchSize, DEFAULT_BATCH_SIZE);
  const concurrency = positiveInt(options.concurrency, DEFAULT_CONCURRENCY);
  const batchPauseMs = Math.max(0, options.batchPauseMs ?? DEFAULT_BATCH_PAUSE_MS);
  const expirationYearCutoff = options.expirationYearCutoff ?? DEFAULT_EXPIRATION_YEAR_CUTOFF;

  const eligible = selectEligibleCandidates(rows, { expirationYearCutoff });
  const resumable = selectResumableCandidates(eligible, initial);
  const capped = options.maxCandidates !== undefined && options.maxCandidates < resumable.length;
  const pending = capped ? resumable.slice(0, Math.max(0, options.maxCandidates ?? 0)) : resumable;
  const batches = sliceBatches(pending, batchSize);

  let progress: ProgressState = { ...initial, filePath: options.filePath ?? initial.filePath };
  let batchesDone = 0;
  let processed = 0;
  let kept = 0;
  let removed = 0;

  const summarize = (status: RunSummary['status'], error?: SearchTerminalError): RunSummary => ({
    status,
    batches: batchesDone,
    processed,
    kept,
    removed,
    skipped: {
      ineligible: rows.length - eligible.length,
      alreadyProcessed: eligible.length - resumable.length,
    },
    progress,
    error,
    durationMs: performance.now() - start,
  });

  const persist = async (): Promise<void> => {
    try {
      await checkpoints.save(key, progress);
    } catch (error) {
      logger.warn(persistFailureMessage(key, error));
    }
  };

  if (initial.completed) {
    logger.info(`[reconcile:${key}] Already completed; clear the checkpoint to run again`);
    return summarize('completed');
  }

  logger.info(
    `[reconcile:${key}] ${pending.length} candidates to look up (${eligible.length} eligible, resuming from index ${initial.lastProcessedIndex})`,
  );

  for (const [batchIndex, batch] of batches.entries()) {
    const first = batch[0];
    const last = batch[batch.length - 1];
    if (!first || !last) continue;

    logger.info(
      `[reconcile:${key}] Batch ${batchIndex + 1}/${batches.length}: rows ${first.sourceIndex}-${last.sourceIndex}`,
    );
    const batchStart = performance.now();

    const outcome = await processBatch(batch, options, concurrency, (message) =>
      logger.warn(`[reconcile:${key}] ${message}`),
    );

    if (outcome.kind === 'halted') {
      progress = {
        ...progress,
        timestamp: new Date().toISOString(),
        lastError: `${outcome.error.name}: ${outcome.error.message} (row ${outcome.candidate.sourceIndex})`,
      };
      logger.error(`[reconcile:${key}] Halting run: ${progress.lastError}`);
      await persist();
      return summarize('halted', outcome.error);
    }

    batchesDone += 1;
    processed += batch.length;
    kept += outcome.kept;
    removed += outcome.removed;
    progress = {
      ...progress,
      lastProcessedIndex: Math.max(progress.lastProcessedIndex, last.sourceIndex),
      timestamp: new Date().toISOString(),
      totalFound: progress.totalFound + outcome.kept,
      totalProcessed: progress.totalProcessed + batch.length,
      lastError: undefined,
    };
    await persist();

    const seconds = ((performance.now() - batchStart) / 1000).toFixed(1);
    logger.info(
      `[reconcile:${key}] Batch ${batchIndex + 1} done in ${seconds}s: ${outcome.kept} kept, ${outcome.removed} removed` +
        `${outcome.softFailures > 0 ? `, ${outcome.softFailures} lookups failed open` : ''}` +
        ` (found ${progress.totalFound}/${progress.totalProcessed})`,
    );

    if (batchIndex < batches.length - 1 && batchPauseMs > 0) {
      await sleep(batchPauseMs);
    }
  }

  if (capped) {
    logger.info(`[reconcile:${key}] Stopped after ${processed} candidates (limit reached)`);
    return summarize('partial');
  }

  progress = { ...progress, completed: true, timestamp: new Date().toISOString() };
  await persist();
  logger.info(`[reconcile:${key}] Done. Found ${progress.totalFound}/${progress.totalProcessed}`);

  return summarize('completed');
}

async function processBatch(
  batch: Candidate[],
  options: RunOptions,
  concurrency: number,
  warn: (message: string) => void,
): Promise<BatchResult> {
  const results = await searchBatch(batch, options, concurrency, warn);

  for (const [index, result] of results.entries()) {
    const candidate = batch[index];
    if (result.status === 'hard_failure' && candidate) {
      return { kind: 'halted', error: result.error, candidate };
    }
  }

  const keptRows: OutputRow[] = [];
  const removedRows: OutputRow[] = [];
  let softFailures = 0;

  for (const [index, result] of results.entries()) {
    const candidate = batch[index];
    if (!candidate) continue;

    if (result.status === 'soft_failure') {
      softFailures += 1;
      warn(`row ${candidate.sourceIndex} treated as no results: ${result.reason}`);
    }

    const entries = result.status === 'ok' ? result.entries : [];
    const partitioned = partitionOutcome(evaluateEntries(candidate, entries));
    if (partitioned.kept) {
      keptRows.push(partitioned.row);
    } else {
      removedRows.push(partitioned.row);
    }
  }

  await options.outputs.kept.append(keptRows);
  await options.outputs.removed.append(removedRows);

  return { kind: 'written', kept: keptRows.length, removed: removedRows.length, softFailures };
}
