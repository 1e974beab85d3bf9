import { access } from 'node:fs/promises';
import type { ObituarySearcher } from '@obitsweep/obituary-client';
import {
  reconcileFile,
  resetFileCheckpoint,
  type CheckpointStore,
  type ReconcileFileOptions,
  type ReconcileFileResult,
} from '@obitsweep/reconcile';
import type { Logger } from 'pino';
import type { RunnerConfig } from './config.js';
import { createReconcileLogger } from './observability/reconcile-logger.js';
import { serializeError } from './observability/serialize-error.js';

export interface RunFilesDeps {
  searcher: ObituarySearcher;
  checkpoints: CheckpointStore;
  logger: Logger;
  reconcile?: (filePath: string, options: ReconcileFileOptions) => Promise<ReconcileFileResult>;
  fileExists?: (filePath: string) => Promise<boolean>;
}

export interface RunFilesResult {
  status: 'completed' | 'halted' | 'partial';
  files: ReconcileFileResult[];
  missing: string[];
}

async function isReadable(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function summarize(result: ReconcileFileResult): Record<string, unknown> {
  return {
    filePath: result.filePath,
    checkpointKey: result.checkpointKey,
    status: result.status,
    batches: result.batches,
    processed: result.processed,
    kept: result.kept,
    removed: result.removed,
    skippedIneligible: result.skipped.ineligible,
    skippedAlreadyProcessed: result.skipped.alreadyProcessed,
    totalFound: result.progress.totalFound,
    totalProcessed: result.progress.totalProcessed,
    durationMs: Math.round(result.durationMs),
  };
}

/**
 * Reconcile each input file in turn. The first file processed writes with the
 * configured output mode and later ones append, so several files share one pair
 * of outputs. Missing files are skipped. A halted file stops the loop; later
 * files are left for the next run.
 */
export async function runFiles(config: RunnerConfig, deps: RunFilesDeps): Promise<RunFilesResult> {
  const { searcher, checkpoints, logger } = deps;
  const reconcile = deps.reconcile ?? reconcileFile;
  const fileExists = deps.fileExists ?? isReadable;
  const reconcileLogger = createReconcileLogger(logger);
  const files: ReconcileFileResult[] = [];
  const missing: string[] = [];

  for (const [index, filePath] of config.inputFiles.entries()) {
    if (!(await fileExists(filePath))) {
      missing.push(filePath);
      logger.warn({ event: 'file_missing', filePath }, 'Input file not found, skipping');
      continue;
    }

    if (config.reset) {
      const checkpointKey = await resetFileCheckpoint(filePath, { checkpoints });
      logger.info({ event: 'checkpoint_reset', filePath, checkpointKey }, 'Checkpoint cleared');
    }

    logger.info({ event: 'file_started', filePath, position: index + 1, of: config.inputFiles.length }, 'Reconciling file');

    const result = await reconcile(filePath, {
      searcher,
      checkpoints,
      logger: reconcileLogger,
      keptPath: config.keptPath,
      removedPath: config.removedPath,
      outputMode: files.length === 0 ? config.outputMode : 'append',
      batchSize: config.batchSize,
      concurrency: config.concurrency,
      batchPauseMs: config.batchPauseMs,
      maxCandidates: config.maxCandidates,
      expirationYearCutoff: config.expirationYearCutoff,
    });
    files.push(result);

    if (result.status === 'halted') {
      logger.error(
        {
          event: 'file_halted',
          ...summarize(result),
          lastError: result.progress.lastError,
          error: serializeError(result.error),
        },
        'Run halted: remote service refused further lookups',
      );
      return { status: 'halted', files, missing };
    }

    logger.info({ event: 'file_completed', ...summarize(result) }, 'File reconciled');
  }

  const status = files.some((file) => file.status === 'partial') ? 'partial' : 'completed';
  return { status, files, missing };
}
