import { readFile } from 'node:fs/promises';
import { checkpointKeyFor } from './checkpoint.js';
import { openCsvOutputs, parseInputCsv, type CsvOutputPaths } from './csv.js';
import { runReconciliation } from './scheduler.js';
import type { OutputMode, RunOptions, RunSummary } from './types.js';

export interface ReconcileFileOptions extends Omit<RunOptions, 'outputs' | 'checkpointKey' | 'filePath'>, CsvOutputPaths {
  outputMode: OutputMode;
}

export interface ReconcileFileResult extends RunSummary {
  filePath: string;
  checkpointKey: string;
}

/**
 * Load an input CSV and its checkpoint, then run it against the CSV outputs.
 */
export async function reconcileFile(filePath: string, options: ReconcileFileOptions): Promise<ReconcileFileResult> {
  const { keptPath, removedPath, outputMode, ...runOptions } = options;
  const checkpointKey = checkpointKeyFor(filePath);

  const table = parseInputCsv(await readFile(filePath, 'utf-8'));
  const progress = await options.checkpoints.load(checkpointKey);
  const outputs = await openCsvOutputs(table.columns, { keptPath, removedPath }, outputMode);

  const summary = await runReconciliation(table.rows, progress, {
    ...runOptions,
    outputs,
    checkpointKey,
    filePath,
  });

  return { ...summary, filePath, checkpointKey };
}

/**
 * Forget how far a file got so the next run starts from the top.
 */
export async function resetFileCheckpoint(filePath: string, options: Pick<RunOptions, 'checkpoints'>): Promise<string> {
  const key = checkpointKeyFor(filePath);
  await options.checkpoints.clear(key);
  return key;
}
