// Pipeline
export { runReconciliation, sliceBatches } from './scheduler.js';
export { reconcileFile, resetFileCheckpoint } from './reconcile-file.js';

// Individual stages
export {
  parseExpirationYear,
  selectEligibleCandidates,
  selectResumableCandidates,
  DEFAULT_EXPIRATION_YEAR_CUTOFF,
  FIRST_NAME_COLUMN,
  LAST_NAME_COLUMN,
  EXPIRATION_DATE_COLUMN,
} from './eligibility.js';
export { evaluateEntries } from './evaluate.js';
export { partitionOutcome, KEPT_EXTRA_COLUMNS, REMOVED_EXTRA_COLUMNS } from './partition.js';
export { FileCheckpointStore, checkpointKeyFor, createInitialProgress } from './checkpoint.js';
export { parseInputCsv, openCsvOutputs, CsvRowSink } from './csv.js';

// Types
export type { ReconcileFileOptions, ReconcileFileResult } from './reconcile-file.js';
export type { InputTable, CsvOutputPaths } from './csv.js';
export type {
  Candidate,
  CheckpointStore,
  EligibilityOptions,
  EvaluatedEntry,
  InputRow,
  OutputMode,
  OutputRow,
  PartitionResult,
  ProgressState,
  ReconcileLogger,
  ReconcileOutputs,
  RemovalReason,
  RowSink,
  RunOptions,
  RunSummary,
  SearchOutcome,
} from './types.js';
