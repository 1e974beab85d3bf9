import type { MatchDecision } from '@obitsweep/name-matching';
import type { ObituaryEntry, ObituarySearcher, SearchTerminalError } from '@obitsweep/obituary-client';

export type InputRow = Record<string, string>;
export type OutputRow = Record<string, string>;

/**
 * One license holder to look up. `rawRow` is copied verbatim into output.
 */
export interface Candidate {
  readonly firstName: string;
  readonly lastName: string;
  readonly rawRow: Readonly<InputRow>;
  readonly sourceIndex: number;
}

export interface EvaluatedEntry extends ObituaryEntry {
  decision: MatchDecision;
}

/**
 * Every entry the search returned for a candidate, split by the name matcher.
 */
export interface SearchOutcome {
  candidate: Candidate;
  entries: ObituaryEntry[];
  matched: EvaluatedEntry[];
  unmatched: EvaluatedEntry[];
}

export type RemovalReason = 'no results' | 'no matching name';

export type PartitionResult =
  | { kept: true; row: OutputRow }
  | { kept: false; reason: RemovalReason; row: OutputRow };

/**
 * How far processing of one input file got. `totalFound` counts kept candidates.
 */
export interface ProgressState {
  lastProcessedIndex: number;
  timestamp: string;
  totalFound: number;
  totalProcessed: number;
  completed: boolean;
  filePath?: string;
  lastError?: string;
}

export interface CheckpointStore {
  load(key: string): Promise<ProgressState>;
  save(key: string, state: ProgressState): Promise<void>;
  clear(key: string): Promise<void>;
}

export interface RowSink {
  append(rows: OutputRow[]): Promise<void>;
}

export interface ReconcileOutputs {
  kept: RowSink;
  removed: RowSink;
}

export type OutputMode = 'append' | 'overwrite';

/**
 * Minimal logger interface. Defaults to console.
 */
export interface ReconcileLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface EligibilityOptions {
  expirationYearCutoff: number;
}

export interface RunOptions extends Partial<EligibilityOptions> {
  searcher: ObituarySearcher;
  outputs: ReconcileOutputs;
  checkpoints: CheckpointStore;
  checkpointKey: string;
  filePath?: string;
  batchSize?: number;
  concurrency?: number;
  batchPauseMs?: number;
  maxCandidates?: number;
  logger?: ReconcileLogger;
}

export interface RunSummary {
  status: 'completed' | 'halted' | 'partial';
  batches: number;
  processed: number;
  kept: number;
  removed: number;
  skipped: {
    ineligible: number;
    alreadyProcessed: number;
  };
  progress: ProgressState;
  error?: SearchTerminalError;
  durationMs: number;
}
