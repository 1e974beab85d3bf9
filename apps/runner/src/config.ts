import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import type { ObituarySearchClientOptions, SearchWindow } from '@obitsweep/obituary-client';
import type { OutputMode } from '@obitsweep/reconcile';

const DEFAULT_KEPT_OUTPUT = 'kept_licenses.csv';
const DEFAULT_REMOVED_OUTPUT = 'removed_licenses.csv';
const DEFAULT_CHECKPOINT_DIR = '.obitsweep';
const DEFAULT_OUTPUT_MODE: OutputMode = 'append';
const RESET_FLAG = '--reset';

export type SearchConfig = Omit<ObituarySearchClientOptions, 'logger' | 'fetchImpl'>;

export interface RunnerConfig {
  inputFiles: string[];
  keptPath: string;
  removedPath: string;
  outputMode: OutputMode;
  checkpointDir: string;
  batchSize: number;
  concurrency: number;
  batchPauseMs: number;
  maxCandidates?: number;
  expirationYearCutoff: number;
  reset: boolean;
  search: SearchConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Load `.env` then `.env.local` from `cwd`; the local file wins.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  const envPath = resolve(cwd, '.env');
  const envLocalPath = resolve(cwd, '.env.local');

  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    loadDotenv({ path: envLocalPath, override: true });
  }
}

function readStringEnv(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

function readOptionalStringEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  return env[name]?.trim() || undefined;
}

export function readIntEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min) {
    return fallback;
  }

  return Math.floor(parsed);
}

function readOptionalIntEnv(env: NodeJS.ProcessEnv, name: string, min = 1): number | undefined {
  const value = readIntEnv(env, name, Number.NaN, min);
  return Number.isNaN(value) ? undefined : value;
}

export function readBoolEnv(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

export function readListEnv(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const raw = env[name];
  if (!raw) {
    return undefined;
  }

  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return items.length > 0 ? items : undefined;
}

function readOutputMode(env: NodeJS.ProcessEnv): OutputMode {
  const raw = env.OUTPUT_MODE?.trim().toLowerCase();
  if (!raw) {
    return DEFAULT_OUTPUT_MODE;
  }

  if (raw === 'append' || raw === 'overwrite') {
    return raw;
  }

  throw new ConfigError(`OUTPUT_MODE must be "append" or "overwrite", got "${raw}"`);
}

function readSearchWindow(env: NodeJS.ProcessEnv): Partial<SearchWindow> {
  const window: Partial<SearchWindow> = {};

  const startDate = readOptionalStringEnv(env, 'SEARCH_START_DATE');
  const endDate = readOptionalStringEnv(env, 'SEARCH_END_DATE');
  const countryIds = readListEnv(env, 'SEARCH_COUNTRY_IDS');
  const regionIds = readListEnv(env, 'SEARCH_REGION_IDS');
  const limit = readOptionalIntEnv(env, 'SEARCH_RESULT_LIMIT');

  if (startDate) window.startDate = startDate;
  if (endDate) window.endDate = endDate;
  if (countryIds) window.countryIds = countryIds;
  if (regionIds) window.regionIds = regionIds;
  if (limit !== undefined) window.limit = limit;

  return window;
}

function readSearchConfig(env: NodeJS.ProcessEnv): SearchConfig {
  return {
    baseUrl: readOptionalStringEnv(env, 'SEARCH_BASE_URL'),
    userAgent: readOptionalStringEnv(env, 'SEARCH_USER_AGENT'),
    window: readSearchWindow(env),
    minDelayMs: readIntEnv(env, 'SEARCH_MIN_DELAY_MS', 500, 0),
    maxDelayMs: readIntEnv(env, 'SEARCH_MAX_DELAY_MS', 1500, 0),
    timeoutMs: readIntEnv(env, 'SEARCH_TIMEOUT_MS', 30_000),
    maxAttempts: readIntEnv(env, 'SEARCH_MAX_ATTEMPTS', 3),
    rateLimitBackoffMs: readIntEnv(env, 'SEARCH_RATE_LIMIT_BACKOFF_MS', 30_000, 0),
    retryDelayMs: readIntEnv(env, 'SEARCH_RETRY_DELAY_MS', 5_000, 0),
  };
}

/**
 * Build the run configuration from command-line arguments and the environment.
 * Positional arguments replace `INPUT_FILES`; `--reset` clears their checkpoints first.
 */
export function loadRunnerConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const positional = argv.filter((arg) => arg !== RESET_FLAG);
  const unknownFlag = positional.find((arg) => arg.startsWith('--'));
  if (unknownFlag) {
    throw new ConfigError(`Unknown option ${unknownFlag}`);
  }

  const inputFiles = positional.length > 0 ? positional : (readListEnv(env, 'INPUT_FILES') ?? []);
  if (inputFiles.length === 0) {
    throw new ConfigError('No input files: pass CSV paths as arguments or set INPUT_FILES');
  }

  return {
    inputFiles,
    keptPath: readStringEnv(env, 'KEPT_OUTPUT', DEFAULT_KEPT_OUTPUT),
    removedPath: readStringEnv(env, 'REMOVED_OUTPUT', DEFAULT_REMOVED_OUTPUT),
    outputMode: readOutputMode(env),
    checkpointDir: readStringEnv(env, 'CHECKPOINT_DIR', DEFAULT_CHECKPOINT_DIR),
    batchSize: readIntEnv(env, 'BATCH_SIZE', 20),
    concurrency: readIntEnv(env, 'CONCURRENCY', 2),
    batchPauseMs: readIntEnv(env, 'BATCH_PAUSE_MS', 2000, 0),
    maxCandidates: readOptionalIntEnv(env, 'MAX_CANDIDATES'),
    expirationYearCutoff: readIntEnv(env, 'EXPIRATION_YEAR_CUTOFF', 2023),
    reset: argv.includes(RESET_FLAG) || readBoolEnv(env, 'RESET_CHECKPOINTS', false),
    search: readSearchConfig(env),
  };
}
