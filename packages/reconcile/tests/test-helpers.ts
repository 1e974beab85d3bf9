import type { ObituaryEntry, ObituarySearcher, SearchQuery, SearchResult } from '@obitsweep/obituary-client';
import { vi } from 'vitest';
import type { CheckpointStore, InputRow, OutputRow, ProgressState, ReconcileLogger, ReconcileOutputs } from '../src/types.js';

export function row(firstName: string, lastName: string, expirationDate = '06/30/2025', extra: InputRow = {}): InputRow {
  return {
    'First Name': firstName,
    'Last Name': lastName,
    'Expiration Date': expirationDate,
    ...extra,
  };
}

export function entry(id: string, firstName: string, lastName: string, extra: Partial<ObituaryEntry['name']> = {}): ObituaryEntry {
  return {
    id,
    name: { firstName, lastName, ...extra },
    obituaryUrl: `https://obituaries.example.test/${id}`,
  };
}

export function ok(entries: ObituaryEntry[]): SearchResult {
  return { status: 'ok', totalRecordCount: entries.length, entries, attempts: 1 };
}

export type SearchHandler = (query: SearchQuery, signal?: AbortSignal) => Promise<SearchResult>;

export function createSearcher(handler: SearchHandler) {
  const search = vi.fn(handler);
  const searcher: ObituarySearcher = { search };
  return { searcher, search };
}

export function createMemoryCheckpoints(initial: Record<string, ProgressState> = {}) {
  const states = new Map<string, ProgressState>(Object.entries(initial));
  const saves: ProgressState[] = [];

  const store: CheckpointStore = {
    load: async (key) =>
      states.get(key) ?? {
        lastProcessedIndex: 0,
        timestamp: '2026-01-01T00:00:00.000Z',
        totalFound: 0,
        totalProcessed: 0,
        completed: false,
      },
    save: async (key, state) => {
      saves.push(state);
      states.set(key, state);
    },
    clear: async (key) => {
      states.delete(key);
    },
  };

  return { store, states, saves };
}

export function createMemoryOutputs() {
  const kept: OutputRow[] = [];
  const removed: OutputRow[] = [];
  const outputs: ReconcileOutputs = {
    kept: { append: async (rows) => void kept.push(...rows) },
    removed: { append: async (rows) => void removed.push(...rows) },
  };

  return { outputs, kept, removed };
}

export function createLoggerMock(): ReconcileLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function initialProgress(overrides: Partial<ProgressState> = {}): ProgressState {
  return {
    lastProcessedIndex: 0,
    timestamp: '2026-01-01T00:00:00.000Z',
    totalFound: 0,
    totalProcessed: 0,
    completed: false,
    ...overrides,
  };
}
