import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileCheckpointStore, checkpointKeyFor } from '../src/checkpoint.js';
import { parseInputCsv } from '../src/csv.js';
import { reconcileFile, resetFileCheckpoint, type ReconcileFileOptions } from '../src/reconcile-file.js';
import { createLoggerMock, createSearcher, entry, ok } from './test-helpers.js';

const INPUT =
  'First Name,Last Name,Expiration Date,License\n' +
  'Ellen,Park,06/30/2025,L-1\n' +
  'Omar,Reyes,06/30/2025,L-2\n' +
  'Old,Timer,01/31/2021,L-3\n' +
  'Nina,Shaw,2024-05-01,L-4\n';

describe('reconcileFile', () => {
  let directory: string;
  let inputPath: string;
  let checkpoints: FileCheckpointStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'obitsweep-file-'));
    inputPath = join(directory, 'licenses.csv');
    checkpoints = new FileCheckpointStore(join(directory, 'progress'));
    await writeFile(inputPath, INPUT, 'utf-8');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  function options(overrides: Partial<ReconcileFileOptions> = {}): ReconcileFileOptions {
    const { searcher } = createSearcher(async (query) => {
      if (query.firstName === 'Ellen') return ok([entry('e1', 'Ellen', 'Park')]);
      if (query.firstName === 'Nina') return ok([entry('n1', 'Nora', 'Shaw')]);
      return ok([]);
    });

    return {
      searcher,
      checkpoints,
      keptPath: join(directory, 'kept.csv'),
      removedPath: join(directory, 'removed.csv'),
      outputMode: 'overwrite',
      batchSize: 2,
      batchPauseMs: 0,
      logger: createLoggerMock(),
      ...overrides,
    };
  }

  it('partitions an input file into kept and removed CSVs', async () => {
    const result = await reconcileFile(inputPath, options());

    expect(result).toMatchObject({
      status: 'completed',
      filePath: inputPath,
      checkpointKey: checkpointKeyFor(inputPath),
      processed: 3,
      kept: 1,
      removed: 2,
      skipped: { ineligible: 1, alreadyProcessed: 0 },
    });

    const kept = parseInputCsv(await readFile(join(directory, 'kept.csv'), 'utf-8'));
    expect(kept.columns).toEqual([
      'First Name',
      'Last Name',
      'Expiration Date',
      'License',
      'matched_obituaries',
      'total_matches',
      'total_obituaries_found',
    ]);
    expect(kept.rows).toHaveLength(1);
    expect(kept.rows[0]).toMatchObject({ License: 'L-1', total_matches: '1', total_obituaries_found: '1' });
    expect(JSON.parse(kept.rows[0]?.matched_obituaries ?? '[]')).toEqual([
      {
        id: 'e1',
        name: { firstName: 'Ellen', lastName: 'Park' },
        obituaryUrl: 'https://obituaries.example.test/e1',
        match_reason: 'Exact match: ellen park',
        is_match: true,
      },
    ]);

    const removed = parseInputCsv(await readFile(join(directory, 'removed.csv'), 'utf-8'));
    expect(removed.columns).toEqual([
      'First Name',
      'Last Name',
      'Expiration Date',
      'License',
      'removal_reason',
      'matched_obituaries',
      'total_obituaries_found',
    ]);
    expect(removed.rows.map((item) => [item.License, item.removal_reason, item.total_obituaries_found])).toEqual([
      ['L-2', 'no results', '0'],
      ['L-4', 'no matching name', '1'],
    ]);

    const progress = await checkpoints.load(checkpointKeyFor(inputPath));
    expect(progress).toMatchObject({
      lastProcessedIndex: 3,
      totalFound: 1,
      totalProcessed: 3,
      completed: true,
      filePath: inputPath,
    });
  });

  it('skips a completed file until its checkpoint is reset', async () => {
    await reconcileFile(inputPath, options());

    const { searcher, search } = createSearcher(async () => ok([]));
    const second = await reconcileFile(inputPath, options({ searcher, outputMode: 'append' }));
    expect(second.status).toBe('completed');
    expect(search).not.toHaveBeenCalled();

    const key = await resetFileCheckpoint(inputPath, { checkpoints });
    expect(key).toBe(checkpointKeyFor(inputPath));

    const third = await reconcileFile(inputPath, options({ searcher }));
    expect(third.processed).toBe(3);
    expect(search).toHaveBeenCalledTimes(3);

    const removed = parseInputCsv(await readFile(join(directory, 'removed.csv'), 'utf-8'));
    expect(removed.rows.map((item) => item.License)).toEqual(['L-1', 'L-2', 'L-4']);
  });

  it('replaces earlier output in overwrite mode even when nothing is kept', async () => {
    const keptPath = join(directory, 'kept.csv');
    await writeFile(keptPath, 'STALE,FROM,LAST,RUN\n', 'utf-8');
    const { searcher } = createSearcher(async () => ok([]));

    await reconcileFile(inputPath, options({ searcher }));

    expect(await readFile(keptPath, 'utf-8')).toBe(
      'First Name,Last Name,Expiration Date,License,matched_obituaries,total_matches,total_obituaries_found\n',
    );
  });

  it('keeps values under their own columns when a second file has another layout', async () => {
    const secondPath = join(directory, 'physicians.csv');
    await writeFile(secondPath, 'First Name,Last Name,Expiration Date,Specialty\nBen,Stone,06/30/2025,Cardio\n', 'utf-8');
    const { searcher } = createSearcher(async () => ok([]));

    await reconcileFile(inputPath, options({ searcher }));
    await reconcileFile(secondPath, options({ searcher, outputMode: 'append' }));

    const removed = parseInputCsv(await readFile(join(directory, 'removed.csv'), 'utf-8'));
    expect(removed.columns).toEqual([
      'First Name',
      'Last Name',
      'Expiration Date',
      'License',
      'removal_reason',
      'matched_obituaries',
      'total_obituaries_found',
      'Specialty',
    ]);
    expect(removed.rows.at(-1)).toEqual({
      'First Name': 'Ben',
      'Last Name': 'Stone',
      'Expiration Date': '06/30/2025',
      License: '',
      removal_reason: 'no results',
      matched_obituaries: '[]',
      total_obituaries_found: '0',
      Specialty: 'Cardio',
    });
    expect(removed.rows[0]).toMatchObject({ License: 'L-1', Specialty: '' });
  });
});
