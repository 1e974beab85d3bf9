import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CsvRowSink, openCsvOutputs, parseInputCsv } from '../src/csv.js';

describe('parseInputCsv', () => {
  it('maps records to header columns and pads short records', () => {
    const table = parseInputCsv(
      '\uFEFFFirst Name,Last Name,Expiration Date,Notes\n' +
        'Ellen,Park,06/30/2025,"Moved, twice"\n' +
        '\n' +
        'Ruth,Hale,2024-01-31\n',
    );

    expect(table.columns).toEqual(['First Name', 'Last Name', 'Expiration Date', 'Notes']);
    expect(table.rows).toEqual([
      { 'First Name': 'Ellen', 'Last Name': 'Park', 'Expiration Date': '06/30/2025', Notes: 'Moved, twice' },
      { 'First Name': 'Ruth', 'Last Name': 'Hale', 'Expiration Date': '2024-01-31', Notes: '' },
    ]);
  });

  it('returns an empty table for empty input', () => {
    expect(parseInputCsv('')).toEqual({ columns: [], rows: [] });
  });
});

describe('CsvRowSink', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'obitsweep-csv-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes a header on open and quotes values', async () => {
    const path = join(directory, 'kept.csv');
    const sink = await CsvRowSink.open(path, ['First Name', 'matched_obituaries'], 'append');

    await sink.append([{ 'First Name': 'Ellen', matched_obituaries: '[{"id":"a"}]' }]);
    await sink.append([]);
    await sink.append([{ 'First Name': 'Ruth' }]);

    expect(await readFile(path, 'utf-8')).toBe(
      'First Name,matched_obituaries\nEllen,"[{""id"":""a""}]"\nRuth,\n',
    );
  });

  it('appends to an existing file without repeating the header', async () => {
    const path = join(directory, 'kept.csv');
    await writeFile(path, 'First Name\nEllen\n', 'utf-8');
    const sink = await CsvRowSink.open(path, ['First Name'], 'append');

    await sink.append([{ 'First Name': 'Ruth' }]);

    expect(await readFile(path, 'utf-8')).toBe('First Name\nEllen\nRuth\n');
  });

  it('truncates an existing file in overwrite mode', async () => {
    const path = join(directory, 'kept.csv');
    await writeFile(path, 'First Name\nEllen\n', 'utf-8');
    const sink = await CsvRowSink.open(path, ['First Name'], 'overwrite');

    await sink.append([{ 'First Name': 'Ruth' }]);
    await sink.append([{ 'First Name': 'Carl' }]);

    expect(await readFile(path, 'utf-8')).toBe('First Name\nRuth\nCarl\n');
  });

  it('clears earlier rows in overwrite mode even when nothing is written', async () => {
    const path = join(directory, 'kept.csv');
    await writeFile(path, 'First Name,Last Name\nStale,Row\n', 'utf-8');

    const sink = await CsvRowSink.open(path, ['First Name', 'Last Name'], 'overwrite');
    await sink.append([]);

    expect(await readFile(path, 'utf-8')).toBe('First Name,Last Name\n');
  });

  it('widens the header and keeps values under their own columns when appending another layout', async () => {
    const path = join(directory, 'kept.csv');
    await writeFile(path, 'License,First Name,Last Name\nL-1,Ada,Stone\n', 'utf-8');

    const sink = await CsvRowSink.open(path, ['First Name', 'Last Name', 'Specialty'], 'append');
    await sink.append([{ 'First Name': 'Ben', 'Last Name': 'Stone', Specialty: 'Cardio' }]);

    expect(sink.columns).toEqual(['License', 'First Name', 'Last Name', 'Specialty']);
    expect(await readFile(path, 'utf-8')).toBe(
      'License,First Name,Last Name,Specialty\nL-1,Ada,Stone,\n,Ben,Stone,Cardio\n',
    );
  });

  it('follows the existing column order when the layout matches', async () => {
    const path = join(directory, 'kept.csv');
    await writeFile(path, 'Last Name,First Name\nStone,Ada\n', 'utf-8');

    const sink = await CsvRowSink.open(path, ['First Name', 'Last Name'], 'append');
    await sink.append([{ 'First Name': 'Ben', 'Last Name': 'Hale' }]);

    expect(await readFile(path, 'utf-8')).toBe('Last Name,First Name\nStone,Ada\nHale,Ben\n');
  });
});

describe('openCsvOutputs', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'obitsweep-outputs-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('extends the input columns for each stream without duplicates', async () => {
    const keptPath = join(directory, 'kept.csv');
    const removedPath = join(directory, 'removed.csv');
    const outputs = await openCsvOutputs(['First Name', 'total_matches'], { keptPath, removedPath }, 'overwrite');

    await outputs.kept.append([{ 'First Name': 'Ellen' }]);
    await outputs.removed.append([{ 'First Name': 'Ruth' }]);

    expect((await readFile(keptPath, 'utf-8')).split('\n')[0]).toBe(
      'First Name,total_matches,matched_obituaries,total_obituaries_found',
    );
    expect((await readFile(removedPath, 'utf-8')).split('\n')[0]).toBe(
      'First Name,total_matches,removal_reason,matched_obituaries,total_obituaries_found',
    );
  });
});
