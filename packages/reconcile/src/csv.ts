import { appendFile, readFile, writeFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { KEPT_EXTRA_COLUMNS, REMOVED_EXTRA_COLUMNS } from './partition.js';
import type { InputRow, OutputMode, OutputRow, ReconcileOutputs, RowSink } from './types.js';

const recordsSchema = z.array(z.array(z.string()));

export interface InputTable {
  columns: string[];
  rows: InputRow[];
}

/**
 * Parse a CSV with a header line. Short records are padded with empty strings.
 */
export function parseInputCsv(content: string): InputTable {
  const records = recordsSchema.parse(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );

  const [header, ...body] = records;
  if (!header) {
    return { columns: [], rows: [] };
  }

  const columns = header.map((column) => column.trim());
  const rows = body.map((values) => {
    const row: InputRow = {};
    columns.forEach((column, index) => {
      row[column] = values[index] ?? '';
    });
    return row;
  });

  return { columns, rows };
}

function mergeColumns(base: string[], extra: readonly string[]): string[] {
  return [...new Set([...base, ...extra])];
}

async function readExisting(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    return '';
  }
}

/**
 * Appends rows to a CSV file, matching values to the header by column name.
 *
 * Opening in overwrite mode truncates the file and writes the header at once,
 * so a run that emits nothing still replaces the previous run's rows. Opening
 * in append mode keeps existing rows; when this run brings columns the file
 * lacks, the file is rewritten once under the widened header.
 */
export class CsvRowSink implements RowSink {
  private readonly path: string;
  readonly columns: string[];

  private constructor(path: string, columns: string[]) {
    this.path = path;
    this.columns = columns;
  }

  static async open(path: string, columns: string[], mode: OutputMode): Promise<CsvRowSink> {
    const existing = mode === 'overwrite' ? '' : await readExisting(path);
    const table = parseInputCsv(existing);

    if (table.columns.length === 0) {
      await writeFile(path, stringify([columns]), 'utf-8');
      return new CsvRowSink(path, columns);
    }

    const widened = mergeColumns(table.columns, columns);
    if (widened.length > table.columns.length) {
      const records = table.rows.map((row) => widened.map((column) => row[column] ?? ''));
      await writeFile(path, stringify([widened, ...records]), 'utf-8');
    }

    return new CsvRowSink(path, widened);
  }

  async append(rows: OutputRow[]): Promise<void> {
    if (rows.length === 0) return;

    const records = rows.map((row) => this.columns.map((column) => row[column] ?? ''));
    await appendFile(this.path, stringify(records), 'utf-8');
  }
}

export interface CsvOutputPaths {
  keptPath: string;
  removedPath: string;
}

export async function openCsvOutputs(
  inputColumns: string[],
  paths: CsvOutputPaths,
  mode: OutputMode,
): Promise<ReconcileOutputs> {
  const [kept, removed] = await Promise.all([
    CsvRowSink.open(paths.keptPath, mergeColumns(inputColumns, KEPT_EXTRA_COLUMNS), mode),
    CsvRowSink.open(paths.removedPath, mergeColumns(inputColumns, REMOVED_EXTRA_COLUMNS), mode),
  ]);

  return { kept, removed };
}
