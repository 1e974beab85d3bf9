import { createHash } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { z } from 'zod';
import type { CheckpointStore, ProgressState } from './types.js';

const checkpointFileSchema = z
  .object({
    last_processed_index: z.number().int().nonnegative(),
    timestamp: z.string().optional(),
    file_path: z.string().optional(),
    total_found: z.number().int().nonnegative().default(0),
    total_processed: z.number().int().nonnegative().default(0),
    completed: z.boolean().default(false),
    error: z.string().optional(),
  })
  .refine((file) => file.total_found <= file.total_processed, {
    message: 'total_found exceeds total_processed',
  });

type CheckpointFile = z.input<typeof checkpointFileSchema>;

export function createInitialProgress(filePath?: string): ProgressState {
  return {
    lastProcessedIndex: 0,
    timestamp: new Date().toISOString(),
    totalFound: 0,
    totalProcessed: 0,
    completed: false,
    filePath,
  };
}

/**
 * Stable per-input key: file stem plus a short hash of the absolute path, so two
 * files sharing a name in different directories keep separate checkpoints.
 */
export function checkpointKeyFor(filePath: string): string {
  const absolute = resolve(filePath);
  const stem = basename(absolute, extname(absolute));
  const digest = createHash('sha256').update(absolute).digest('hex').slice(0, 8);
  return `${stem}-${digest}`;
}

function toFile(state: ProgressState): CheckpointFile {
  const file: CheckpointFile = {
    last_processed_index: state.lastProcessedIndex,
    timestamp: state.timestamp,
    file_path: state.filePath,
    total_found: state.totalFound,
    total_processed: state.totalProcessed,
    completed: state.completed,
  };

  if (state.lastError) {
    file.error = state.lastError;
  }

  return file;
}

/**
 * JSON checkpoint per key under one directory. Reads never throw; writes go
 * through a temp file and a rename.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  pathFor(key: string): string {
    return join(this.directory, `${key}_progress.json`);
  }

  async load(key: string): Promise<ProgressState> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(key), 'utf-8');
    } catch {
      return createInitialProgress();
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      return createInitialProgress();
    }

    const parsed = checkpointFileSchema.safeParse(payload);
    if (!parsed.success) {
      return createInitialProgress();
    }

    const file = parsed.data;
    return {
      lastProcessedIndex: file.last_processed_index,
      timestamp: file.timestamp ?? new Date().toISOString(),
      totalFound: file.total_found,
      totalProcessed: file.total_processed,
      completed: file.completed,
      filePath: file.file_path,
      lastError: file.error,
    };
  }

  async save(key: string, state: ProgressState): Promise<void> {
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.${Date.now()}.tmp`;

    await mkdir(this.directory, { recursive: true });
    await writeFile(temp, `${JSON.stringify(toFile(state), null, 2)}\n`, 'utf-8');
    await rename(temp, target);
  }

  async clear(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}
