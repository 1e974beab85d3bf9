import { ObituarySearchClient } from '@obitsweep/obituary-client';
import { FileCheckpointStore } from '@obitsweep/reconcile';
import { loadEnvFiles, loadRunnerConfig } from './config.js';
import { createRunnerLogger } from './observability/logger.js';
import { createSearchClientLogger } from './observability/reconcile-logger.js';
import { serializeError } from './observability/serialize-error.js';
import { runFiles } from './run-files.js';

async function run(): Promise<number> {
  loadEnvFiles();
  const logger = createRunnerLogger();
  const config = loadRunnerConfig(process.argv.slice(2));

  const searcher = new ObituarySearchClient({
    ...config.search,
    logger: createSearchClientLogger(logger),
  });
  const checkpoints = new FileCheckpointStore(config.checkpointDir);

  logger.info(
    {
      event: 'runner_started',
      inputFiles: config.inputFiles,
      outputMode: config.outputMode,
      checkpointDir: config.checkpointDir,
      batchSize: config.batchSize,
      concurrency: config.concurrency,
      maxCandidates: config.maxCandidates,
      reset: config.reset,
    },
    'Runner started',
  );

  const result = await runFiles(config, { searcher, checkpoints, logger });

  logger.info(
    {
      event: 'runner_finished',
      status: result.status,
      files: result.files.length,
      missing: result.missing,
      kept: result.files.reduce((sum, file) => sum + file.kept, 0),
      removed: result.files.reduce((sum, file) => sum + file.removed, 0),
    },
    'Runner finished',
  );

  return result.status === 'halted' ? 1 : 0;
}

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const logger = createRunnerLogger();
    logger.error(
      {
        event: 'runner_fatal_error',
        error: serializeError(error),
      },
      'Runner fatal error',
    );
    process.exit(1);
  });
