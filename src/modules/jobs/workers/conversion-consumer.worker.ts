import { logger } from '../../../config/logger';
import { MAX_TIMER_MS, Settings, loadSettings } from '../../../config/settings';
import { createDbPool } from '../../../infrastructure/database/repositories/db.repo';
import { PostgresService } from '../../../infrastructure/database/repositories/postgres.repository';
import { PostgresJobStore } from '../../../infrastructure/database/repositories/postgres-job.store';
import { InMemoryJobStore } from '../../../infrastructure/database/repositories/memory-job.store';
import { createMinioClient } from '../../../infrastructure/database/repositories/minio.repo';
import { MinioResultStore } from '../../../infrastructure/storage/providers/minio.provider';
import { DockerSandboxRuntime } from '../../../infrastructure/sandbox/docker.runtime';
import { VolumeManager } from '../../../infrastructure/sandbox/volume.manager';
import { IJobStore } from '../../../shared/interfaces/job-store.interface';
import { JobQueueService } from '../../queue/services/job-queue.service';
import { SandboxExecutor } from '../../sandbox/services/sandbox-executor.service';
import { SandboxSweeper } from '../../sandbox/services/sandbox-sweeper.service';
import { SandboxOrchestrator } from '../../orchestration/services/sandbox-orchestrator.service';
import { ImageSanitizationService } from '../../sanitization/services/image-sanitization.service';
import { TextSanitizationService } from '../../sanitization/services/text-sanitization.service';
import { ResultSanitizerService } from '../../sanitization/services/result-sanitizer.service';
import { JobWorkerService } from '../services/job-worker.service';

// Global state for cleanup tracking
let jobWorkerService: JobWorkerService | null = null;
let database: PostgresService | null = null;
let isShuttingDown = false;
let cleanupTimeout: NodeJS.Timeout | null = null;

// in-flight jobs may run up to the job timeout before they settle
const FORCE_EXIT_GRACE_MS = 30000;

/**
 * Stops the worker and closes all resources. Idempotent.
 */
async function cleanup(): Promise<void> {
  if (isShuttingDown) {
    logger.info('Cleanup already in progress, skipping...');
    return;
  }

  isShuttingDown = true;
  logger.info('Starting graceful shutdown...');

  if (jobWorkerService) {
    logger.info('Stopping conversion worker service...');
    await jobWorkerService.stopWorker();
    jobWorkerService = null;
  }

  if (database) {
    logger.info('Closing database connection pool...');
    await database.close();
    database = null;
    logger.info('Database connection pool closed');
  }

  logger.info('Graceful shutdown completed successfully');
}

async function handleShutdown(signal: string, timeoutMs: number): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');

  cleanupTimeout = setTimeout(() => {
    logger.error('Cleanup timeout reached, forcing exit...');
    process.exit(1);
  }, timeoutMs);

  try {
    await cleanup();
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Cleanup failed, exiting with error');
    process.exit(1);
  } finally {
    if (cleanupTimeout) {
      clearTimeout(cleanupTimeout);
      cleanupTimeout = null;
    }
  }
}

function createJobStore(settings: Settings): IJobStore {
  if (settings.queue.store === 'memory') {
    logger.warn('Using in-process job store; jobs do not survive a restart');
    return new InMemoryJobStore();
  }

  database = new PostgresService(createDbPool(settings.queue.databaseUrl));
  return new PostgresJobStore(database);
}

function initServices(settings: Settings): JobWorkerService {
  const queue = new JobQueueService(createJobStore(settings), {
    maxAttempts: settings.queue.maxAttempts,
    backoffBaseMs: settings.queue.backoffBaseMs,
    backoffMaxMs: settings.queue.backoffMaxMs,
    staleAfterMs: settings.queue.staleAfterMs,
  });

  const runtime = new DockerSandboxRuntime();
  const volumes = new VolumeManager(settings.sandbox.root);
  const executor = new SandboxExecutor(runtime, volumes, {
    runtime: settings.sandbox.runtime,
    scratchBytes: settings.sandbox.scratchBytes,
  });
  const sweeper = new SandboxSweeper(
    runtime,
    volumes,
    settings.sandbox.maxJobDurationMs,
  );

  const orchestrator = new SandboxOrchestrator(executor, {
    inputDir: settings.sandbox.inputDir,
    processorImage: settings.sandbox.processorImage,
    helperImage: settings.sandbox.helperImage,
    processorLimits: settings.sandbox.processorLimits,
    helperLimits: settings.sandbox.helperLimits,
    jobTimeoutMs: settings.sandbox.jobTimeoutMs,
    maxArtifactBytes: settings.sandbox.maxArtifactBytes,
    signalPollIntervalMs: settings.sandbox.signalPollIntervalMs,
  });

  const sanitizer = new ResultSanitizerService(
    new ImageSanitizationService({
      width: settings.sanitizer.thumbnailWidth,
      height: settings.sanitizer.thumbnailHeight,
    }),
    new TextSanitizationService({
      maxBytes: settings.sanitizer.maxTextBytes,
      fallbackMaxBytes: settings.sanitizer.fallbackMaxBytes,
      fallbackMinPrintable: settings.sanitizer.fallbackMinPrintable,
    }),
  );

  const results = new MinioResultStore(
    createMinioClient(),
    settings.storage.thumbnailBucket,
  );

  return new JobWorkerService(queue, orchestrator, sanitizer, results, sweeper, {
    concurrency: settings.sandbox.maxConcurrentJobs,
    pollIntervalMs: settings.queue.pollIntervalMs,
    inputDir: settings.sandbox.inputDir,
  });
}

(async function () {
  try {
    const settings = loadSettings();
    const shutdownTimeoutMs = Math.min(
      settings.sandbox.jobTimeoutMs + FORCE_EXIT_GRACE_MS,
      MAX_TIMER_MS,
    );

    process.on('SIGINT', () => handleShutdown('SIGINT', shutdownTimeoutMs));
    process.on('SIGTERM', () => handleShutdown('SIGTERM', shutdownTimeoutMs));
    process.on('unhandledRejection', (reason) => {
      logger.error({ reason }, 'Unhandled promise rejection occurred');
      return handleShutdown('unhandledRejection', FORCE_EXIT_GRACE_MS);
    });

    jobWorkerService = initServices(settings);
    await jobWorkerService.startWorker();

    logger.info('Worker started and waiting for jobs...');
  } catch (err) {
    logger.error({ error: err }, 'Error starting worker:');

    try {
      await cleanup();
    } catch (cleanupError) {
      logger.error(
        { error: cleanupError },
        'Cleanup failed during startup error handling',
      );
    }
    process.exit(1);
  }
})();
