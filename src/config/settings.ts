import 'dotenv/config';
import path from 'path';
import { z } from 'zod';
import { parseByteSize } from '../shared/utils/parse-number';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

/** Largest delay Node timers accept; longer ones fire immediately. */
export const MAX_TIMER_MS = 2_147_483_647;

const durationMs = (fallback: number) =>
  z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_TIMER_MS, `must be at most ${MAX_TIMER_MS}ms`)
    .default(fallback);

const byteSize = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      const bytes = parseByteSize(value);
      if (bytes === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid size "${value}", expected e.g. 512m or 2g`,
        });
        return z.NEVER;
      }
      return bytes;
    });

const DATA_ROOT = '/var/lib/sandboxed-thumbnailer';

export const EnvSchema = z
  .object({
    POLL_INTERVAL_MS: durationMs(5000),
    SIGNAL_POLL_INTERVAL_MS: durationMs(500),
    MAX_RETRIES: positiveInt(3),
    RETRY_BACKOFF_BASE_MS: durationMs(30_000),
    RETRY_BACKOFF_MAX_MS: durationMs(600_000),
    JOB_TIMEOUT_MS: durationMs(600_000),
    STALE_JOB_THRESHOLD_MS: durationMs(1_200_000),
    SANDBOX_SWEEP_GRACE_MS: durationMs(60_000),

    PROCESSOR_IMAGE: z.string().min(1).default('thumbnail-processor:latest'),
    HELPER_IMAGE: z.string().min(1).default('cad-helper:latest'),
    PROCESSOR_RUNTIME: z.string().min(1).default('runsc'),
    PROCESSOR_MEMORY: byteSize('2g'),
    PROCESSOR_CPUS: z.coerce.number().positive().default(2),
    PROCESSOR_PIDS_LIMIT: positiveInt(200),
    HELPER_MEMORY: byteSize('1g'),
    HELPER_CPUS: z.coerce.number().positive().default(1),
    HELPER_PIDS_LIMIT: positiveInt(100),
    SCRATCH_SIZE: byteSize('512m'),
    MAX_CONCURRENT_JOBS: positiveInt(2),

    SANDBOX_ROOT: z.string().min(1).default(path.join(DATA_ROOT, 'sandboxes')),
    INPUT_DIR: z.string().min(1).default(path.join(DATA_ROOT, 'input')),

    THUMBNAIL_WIDTH: positiveInt(400),
    THUMBNAIL_HEIGHT: positiveInt(300),
    MAX_TEXT_LENGTH: positiveInt(51_200),
    TEXT_FALLBACK_MAX_SIZE: positiveInt(204_800),
    TEXT_FALLBACK_MIN_PRINTABLE: z.coerce.number().min(0).max(1).default(0.99),
    MAX_ARTIFACT_BYTES: positiveInt(16 * 1024 * 1024),

    JOB_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().optional(),
    THUMBNAIL_BUCKET: z.string().min(1).default('thumbnails'),
  })
  .superRefine((env, ctx) => {
    if (env.JOB_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when JOB_STORE=postgres',
      });
    }
    if (env.RETRY_BACKOFF_MAX_MS < env.RETRY_BACKOFF_BASE_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RETRY_BACKOFF_MAX_MS'],
        message: 'RETRY_BACKOFF_MAX_MS must be >= RETRY_BACKOFF_BASE_MS',
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export interface SandboxLimitSettings {
  memoryBytes: number;
  nanoCpus: number;
  pidsLimit: number;
}

export interface Settings {
  queue: {
    pollIntervalMs: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    staleAfterMs: number;
    store: Env['JOB_STORE'];
    databaseUrl?: string;
  };
  sandbox: {
    root: string;
    inputDir: string;
    processorImage: string;
    helperImage: string;
    runtime?: string;
    jobTimeoutMs: number;
    maxJobDurationMs: number;
    processorLimits: SandboxLimitSettings;
    helperLimits: SandboxLimitSettings;
    scratchBytes: number;
    maxArtifactBytes: number;
    maxConcurrentJobs: number;
    signalPollIntervalMs: number;
  };
  sanitizer: {
    thumbnailWidth: number;
    thumbnailHeight: number;
    maxTextBytes: number;
    fallbackMaxBytes: number;
    fallbackMinPrintable: number;
  };
  storage: {
    thumbnailBucket: string;
  };
}

function configurationError(error: z.ZodError): Error {
  const issues = error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('\n  ');
  return new Error(`Configuration errors:\n  ${issues}`);
}

/**
 * Reads the worker configuration from the environment.
 * @throws {Error} listing every invalid variable
 */
export function loadSettings(
  source: NodeJS.ProcessEnv = process.env,
): Settings {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw configurationError(parsed.error);
  }

  const env = parsed.data;
  const toNanoCpus = (cpus: number) => Math.round(cpus * 1e9);

  return {
    queue: {
      pollIntervalMs: env.POLL_INTERVAL_MS,
      maxAttempts: env.MAX_RETRIES,
      backoffBaseMs: env.RETRY_BACKOFF_BASE_MS,
      backoffMaxMs: env.RETRY_BACKOFF_MAX_MS,
      staleAfterMs: env.STALE_JOB_THRESHOLD_MS,
      store: env.JOB_STORE,
      databaseUrl: env.DATABASE_URL,
    },
    sandbox: {
      root: env.SANDBOX_ROOT,
      inputDir: env.INPUT_DIR,
      processorImage: env.PROCESSOR_IMAGE,
      helperImage: env.HELPER_IMAGE,
      // runc is docker's default; leaving it unset keeps the daemon's choice
      runtime: env.PROCESSOR_RUNTIME === 'runc' ? undefined : env.PROCESSOR_RUNTIME,
      jobTimeoutMs: env.JOB_TIMEOUT_MS,
      maxJobDurationMs: env.JOB_TIMEOUT_MS + env.SANDBOX_SWEEP_GRACE_MS,
      processorLimits: {
        memoryBytes: env.PROCESSOR_MEMORY,
        nanoCpus: toNanoCpus(env.PROCESSOR_CPUS),
        pidsLimit: env.PROCESSOR_PIDS_LIMIT,
      },
      helperLimits: {
        memoryBytes: env.HELPER_MEMORY,
        nanoCpus: toNanoCpus(env.HELPER_CPUS),
        pidsLimit: env.HELPER_PIDS_LIMIT,
      },
      scratchBytes: env.SCRATCH_SIZE,
      maxArtifactBytes: env.MAX_ARTIFACT_BYTES,
      maxConcurrentJobs: env.MAX_CONCURRENT_JOBS,
      signalPollIntervalMs: env.SIGNAL_POLL_INTERVAL_MS,
    },
    sanitizer: {
      thumbnailWidth: env.THUMBNAIL_WIDTH,
      thumbnailHeight: env.THUMBNAIL_HEIGHT,
      maxTextBytes: env.MAX_TEXT_LENGTH,
      fallbackMaxBytes: env.TEXT_FALLBACK_MAX_SIZE,
      fallbackMinPrintable: env.TEXT_FALLBACK_MIN_PRINTABLE,
    },
    storage: {
      thumbnailBucket: env.THUMBNAIL_BUCKET,
    },
  };
}

export const HelperEnvSchema = z.object({
  EXCHANGE_DIR: z.string().min(1).default('/exchange'),
  CAD_CONVERTER_PATH: z.string().min(1).default('/exec/qcad/dwg2pdf'),
  CAD_CONVERTER_TIMEOUT_MS: durationMs(300_000),
  SIGNAL_POLL_INTERVAL_MS: durationMs(500),
});

export interface HelperSettings {
  exchangeDir: string;
  converterPath: string;
  converterTimeoutMs: number;
  pollIntervalMs: number;
}

/** Configuration of the CAD helper process running inside its sandbox. */
export function loadHelperSettings(
  source: NodeJS.ProcessEnv = process.env,
): HelperSettings {
  const parsed = HelperEnvSchema.safeParse(source);
  if (!parsed.success) {
    throw configurationError(parsed.error);
  }

  return {
    exchangeDir: parsed.data.EXCHANGE_DIR,
    converterPath: parsed.data.CAD_CONVERTER_PATH,
    converterTimeoutMs: parsed.data.CAD_CONVERTER_TIMEOUT_MS,
    pollIntervalMs: parsed.data.SIGNAL_POLL_INTERVAL_MS,
  };
}
