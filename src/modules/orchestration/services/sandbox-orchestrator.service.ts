import fs, { FileHandle } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { Logger } from 'pino';
import { logger as rootLogger } from '../../../config/logger';
import { JobFailure } from '../../../shared/errors/job-failure';
import { ResourceLimits } from '../../../shared/interfaces/sandbox-runtime.interface';
import {
  ConversionJob,
  JobKind,
  ProcessorResult,
  RawArtifacts,
} from '../../../shared/types';
import { Deadline } from '../../../shared/utils/deadline';
import { fileExtension } from '../../../shared/utils/file-kind';
import { resolveInputPath } from '../../../shared/utils/input-path';
import { isNotFound } from '../../../infrastructure/sandbox/volume.manager';
import {
  SandboxExecutor,
  SandboxRunResult,
} from '../../sandbox/services/sandbox-executor.service';
import { SignalFileProducer } from '../../conversion/services/signal-file.producer';
import { isPlainFileName } from '../../conversion/services/signal-file.protocol';
import { CollectedArtifacts, decideOutcome } from './outcome';

export const WORK_MOUNT = '/work';
export const EXCHANGE_MOUNT = '/exchange';
export const INPUT_FILE = 'input.bin';
export const JOB_FILE = 'job.json';
export const RESULT_FILE = 'result.json';
export const PROCESSOR_LOG_FILE = 'processor.log';

const LOG_PREVIEW_CHARS = 4000;

const ProcessorResultSchema = z
  .object({
    success: z.boolean(),
    thumbnail_file: z.string().nullable().default(null),
    extracted_text: z.string().nullable().default(null),
    error: z.string().nullable().default(null),
  })
  .transform(
    (file): ProcessorResult => ({
      success: file.success,
      thumbnailFile: file.thumbnail_file,
      extractedText: file.extracted_text,
      error: file.error,
    }),
  );

/** `result.json` as the processor writes it. */
export type ProcessorResultFile = z.input<typeof ProcessorResultSchema>;

/** `job.json` as the processor reads it. */
export interface JobManifest {
  job_id: string;
  kind: JobKind;
  original_filename: string;
  original_extension: string;
}

export interface OrchestratorOptions {
  inputDir: string;
  processorImage: string;
  helperImage: string;
  processorLimits: ResourceLimits;
  helperLimits: ResourceLimits;
  jobTimeoutMs: number;
  maxArtifactBytes: number;
  signalPollIntervalMs: number;
}

/**
 * Runs one job attempt: resolves the input, drives the CAD helper when the
 * job needs one, runs the processor and returns its raw, still untrusted
 * artifacts. Every failure leaves as a `JobFailure`.
 */
export class SandboxOrchestrator {
  constructor(
    private readonly executor: SandboxExecutor,
    private readonly options: OrchestratorOptions,
    private readonly now: () => number = Date.now,
  ) {}

  async execute(
    job: ConversionJob,
    log: Logger = rootLogger,
  ): Promise<RawArtifacts> {
    // one budget for the helper wait and the processor wait together
    const deadline = Deadline.after(this.options.jobTimeoutMs, this.now);
    const inputPath = await this.resolveInput(job.sourceRef);

    if (job.kind === 'cad') {
      return this.executeCad(job, inputPath, deadline, log);
    }

    const run = await this.runProcessor(
      job,
      job.kind,
      inputPath,
      job.originalFilename,
      deadline,
      log,
    );
    return decideOutcome({ run });
  }

  /**
   * @throws {JobFailure} contract violation when the reference leaves the
   * input directory or names nothing
   */
  async resolveInput(sourceRef: string): Promise<string> {
    const resolved = resolveInputPath(this.options.inputDir, sourceRef);
    if (!resolved) {
      throw JobFailure.contractViolation(
        `source reference escapes input directory: ${sourceRef}`,
      );
    }

    try {
      const stats = await fs.stat(resolved);
      if (!stats.isFile()) {
        throw JobFailure.contractViolation(`input is not a file: ${sourceRef}`);
      }
    } catch (error) {
      if (isNotFound(error)) {
        throw JobFailure.contractViolation(`input missing: ${sourceRef}`);
      }
      throw error;
    }
    return resolved;
  }

  private async executeCad(
    job: ConversionJob,
    inputPath: string,
    deadline: Deadline,
    log: Logger,
  ): Promise<RawArtifacts> {
    const lease = await this.executor.lease({
      owner: job.id,
      role: 'helper',
      image: this.options.helperImage,
      inputs: [],
      mountPath: EXCHANGE_MOUNT,
      limits: this.options.helperLimits,
      log,
    });

    try {
      const producer = new SignalFileProducer(
        lease.workDir,
        this.options.signalPollIntervalMs,
        log.child({ sandboxId: lease.id }),
      );
      await producer.submit(
        job.id,
        inputPath,
        fileExtension(job.originalFilename) || '.dwg',
      );

      const helper = await producer.awaitOutcome(job.id, deadline);
      if (helper.status !== 'done') {
        return decideOutcome({ helper });
      }

      const pdfName = `${path.parse(job.originalFilename).name || job.id}.pdf`;
      const run = await this.runProcessor(
        job,
        'pdf',
        helper.outputPath,
        pdfName,
        deadline,
        log,
      );
      return decideOutcome({ helper, run });
    } finally {
      await lease.destroy();
    }
  }

  private runProcessor(
    job: ConversionJob,
    kind: JobKind,
    sourcePath: string,
    originalFilename: string,
    deadline: Deadline,
    log: Logger,
  ): Promise<SandboxRunResult<CollectedArtifacts>> {
    const manifest: JobManifest = {
      job_id: job.id,
      kind,
      original_filename: originalFilename,
      original_extension: fileExtension(originalFilename),
    };

    return this.executor.run(
      {
        owner: job.id,
        role: 'processor',
        image: this.options.processorImage,
        inputs: [
          { name: INPUT_FILE, sourcePath },
          { name: JOB_FILE, content: JSON.stringify(manifest) },
        ],
        mountPath: WORK_MOUNT,
        limits: this.options.processorLimits,
        log,
      },
      deadline,
      (workDir) => this.collect(workDir, log),
    );
  }

  private async collect(
    workDir: string,
    log: Logger,
  ): Promise<CollectedArtifacts> {
    const processorLog = await this.readArtifact(workDir, PROCESSOR_LOG_FILE);
    if (processorLog) {
      log.debug(
        { output: processorLog.toString('utf-8').slice(0, LOG_PREVIEW_CHARS) },
        'Processor log',
      );
    }

    const raw = await this.readArtifact(workDir, RESULT_FILE);
    if (!raw) {
      return { result: null, thumbnail: null, thumbnailMissing: false };
    }
    const result = parseResult(raw);

    if (!result.thumbnailFile) {
      return { result, thumbnail: null, thumbnailMissing: false };
    }
    if (!isPlainFileName(result.thumbnailFile)) {
      log.warn(
        { thumbnailFile: result.thumbnailFile },
        'Ignoring thumbnail outside the work directory',
      );
      return {
        result: { ...result, thumbnailFile: null },
        thumbnail: null,
        thumbnailMissing: false,
      };
    }

    const thumbnail = await this.readArtifact(workDir, result.thumbnailFile);
    return { result, thumbnail, thumbnailMissing: thumbnail === null };
  }

  /**
   * Reads a regular file written by the sandbox. Symlinks are refused, since
   * they would resolve against the host filesystem.
   * @returns null when the file does not exist
   */
  private async readArtifact(
    workDir: string,
    name: string,
  ): Promise<Buffer | null> {
    let handle: FileHandle;
    try {
      handle = await fs.open(
        path.join(workDir, name),
        fs.constants.O_RDONLY | fs.constants.O_NOFOLLOW,
      );
    } catch (error) {
      if (isNotFound(error)) return null;
      throw JobFailure.execution(`unreadable artifact ${name}`);
    }

    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw JobFailure.execution(`artifact ${name} is not a regular file`);
      }
      if (stats.size > this.options.maxArtifactBytes) {
        throw JobFailure.rejected(
          `artifact ${name} is ${stats.size} bytes, limit ${this.options.maxArtifactBytes}`,
        );
      }
      return await handle.readFile();
    } finally {
      await handle.close();
    }
  }
}

function parseResult(raw: Buffer): ProcessorResult {
  let json: unknown;
  try {
    json = JSON.parse(raw.toString('utf-8'));
  } catch {
    throw JobFailure.execution('result.json is not valid JSON');
  }

  const parsed = ProcessorResultSchema.safeParse(json);
  if (!parsed.success) {
    throw JobFailure.execution(
      `result.json does not match the result schema: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
    );
  }
  return parsed.data;
}
