import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import {
  ConversionRun,
  IConversionToolchain,
} from '../../shared/interfaces/conversion-toolchain.interface';
import { SignalFileConsumer } from '../../modules/conversion/services/signal-file.consumer';
import { ProcessorResultFile } from '../../modules/orchestration/services/sandbox-orchestrator.service';
import { SandboxBehavior } from '../mocks/sandbox-runtime';

export const PROCESSOR_IMAGE = 'thumbnail-processor:test';
export const HELPER_IMAGE = 'cad-helper:test';

export function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export function solidPng(
  width: number,
  height: number,
  background = { r: 200, g: 40, b: 40 },
): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background } })
    .png()
    .toBuffer();
}

export async function writeResult(
  workDir: string,
  result: ProcessorResultFile,
): Promise<void> {
  await fs.writeFile(
    path.join(workDir, 'result.json'),
    JSON.stringify({
      thumbnail_file: null,
      extracted_text: null,
      error: null,
      ...result,
    }),
  );
}

export interface ProcessorScript {
  thumbnail?: Buffer;
  text?: string;
  exitCode?: number;
}

/**
 * A processor that behaves like the real image: reads `job.json`, writes a
 * thumbnail, `result.json` and `processor.log`.
 */
export function processorBehavior(script: ProcessorScript = {}): SandboxBehavior {
  return async ({ workDir }) => {
    const job: unknown = JSON.parse(
      await fs.readFile(path.join(workDir, 'job.json'), 'utf-8'),
    );
    await fs.writeFile(
      path.join(workDir, 'processor.log'),
      `processing ${JSON.stringify(job)}\n`,
    );

    if (script.thumbnail) {
      await fs.writeFile(path.join(workDir, 'thumbnail.png'), script.thumbnail);
    }
    await writeResult(workDir, {
      success: true,
      thumbnail_file: script.thumbnail ? 'thumbnail.png' : null,
      extracted_text: script.text ?? null,
    });
    return script.exitCode ?? 0;
  };
}

export const FAKE_PDF = '%PDF-1.4 fake drawing';

export class FakeDwgToolchain implements IConversionToolchain {
  readonly calls: Array<{ inputPath: string; outputPath: string }> = [];

  constructor(
    private readonly options: {
      exitCode?: number;
      writeOutput?: boolean;
      delayMs?: number;
    } = {},
  ) {}

  async convert(inputPath: string, outputPath: string): Promise<ConversionRun> {
    this.calls.push({ inputPath, outputPath });
    if (this.options.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
    }
    const exitCode = this.options.exitCode ?? 0;
    if (this.options.writeOutput ?? exitCode === 0) {
      await fs.writeFile(outputPath, FAKE_PDF);
    }
    return { exitCode, output: '' };
  }
}

async function pendingRequests(workDir: string): Promise<string[]> {
  return (await fs.readdir(workDir))
    .filter((name) => name.endsWith('.convert') && !name.startsWith('.'))
    .map((name) => name.slice(0, -'.convert'.length))
    .sort();
}

/** Deletes the source a request names, as if the copy was lost. */
async function dropRequestedSource(workDir: string, jobId: string): Promise<void> {
  const marker = path.join(workDir, `${jobId}.convert`);
  const source = (await fs.readFile(marker, 'utf-8')).trim();
  await fs.rm(path.join(workDir, source), { force: true });
}

/** The real helper loop, running on the mounted exchange directory. */
export function helperBehavior(
  toolchain: IConversionToolchain,
  options: { pollIntervalMs?: number; loseSources?: boolean } = {},
): SandboxBehavior {
  const pollIntervalMs = options.pollIntervalMs ?? 5;

  return async ({ workDir, signal }) => {
    const consumer = new SignalFileConsumer(workDir, toolchain, pollIntervalMs);
    if (!options.loseSources) {
      await consumer.run(signal);
      return 0;
    }

    while (!signal.aborted) {
      for (const jobId of await pendingRequests(workDir)) {
        await dropRequestedSource(workDir, jobId);
        await consumer.handle(jobId);
      }
      await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
    }
    return 0;
  };
}
