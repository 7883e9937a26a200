import { spawn } from 'child_process';
import { logger } from '../../config/logger';
import {
  ConversionRun,
  IConversionToolchain,
} from '../../shared/interfaces/conversion-toolchain.interface';

const OUTPUT_PREVIEW_CHARS = 2000;

/**
 * Runs QCAD's `dwg2pdf` once per request. A run that outlives `timeoutMs` is
 * killed and reported with exit code 124, matching coreutils `timeout`.
 */
export class Dwg2PdfToolchain implements IConversionToolchain {
  constructor(
    private readonly binaryPath: string,
    private readonly timeoutMs: number,
  ) {}

  convert(inputPath: string, outputPath: string): Promise<ConversionRun> {
    const args = ['-a', '-auto-orientation', '-f', '-o', outputPath, inputPath];

    return new Promise<ConversionRun>((resolve, reject) => {
      const child = spawn(this.binaryPath, args, {
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      let output = '';
      let timedOut = false;

      const append = (buf: Buffer) => {
        if (output.length < OUTPUT_PREVIEW_CHARS) {
          output += String(buf);
        }
      };
      child.stdout.on('data', append);
      child.stderr.on('data', append);

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, this.timeoutMs);

      child.on('error', (error) => {
        clearTimeout(timer);
        reject(error);
      });
      child.on('close', (code) => {
        clearTimeout(timer);
        const exitCode = timedOut ? 124 : code ?? 1;
        logger.debug({ inputPath, exitCode }, 'dwg2pdf finished');
        resolve({ exitCode, output: output.slice(0, OUTPUT_PREVIEW_CHARS) });
      });
    });
  }
}
