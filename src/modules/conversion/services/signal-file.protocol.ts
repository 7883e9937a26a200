/* eslint-disable no-control-regex */
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { isNotFound } from '../../../infrastructure/sandbox/volume.manager';

export const REQUEST_SUFFIX = '.convert';
export const DONE_SUFFIX = '.done';
export const FAILED_SUFFIX = '.failed';
export const OUTPUT_SUFFIX = '.pdf';

export const CAUSE_MAX_LENGTH = 500;

const SAFE_JOB_ID = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;
const UNSAFE_CAUSE_CHARS = /[\x00-\x08\x0B-\x1F\x7F]/g;

export interface SignalPaths {
  request: string;
  done: string;
  failed: string;
  output: string;
}

export function isSafeJobId(jobId: string): boolean {
  return SAFE_JOB_ID.test(jobId);
}

/** A bare file name inside the exchange directory, nothing else. */
export function isPlainFileName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= 255 &&
    path.basename(name) === name &&
    !name.startsWith('.') &&
    !name.includes('\\') &&
    !name.includes('\0')
  );
}

export function signalPaths(exchangeDir: string, jobId: string): SignalPaths {
  const base = path.join(exchangeDir, jobId);
  return {
    request: `${base}${REQUEST_SUFFIX}`,
    done: `${base}${DONE_SUFFIX}`,
    failed: `${base}${FAILED_SUFFIX}`,
    output: `${base}${OUTPUT_SUFFIX}`,
  };
}

/** Cause text as stored on a job: single line-ish, printable, bounded. */
export function cleanCause(text: string): string {
  return text
    .replace(UNSAFE_CAUSE_CHARS, '')
    .trim()
    .slice(0, CAUSE_MAX_LENGTH);
}

function tempPathFor(filePath: string): string {
  return path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${uuid()}.tmp`,
  );
}

/**
 * Writes to a hidden temp file in the same directory and renames it into
 * place, so a poller never observes a partial file.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Buffer,
): Promise<void> {
  const tmp = tempPathFor(filePath);
  try {
    await fs.writeFile(tmp, data, { mode: 0o644 });
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

export async function copyFileAtomic(
  sourcePath: string,
  filePath: string,
): Promise<void> {
  const tmp = tempPathFor(filePath);
  try {
    await fs.copyFile(sourcePath, tmp);
    await fs.chmod(tmp, 0o644);
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}
