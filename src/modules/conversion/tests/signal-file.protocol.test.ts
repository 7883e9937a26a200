import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import {
  CAUSE_MAX_LENGTH,
  cleanCause,
  copyFileAtomic,
  isPlainFileName,
  isSafeJobId,
  signalPaths,
  writeFileAtomic,
} from '../services/signal-file.protocol';
import { makeTempDir } from '../../../tests/fixtures/sandbox';

describe('signal file protocol', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should accept only job ids that are plain file stems', () => {
    expect(isSafeJobId('3f2a9c1e-5b7d-4e8f-9a0b-1c2d3e4f5a6b')).toBe(true);
    expect(isSafeJobId('job_1')).toBe(true);
    expect(isSafeJobId('-job')).toBe(false);
    expect(isSafeJobId('job.1')).toBe(false);
    expect(isSafeJobId('a/b')).toBe(false);
    expect(isSafeJobId('')).toBe(false);
    expect(isSafeJobId('a'.repeat(129))).toBe(false);
  });

  it('should accept only bare, visible file names', () => {
    expect(isPlainFileName('job-1.dwg')).toBe(true);
    expect(isPlainFileName('../job-1.dwg')).toBe(false);
    expect(isPlainFileName('dir/job-1.dwg')).toBe(false);
    expect(isPlainFileName('dir\\job-1.dwg')).toBe(false);
    expect(isPlainFileName('.job-1.dwg')).toBe(false);
    expect(isPlainFileName('x'.repeat(256))).toBe(false);
  });

  it('should derive every marker path from the job id', () => {
    expect(signalPaths('/exchange', 'job-1')).toEqual({
      request: '/exchange/job-1.convert',
      done: '/exchange/job-1.done',
      failed: '/exchange/job-1.failed',
      output: '/exchange/job-1.pdf',
    });
  });

  it('should strip control characters and bound the cause', () => {
    expect(cleanCause('\x1b[31mfailed\x1b[0m\r\n')).toBe('[31mfailed[0m');
    expect(cleanCause('line one\nline two\ttab')).toBe('line one\nline two\ttab');
    expect(cleanCause('e'.repeat(CAUSE_MAX_LENGTH + 20))).toHaveLength(CAUSE_MAX_LENGTH);
  });

  it('should write and copy files without leaving temp files behind', async () => {
    dir = await makeTempDir('protocol');
    const target = path.join(dir, 'job-1.done');
    const copy = path.join(dir, 'job-1.dwg');

    await writeFileAtomic(target, 'ok');
    await copyFileAtomic(target, copy);

    expect((await fs.readdir(dir)).sort()).toEqual(['job-1.done', 'job-1.dwg']);
    await expect(fs.readFile(copy, 'utf-8')).resolves.toBe('ok');
    expect((await fs.stat(copy)).mode & 0o777).toBe(0o644);
  });

  it('should clean up the temp file when the copy fails', async () => {
    dir = await makeTempDir('protocol');

    await expect(
      copyFileAtomic(path.join(dir, 'missing.dwg'), path.join(dir, 'job-1.dwg')),
    ).rejects.toMatchObject({ code: 'ENOENT' });
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
