import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { SignalFileProducer } from '../services/signal-file.producer';
import { SignalFileConsumer } from '../services/signal-file.consumer';
import { JobFailure } from '../../../shared/errors/job-failure';
import { Deadline } from '../../../shared/utils/deadline';
import { FAKE_PDF, FakeDwgToolchain, makeTempDir } from '../../../tests/fixtures/sandbox';

describe('SignalFileProducer', () => {
  let root: string;
  let dir: string;
  let source: string;
  let producer: SignalFileProducer;

  const exchangeFile = (name: string) => path.join(dir, name);

  beforeEach(async () => {
    root = await makeTempDir('producer');
    dir = path.join(root, 'exchange');
    await fs.mkdir(dir);
    source = path.join(root, 'upload.bin');
    await fs.writeFile(source, 'AC1032 drawing bytes');
    producer = new SignalFileProducer(dir, 5);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('submit', () => {
    it('should place the source and a request naming it', async () => {
      await producer.submit('job-1', source, '.DWG');

      expect((await fs.readdir(dir)).sort()).toEqual(['job-1.convert', 'job-1.dwg']);
      await expect(fs.readFile(exchangeFile('job-1.convert'), 'utf-8')).resolves.toBe(
        'job-1.dwg',
      );
      await expect(fs.readFile(exchangeFile('job-1.dwg'), 'utf-8')).resolves.toBe(
        'AC1032 drawing bytes',
      );
    });

    it('should reject an id that is not safe as a file name', async () => {
      await expect(producer.submit('../job-1', source, '.dwg')).rejects.toMatchObject({
        category: 'contract-violation',
        message: 'invalid job id for conversion: ../job-1',
      });
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('should refuse a second request while the first is pending', async () => {
      await producer.submit('job-1', source, '.dwg');

      const error: unknown = await producer
        .submit('job-1', source, '.dwg')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(JobFailure);
      expect(error).toMatchObject({
        category: 'transient',
        message: 'conversion request for job-1 already pending',
      });
    });

    it('should refuse a request while an old outcome is still present', async () => {
      await fs.writeFile(exchangeFile('job-1.failed'), 'DWG file not found');

      await expect(producer.submit('job-1', source, '.dwg')).rejects.toMatchObject({
        category: 'transient',
        message: 'conversion outcome for job-1 already present in exchange directory',
      });
    });
  });

  describe('awaitOutcome', () => {
    it('should return the output path once the helper is done', async () => {
      await fs.writeFile(exchangeFile('job-1.pdf'), FAKE_PDF);
      await fs.writeFile(exchangeFile('job-1.done'), '');

      await expect(producer.awaitOutcome('job-1', Deadline.after(1000))).resolves.toEqual({
        status: 'done',
        outputPath: exchangeFile('job-1.pdf'),
      });
    });

    it('should fail a done marker without output', async () => {
      await fs.writeFile(exchangeFile('job-1.done'), '');

      await expect(producer.awaitOutcome('job-1', Deadline.after(1000))).resolves.toEqual({
        status: 'failed',
        cause: 'conversion output missing',
      });
    });

    it('should return the cleaned cause from a failed marker', async () => {
      await fs.writeFile(exchangeFile('job-1.failed'), '  disk full\x07\n');

      await expect(producer.awaitOutcome('job-1', Deadline.after(1000))).resolves.toEqual({
        status: 'failed',
        cause: 'disk full',
      });
    });

    it('should substitute a generic cause for an empty failed marker', async () => {
      await fs.writeFile(exchangeFile('job-1.failed'), '');

      await expect(producer.awaitOutcome('job-1', Deadline.after(1000))).resolves.toEqual({
        status: 'failed',
        cause: 'conversion failed',
      });
    });

    it('should time out when no marker appears before the deadline', async () => {
      const started = Date.now();

      await expect(producer.awaitOutcome('job-1', Deadline.after(40))).resolves.toEqual({
        status: 'timeout',
      });
      expect(Date.now() - started).toBeGreaterThanOrEqual(30);
    });
  });

  it('should complete a round trip with the helper', async () => {
    const consumer = new SignalFileConsumer(dir, new FakeDwgToolchain(), 5);

    await producer.submit('job-1', source, '.dwg');
    const outcome = producer.awaitOutcome('job-1', Deadline.after(2000));
    await consumer.scanOnce();

    await expect(outcome).resolves.toEqual({
      status: 'done',
      outputPath: exchangeFile('job-1.pdf'),
    });
    await expect(fs.readFile(exchangeFile('job-1.pdf'), 'utf-8')).resolves.toBe(FAKE_PDF);
  });
});
