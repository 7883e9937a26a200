import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { ImageSanitizationService } from '../services/image-sanitization.service';
import { JobFailure } from '../../../shared/errors/job-failure';
import { solidPng } from '../../../tests/fixtures/sandbox';

const MARKER = 'hidden-payload-marker';

describe('ImageSanitizationService', () => {
  const service = new ImageSanitizationService({ width: 64, height: 48 });

  it('should produce a PNG at the thumbnail size', async () => {
    const output = await service.sanitize(await solidPng(200, 100));

    const metadata = await sharp(output).metadata();
    expect(metadata.format).toBe('png');
    expect(metadata.width).toBe(64);
    expect(metadata.height).toBe(48);
  });

  it('should drop bytes appended after the image data', async () => {
    const jpeg = await sharp({
      create: { width: 80, height: 60, channels: 3, background: { r: 10, g: 90, b: 160 } },
    })
      .jpeg()
      .toBuffer();
    const polyglot = Buffer.concat([jpeg, Buffer.from(`<?php /* ${MARKER} */ ?>`)]);

    const output = await service.sanitize(polyglot);

    expect(output.includes(MARKER)).toBe(false);
    expect((await sharp(output).metadata()).format).toBe('png');
  });

  it('should drop embedded metadata', async () => {
    const tagged = await sharp({
      create: { width: 80, height: 60, channels: 3, background: { r: 10, g: 90, b: 160 } },
    })
      .jpeg()
      .withExif({ IFD0: { ImageDescription: MARKER } })
      .toBuffer();
    expect(tagged.includes(MARKER)).toBe(true);

    const output = await service.sanitize(tagged);

    expect(output.includes(MARKER)).toBe(false);
    expect((await sharp(output).metadata()).exif).toBeUndefined();
  });

  it('should be idempotent on its own output', async () => {
    const once = await service.sanitize(await solidPng(120, 90));
    const twice = await service.sanitize(once);

    const [first, second] = await Promise.all([
      sharp(once).raw().toBuffer({ resolveWithObject: true }),
      sharp(twice).raw().toBuffer({ resolveWithObject: true }),
    ]);
    expect(second.info.width).toBe(first.info.width);
    expect(second.info.height).toBe(first.info.height);
    expect(second.info.channels).toBe(first.info.channels);
    expect(second.data.equals(first.data)).toBe(true);
  });

  it('should reject bytes that are not an image', async () => {
    const error: unknown = await service
      .sanitize(Buffer.from('%PDF-1.4 definitely not pixels'))
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(JobFailure);
    expect(error).toMatchObject({ category: 'rejected' });
    expect(String(error)).toContain('thumbnail rejected: ');
  });

  it('should reject a truncated image', async () => {
    const png = await solidPng(300, 300);

    await expect(
      service.sanitize(png.subarray(0, Math.floor(png.length / 2))),
    ).rejects.toMatchObject({ category: 'rejected' });
  });
});
