import CircuitBreaker from 'opossum';
import { Client } from 'minio';
import { createCircuitBreaker } from '../../../shared/utils/cb';
import { IResultStore } from '../../../shared/interfaces/result-store.interface';
import { SanitizedResult, StoredResultRef } from '../../../shared/types';

export type ThumbnailClient = Pick<Client, 'makeBucket' | 'putObject'>;

const BUCKET_EXISTS_CODES = new Set([
  'BucketAlreadyOwnedByYou',
  'BucketAlreadyExists',
]);

function isBucketExistsError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const code = 'code' in error ? error.code : undefined;
  const statusCode = 'statusCode' in error ? error.statusCode : undefined;
  return (
    (typeof code === 'string' && BUCKET_EXISTS_CODES.has(code)) ||
    statusCode === 409
  );
}

/**
 * Uploads sanitized thumbnails to MinIO as `{jobId}.png`. Extracted text is
 * returned as-is for the job row; object storage only holds images.
 */
export class MinioResultStore implements IResultStore {
  private bucketReady?: Promise<void>;
  private readonly uploadBreaker: CircuitBreaker<[string, Buffer], void>;

  constructor(
    private readonly client: ThumbnailClient,
    private readonly bucket: string,
    breakerOptions: CircuitBreaker.Options = {
      timeout: 10000,
      errorThresholdPercentage: 50,
      resetTimeout: 30000,
    },
  ) {
    this.uploadBreaker = createCircuitBreaker(
      'thumbnail-upload',
      this.upload.bind(this),
      breakerOptions,
    );
  }

  async save(jobId: string, result: SanitizedResult): Promise<StoredResultRef> {
    let thumbnailKey: string | null = null;

    if (result.thumbnail) {
      thumbnailKey = `${jobId}.png`;
      await this.uploadBreaker.fire(thumbnailKey, result.thumbnail);
    }

    return { thumbnailKey, extractedText: result.text };
  }

  private async upload(key: string, png: Buffer): Promise<void> {
    await this.ensureBucket();
    await this.client.putObject(this.bucket, key, png, png.length, {
      'Content-Type': 'image/png',
    });
  }

  private ensureBucket(): Promise<void> {
    if (!this.bucketReady) {
      this.bucketReady = this.client.makeBucket(this.bucket).catch((error) => {
        if (isBucketExistsError(error)) return;
        // allow the next upload to try again
        this.bucketReady = undefined;
        throw error;
      });
    }
    return this.bucketReady;
  }
}
