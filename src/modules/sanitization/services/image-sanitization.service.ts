import sharp from 'sharp';
import { JobFailure } from '../../../shared/errors/job-failure';
import { ISanitizeFile } from '../../../shared/interfaces/sanitize-file.interface';
import { errorMessage } from '../../../shared/utils/error-message';

export interface ThumbnailSize {
  width: number;
  height: number;
}

/**
 * Decodes the whole image and writes a fresh PNG of the decoded pixels at
 * the thumbnail size. Metadata, trailing bytes and anything else outside the
 * pixel grid are left behind.
 */
export class ImageSanitizationService implements ISanitizeFile<Buffer> {
  constructor(private readonly size: ThumbnailSize) {}

  async sanitize(fileBuffer: Buffer): Promise<Buffer> {
    try {
      return await sharp(fileBuffer, { failOn: 'truncated' })
        .resize(this.size.width, this.size.height, {
          fit: 'cover',
          position: 'top',
        })
        .png()
        .toBuffer();
    } catch (error) {
      const message = errorMessage(error);
      throw JobFailure.rejected(`thumbnail rejected: ${message}`);
    }
  }
}
