import { ISanitizeFile } from '../../../shared/interfaces/sanitize-file.interface';
import { JobKind, RawArtifacts, SanitizedResult } from '../../../shared/types';
import { TextSanitizationService } from './text-sanitization.service';

/**
 * The only way sandbox output reaches storage. Either every artifact comes
 * out sanitized or the call throws and nothing is forwarded.
 */
export class ResultSanitizerService {
  constructor(
    private readonly imageSanitizer: ISanitizeFile<Buffer>,
    private readonly textSanitizer: TextSanitizationService,
  ) {}

  async sanitize(kind: JobKind, raw: RawArtifacts): Promise<SanitizedResult> {
    const thumbnail = raw.thumbnail
      ? await this.imageSanitizer.sanitize(raw.thumbnail)
      : null;

    let text: string | null = null;
    if (raw.result.extractedText) {
      if (kind === 'unknown') {
        this.textSanitizer.assertPlausibleText(raw.result.extractedText);
      }
      text = this.textSanitizer.sanitizeText(raw.result.extractedText) || null;
    }

    return { thumbnail, text };
  }
}
