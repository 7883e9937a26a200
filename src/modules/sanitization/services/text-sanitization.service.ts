/* eslint-disable no-control-regex */
import { JobFailure } from '../../../shared/errors/job-failure';

export interface TextSanitizationOptions {
  /** Limit on the UTF-8 encoded length of the result. */
  maxBytes: number;
  /** Content larger than this is never treated as text for unknown kinds. */
  fallbackMaxBytes: number;
  /** Minimum share of printable characters for unknown kinds. */
  fallbackMinPrintable: number;
}

/** Cleans the text a processor reports in `result.json`. */
export class TextSanitizationService {
  private CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;
  private UNICODE_INVISIBLES = /[\u200B-\u200F\u202A-\u202E\u2060-\u206F]/g;
  private LONE_SURROGATES =
    /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;
  private NON_PRINTABLE = /[\p{C}\p{Z}]/u;

  constructor(private readonly options: TextSanitizationOptions) {}

  sanitizeText(text: string): string {
    let content = text.replace(this.LONE_SURROGATES, '\uFFFD');

    content = content.replace(/^\uFEFF/, '');

    content = content.replace(this.CONTROL_CHARS, '');

    content = content.replace(this.UNICODE_INVISIBLES, '');

    content = content.replace(/\r\n/g, '\n');

    content = content.replace(/\n{3,}/g, '\n\n');

    return truncateUtf8(content.trim(), this.options.maxBytes);
  }

  /**
   * Gate for text extracted from files of unknown format.
   * @throws {JobFailure} rejected when the content does not look like text
   */
  assertPlausibleText(text: string): void {
    const size = Buffer.byteLength(text, 'utf-8');
    if (size > this.options.fallbackMaxBytes) {
      throw JobFailure.rejected(
        `text rejected: ${size} bytes exceeds ${this.options.fallbackMaxBytes}`,
      );
    }
    if (text.includes('\0')) {
      throw JobFailure.rejected('text rejected: contains NUL bytes');
    }

    let total = 0;
    let printable = 0;
    for (const char of text) {
      total++;
      if (
        char === ' ' ||
        char === '\n' ||
        char === '\r' ||
        char === '\t' ||
        !this.NON_PRINTABLE.test(char)
      ) {
        printable++;
      }
    }

    const ratio = total ? printable / total : 0;
    if (ratio < this.options.fallbackMinPrintable) {
      throw JobFailure.rejected(
        `text rejected: printable ratio ${ratio.toFixed(3)} below ${this.options.fallbackMinPrintable}`,
      );
    }
  }
}

/** Cuts `text` to at most `maxBytes` of UTF-8 without splitting a character. */
export function truncateUtf8(text: string, maxBytes: number): string {
  const encoded = Buffer.from(text, 'utf-8');
  if (encoded.length <= maxBytes) return text;

  let cut = maxBytes;
  // back off continuation bytes (10xxxxxx) to the start of the character
  while (cut > 0 && (encoded[cut] & 0xc0) === 0x80) {
    cut--;
  }
  return encoded.subarray(0, cut).toString('utf-8');
}
