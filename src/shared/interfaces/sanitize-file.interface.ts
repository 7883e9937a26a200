/**
 * Interface for sanitizers of binary artifacts that cross from a sandbox
 * into the trusted system. Images are decoded completely and the pixel grid
 * re-encoded, so appended or embedded bytes cannot ride along into storage.
 *
 * Implementations:
 * - `ImageSanitizationService` → canonical PNG thumbnail
 */
export interface ISanitizeFile<T> {
  /**
   * Sanitizes untrusted bytes.
   *
   * @param fileBuffer - Raw artifact bytes copied out of a sandbox
   *
   * **Failure Behavior:**
   * - Throws `JobFailure` with category `rejected` when the content cannot be
   *   made safe (undecodable image, binary data posing as text). The caller
   *   must not forward anything for that artifact.
   */
  sanitize(fileBuffer: Buffer): Promise<T>;
}
