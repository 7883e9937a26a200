import path from 'path';

/**
 * Resolves a job's source reference against the input directory.
 * @returns null when the reference points outside `inputDir`
 */
export function resolveInputPath(
  inputDir: string,
  sourceRef: string,
): string | null {
  const root = path.resolve(inputDir);
  const resolved = path.resolve(root, sourceRef);
  return resolved.startsWith(root + path.sep) ? resolved : null;
}
