const BYTE_UNITS: Record<string, number> = {
  '': 1,
  b: 1,
  k: 1024,
  kb: 1024,
  m: 1024 ** 2,
  mb: 1024 ** 2,
  g: 1024 ** 3,
  gb: 1024 ** 3,
};

/**
 * Parses a docker-style size ("512m", "2g", "1048576") into bytes.
 * Returns `undefined` for anything it does not recognise.
 */
export function parseByteSize(value: string): number | undefined {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([a-z]*)\s*$/i.exec(value);
  if (!match) {
    return undefined;
  }

  const multiplier = BYTE_UNITS[match[2].toLowerCase()];
  if (multiplier === undefined) {
    return undefined;
  }

  const bytes = Math.floor(parseFloat(match[1]) * multiplier);
  return bytes > 0 ? bytes : undefined;
}
