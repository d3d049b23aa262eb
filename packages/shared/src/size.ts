/**
 * Modelsync Shared - Size Parsing
 */

const UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

/**
 * Parse "512MB", "80kb", "10MB/s" into a byte count (1024-based)
 */
export function parseSize(text: string): number {
  const match = /^\s*(\d+(?:\.\d+)?)\s*(B|KB|MB|GB)?(?:\/S)?\s*$/i.exec(text);
  if (!match || match[1] === undefined) {
    throw new Error(`Invalid size "${text}": expected a number followed by B, KB, MB or GB`);
  }

  const value = Number(match[1]);
  const unit = (match[2] ?? 'B').toUpperCase();
  const multiplier = UNITS[unit] ?? 1;

  return Math.floor(value * multiplier);
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB', 'TB'];
  let value = bytes / 1024;
  let index = 0;
  while (value >= 1024 && index < units.length - 1) {
    value /= 1024;
    index++;
  }
  return `${value.toFixed(value >= 100 ? 0 : value >= 10 ? 1 : 2)} ${units[index]}`;
}
