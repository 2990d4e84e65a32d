// Parse human-readable byte sizes ("5MB", "512 KB", "1048576")

const UNITS: Record<string, number> = {
  b: 1,
  kb: 1024,
  mb: 1024 * 1024,
  gb: 1024 * 1024 * 1024,
};

export function parseSize(input: string | number): number | undefined {
  if (typeof input === 'number') {
    return Number.isInteger(input) && input > 0 ? input : undefined;
  }

  const match = input.trim().toLowerCase().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/);
  if (!match) return undefined;

  const multiplier = UNITS[match[2] ?? 'b'];
  const bytes = Math.floor(parseFloat(match[1]) * multiplier);
  return bytes > 0 ? bytes : undefined;
}
