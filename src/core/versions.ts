/**
 * Compare dotted numeric versions (`1.2.0` style).
 * Missing or non-numeric parts count as zero, so `'1.2'` equals `'1.2.0'`.
 */
export function compareVersions(left: string, right: string): number {
  const a = toParts(left);
  const b = toParts(right);
  const length = Math.max(a.length, b.length);

  for (let index = 0; index < length; index += 1) {
    const diff = (a[index] ?? 0) - (b[index] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }

  return 0;
}

function toParts(version: string): number[] {
  return version
    .trim()
    .split('.')
    .map((part) => {
      const parsed = Number.parseInt(part, 10);
      return Number.isNaN(parsed) ? 0 : parsed;
    });
}
