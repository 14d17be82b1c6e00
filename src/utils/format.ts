/**
 * Text helpers for bot replies
 */

const UNITS: ReadonlyArray<[seconds: number, label: string]> = [
  [86400, 'д'],
  [3600, 'ч'],
  [60, 'мин'],
];

/**
 * Formats a duration in seconds as "1 ч 30 мин"
 */
export function formatDuration(totalSeconds: number): string {
  let rest = Math.max(0, Math.floor(totalSeconds));
  const parts: string[] = [];

  for (const [size, label] of UNITS) {
    const amount = Math.floor(rest / size);
    if (amount > 0) {
      parts.push(`${amount} ${label}`);
      rest -= amount * size;
    }
  }

  if (rest > 0 || parts.length === 0) {
    parts.push(`${rest} сек`);
  }

  return parts.join(' ');
}

export const truncate = (text: string, maxLength: number): string =>
  text.length <= maxLength ? text : `${text.slice(0, maxLength - 1)}…`;
