// Wayback Machine timestamps are digit prefixes of YYYYMMDDhhmmss
const TIMESTAMP_LENGTHS = [14, 12, 10, 8, 6, 4];

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Convert an archive timestamp such as `20230415123045` into
 * `2023/04/15 12:30:45`. Shorter prefixes (`202304`, `2023`) fill the
 * missing parts with the first month/day and midnight.
 *
 * Returns `null` when the value is not a valid timestamp.
 */
export function parseArchiveTimestamp(timestamp: string): string | null {
  if (!/^\d+$/.test(timestamp) || !TIMESTAMP_LENGTHS.includes(timestamp.length)) {
    return null;
  }

  const part = (start: number, end: number, fallback: number): number =>
    timestamp.length >= end ? Number(timestamp.slice(start, end)) : fallback;

  const year = part(0, 4, 1);
  const month = part(4, 6, 1);
  const day = part(6, 8, 1);
  const hour = part(8, 10, 0);
  const minute = part(10, 12, 0);
  const second = part(12, 14, 0);

  if (year < 1 || month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  // Day 0 of the following month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day < 1 || day > daysInMonth) return null;

  return `${pad(year, 4)}/${pad(month)}/${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}
