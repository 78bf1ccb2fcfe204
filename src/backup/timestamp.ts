/**
 * Fixed-width UTC timestamps for backup file names.
 * `YYYYMMDDTHHMMSSmmmZ` sorts lexicographically in creation order.
 */

export const BACKUP_TIMESTAMP_PATTERN = '\\d{8}T\\d{9}Z';

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatBackupTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1, 2) +
    pad(date.getUTCDate(), 2) +
    'T' +
    pad(date.getUTCHours(), 2) +
    pad(date.getUTCMinutes(), 2) +
    pad(date.getUTCSeconds(), 2) +
    pad(date.getUTCMilliseconds(), 3) +
    'Z'
  );
}

export function parseBackupTimestamp(stamp: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{3})Z$/.exec(stamp);
  if (!match) return null;
  const [, year, month, day, hour, minute, second, ms] = match.map(Number);
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second, ms));
}
