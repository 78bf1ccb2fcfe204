import { describe, it, expect } from '@jest/globals';
import { formatBackupTimestamp, parseBackupTimestamp } from '../../src/backup/timestamp.js';

describe('backup timestamps', () => {
  it('formats UTC with fixed width', () => {
    expect(formatBackupTimestamp(new Date(Date.UTC(2026, 0, 2, 3, 4, 5, 6)))).toBe('20260102T030405006Z');
  });

  it('sorts in creation order', () => {
    const earlier = formatBackupTimestamp(new Date(Date.UTC(2026, 8, 30, 23, 59, 59, 999)));
    const later = formatBackupTimestamp(new Date(Date.UTC(2026, 9, 1, 0, 0, 0, 0)));
    expect([later, earlier].sort()).toEqual([earlier, later]);
  });

  it('parses its own output and rejects anything else', () => {
    const date = new Date(Date.UTC(2026, 9, 19, 9, 30, 0, 123));
    expect(parseBackupTimestamp(formatBackupTimestamp(date))?.getTime()).toBe(date.getTime());
    expect(parseBackupTimestamp('2026-10-19')).toBeNull();
  });
});
