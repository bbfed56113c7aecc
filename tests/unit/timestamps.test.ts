import { describe, expect, it } from 'vitest';
import { formatDay, formatTimestamp } from '@/utils/timestamps';

describe('timestamps', () => {
  const date = new Date(2024, 0, 5, 7, 8, 9, 123);

  it('formats the day', () => {
    expect(formatDay(date)).toBe('20240105');
  });

  it('formats seconds and optional microseconds', () => {
    expect(formatTimestamp(date)).toBe('20240105_070809');
    expect(formatTimestamp(date, { micros: true })).toBe('20240105_070809_123000');
  });
});
