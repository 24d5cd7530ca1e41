import {
  addDays,
  daysBetweenInclusive,
  formatCompactDay,
  formatDay,
  parseDay,
  sleep,
} from '@/utils/time';

describe('time utils (unit)', () => {
  test('parses YYYY-MM-DD as UTC midnight', () => {
    expect(parseDay('2024-01-05').toISOString()).toBe('2024-01-05T00:00:00.000Z');
  });

  test('rejects malformed and impossible dates', () => {
    expect(() => parseDay('2024/01/05')).toThrow('expected YYYY-MM-DD');
    expect(() => parseDay('2023-02-29')).toThrow('Invalid date "2023-02-29"');
  });

  test('adds days across month and year boundaries', () => {
    expect(formatDay(addDays(parseDay('2024-02-28'), 1))).toBe('2024-02-29');
    expect(formatDay(addDays(parseDay('2024-12-31'), 1))).toBe('2025-01-01');
  });

  test('formats compact days for search bounds', () => {
    expect(formatCompactDay(parseDay('2023-04-28'))).toBe('20230428');
  });

  test('counts days inclusively', () => {
    expect(daysBetweenInclusive(parseDay('2024-01-01'), parseDay('2024-01-01'))).toBe(1);
    expect(daysBetweenInclusive(parseDay('2023-04-28'), parseDay('2025-10-28'))).toBe(915);
    expect(daysBetweenInclusive(parseDay('2024-01-02'), parseDay('2024-01-01'))).toBe(0);
  });

  test('sleep resolves after the delay', async () => {
    jest.useFakeTimers();
    try {
      const done = jest.fn();
      const pending = sleep(15_000).then(done);

      await jest.advanceTimersByTimeAsync(14_999);
      expect(done).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toHaveBeenCalledTimes(1);
    } finally {
      jest.useRealTimers();
    }
  });
});
