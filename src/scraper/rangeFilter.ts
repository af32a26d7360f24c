import type { CalendarDate, GameRecord } from '../types';

/** Keeps records dated within `[startDate, endDate]`, both ends inclusive, in their original order. */
export function filterByDateRange<T extends Pick<GameRecord, 'date'>>(
  records: readonly T[],
  startDate: CalendarDate,
  endDate: CalendarDate
): T[] {
  // ISO calendar dates order lexicographically
  return records.filter(record => record.date >= startDate && record.date <= endDate);
}
