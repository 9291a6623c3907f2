// Monitoring window helpers
import type { DateRange } from '../types/index.js';

/**
 * DD/MM/YYYY in local time
 */
export function formatDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${day}/${month}/${date.getFullYear()}`;
}

/**
 * Window ending `now` and starting `days` calendar days earlier
 */
export function calculateDateRange(days: number, now: Date = new Date()): DateRange {
  const endDate = new Date(now.getTime());
  const startDate = new Date(now.getTime());
  startDate.setDate(startDate.getDate() - days);

  return {
    startDate,
    endDate,
    startDateStr: formatDate(startDate),
    endDateStr: formatDate(endDate),
  };
}
