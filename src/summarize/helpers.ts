import { format, parseISO } from 'date-fns';
import type { WorkRecord } from '../state/record-types';
import type { YearMonth } from './type';
import { fromMinuteOfDay } from '../core/time';

export const currentYearMonth = (now: Date = new Date()): YearMonth => ({
  year: now.getFullYear(),
  month: now.getMonth() + 1,
});

// {2025, 12} + 1 -> {2026, 1}
export function shiftMonth(from: YearMonth, offset: number): YearMonth {
  const idx = from.year * 12 + (from.month - 1) + Math.trunc(offset);
  return { year: Math.floor(idx / 12), month: (((idx % 12) + 12) % 12) + 1 };
}

const STAMP = 'yyyy/MM/dd (EEE) HH:mm';

/** Plain-text dump of one record, for logs and debugging. */
export function formatRecordLog(r: WorkRecord): string {
  const lines = [
    '--------------------------',
    `Date: ${format(parseISO(r.date), 'yyyy/MM/dd (EEE)')}`,
    `Start: ${format(parseISO(r.startTime), STAMP)}`,
    `End: ${format(parseISO(r.endTime), STAMP)}`,
    `Hours: ${r.hoursAndMinutesDisplay}`,
    `HalfHourDecimal: ${r.halfHourDecimal.toFixed(1)}`,
    `Salary: ${Math.trunc(r.salary)}`,
    `Hourly: ${Math.trunc(r.hourly)}`,
    `Modified: ${r.modifiedHourly}`,
  ];
  if (r.usesCustomPayWindow && r.customPayStartMinutes != null && r.customPayEndMinutes != null) {
    lines.push(
      `PayWindow: ${fromMinuteOfDay(r.customPayStartMinutes)}-${fromMinuteOfDay(r.customPayEndMinutes)} (custom)`,
    );
  }
  lines.push(`Description: ${r.description}`);
  return lines.join('\n');
}
