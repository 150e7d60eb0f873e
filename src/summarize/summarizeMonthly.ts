import type { WorkRecord } from '../state/record-types';
import type { MonthlySummary } from './type';
import { isInMonth, monthKey } from '../state/record';
import { formatDuration } from '../core/time';
import { sum } from '../state/number';

export function summarizeMonthly(
  records: readonly WorkRecord[],
  year: number,
  month: number,
): MonthlySummary {
  const inMonth = records.filter((r) => isInMonth(r, year, month));
  const totalSeconds = sum(inMonth.map((r) => r.totalSeconds));

  return {
    year,
    month,
    key: monthKey(year, month),
    records: inMonth,
    totalSeconds,
    totalDisplay: formatDuration(totalSeconds),
    totalHalfHours: sum(inMonth.map((r) => r.halfHourDecimal)),
    totalSalary: sum(inMonth.map((r) => r.salary)),
  };
}
