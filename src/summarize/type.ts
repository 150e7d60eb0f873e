import type { WorkRecord } from '../state/record-types';

export type YearMonth = {
  year: number;
  month: number; // 1..12
};

export type MonthlySummary = YearMonth & {
  key: string; // yyyy-MM
  records: WorkRecord[];
  totalSeconds: number;
  totalDisplay: string;
  /** sum of each record's floored hours, not a floor of the sum */
  totalHalfHours: number;
  totalSalary: number;
};
