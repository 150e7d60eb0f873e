import type { CustomPayWindow, Instant, MinuteOfDay } from '../core/types';

export type WorkRecord = Readonly<{
  id: string;
  date: string; // yyyy-MM-dd, local day of startTime
  startTime: string; // ISO 8601
  endTime: string; // ISO 8601
  totalSeconds: number; // payable, after window intersection
  hoursAndMinutesDisplay: string;
  halfHourDecimal: number;
  hourly: number;
  salary: number;
  modifiedHourly: boolean;
  description: string;
  usesCustomPayWindow: boolean;
  customPayStartMinutes?: MinuteOfDay;
  customPayEndMinutes?: MinuteOfDay;
}>;

export type RecordField = 'totalSeconds' | 'halfHourDecimal' | 'hourly' | 'salary';

export type NewRecordInput = {
  startTime: Instant;
  endTime: Instant;
  hourly: number;
  description?: string;
  customWindow?: CustomPayWindow;
};

export type RecordPatch = {
  startTime?: Instant;
  endTime?: Instant;
  hourly?: number;
  description?: string;
  /** null turns the override off and keeps the remembered minutes */
  customWindow?: CustomPayWindow | null;
};

export type RecordChangeDiff = {
  id: string;
  field: RecordField;
  before: number;
  after: number;
};
