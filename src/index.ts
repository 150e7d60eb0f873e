export * from './core/types';
export { formatDuration, halfHourFloor, toMinuteOfDay, fromMinuteOfDay } from './core/time';
export { paidSeconds, resolvePayWindow, windowBounds } from './core/payWindow';

export type * from './state/record-types';
export {
  createRecord,
  isValidInterval,
  recordDate,
  monthKey,
  isInMonth,
  type CreateRecordOptions,
} from './state/record';
export { fromJsonRecord } from './state/from-json';

export { recompute } from './orchestrator/recompute';
export { editRecord } from './orchestrator/edit';
export { applyWage, type ApplyWageOptions, type ApplyWageResult } from './orchestrator/applyWage';
export { buildDiff } from './orchestrator/diff';

export * from './store/recordStore';
export * from './store/fileStore';

export * from './config/settings';
export * from './config/env';

export * from './session/clock';

export { summarizeMonthly } from './summarize/summarizeMonthly';
export { shiftMonth, currentYearMonth, formatRecordLog } from './summarize/helpers';
export type * from './summarize/type';

export * from './ledger';
export * from './errors';
export { createLogger, configureLogger, setLogLevel, getLogLevel, LogLevel, type Logger } from './logger';
