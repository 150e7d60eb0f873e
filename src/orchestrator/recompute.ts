import { produce } from 'immer';
import type { PayWindowPolicy } from '../core/types';
import type { WorkRecord } from '../state/record-types';
import { paidSeconds, resolvePayWindow } from '../core/payWindow';
import { formatDuration, halfHourFloor } from '../core/time';

/**
 * Re-derives payable time and pay for one record. Only the timing/pay fields
 * and the applied hourly change; flags, description, date and the custom
 * window minutes are carried over untouched.
 */
export function recompute(record: WorkRecord, hourly: number, global: PayWindowPolicy): WorkRecord {
  const window = resolvePayWindow(record, global);
  const payable = paidSeconds(
    record.startTime,
    record.endTime,
    window.enabled,
    window.startMinutes,
    window.endMinutes,
  );
  const half = halfHourFloor(payable);

  return produce(record, (draft) => {
    draft.totalSeconds = payable;
    draft.hoursAndMinutesDisplay = formatDuration(payable);
    draft.halfHourDecimal = half;
    draft.hourly = hourly;
    draft.salary = half * hourly;
  });
}
