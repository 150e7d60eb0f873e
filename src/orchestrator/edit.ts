import { produce } from 'immer';
import type { PayWindowPolicy } from '../core/types';
import type { RecordPatch, WorkRecord } from '../state/record-types';
import { assertValidInterval, recordDate, toIso } from '../state/record';
import { clampMinuteOfDay } from '../state/number';
import { recompute } from './recompute';

/**
 * Applies a human edit and re-derives the record. Supplying an hourly that
 * differs from the current one marks the record as manually rated, which
 * protects it from later bulk wage updates.
 */
export function editRecord(record: WorkRecord, patch: RecordPatch, policy: PayWindowPolicy): WorkRecord {
  const startTime = patch.startTime != null ? toIso(patch.startTime) : record.startTime;
  const endTime = patch.endTime != null ? toIso(patch.endTime) : record.endTime;
  assertValidInterval(startTime, endTime);

  const hourlyChanged = patch.hourly != null && patch.hourly !== record.hourly;
  const hourly = patch.hourly ?? record.hourly;

  const edited = produce(record, (draft) => {
    draft.startTime = startTime;
    draft.endTime = endTime;
    draft.date = recordDate(startTime);
    if (hourlyChanged) draft.modifiedHourly = true;
    if (patch.description !== undefined) draft.description = patch.description;

    if (patch.customWindow === null) {
      draft.usesCustomPayWindow = false;
    } else if (patch.customWindow) {
      draft.usesCustomPayWindow = true;
      draft.customPayStartMinutes = clampMinuteOfDay(patch.customWindow.startMinutes);
      draft.customPayEndMinutes = clampMinuteOfDay(patch.customWindow.endMinutes);
    }
  });

  return recompute(edited, hourly, policy);
}
