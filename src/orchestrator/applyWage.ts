import { produce } from 'immer';
import type { PayWindowPolicy } from '../core/types';
import type { RecordChangeDiff, WorkRecord } from '../state/record-types';
import { recompute } from './recompute';
import { buildDiff } from './diff';

export type ApplyWageOptions = {
  hourly: number;
  /** also overwrite records whose rate was set by hand */
  applyToModifiedHourly: boolean;
  policy: PayWindowPolicy;
  filter?: (record: WorkRecord) => boolean;
};

export type ApplyWageResult = {
  next: readonly WorkRecord[];
  changed: number; // records that were eligible and recomputed
  diff: RecordChangeDiff[];
};

export const isEligible = (record: WorkRecord, applyToModifiedHourly: boolean) =>
  applyToModifiedHourly || !record.modifiedHourly;

export function applyWage(records: readonly WorkRecord[], opts: ApplyWageOptions): ApplyWageResult {
  const { hourly, applyToModifiedHourly, policy, filter } = opts;
  let changed = 0;

  const next = produce(records, (draft) => {
    records.forEach((rec, i) => {
      if (filter && !filter(rec)) return;
      if (!isEligible(rec, applyToModifiedHourly)) return;
      draft[i] = recompute(rec, hourly, policy);
      changed++;
    });
  });

  return { next, changed, diff: buildDiff(records, next) };
}
