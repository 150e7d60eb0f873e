import type { RecordChangeDiff, RecordField, WorkRecord } from '../state/record-types';

const DIFF_FIELDS: RecordField[] = ['totalSeconds', 'halfHourDecimal', 'hourly', 'salary'];

/** Field-level before/after for records matched by id; unchanged fields are omitted. */
export function buildDiff(before: readonly WorkRecord[], after: readonly WorkRecord[]): RecordChangeDiff[] {
  if (before === after) return [];
  const byId = new Map(before.map((r) => [r.id, r] as const));
  const out: RecordChangeDiff[] = [];

  for (const a of after) {
    const b = byId.get(a.id);
    if (!b || b === a) continue;
    for (const field of DIFF_FIELDS) {
      if (b[field] !== a[field]) {
        out.push({ id: a.id, field, before: b[field], after: a[field] });
      }
    }
  }
  return out;
}
