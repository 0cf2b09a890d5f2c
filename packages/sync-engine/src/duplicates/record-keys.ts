import { normalizeKey, type RunError, type SourceRecord } from '@catalog-sync/core';

export interface NormalizedRecords {
  records: SourceRecord[];
  /** Records whose key is empty once normalised */
  errors: RunError[];
}

/**
 * Bring record keys into the form entity profiles read from live assets,
 * so that source and catalog agree on which keys are equal.
 */
export function normalizeRecordKeys(records: readonly SourceRecord[]): NormalizedRecords {
  const normalized: SourceRecord[] = [];
  const errors: RunError[] = [];

  records.forEach((record, index) => {
    const key = normalizeKey(record.key);
    if (!key) {
      errors.push({
        code: 'INVALID_RECORD',
        message: `Record #${index} ('${record.label}') has an empty natural key`,
      });
      return;
    }
    normalized.push(key === record.key ? record : { ...record, key });
  });

  return { records: normalized, errors };
}
