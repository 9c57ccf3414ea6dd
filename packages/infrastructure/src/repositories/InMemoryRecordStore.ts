/**
 * In-Memory Record Store
 *
 * Test/development adapter for the RecordStore port.
 *
 * WARNING: Not suitable for production - records are lost on exit.
 * For production, use YamlRecordStore.
 *
 * @module @periorecord/infrastructure/repositories/in-memory-record-store
 */

import type { RecordStore } from '@periorecord/domain';
import type { FlatRecord } from '@periorecord/types';

/**
 * @example
 * ```typescript
 * const store = new InMemoryRecordStore([{ mrn: '222', _type: 'PeriodicExam', ... }]);
 * const service = createRecordService({ repository: new RecordRepository(store) });
 * ```
 */
export class InMemoryRecordStore implements RecordStore {
  readonly location = 'memory';
  private records: unknown[];

  constructor(records: readonly unknown[] = []) {
    this.records = records.map(copyRecord);
  }

  read(): unknown[] {
    return this.records.map(copyRecord);
  }

  write(records: readonly FlatRecord[]): void {
    this.records = records.map(copyRecord);
  }
}

// Records are flat mappings of scalars, so a shallow copy detaches them
function copyRecord(record: unknown): unknown {
  return typeof record === 'object' && record !== null ? { ...record } : record;
}
