/**
 * @fileoverview YamlRecordStore Tests
 *
 * File round trips run against a temporary directory.
 *
 * @module infrastructure/__tests__/repositories/YamlRecordStore
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RecordCorruptError, StorageUnavailableError } from '@periorecord/core';
import { PatientRegistry, normalizeRecords } from '@periorecord/domain';
import type { FlatRecord, FlatScalar } from '@periorecord/types';
import { YamlRecordStore } from '../../src/repositories/YamlRecordStore.js';

// ============================================================================
// TEST SETUP
// ============================================================================

function createTestFlatRecord(overrides: Record<string, FlatScalar> = {}): FlatRecord {
  const record: FlatRecord = {
    mrn: '222',
    first: 'tom',
    last: 'wagar',
    birthday: '19830303',
    sex: 'male',
    _type: 'PeriodicExam',
    date: '20210101',
    asa: null,
    note: null,
  };
  for (const [field, value] of Object.entries(overrides)) {
    record[field] = value;
  }
  return record;
}

describe('YamlRecordStore', () => {
  let directory: string;
  let path: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'periorecord-'));
    path = join(directory, 'records.yaml');
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  describe('read', () => {
    it('should read a missing file as an empty collection', () => {
      expect(new YamlRecordStore({ path }).read()).toEqual([]);
    });

    it('should read an empty file as an empty collection', () => {
      writeFileSync(path, '');

      expect(new YamlRecordStore({ path }).read()).toEqual([]);
    });

    it('should read a sequence of mappings', () => {
      writeFileSync(
        path,
        ['- mrn: 222', '  _type: Surgery', '  date: 20210826', '  biopsy: true', '  note: null'].join('\n')
      );

      expect(new YamlRecordStore({ path }).read()).toEqual([
        { mrn: 222, _type: 'Surgery', date: 20210826, biopsy: true, note: null },
      ]);
    });

    it('should hand over an oversized integer MRN so that loading reports it corrupt', () => {
      writeFileSync(
        path,
        [
          '- {mrn: 100, first: ada, last: moss, birthday: 19790412, sex: female, _type: PeriodicExam, date: 20210101}',
          '- {mrn: 12345678901234567891, first: tom, last: wagar, birthday: 19830303, sex: male, _type: PeriodicExam, date: 20210101}',
        ].join('\n')
      );
      const registry = new PatientRegistry();

      const summary = normalizeRecords(new YamlRecordStore({ path }).read(), registry);

      expect(summary.accepted).toBe(1);
      expect(summary.rejected).toHaveLength(1);
      expect(summary.rejected[0]).toBeInstanceOf(RecordCorruptError);
      expect(summary.rejected[0]?.recordIndex).toBe(1);
      expect(registry.values().map((patient) => patient.mrn)).toEqual(['100']);
    });

    it('should reject a file whose top level is not a sequence', () => {
      writeFileSync(path, 'mrn: 222\n');

      expect(() => new YamlRecordStore({ path }).read()).toThrow(
        `Cannot read records at ${path}: top level of the file is not a sequence of records`
      );
    });

    it('should reject a file that is not valid YAML', () => {
      writeFileSync(path, '- mrn: [unclosed\n');

      expect(() => new YamlRecordStore({ path }).read()).toThrow(StorageUnavailableError);
    });

    it('should reject a path that cannot be read as a file', () => {
      mkdirSync(path);

      const read = () => new YamlRecordStore({ path }).read();

      expect(read).toThrow(StorageUnavailableError);
    });
  });

  describe('write', () => {
    it('should round-trip records with their text and null values', () => {
      const store = new YamlRecordStore({ path });
      const records = [
        createTestFlatRecord({ asa: '2', note: 'stable' }),
        createTestFlatRecord({
          _type: 'Surgery',
          date: '20210826',
          biopsy: true,
          implant: '#30',
          sinus: null,
        }),
      ];

      store.write(records);

      expect(store.read()).toEqual(records);
    });

    it('should keep digit-only text as text', () => {
      const store = new YamlRecordStore({ path });

      store.write([createTestFlatRecord()]);

      expect(store.read()).toEqual([expect.objectContaining({ mrn: '222', date: '20210101' })]);
    });

    it('should replace the previous contents', () => {
      const store = new YamlRecordStore({ path });
      store.write([createTestFlatRecord({ mrn: '1' }), createTestFlatRecord({ mrn: '2' })]);

      store.write([createTestFlatRecord({ mrn: '3' })]);

      expect(store.read()).toHaveLength(1);
    });

    it('should write an empty sequence for no records', () => {
      const store = new YamlRecordStore({ path });

      store.write([]);

      expect(readFileSync(path, 'utf8')).toBe('[]\n');
      expect(store.read()).toEqual([]);
    });

    it('should leave no temporary file behind', () => {
      new YamlRecordStore({ path }).write([createTestFlatRecord()]);

      expect(readdirSync(directory)).toEqual(['records.yaml']);
    });

    it('should fail when the directory does not exist', () => {
      const store = new YamlRecordStore({ path: join(directory, 'missing', 'records.yaml') });

      expect(() => store.write([createTestFlatRecord()])).toThrow(StorageUnavailableError);
      expect(readdirSync(directory)).toEqual([]);
    });
  });
});
