/**
 * @fileoverview Tests for the patient entity and the MRN-keyed registry
 *
 * @module domain/__tests__/periodontal-patient
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '@periorecord/core';
import { createAppointment } from '../periodontal/appointment.js';
import {
  createPatient,
  describePatient,
  matchesMrn,
  mrnOf,
  readMrn,
  toPatientRecord,
  withAppointments,
} from '../periodontal/patient.js';
import { PatientRegistry } from '../periodontal/patient-registry.js';
import { createTestPatientFields, createTestRecord } from './periodontal-fixtures.js';

// ============================================================================
// PATIENT
// ============================================================================

describe('createPatient', () => {
  it('should build a patient without appointments', () => {
    const patient = createPatient(createTestPatientFields());

    expect(patient).toEqual({
      mrn: '222',
      first: 'tom',
      last: 'wagar',
      birthday: '19830303',
      sex: 'male',
      appointments: [],
    });
  });

  it('should accept integer mrn and birthday', () => {
    const patient = createPatient({ ...createTestPatientFields(), mrn: 222, birthday: 19830303 });

    expect(patient.mrn).toBe('222');
    expect(patient.birthday).toBe('19830303');
  });

  it('should reject an unknown sex', () => {
    expect(() => createPatient({ ...createTestPatientFields(), sex: 'other' })).toThrow(
      ValidationError
    );
  });

  it('should reject a birthday that does not exist', () => {
    expect(() => createPatient(createTestPatientFields({ birthday: '19830230' }))).toThrow(
      'Invalid patient: birthday: Not an existing calendar date'
    );
  });

  it('should reject a record without last name', () => {
    const { last: _last, ...record } = createTestPatientFields();

    expect(() => createPatient(record)).toThrow(/^Invalid patient: last: /);
  });
});

describe('patient keys', () => {
  const patient = createPatient(createTestPatientFields());

  it('matchesMrn should accept a patient, a record, text or an integer', () => {
    expect(matchesMrn(patient, patient)).toBe(true);
    expect(matchesMrn(patient, { mrn: '222' })).toBe(true);
    expect(matchesMrn(patient, '222')).toBe(true);
    expect(matchesMrn(patient, 222)).toBe(true);
  });

  it('matchesMrn should ignore blanks around the MRN', () => {
    expect(matchesMrn(patient, ' 222 ')).toBe(true);
    expect(matchesMrn(patient, { mrn: '222 ' })).toBe(true);
    expect(createPatient(createTestPatientFields({ mrn: ' 222 ' })).mrn).toBe('222');
  });

  it('matchesMrn should be false for another MRN', () => {
    expect(matchesMrn(patient, '223')).toBe(false);
    expect(matchesMrn(patient, { mrn: 2220 })).toBe(false);
  });

  it('mrnOf should render integer MRNs as text', () => {
    expect(mrnOf(100)).toBe('100');
    expect(mrnOf({ mrn: 7 })).toBe('7');
  });

  it('readMrn should reject a record without mrn', () => {
    expect(() => readMrn({ first: 'tom' })).toThrow('Invalid patient: record has no usable mrn');
    expect(() => readMrn({ mrn: '   ' })).toThrow(ValidationError);
    expect(() => readMrn('222')).toThrow(ValidationError);
  });
});

describe('patient serialization', () => {
  it('toPatientRecord should leave out appointments', () => {
    const patient = withAppointments(createPatient(createTestPatientFields()), [
      createAppointment(createTestRecord()),
    ]);

    expect(toPatientRecord(patient)).toEqual(createTestPatientFields());
  });

  it('describePatient should title-case names and format the birthday', () => {
    const patient = createPatient(createTestPatientFields());

    expect(describePatient(patient)).toBe('Patient: Tom Wagar, MRN: 222, Male, Birthday: 1983-03-03');
  });

  it('describePatient should title-case every word of a name', () => {
    const patient = createPatient(
      createTestPatientFields({ first: 'mary ANN', last: 'de vries', sex: 'female' })
    );

    expect(describePatient(patient)).toBe(
      'Patient: Mary Ann De Vries, MRN: 222, Female, Birthday: 1983-03-03'
    );
  });
});

// ============================================================================
// REGISTRY
// ============================================================================

describe('PatientRegistry', () => {
  let registry: PatientRegistry;

  const upsert = (overrides?: Record<string, unknown>) => {
    const record = createTestRecord(overrides);
    return registry.upsertAppointment(record, createAppointment(record));
  };

  beforeEach(() => {
    registry = new PatientRegistry();
  });

  it('should create a patient for a new MRN', () => {
    const outcome = upsert();

    expect(outcome.created).toBe(true);
    expect(outcome.patient.appointments).toHaveLength(1);
    expect(registry.size).toBe(1);
  });

  it('should append to the existing patient for a known MRN', () => {
    upsert();
    const outcome = upsert({ date: '20210601' });

    expect(outcome.created).toBe(false);
    expect(outcome.patient.appointments.map((a) => a.date)).toEqual(['20210101', '20210601']);
    expect(registry.size).toBe(1);
  });

  it('should keep the attributes of the first record for an MRN', () => {
    upsert();
    upsert({ first: 'thomas', date: '20210601' });

    expect(registry.find('222')?.first).toBe('tom');
  });

  it('should not validate patient fields of a record for a known MRN', () => {
    upsert();

    expect(() => upsert({ birthday: 'unknown', date: '20210601' })).not.toThrow();
  });

  it('should find a patient by text or integer MRN', () => {
    upsert({ mrn: '100' });

    expect(registry.find('100')?.mrn).toBe('100');
    expect(registry.find(100)?.mrn).toBe('100');
    expect(registry.find('101')).toBeNull();
  });

  it('should keep a replaced patient in its position', () => {
    upsert({ mrn: '1' });
    upsert({ mrn: '2' });
    upsert({ mrn: '3' });

    const replacement = createPatient(createTestPatientFields({ mrn: '2', first: 'sam' }));
    registry.replace(replacement);

    expect(registry.values().map((p) => p.mrn)).toEqual(['1', '2', '3']);
    expect(registry.find('2')?.first).toBe('sam');
  });

  it('should remove a patient and report it', () => {
    upsert({ mrn: '1' });

    expect(registry.remove('1')?.mrn).toBe('1');
    expect(registry.remove('1')).toBeNull();
    expect(registry.size).toBe(0);
  });

  it('should iterate in insertion order', () => {
    upsert({ mrn: '9' });
    upsert({ mrn: '3' });
    upsert({ mrn: '5' });

    expect(Array.from(registry, (p) => p.mrn)).toEqual(['9', '3', '5']);
  });

  it('should empty on clear', () => {
    upsert();
    registry.clear();

    expect(registry.size).toBe(0);
    expect(registry.values()).toEqual([]);
  });
});
