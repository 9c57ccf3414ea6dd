/**
 * @fileoverview Conversion between the patient graph and flat records
 *
 * Denormalize: one flat record per appointment, the patient's fields merged
 * with the appointment's. Normalize: feed records one by one into
 * upsert-by-MRN, rebuilding patients and their appointments.
 *
 * @module domain/periodontal/record-mapper
 */

import type { FlatRecord } from '@periorecord/types';
import { RecordCorruptError, isOperationalError } from '@periorecord/core';
import { createAppointment, toAppointmentRecord, type Appointment } from './appointment.js';
import { toPatientRecord, type Patient } from './patient.js';
import type { PatientRegistry, UpsertOutcome } from './patient-registry.js';

export interface NormalizedRecord extends UpsertOutcome {
  appointment: Appointment;
}

export interface NormalizeSummary {
  /** Records turned into appointments */
  accepted: number;
  /** Records skipped, in file order */
  rejected: RecordCorruptError[];
}

/**
 * Merge one appointment with its patient into a flat record
 */
export function toFlatRecord(patient: Patient, appointment: Appointment): FlatRecord {
  return { ...toPatientRecord(patient), ...toAppointmentRecord(appointment) };
}

/**
 * Flatten patients into records, patient by patient, appointment by appointment.
 * A patient without appointments yields no record.
 */
export function denormalizePatients(patients: Iterable<Patient>): FlatRecord[] {
  const records: FlatRecord[] = [];
  for (const patient of patients) {
    for (const appointment of patient.appointments) {
      records.push(toFlatRecord(patient, appointment));
    }
  }
  return records;
}

/**
 * Build the appointment a record describes and file it under its patient,
 * creating the patient when its MRN is new
 *
 * @throws {UnknownVariantError} when `_type` is missing or unrecognized
 * @throws {ValidationError} when an appointment or new-patient field is malformed
 */
export function normalizeRecord(record: unknown, registry: PatientRegistry): NormalizedRecord {
  const appointment = createAppointment(record);
  const outcome = registry.upsertAppointment(record, appointment);
  return { ...outcome, appointment };
}

/**
 * Normalize records in order. A record that cannot be built is reported as a
 * RecordCorruptError and skipped; the remaining records still load.
 */
export function normalizeRecords(
  records: readonly unknown[],
  registry: PatientRegistry
): NormalizeSummary {
  const summary: NormalizeSummary = { accepted: 0, rejected: [] };

  records.forEach((record, index) => {
    try {
      normalizeRecord(record, registry);
      summary.accepted++;
    } catch (error) {
      if (!isOperationalError(error)) {
        throw error;
      }
      summary.rejected.push(new RecordCorruptError(index, error.message, error));
    }
  });

  return summary;
}
