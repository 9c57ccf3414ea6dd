/**
 * @fileoverview In-memory patient collection indexed by MRN
 *
 * @module domain/periodontal/patient-registry
 */

import type { Appointment } from './appointment.js';
import { createPatient, mrnOf, readMrn, type Patient, type PatientKey } from './patient.js';

export interface UpsertOutcome {
  patient: Patient;
  /** True when the record introduced a new patient */
  created: boolean;
}

/**
 * Patients keyed by MRN. Iteration follows insertion order, which is the
 * order records are written back to storage.
 */
export class PatientRegistry {
  private patients = new Map<string, Patient>();

  get size(): number {
    return this.patients.size;
  }

  find(key: PatientKey): Patient | null {
    return this.patients.get(mrnOf(key)) ?? null;
  }

  /**
   * Append `appointment` to the patient the record names, creating that
   * patient from the record's patient fields when the MRN is new. An existing
   * patient's attributes are left untouched.
   */
  upsertAppointment(record: unknown, appointment: Appointment): UpsertOutcome {
    const existing = this.patients.get(readMrn(record));
    if (existing) {
      existing.appointments.push(appointment);
      return { patient: existing, created: false };
    }

    const candidate = createPatient(record);
    candidate.appointments.push(appointment);
    this.patients.set(candidate.mrn, candidate);
    return { patient: candidate, created: true };
  }

  /**
   * Swap in a replacement for the patient with the same MRN, keeping its position
   */
  replace(patient: Patient): void {
    this.patients.set(patient.mrn, patient);
  }

  remove(key: PatientKey): Patient | null {
    const mrn = mrnOf(key);
    const patient = this.patients.get(mrn);
    if (!patient) {
      return null;
    }
    this.patients.delete(mrn);
    return patient;
  }

  clear(): void {
    this.patients.clear();
  }

  values(): Patient[] {
    return Array.from(this.patients.values());
  }

  [Symbol.iterator](): IterableIterator<Patient> {
    return this.patients.values();
  }
}
