/**
 * @fileoverview Patient entity of the periodontal record model
 *
 * A patient is identified by its clinic-assigned MRN and owns its
 * appointments; appointments have no existence outside their patient.
 *
 * @module domain/periodontal/patient
 */

import {
  MrnSchema,
  PatientFieldsSchema,
  canonicalMrn,
  type PatientRecord,
  type Sex,
} from '@periorecord/types';
import { ValidationError, formatIsoDate, parseCalendarDate, type CalendarDate } from '@periorecord/core';
import type { Appointment } from './appointment.js';

export interface Patient {
  /** Medical record number; unique and immutable once created */
  readonly mrn: string;
  readonly first: string;
  readonly last: string;
  readonly birthday: CalendarDate;
  readonly sex: Sex;
  /** Insertion order carries no meaning; display order is by date */
  readonly appointments: Appointment[];
}

/**
 * Anything that names a patient: the patient itself, a record carrying an
 * `mrn`, or the MRN alone (text or integer)
 */
export type PatientKey = { readonly mrn: string | number } | string | number;

/**
 * Canonical MRN named by a patient key
 */
export function mrnOf(key: PatientKey): string {
  return canonicalMrn(typeof key === 'object' ? key.mrn : key);
}

/**
 * MRN carried by a raw record
 *
 * @throws {ValidationError} when the record has no usable `mrn`
 */
export function readMrn(record: unknown): string {
  const mrn = typeof record === 'object' && record !== null && 'mrn' in record ? record.mrn : undefined;
  const parsed = MrnSchema.safeParse(mrn);
  if (!parsed.success) {
    throw new ValidationError('Invalid patient: record has no usable mrn', parsed.error.issues);
  }
  return parsed.data;
}

/**
 * True iff `key` names this patient
 */
export function matchesMrn(patient: Patient, key: PatientKey): boolean {
  return patient.mrn === mrnOf(key);
}

/**
 * Build a patient, without appointments, from the patient-shaped fields of a record
 *
 * @throws {ValidationError} when a patient field is missing or malformed
 */
export function createPatient(record: unknown): Patient {
  const parsed = PatientFieldsSchema.safeParse(record);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid patient: ${issues.join('; ')}`, parsed.error.issues);
  }

  const { mrn, first, last, birthday, sex } = parsed.data;
  return {
    mrn,
    first,
    last,
    birthday: parseCalendarDate(birthday, 'birthday'),
    sex,
    appointments: [],
  };
}

/**
 * Same patient attributes, taking over an existing appointment collection
 */
export function withAppointments(patient: Patient, appointments: Appointment[]): Patient {
  return { ...patient, appointments };
}

/**
 * Flat record of a patient's own attributes (appointments excluded)
 */
export function toPatientRecord(patient: Patient): PatientRecord {
  return {
    mrn: patient.mrn,
    first: patient.first,
    last: patient.last,
    birthday: patient.birthday,
    sex: patient.sex,
  };
}

function titleCase(text: string): string {
  return text
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * e.g. "Patient: Tom Wagar, MRN: 222, Male, Birthday: 1983-03-03"
 */
export function describePatient(patient: Patient): string {
  return (
    `Patient: ${titleCase(patient.first)} ${titleCase(patient.last)}, MRN: ${patient.mrn}, ` +
    `${titleCase(patient.sex)}, Birthday: ${formatIsoDate(patient.birthday)}`
  );
}
