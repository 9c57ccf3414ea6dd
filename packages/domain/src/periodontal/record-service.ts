/**
 * @fileoverview Periodontal record service
 *
 * Every caller-facing operation on the patient collection. Mutations only
 * touch memory; `save()` writes the whole collection back through the
 * repository. A patient or appointment that is not on file is a normal
 * outcome, returned as an `Err` value rather than thrown.
 *
 * @module domain/periodontal/record-service
 *
 * @example
 * ```typescript
 * const service = createRecordService({ repository });
 * service.load();
 *
 * service.addAppointment({
 *   mrn: '100', first: 'ada', last: 'moss', birthday: '19790412', sex: 'female',
 *   _type: 'Surgery', date: '20210601', biopsy: true,
 * });
 * service.save();
 * ```
 */

import type { AppointmentRecord, PatientRecord } from '@periorecord/types';
import {
  Err,
  InvalidArgumentError,
  Ok,
  calendarDateOf,
  compareCalendarDates,
  createLogger,
  formatIsoDate,
  parseCalendarDate,
  runCorrelationId,
  type CalendarDate,
  type Logger,
  type Result,
} from '@periorecord/core';
import {
  createAppointment,
  describeAppointment,
  isSameSlot,
  matchesDate,
  toAppointmentRecord,
  type Appointment,
} from './appointment.js';
import {
  createPatient,
  describePatient,
  mrnOf,
  readMrn,
  toPatientRecord,
  withAppointments,
  type Patient,
  type PatientKey,
} from './patient.js';
import { PatientRegistry } from './patient-registry.js';
import { normalizeRecord } from './record-mapper.js';
import type { LoadReport, RecordRepository } from './record-repository.js';
import { tallyProcedures, type DateBound, type TallyBuckets } from './statistics.js';

// ============================================================================
// RESULT TYPES
// ============================================================================

export type RecordLookupMiss =
  | { kind: 'patient_not_found'; mrn: string; message: string }
  | { kind: 'appointment_not_found'; mrn: string; date: CalendarDate; message: string };

export interface AddedAppointment {
  patient: Patient;
  appointment: Appointment;
  /** True when the record introduced a new patient */
  patientCreated: boolean;
}

export interface AppointmentChange {
  patient: Patient;
  previous: Appointment;
  appointment: Appointment;
  message: string;
}

type PatientDiff = Partial<Record<keyof PatientRecord, string>>;

export interface PatientChange {
  patient: Patient;
  /** Changed attributes as they were */
  before: PatientDiff;
  /** Changed attributes as they are now */
  after: PatientDiff;
  message: string;
}

export interface PatientRecords {
  patient: PatientRecord;
  /** Most recent first */
  appointments: AppointmentRecord[];
}

const PATIENT_FIELDS: readonly (keyof PatientRecord)[] = ['mrn', 'first', 'last', 'birthday', 'sex'];

function patientNotFound(mrn: string): RecordLookupMiss {
  return { kind: 'patient_not_found', mrn, message: 'Patient not found. Check MRN.' };
}

function appointmentNotFound(mrn: string, date: CalendarDate, message: string): RecordLookupMiss {
  return { kind: 'appointment_not_found', mrn, date, message };
}

/**
 * @throws {InvalidArgumentError} unless `value` is a record object
 */
function assertRecord(value: unknown, argument: string): asserts value is object {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new InvalidArgumentError(argument, 'a record object', value);
  }
}

/**
 * @throws {InvalidArgumentError} unless `mrn` is text or an integer
 */
function assertMrnArgument(mrn: unknown): asserts mrn is string | number {
  const isText = typeof mrn === 'string';
  const isInteger = typeof mrn === 'number' && Number.isSafeInteger(mrn);
  if (!isText && !isInteger) {
    throw new InvalidArgumentError('mrn', 'a string or an integer', mrn);
  }
}

// ============================================================================
// SERVICE
// ============================================================================

export interface RecordServiceOptions {
  repository: RecordRepository;
  logger?: Logger;
  /** Source of "now" for todayDate() */
  clock?: () => Date;
}

export class RecordService {
  private readonly registry = new PatientRegistry();
  private readonly repository: RecordRepository;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: RecordServiceOptions) {
    this.repository = options.repository;
    this.logger =
      options.logger ?? createLogger({ name: 'record-service', correlationId: runCorrelationId });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Replace the in-memory collection with the stored records
   */
  load(): LoadReport {
    return this.repository.load(this.registry);
  }

  /**
   * Write the whole collection back; returns the number of records written
   */
  save(): number {
    const written = this.repository.save(this.registry);
    this.logger.info({ records: written }, 'save()');
    return written;
  }

  /**
   * Append the appointment a record describes to its patient, creating the
   * patient when the MRN is new. Adding the same slot twice keeps both.
   */
  addAppointment(record: unknown): AddedAppointment {
    assertRecord(record, 'record');
    const { patient, appointment, created } = normalizeRecord(record, this.registry);

    this.logger.info(
      { mrn: patient.mrn, date: appointment.date, type: appointment.type, patientCreated: created },
      'addAppointment()'
    );
    return { patient, appointment, patientCreated: created };
  }

  /**
   * Replace the appointment in the same slot (date and variant) as the one
   * the record describes: the old entry is removed and the new one appended,
   * so the collection keeps its length.
   */
  modifyAppointment(record: unknown): Result<AppointmentChange, RecordLookupMiss> {
    assertRecord(record, 'record');
    const appointment = createAppointment(record);
    const mrn = readMrn(record);

    const patient = this.registry.find(mrn);
    if (!patient) {
      this.logger.warn({ mrn }, 'modifyAppointment(): patient not found');
      return Err(patientNotFound(mrn));
    }

    const index = patient.appointments.findIndex((existing) => isSameSlot(existing, appointment));
    const previous = patient.appointments[index];
    if (index === -1 || !previous) {
      this.logger.warn(
        { mrn, date: appointment.date, type: appointment.type },
        'modifyAppointment(): appointment not found'
      );
      return Err(
        appointmentNotFound(mrn, appointment.date, `${describeAppointment(appointment)} not found.`)
      );
    }

    patient.appointments.splice(index, 1);
    patient.appointments.push(appointment);
    this.logger.info(
      { mrn, date: appointment.date, type: appointment.type },
      'modifyAppointment(): appointment replaced'
    );
    return Ok({
      patient,
      previous,
      appointment,
      message: `${describePatient(patient)} appointment on ${formatIsoDate(appointment.date)} has been updated.`,
    });
  }

  /**
   * Replace a patient's attributes wholesale. Appointments are carried over
   * untouched.
   */
  modifyPatient(record: unknown): Result<PatientChange, RecordLookupMiss> {
    assertRecord(record, 'record');
    const mrn = readMrn(record);

    const existing = this.registry.find(mrn);
    if (!existing) {
      this.logger.warn({ mrn }, 'modifyPatient(): patient not found');
      return Err(patientNotFound(mrn));
    }

    const replacement = withAppointments(createPatient(record), existing.appointments);
    const original = toPatientRecord(existing);
    const updated = toPatientRecord(replacement);

    const before: PatientDiff = {};
    const after: PatientDiff = {};
    for (const field of PATIENT_FIELDS) {
      if (original[field] !== updated[field]) {
        before[field] = original[field];
        after[field] = updated[field];
      }
    }

    this.registry.replace(replacement);
    this.logger.info({ mrn, before, after }, 'modifyPatient(): patient attributes replaced');

    return Ok({
      patient: replacement,
      before,
      after,
      message: `The following changes have been made. ${JSON.stringify(before)} has been changed to ${JSON.stringify(after)}.`,
    });
  }

  /**
   * Remove the first appointment on `date`, whatever its variant
   *
   * @throws {ValidationError} when `date` is not YYYYMMDD
   */
  deleteAppointment(mrn: string | number, date: string | number): Result<Appointment, RecordLookupMiss> {
    assertMrnArgument(mrn);
    const key = mrnOf(mrn);
    const day = parseCalendarDate(date);

    const patient = this.registry.find(key);
    if (!patient) {
      this.logger.warn({ mrn: key, date: day }, 'deleteAppointment(): patient not found');
      return Err(patientNotFound(key));
    }

    const index = patient.appointments.findIndex((appointment) => matchesDate(appointment, day));
    const [removed] = index === -1 ? [] : patient.appointments.splice(index, 1);
    if (!removed) {
      this.logger.warn({ mrn: key, date: day }, 'deleteAppointment(): appointment not found');
      return Err(appointmentNotFound(key, day, `Appointment on ${formatIsoDate(day)} not found.`));
    }

    this.logger.info({ mrn: key, date: day, type: removed.type }, 'deleteAppointment()');
    return Ok(removed);
  }

  /**
   * Remove a patient and, with it, all of its appointments
   */
  deletePatient(key: PatientKey): Result<Patient, RecordLookupMiss> {
    const removed = this.registry.remove(key);
    if (!removed) {
      this.logger.warn({ mrn: mrnOf(key) }, 'deletePatient(): patient not found');
      return Err(patientNotFound(mrnOf(key)));
    }

    this.logger.info(
      { mrn: removed.mrn, appointments: removed.appointments.length },
      'deletePatient()'
    );
    return Ok(removed);
  }

  /**
   * @throws {InvalidArgumentError} unless `mrn` is text or an integer
   */
  findPatient(mrn: string | number): Result<Patient, RecordLookupMiss> {
    assertMrnArgument(mrn);
    const patient = this.registry.find(mrn);
    return patient ? Ok(patient) : Err(patientNotFound(mrnOf(mrn)));
  }

  /**
   * The patient's flat record plus its appointment records, most recent first
   *
   * @throws {InvalidArgumentError} unless `mrn` is text or an integer
   */
  returnPatientRecords(mrn: string | number): Result<PatientRecords, RecordLookupMiss> {
    return this.findPatient(mrn).map((patient) => {
      this.logger.debug({ mrn: patient.mrn }, 'returnPatientRecords()');
      const newestFirst = [...patient.appointments].sort((a, b) =>
        compareCalendarDates(b.date, a.date)
      );
      return {
        patient: toPatientRecord(patient),
        appointments: newestFirst.map(toAppointmentRecord),
      };
    });
  }

  /**
   * Number of appointments on file for a patient
   */
  countVisits(mrn: string | number): Result<number, RecordLookupMiss> {
    return this.findPatient(mrn).map((patient) => patient.appointments.length);
  }

  /**
   * Patients in collection order
   */
  listPatients(): Patient[] {
    return this.registry.values();
  }

  /**
   * Per-variant procedure counts; see tallyProcedures
   */
  tally(dateFrom?: DateBound | null, dateTo?: DateBound | null): TallyBuckets {
    this.logger.debug({ dateFrom, dateTo }, 'tally()');
    return tallyProcedures(this.registry, dateFrom, dateTo);
  }

  todayDate(): CalendarDate {
    return calendarDateOf(this.clock());
  }
}

/**
 * Factory function for creating a record service
 */
export function createRecordService(options: RecordServiceOptions): RecordService {
  return new RecordService(options);
}
