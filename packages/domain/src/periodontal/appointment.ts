/**
 * @fileoverview Appointment variants of the periodontal record model
 *
 * An appointment is one of four variants, told apart by `type`. Each variant
 * holds the procedures that occurred during the visit; a procedure that did
 * not occur is simply absent from `procedures`.
 *
 * @module domain/periodontal/appointment
 */

import type { z } from 'zod';
import {
  APPOINTMENT_TYPE_KEY,
  AppointmentFieldsSchema,
  AppointmentTypeSchema,
  ComprehensiveExamProceduresSchema,
  LimitedExamProceduresSchema,
  PROCEDURE_FIELDS,
  SurgeryProceduresSchema,
  COMPREHENSIVE_EXAM_PROCEDURES,
  LIMITED_EXAM_PROCEDURES,
  SURGERY_PROCEDURES,
  type AppointmentRecord,
  type AppointmentStatsRecord,
  type AppointmentType,
  type ProcedureField,
  type ProcedureFlag,
  type StoredProcedureFlag,
} from '@periorecord/types';
import {
  UnknownVariantError,
  ValidationError,
  formatIsoDate,
  parseCalendarDate,
  type CalendarDate,
} from '@periorecord/core';

// ============================================================================
// TYPES
// ============================================================================

export interface AppointmentOf<T extends AppointmentType> {
  readonly type: T;
  /** Identifies the appointment within its patient, together with `type` */
  readonly date: CalendarDate;
  /** ASA physical status code; null when not recorded */
  readonly asa: string | null;
  readonly note: string | null;
  readonly procedures: ReadonlyMap<ProcedureField<T>, ProcedureFlag>;
}

export type PeriodicExam = AppointmentOf<'PeriodicExam'>;
export type LimitedExam = AppointmentOf<'LimitedExam'>;
export type ComprehensiveExam = AppointmentOf<'ComprehensiveExam'>;
export type Surgery = AppointmentOf<'Surgery'>;

export type Appointment = PeriodicExam | LimitedExam | ComprehensiveExam | Surgery;

export const NO_ASA_NUMBER = 'No ASA number.';
export const NO_NOTE = 'No note.';

// ============================================================================
// CONSTRUCTION
// ============================================================================

type CommonFields = Pick<Appointment, 'date' | 'asa' | 'note'>;

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || what}: ${issue.message}`
    );
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, result.error.issues);
  }
  return result.data;
}

/**
 * Keep the procedures that occurred: `true` or non-empty text
 */
function occurredProcedures<F extends string>(
  fields: readonly F[],
  values: Partial<Record<F, StoredProcedureFlag>>
): ReadonlyMap<F, ProcedureFlag> {
  const occurred = new Map<F, ProcedureFlag>();
  for (const field of fields) {
    const value = values[field];
    if (value === true || (typeof value === 'string' && value.length > 0)) {
      occurred.set(field, value);
    }
  }
  return occurred;
}

type AppointmentFactories = {
  [T in AppointmentType]: (input: unknown, common: CommonFields) => AppointmentOf<T>;
};

const APPOINTMENT_FACTORIES: AppointmentFactories = {
  PeriodicExam: (_input, common) => ({
    type: 'PeriodicExam',
    ...common,
    procedures: new Map<never, ProcedureFlag>(),
  }),
  LimitedExam: (input, common) => ({
    type: 'LimitedExam',
    ...common,
    procedures: occurredProcedures(
      LIMITED_EXAM_PROCEDURES,
      validate(LimitedExamProceduresSchema, input, 'LimitedExam procedures')
    ),
  }),
  ComprehensiveExam: (input, common) => ({
    type: 'ComprehensiveExam',
    ...common,
    procedures: occurredProcedures(
      COMPREHENSIVE_EXAM_PROCEDURES,
      validate(ComprehensiveExamProceduresSchema, input, 'ComprehensiveExam procedures')
    ),
  }),
  Surgery: (input, common) => ({
    type: 'Surgery',
    ...common,
    procedures: occurredProcedures(
      SURGERY_PROCEDURES,
      validate(SurgeryProceduresSchema, input, 'Surgery procedures')
    ),
  }),
};

/**
 * Read the variant discriminator of a raw record
 *
 * @throws {UnknownVariantError} when it is missing or names no variant
 */
export function appointmentTypeOf(record: unknown): AppointmentType {
  const tag =
    typeof record === 'object' && record !== null && APPOINTMENT_TYPE_KEY in record
      ? record[APPOINTMENT_TYPE_KEY]
      : undefined;

  const parsed = AppointmentTypeSchema.safeParse(tag);
  if (!parsed.success) {
    throw new UnknownVariantError(tag);
  }
  return parsed.data;
}

/**
 * Build the appointment variant a raw record describes
 *
 * @throws {UnknownVariantError} when `_type` is missing or unrecognized
 * @throws {ValidationError} when `date` is missing or not YYYYMMDD, or a field is mistyped
 */
export function createAppointment(record: unknown): Appointment {
  const type = appointmentTypeOf(record);
  const fields = validate(AppointmentFieldsSchema, record, `${type} appointment`);

  const common: CommonFields = {
    date: parseCalendarDate(fields.date),
    asa: fields.asa ?? null,
    note: fields.note ?? null,
  };

  return APPOINTMENT_FACTORIES[type](record, common);
}

// ============================================================================
// IDENTITY
// ============================================================================

/**
 * Same slot: identical variant AND identical date
 */
export function isSameSlot(a: Appointment, b: Appointment): boolean {
  return a.type === b.type && a.date === b.date;
}

/**
 * Same date, whatever the variant
 */
export function matchesDate(appointment: Appointment, date: CalendarDate): boolean {
  return appointment.date === date;
}

// ============================================================================
// SERIALIZATION
// ============================================================================

/**
 * Flat record of an appointment; every procedure field of the variant is
 * written, `null` for those that did not occur
 */
export function toAppointmentRecord(appointment: Appointment): AppointmentRecord {
  const occurred = new Map<string, ProcedureFlag>(appointment.procedures);
  const fields: readonly string[] = PROCEDURE_FIELDS[appointment.type];

  const record: AppointmentRecord = {
    _type: appointment.type,
    date: appointment.date,
    asa: appointment.asa,
    note: appointment.note,
  };
  for (const field of fields) {
    record[field] = occurred.get(field) ?? null;
  }
  return record;
}

/**
 * Record used for statistics: no `asa`, no `note`, only the procedures that occurred
 */
export function toStatsRecord(appointment: Appointment): AppointmentStatsRecord {
  const record: AppointmentStatsRecord = {
    _type: appointment.type,
    date: appointment.date,
  };
  for (const [field, flag] of appointment.procedures) {
    record[field] = flag;
  }
  return record;
}

/**
 * ASA code for display; the sentinel text when none was recorded
 */
export function displayAsa(appointment: Appointment): string {
  return appointment.asa ?? NO_ASA_NUMBER;
}

export function displayNote(appointment: Appointment): string {
  return appointment.note ?? NO_NOTE;
}

/**
 * e.g. "Surgery on 2021-08-26"
 */
export function describeAppointment(appointment: Appointment): string {
  return `${appointment.type} on ${formatIsoDate(appointment.date)}`;
}
