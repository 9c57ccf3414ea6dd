/**
 * @fileoverview Procedure statistics over the appointment collection
 *
 * @module domain/periodontal/statistics
 */

import { APPOINTMENT_TYPE_KEY, type AppointmentType } from '@periorecord/types';
import { parseCalendarDate, type CalendarDate } from '@periorecord/core';
import { toStatsRecord, type Appointment } from './appointment.js';
import type { Patient } from './patient.js';

/**
 * Counters of one variant: the variant name counts its appointments, every
 * other key counts appointments in which that procedure occurred
 */
export type ProcedureTally = Record<string, number>;

/** Always PeriodicExam, LimitedExam, ComprehensiveExam, Surgery */
export type TallyBuckets = readonly [ProcedureTally, ProcedureTally, ProcedureTally, ProcedureTally];

/** YYYYMMDD text, the same digits as an integer, or a parsed date */
export type DateBound = string | number | CalendarDate;

// Null, undefined and empty text all leave the bound open
function boundOf(bound: DateBound | null | undefined, field: string): CalendarDate | null {
  if (bound === null || bound === undefined || bound === '') {
    return null;
  }
  return parseCalendarDate(bound, field);
}

function withinBounds(
  appointment: Appointment,
  from: CalendarDate | null,
  to: CalendarDate | null
): boolean {
  if (from === null || to === null) {
    return true;
  }
  // Both ends exclusive: appointments on the boundary dates are left out
  return from < appointment.date && appointment.date < to;
}

function countAppointment(bucket: ProcedureTally, appointment: Appointment): void {
  bucket[appointment.type] = (bucket[appointment.type] ?? 0) + 1;

  for (const [field, value] of Object.entries(toStatsRecord(appointment))) {
    if (field === APPOINTMENT_TYPE_KEY || field === 'date') {
      continue;
    }
    if (value !== null && value !== false) {
      bucket[field] = (bucket[field] ?? 0) + 1;
    }
  }
}

/**
 * Tally appointments and their procedures per variant.
 *
 * When both bounds are given only appointments strictly between them count;
 * when either is omitted (or empty text) every appointment counts.
 *
 * @throws {ValidationError} when a bound is not a YYYYMMDD date
 */
export function tallyProcedures(
  patients: Iterable<Patient>,
  dateFrom?: DateBound | null,
  dateTo?: DateBound | null
): TallyBuckets {
  const from = boundOf(dateFrom, 'dateFrom');
  const to = boundOf(dateTo, 'dateTo');

  const buckets: Record<AppointmentType, ProcedureTally> = {
    PeriodicExam: { PeriodicExam: 0 },
    LimitedExam: { LimitedExam: 0 },
    ComprehensiveExam: { ComprehensiveExam: 0 },
    Surgery: { Surgery: 0 },
  };

  for (const patient of patients) {
    for (const appointment of patient.appointments) {
      if (withinBounds(appointment, from, to)) {
        countAppointment(buckets[appointment.type], appointment);
      }
    }
  }

  return [buckets.PeriodicExam, buckets.LimitedExam, buckets.ComprehensiveExam, buckets.Surgery];
}
