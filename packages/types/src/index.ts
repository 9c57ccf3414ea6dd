/**
 * @periorecord/types
 *
 * Schemas and types for the flat periodontal record format.
 */

export {
  CLINIC_DATE_PATTERN,
  isClinicDateText,
  ClinicDateTextSchema,
  canonicalMrn,
  MrnSchema,
  SexSchema,
  PatientFieldsSchema,
  APPOINTMENT_TYPES,
  APPOINTMENT_TYPE_KEY,
  AppointmentTypeSchema,
  AppointmentFieldsSchema,
  ProcedureFlagSchema,
  PeriodicExamProceduresSchema,
  LimitedExamProceduresSchema,
  ComprehensiveExamProceduresSchema,
  SurgeryProceduresSchema,
  PERIODIC_EXAM_PROCEDURES,
  LIMITED_EXAM_PROCEDURES,
  COMPREHENSIVE_EXAM_PROCEDURES,
  SURGERY_PROCEDURES,
  PROCEDURE_FIELDS,
  type Sex,
  type AppointmentType,
  type PatientFields,
  type AppointmentFields,
  type StoredProcedureFlag,
  type ProcedureField,
  type ProcedureFlag,
  type FlatScalar,
  type PatientRecord,
  type AppointmentRecord,
  type AppointmentStatsRecord,
  type FlatRecord,
} from './periodontal-record.schema.js';
