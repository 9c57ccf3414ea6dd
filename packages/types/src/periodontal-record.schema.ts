import { z } from 'zod';

/**
 * Periodontal Record Schemas
 *
 * The records file holds one flat mapping per appointment: the owning
 * patient's fields merged with the appointment's fields and its `_type`
 * discriminator. These schemas validate one such mapping on its way into
 * the domain model.
 *
 * YAML reads unquoted digit runs back as integers, so `mrn`, `date`,
 * `birthday` and `asa` accept integers and convert them to text.
 */

// ============================================================================
// DATES
// ============================================================================

export const CLINIC_DATE_PATTERN = /^\d{8}$/;

/**
 * True when `text` is an existing calendar day written as YYYYMMDD
 */
export function isClinicDateText(text: string): boolean {
  if (!CLINIC_DATE_PATTERN.test(text)) {
    return false;
  }

  const year = Number(text.slice(0, 4));
  const month = Number(text.slice(4, 6));
  const day = Number(text.slice(6, 8));
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

// Larger integers have already lost digits by the time YAML hands them over
const SafeIntegerSchema = z.number().int().safe();

const ScalarTextSchema = z.union([z.string(), SafeIntegerSchema]).transform((value) => String(value));

export const ClinicDateTextSchema = ScalarTextSchema.pipe(
  z
    .string()
    .regex(CLINIC_DATE_PATTERN, 'Expected a date in YYYYMMDD format')
    .refine(isClinicDateText, 'Not an existing calendar date')
);

// ============================================================================
// PATIENT FIELDS
// ============================================================================

/**
 * Canonical form of an MRN: an integer as its digits, surrounding blanks dropped.
 * Two MRNs name the same patient iff their canonical forms are equal.
 */
export function canonicalMrn(value: string | number): string {
  return String(value).trim();
}

export const MrnSchema = z
  .union([z.string(), SafeIntegerSchema])
  .transform(canonicalMrn)
  .pipe(z.string().min(1, 'MRN is required'));

export const SexSchema = z.enum(['male', 'female']);

export const PatientFieldsSchema = z.object({
  mrn: MrnSchema,
  first: z.string(),
  last: z.string(),
  birthday: ClinicDateTextSchema,
  sex: SexSchema,
});

// ============================================================================
// APPOINTMENT FIELDS
// ============================================================================

export const APPOINTMENT_TYPES = [
  'PeriodicExam',
  'LimitedExam',
  'ComprehensiveExam',
  'Surgery',
] as const;

export const AppointmentTypeSchema = z.enum(APPOINTMENT_TYPES);

/** Key of the variant discriminator in a flat record */
export const APPOINTMENT_TYPE_KEY = '_type';

export const AppointmentFieldsSchema = z.object({
  date: ClinicDateTextSchema,
  asa: ScalarTextSchema.nullable().optional(),
  note: ScalarTextSchema.nullable().optional(),
});

/**
 * "Did this procedure occur" flag: `true` or a free-text value (integers
 * become text). `false`, `null`, empty text and absence all mean it did not occur.
 */
export const ProcedureFlagSchema = z.union([z.boolean(), ScalarTextSchema]).nullable().optional();

export const PeriodicExamProceduresSchema = z.object({});

export const LimitedExamProceduresSchema = z.object({
  abscess: ProcedureFlagSchema,
  crown_lengthening: ProcedureFlagSchema,
  cv_exam: ProcedureFlagSchema,
  extraction: ProcedureFlagSchema,
  frenectomy: ProcedureFlagSchema,
  fracture: ProcedureFlagSchema,
  implant: ProcedureFlagSchema,
  oral_path: ProcedureFlagSchema,
  periodontitis: ProcedureFlagSchema,
  peri_implantitis: ProcedureFlagSchema,
  postop: ProcedureFlagSchema,
  return_: ProcedureFlagSchema,
  recession: ProcedureFlagSchema,
  re_evaluation: ProcedureFlagSchema,
  miscellaneous: ProcedureFlagSchema,
});

export const ComprehensiveExamProceduresSchema = z.object({
  periodontitis: ProcedureFlagSchema,
  executive_health: ProcedureFlagSchema,
  recession: ProcedureFlagSchema,
  hygiene: ProcedureFlagSchema,
  return_: ProcedureFlagSchema,
  oncology: ProcedureFlagSchema,
  implant: ProcedureFlagSchema,
  oral_path: ProcedureFlagSchema,
});

export const SurgeryProceduresSchema = z.object({
  biopsy: ProcedureFlagSchema,
  extractions: ProcedureFlagSchema,
  uncovery: ProcedureFlagSchema,
  implant: ProcedureFlagSchema,
  crown_lengthening: ProcedureFlagSchema,
  soft_tissue: ProcedureFlagSchema,
  perio: ProcedureFlagSchema,
  miscellaneous: ProcedureFlagSchema,
  sinus: ProcedureFlagSchema,
  peri_implantitis: ProcedureFlagSchema,
});

export const PERIODIC_EXAM_PROCEDURES = [] as const;
export const LIMITED_EXAM_PROCEDURES = LimitedExamProceduresSchema.keyof().options;
export const COMPREHENSIVE_EXAM_PROCEDURES = ComprehensiveExamProceduresSchema.keyof().options;
export const SURGERY_PROCEDURES = SurgeryProceduresSchema.keyof().options;

/** Procedure field names of every appointment variant, in file order */
export const PROCEDURE_FIELDS = {
  PeriodicExam: PERIODIC_EXAM_PROCEDURES,
  LimitedExam: LIMITED_EXAM_PROCEDURES,
  ComprehensiveExam: COMPREHENSIVE_EXAM_PROCEDURES,
  Surgery: SURGERY_PROCEDURES,
} as const;

// ============================================================================
// INFERRED TYPES
// ============================================================================

export type Sex = z.infer<typeof SexSchema>;
export type AppointmentType = z.infer<typeof AppointmentTypeSchema>;
export type PatientFields = z.infer<typeof PatientFieldsSchema>;
export type AppointmentFields = z.infer<typeof AppointmentFieldsSchema>;
export type StoredProcedureFlag = z.infer<typeof ProcedureFlagSchema>;

export type ProcedureField<T extends AppointmentType> = (typeof PROCEDURE_FIELDS)[T][number];

/** Occurred value held for a procedure in memory */
export type ProcedureFlag = true | string;

// ============================================================================
// SERIALIZED RECORDS
// ============================================================================

export type FlatScalar = string | boolean | null;

/**
 * Patient half of a flat record
 */
export interface PatientRecord {
  mrn: string;
  first: string;
  last: string;
  /** YYYYMMDD */
  birthday: string;
  sex: Sex;
}

/**
 * Appointment half of a flat record. Every procedure field of the variant is
 * written; a procedure that did not occur is `null`.
 */
export interface AppointmentRecord {
  _type: AppointmentType;
  /** YYYYMMDD */
  date: string;
  asa: string | null;
  note: string | null;
  [procedure: string]: FlatScalar;
}

/**
 * Appointment record minus `asa` and `note`, carrying only the procedures
 * that occurred
 */
export interface AppointmentStatsRecord {
  _type: AppointmentType;
  date: string;
  [procedure: string]: FlatScalar;
}

/** One line of the records file */
export type FlatRecord = PatientRecord & AppointmentRecord;
