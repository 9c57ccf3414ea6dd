/**
 * @fileoverview Records repository and its storage port
 *
 * ## Hexagonal Architecture
 *
 * `RecordStore` is the **PORT**: it moves whole lists of flat records in and
 * out of storage. The YAML file adapter lives in @periorecord/infrastructure.
 * The repository turns those lists into patients and back.
 *
 * @module domain/periodontal/record-repository
 */

import type { FlatRecord } from '@periorecord/types';
import { createLogger, runCorrelationId, type Logger, type RecordCorruptError } from '@periorecord/core';
import type { Patient } from './patient.js';
import type { PatientRegistry } from './patient-registry.js';
import { denormalizePatients, normalizeRecords } from './record-mapper.js';

/**
 * Storage of the flat record list
 */
export interface RecordStore {
  /** Where the records live, for messages */
  readonly location: string;

  /**
   * Every stored record in storage order; empty when nothing has been stored yet
   *
   * @throws {StorageUnavailableError} when storage exists but cannot be read
   */
  read(): unknown[];

  /**
   * Replace the stored records wholesale
   *
   * @throws {StorageUnavailableError} when storage cannot be written
   */
  write(records: readonly FlatRecord[]): void;
}

export interface LoadReport {
  patients: number;
  appointments: number;
  /** Records that were skipped */
  rejected: RecordCorruptError[];
}

export interface RecordRepositoryOptions {
  logger?: Logger;
}

export class RecordRepository {
  private logger: Logger;

  constructor(
    private readonly store: RecordStore,
    options: RecordRepositoryOptions = {}
  ) {
    this.logger =
      options.logger ?? createLogger({ name: 'record-repository', correlationId: runCorrelationId });
  }

  get location(): string {
    return this.store.location;
  }

  /**
   * Replace the registry's contents with the stored records
   */
  load(registry: PatientRegistry): LoadReport {
    const records = this.store.read();

    registry.clear();
    const summary = normalizeRecords(records, registry);

    for (const rejection of summary.rejected) {
      this.logger.error(
        { err: rejection.originalError, recordIndex: rejection.recordIndex },
        'Skipped corrupt record'
      );
    }

    const report: LoadReport = {
      patients: registry.size,
      appointments: summary.accepted,
      rejected: summary.rejected,
    };
    this.logger.debug(
      {
        location: this.store.location,
        patients: report.patients,
        appointments: report.appointments,
        rejected: report.rejected.length,
      },
      'Records loaded'
    );
    return report;
  }

  /**
   * Write every appointment of every patient; returns the number of records written
   */
  save(patients: Iterable<Patient>): number {
    const all = Array.from(patients);

    for (const patient of all) {
      if (patient.appointments.length === 0) {
        this.logger.warn(
          { mrn: patient.mrn },
          'Patient has no appointments and is not written to storage'
        );
      }
    }

    const records = denormalizePatients(all);
    this.store.write(records);

    this.logger.debug({ location: this.store.location, records: records.length }, 'Records saved');
    return records.length;
  }
}
