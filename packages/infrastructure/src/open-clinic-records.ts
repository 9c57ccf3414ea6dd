/**
 * @fileoverview Composition root for the clinic records
 *
 * Reads configuration, wires the YAML store into the repository and the
 * record service, and loads the collection.
 *
 * @module @periorecord/infrastructure/open-clinic-records
 */

import {
  createLogger,
  loadRecorderConfig,
  runCorrelationId,
  type Logger,
  type RecorderConfig,
} from '@periorecord/core';
import {
  RecordRepository,
  createRecordService,
  type LoadReport,
  type RecordService,
  type RecordStore,
} from '@periorecord/domain';
import { YamlRecordStore } from './repositories/YamlRecordStore.js';

export interface OpenClinicRecordsOptions {
  /** Already-validated configuration; read from `env` when omitted */
  config?: RecorderConfig;
  /** Environment to read configuration from; `process.env` when omitted */
  env?: Record<string, string | undefined>;
  /** Store to use instead of the configured YAML file */
  store?: RecordStore;
  /** Clock for the service's todayDate() */
  clock?: () => Date;
}

export interface ClinicRecords {
  config: RecorderConfig;
  service: RecordService;
  report: LoadReport;
  logger: Logger;
}

/**
 * Open the records file and load it
 *
 * @throws {ValidationError} when the configuration is invalid
 * @throws {StorageUnavailableError} when the records file cannot be read
 */
export function openClinicRecords(options: OpenClinicRecordsOptions = {}): ClinicRecords {
  const config = options.config ?? loadRecorderConfig(options.env ?? process.env);
  const logger = createLogger({
    name: 'periorecord',
    level: config.logLevel,
    correlationId: runCorrelationId,
  });

  const store =
    options.store ??
    new YamlRecordStore({ path: config.recordsPath, logger: logger.child({ component: 'store' }) });
  const repository = new RecordRepository(store, {
    logger: logger.child({ component: 'repository' }),
  });
  const service = createRecordService({
    repository,
    logger: logger.child({ component: 'service' }),
    clock: options.clock,
  });

  const report = service.load();
  logger.info(
    {
      location: store.location,
      environment: config.environment,
      patients: report.patients,
      appointments: report.appointments,
      rejected: report.rejected.length,
    },
    'Clinic records opened'
  );

  return { config, service, report, logger };
}
