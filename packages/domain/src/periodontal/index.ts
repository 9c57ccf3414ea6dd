/**
 * Periodontal Records Module (Domain Layer)
 *
 * Patients, their appointment variants, and the operations over the
 * patient collection.
 *
 * ## Hexagonal Architecture
 *
 * This module exports:
 * - RecordService: every caller-facing operation on the collection
 * - RecordRepository: normalize/denormalize over a store
 * - RecordStore: port interface for persistence
 *
 * Store implementations (adapters) are in @periorecord/infrastructure:
 * - YamlRecordStore: one YAML file, replaced atomically on save
 * - InMemoryRecordStore: test/development implementation
 *
 * @example
 * ```typescript
 * import { RecordRepository, RecordService } from '@periorecord/domain';
 * import { YamlRecordStore } from '@periorecord/infrastructure';
 *
 * const repository = new RecordRepository(new YamlRecordStore({ path: 'records.yaml' }));
 * const service = new RecordService({ repository });
 * ```
 *
 * @module domain/periodontal
 */

export * from './appointment.js';
export * from './patient.js';
export * from './patient-registry.js';
export * from './record-mapper.js';
export * from './record-repository.js';
export * from './record-service.js';
export * from './statistics.js';
