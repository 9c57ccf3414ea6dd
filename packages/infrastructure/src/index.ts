/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters implementing the RecordStore port of @periorecord/domain, and
 * the composition root that wires them to the record service.
 *
 * @module @periorecord/infrastructure
 */

// ============================================================================
// REPOSITORIES
// ============================================================================

export { YamlRecordStore, type YamlRecordStoreOptions } from './repositories/YamlRecordStore.js';
export { InMemoryRecordStore } from './repositories/InMemoryRecordStore.js';

// ============================================================================
// COMPOSITION
// ============================================================================

export {
  openClinicRecords,
  type OpenClinicRecordsOptions,
  type ClinicRecords,
} from './open-clinic-records.js';
