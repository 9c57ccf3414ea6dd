/**
 * @fileoverview Domain Package Exports
 *
 * @module @periorecord/domain
 *
 * ## Bounded Contexts
 * - **Periodontal Records**: patients, appointment variants, the record
 *   repository, the mutation service and procedure statistics
 */

// ============================================================================
// PERIODONTAL RECORDS
// ============================================================================

export * from './periodontal/index.js';
