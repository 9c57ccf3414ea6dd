/**
 * @fileoverview YAML Record Store (Infrastructure Layer)
 *
 * Keeps the whole flat record list in one YAML file: a sequence of
 * mappings, one per appointment. The file is read whole and replaced whole.
 *
 * @module @periorecord/infrastructure/repositories/yaml-record-store
 *
 * ## Hexagonal Architecture
 *
 * This is an **ADAPTER** - it implements the RecordStore port defined in
 * the domain layer.
 */

import { readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { parse, stringify } from 'yaml';
import {
  StorageUnavailableError,
  createLogger,
  runCorrelationId,
  toError,
  type Logger,
} from '@periorecord/core';
import type { RecordStore } from '@periorecord/domain';
import type { FlatRecord } from '@periorecord/types';

export interface YamlRecordStoreOptions {
  /** Path of the records file */
  path: string;
  logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class YamlRecordStore implements RecordStore {
  readonly location: string;
  private logger: Logger;

  constructor(options: YamlRecordStoreOptions) {
    this.location = options.path;
    this.logger =
      options.logger ?? createLogger({ name: 'yaml-record-store', correlationId: runCorrelationId });
  }

  /**
   * A missing file is an empty collection; an empty file too
   *
   * @throws {StorageUnavailableError} when the file cannot be read or parsed,
   * or its top level is not a sequence
   */
  read(): unknown[] {
    let text: string;
    try {
      text = readFileSync(this.location, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info({ path: this.location }, 'Records file not found, starting empty');
        return [];
      }
      const cause = toError(error);
      throw new StorageUnavailableError(this.location, 'read', cause.message, cause);
    }

    let document: unknown;
    try {
      document = parse(text);
    } catch (error) {
      const cause = toError(error);
      throw new StorageUnavailableError(this.location, 'read', cause.message, cause);
    }

    if (document === null || document === undefined) {
      return [];
    }
    if (!Array.isArray(document)) {
      throw new StorageUnavailableError(
        this.location,
        'read',
        'top level of the file is not a sequence of records'
      );
    }

    this.logger.debug({ path: this.location, records: document.length }, 'Records file read');
    return document;
  }

  /**
   * Write to a temporary file beside the target, then rename it over the target
   *
   * @throws {StorageUnavailableError} when the file cannot be written
   */
  write(records: readonly FlatRecord[]): void {
    const temporary = join(
      dirname(this.location),
      `.${basename(this.location)}.${process.pid}.${Date.now()}.tmp`
    );

    try {
      writeFileSync(temporary, stringify(records), 'utf8');
      renameSync(temporary, this.location);
    } catch (error) {
      rmSync(temporary, { force: true });
      const cause = toError(error);
      throw new StorageUnavailableError(this.location, 'write', cause.message, cause);
    }

    this.logger.debug({ path: this.location, records: records.length }, 'Records file written');
  }
}
