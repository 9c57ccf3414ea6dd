import { describe, it, expect } from 'vitest';
import { loadRecorderConfig } from '../env.js';
import { ValidationError } from '../errors.js';

describe('loadRecorderConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadRecorderConfig({})).toEqual({
      environment: 'development',
      logLevel: 'info',
      recordsPath: 'records.yaml',
    });
  });

  it('should read every variable', () => {
    expect(
      loadRecorderConfig({
        NODE_ENV: 'production',
        LOG_LEVEL: 'warn',
        RECORDS_PATH: '/var/lib/perio/records.yaml',
      })
    ).toEqual({
      environment: 'production',
      logLevel: 'warn',
      recordsPath: '/var/lib/perio/records.yaml',
    });
  });

  it('should reject an unknown log level', () => {
    expect(() => loadRecorderConfig({ LOG_LEVEL: 'verbose' })).toThrow(ValidationError);
  });

  it('should reject an empty records path', () => {
    expect(() => loadRecorderConfig({ RECORDS_PATH: '' })).toThrow(
      'Invalid recorder configuration: RECORDS_PATH: RECORDS_PATH cannot be empty'
    );
  });
});
