import { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Environment Variable Validation
 * Resolves the recorder configuration once at startup
 */

export const RecorderEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  /** YAML file holding every appointment record */
  RECORDS_PATH: z.string().min(1, 'RECORDS_PATH cannot be empty').default('records.yaml'),
});

export type RecorderEnv = z.infer<typeof RecorderEnvSchema>;

export interface RecorderConfig {
  environment: RecorderEnv['NODE_ENV'];
  logLevel: RecorderEnv['LOG_LEVEL'];
  recordsPath: string;
}

/**
 * Validate environment variables and map them onto the recorder config
 *
 * @throws {ValidationError} listing every invalid variable
 */
export function loadRecorderConfig(env: NodeJS.ProcessEnv = process.env): RecorderConfig {
  const result = RecorderEnvSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid recorder configuration: ${issues.join('; ')}`, issues);
  }

  return {
    environment: result.data.NODE_ENV,
    logLevel: result.data.LOG_LEVEL,
    recordsPath: result.data.RECORDS_PATH,
  };
}
