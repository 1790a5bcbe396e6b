import { z } from 'zod';

import { LOG_LEVELS } from './logger.js';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('warn'),
  LOGGER_COLOR: booleanFlag,
  LOGGER_FILE_LOG_ENABLED: booleanFlag,
  LOGGER_FILE_LOG_PATH: z.string().trim().min(1, { message: 'Invalid file log path' }).default('logs/trustledger.log'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logger environment variables.
 * @throws ZodError when a variable is set to an invalid value
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
