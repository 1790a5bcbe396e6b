import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
import { initLogger, type LogLevel, type Sink } from './logger.js';
import { ConsoleSink } from './sinks/console.js';
import { FileSink } from './sinks/file.js';

export interface LoggerSetupOptions {
  /** Overrides LOGGER_LOG_LEVEL, e.g. from a --verbose flag */
  level?: LogLevel | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Build the sink list described by the logger environment
 */
export function createSinks(config: LoggerEnvConfig): Sink[] {
  const sinks: Sink[] = [new ConsoleSink({ color: config.LOGGER_COLOR })];
  if (config.LOGGER_FILE_LOG_ENABLED) {
    sinks.push(new FileSink(config.LOGGER_FILE_LOG_PATH));
  }
  return sinks;
}

/**
 * Initialize the global logger from environment variables.
 * Call once at process start, before any command runs.
 */
export function setupLogger(options: LoggerSetupOptions = {}): LoggerEnvConfig {
  const config = validateLoggerEnv(options.env ?? process.env);
  initLogger({
    level: options.level ?? config.LOGGER_LOG_LEVEL,
    sinks: createSinks(config),
  });
  return config;
}
