export {
  initLogger,
  getLogger,
  closeLoggers,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, formatConsoleLine, type ConsoleSinkOptions, type TextStream } from './sinks/console.js';
export { FileSink } from './sinks/file.js';
export { loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
export { createSinks, setupLogger, type LoggerSetupOptions } from './setup.js';
