export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

/**
 * Destination for log entries. Writes are synchronous: a run is one short batch
 * and nothing may be lost when the CLI exits right after an error.
 */
export interface Sink {
  write(entry: LogEntry): void;
  close?(): void;
}

interface LogMethod {
  (msg: string): void;
  (context: Record<string, unknown>, msg: string): void;
}

export type Logger = Record<LogLevel, LogMethod>;

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

const SEVERITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

// Silent until initLogger() installs sinks
let activeLevel: LogLevel = 'info';
let activeSinks: Sink[] = [];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/**
 * Reduce a context value to JSON-safe data. Decimals and Dates go through their
 * toJSON; an object met twice is written as "[Circular]".
 */
function toPlain(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value === null || typeof value !== 'object') return value;
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  if (hasToJSON(value)) return value.toJSON();
  if (Array.isArray(value)) return value.map((item) => toPlain(item, seen));
  return toContext(Object.entries(value), seen);
}

function toContext(entries: [string, unknown][], seen: WeakSet<object>): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    if (value !== undefined) {
      context[key] = toPlain(value, seen);
    }
  }
  return context;
}

function emit(
  category: string,
  level: LogLevel,
  msgOrContext: string | Record<string, unknown>,
  msg?: string
): void {
  if (activeSinks.length === 0 || SEVERITY[level] < SEVERITY[activeLevel]) return;

  const entry: LogEntry =
    typeof msgOrContext === 'string'
      ? { level, category, timestamp: new Date(), msg: msgOrContext }
      : {
          level,
          category,
          timestamp: new Date(),
          msg: msg ?? '',
          context: toContext(Object.entries(msgOrContext), new WeakSet()),
        };

  for (const sink of activeSinks) {
    sink.write(entry);
  }
}

/**
 * Install the level and sinks. Sinks of a previous configuration that are not
 * reused are closed.
 */
export function initLogger(config: LoggerConfig): void {
  const sinks = config.sinks ?? [];
  for (const sink of activeSinks) {
    if (!sinks.includes(sink)) sink.close?.();
  }
  activeLevel = config.level ?? 'info';
  activeSinks = sinks;
}

/**
 * Loggers hold no state of their own, so one created at module load follows
 * every later initLogger() call.
 */
export function getLogger(category: string): Logger {
  const method =
    (level: LogLevel): LogMethod =>
    (msgOrContext: string | Record<string, unknown>, msg?: string) =>
      emit(category, level, msgOrContext, msg);

  return {
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}

/**
 * Close every sink and go silent. Call before the process exits.
 */
export function closeLoggers(): void {
  for (const sink of activeSinks) {
    sink.close?.();
  }
  activeSinks = [];
}
