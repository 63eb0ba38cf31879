export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export interface LogEntry {
  readonly level: LogLevel;
  readonly subsystem: string;
  readonly message: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;
export type NowFn = () => number;

export const LOG_LEVEL_ENV = 'GRID_CHASE_LOG_LEVEL';

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isThreshold = (value: string): value is LogThreshold => value in LEVEL_RANK;

/** Reads the minimum level from the environment, defaulting to `info`. */
export const resolveLogThreshold = (raw: string | undefined = process.env[LOG_LEVEL_ENV]): LogThreshold => {
  const normalized = raw?.trim().toLowerCase();
  if (normalized && isThreshold(normalized)) {
    return normalized;
  }
  return 'info';
};

const toIsoTimestamp = (timestamp: number): string => new Date(timestamp).toISOString();

type ConsoleSink = (...parts: unknown[]) => void;

const sinkFor = (level: LogLevel): ConsoleSink => {
  const { console } = globalThis;
  const candidate: ConsoleSink | undefined = console[level];
  return candidate ? candidate.bind(console) : console.log.bind(console);
};

export const formatLogLine = (entry: LogEntry): string =>
  `${toIsoTimestamp(entry.timestamp)} [${entry.level.toUpperCase()}][${entry.subsystem}] ${entry.message}`;

export const defaultLogWriter: LogWriter = (entry) => {
  const sink = sinkFor(entry.level);
  const line = formatLogLine(entry);

  if (entry.context && Object.keys(entry.context).length > 0) {
    sink(line, entry.context);
    return;
  }

  sink(line);
};

/** Writes every entry to stderr, keeping stdout free for machine-readable output. */
export const stderrLogWriter: LogWriter = (entry) => {
  const context = entry.context && Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : '';
  process.stderr.write(`${formatLogLine(entry)}${context}\n`);
};

export interface Logger {
  readonly debug: (message: string, context?: Record<string, unknown>) => void;
  readonly info: (message: string, context?: Record<string, unknown>) => void;
  readonly warn: (message: string, context?: Record<string, unknown>) => void;
  readonly error: (message: string, context?: Record<string, unknown>) => void;
  readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
  readonly writer?: LogWriter;
  readonly now?: NowFn;
  readonly level?: LogThreshold;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
  const writer = options.writer ?? defaultLogWriter;
  const now = options.now ?? Date.now;
  const threshold = options.level ?? resolveLogThreshold();
  const normalized = sanitizeSubsystem(subsystem);

  const forLevel = (level: LogLevel) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return () => undefined;
    }
    return (message: string, context?: Record<string, unknown>) => {
      writer({
        level,
        subsystem: normalized,
        message,
        context,
        timestamp: now(),
      });
    };
  };

  return {
    debug: forLevel('debug'),
    info: forLevel('info'),
    warn: forLevel('warn'),
    error: forLevel('error'),
    child: (suffix) => createLogger(`${normalized}:${sanitizeSubsystem(suffix)}`, { writer, now, level: threshold }),
  };
};

export const rootLogger = createLogger('grid-chase');
