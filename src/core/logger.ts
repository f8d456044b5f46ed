// Leveled component logging. Entries go to a replaceable sink (console by default).

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
};

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  source: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
};

export type LogSink = (entry: LogEntry) => void;

export type ComponentLogger = {
  trace: (message: string, context?: Record<string, unknown>) => void;
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function formatEntry(entry: LogEntry): string {
  let line = `${entry.timestamp.toISOString()} [${entry.level}] ${entry.source}: ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += ` | ${entry.error.name}: ${entry.error.message}`;
  }
  return line;
}

const consoleSink: LogSink = (entry) => {
  const line = formatEntry(entry);
  if (entry.level === 'ERROR') console.error(line);
  else if (entry.level === 'WARN') console.warn(line);
  else console.log(line);
};

let currentLevel: LogLevel = 'WARN';
let currentSink: LogSink = consoleSink;

export function configureLogging(options: { level?: LogLevel; sink?: LogSink | null }): void {
  if (options.level) currentLevel = options.level;
  if (options.sink !== undefined) currentSink = options.sink ?? consoleSink;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function write(
  level: LogLevel,
  source: string,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;
  currentSink({ timestamp: new Date(), level, source, message, context, error });
}

export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => write('TRACE', name, message, context),
    debug: (message, context) => write('DEBUG', name, message, context),
    info: (message, context) => write('INFO', name, message, context),
    warn: (message, context) => write('WARN', name, message, context),
    error: (message, error, context) => write('ERROR', name, message, context, error),
  };
}
