import type { LogFields, Logger, LogLevel } from '../../domain/ports/Logger.js';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface ConsoleLoggerOptions {
  /** Minimum level written. Default: `info`. */
  readonly level?: LogLevel;
  /** Write one JSON object per line instead of text. */
  readonly json?: boolean;
  /** Component name included on every line. Default: `predgrid`. */
  readonly component?: string;
  /** Line sink. Defaults to stdout, or stderr for `warn` and `error`. */
  readonly write?: (level: LogLevel, line: string) => void;
  readonly now?: () => number;
}

const writeToConsole = (level: LogLevel, line: string): void => {
  if (level === 'warn' || level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
};

/** Format one log entry. Exposed for tests and custom sinks. */
export function formatLogLine(
  level: LogLevel,
  component: string,
  message: string,
  fields: LogFields | undefined,
  timestamp: number,
  json: boolean,
): string {
  const ts = new Date(timestamp).toISOString();
  const hasFields = fields !== undefined && Object.keys(fields).length > 0;

  if (json) {
    const entry: Record<string, unknown> = { ts, level, component, msg: message };
    if (hasFields) entry.data = fields;
    return JSON.stringify(entry);
  }

  const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
  return hasFields ? `${prefix} ${message} ${JSON.stringify(fields)}` : `${prefix} ${message}`;
}

/** Levelled, timestamped logger writing text or JSON lines. */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = LEVEL_ORDER[options.level ?? 'info'];
  const component = options.component ?? 'predgrid';
  const json = options.json ?? false;
  const write = options.write ?? writeToConsole;
  const now = options.now ?? Date.now;

  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < minLevel) return;
    write(level, formatLogLine(level, component, message, fields, now(), json));
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
