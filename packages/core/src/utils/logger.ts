/**
 * Console logger used across the runtime.
 *
 * Lines look like `2024-01-01T00:00:00.000Z INFO  command succeeded cmd="df -h"`,
 * coloured by level with chalk. Components accept any {@link Logger}, so tests
 * pass `silentLogger` or a jest mock instead.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

const formatValue = (value: unknown): string => {
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
};

export function formatFields(fields?: LogFields): string {
  if (!fields) {
    return '';
  }
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  now?: () => Date;
  write?: (line: string) => void;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minimum = LEVEL_ORDER[options.level ?? 'info'];
  const now = options.now ?? (() => new Date());
  const write = options.write ?? ((line: string) => console.error(line));

  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < minimum) {
      return;
    }
    const label = LEVEL_STYLE[level](level.toUpperCase().padEnd(5));
    const rendered = formatFields(fields);
    const suffix = rendered ? ` ${chalk.dim(rendered)}` : '';
    write(`${chalk.dim(now().toISOString())} ${label} ${message}${suffix}`);
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
