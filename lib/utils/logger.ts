/**
 * Logger
 * Categorized console logging with a level threshold taken from LOG_LEVEL
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function serialize(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) {
    return ` ${data.name}: ${data.message}`;
  }
  if (typeof data === 'string') {
    return ` ${data}`;
  }
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

export function formatLine(level: Exclude<LogLevel, 'silent'>, category: string, message: string, data?: unknown): string {
  return `[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}] ${message}${serialize(data)}`;
}

export default class Logger {
  static enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
  }

  static debug(category: string, message: string, data?: unknown): void {
    if (Logger.enabled('debug')) console.debug(formatLine('debug', category, message, data));
  }

  static log(category: string, message: string, data?: unknown): void {
    if (Logger.enabled('info')) console.log(formatLine('info', category, message, data));
  }

  static warn(category: string, message: string, data?: unknown): void {
    if (Logger.enabled('warn')) console.warn(formatLine('warn', category, message, data));
  }

  static error(category: string, message: string, data?: unknown): void {
    if (Logger.enabled('error')) console.error(formatLine('error', category, message, data));
  }
}
