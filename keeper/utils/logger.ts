/**
 * Logging utilities for the sizing keeper
 *
 * Structured logging with consistent format for debugging and monitoring.
 * No external dependencies - uses console with formatting.
 */

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogContext {
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_PRIORITY, value);
}

/**
 * Current log level (read from environment on every call so tests and
 * long-running keepers can change it)
 */
function currentLevel(): LogLevel {
  const raw = process.env['LOG_LEVEL']?.toUpperCase();
  return isLogLevel(raw) ? raw : 'INFO';
}

/**
 * Check if a message should be logged based on current level
 */
function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel()];
}

/**
 * Format timestamp for log output
 */
function timestamp(): string {
  return new Date().toISOString();
}

/**
 * Format context object for display
 *
 * Amounts are bigint everywhere in the engine; JSON.stringify throws on
 * them, so they are written as decimal strings.
 */
export function formatContext(ctx: LogContext): string {
  if (Object.keys(ctx).length === 0) return '';
  return ' ' + JSON.stringify(ctx, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

/**
 * Core logging function
 */
function log(level: LogLevel, module: string, message: string, ctx: LogContext = {}): void {
  if (!shouldLog(level)) return;

  const prefix = `[${timestamp()}] [${level}] [${module}]`;
  const contextStr = formatContext(ctx);

  const output = `${prefix} ${message}${contextStr}`;

  switch (level) {
    case 'ERROR':
      console.error(output);
      break;
    case 'WARN':
      console.warn(output);
      break;
    default:
      console.log(output);
  }
}

export interface ModuleLogger {
  debug: (message: string, ctx?: LogContext) => void;
  info: (message: string, ctx?: LogContext) => void;
  warn: (message: string, ctx?: LogContext) => void;
  error: (message: string, ctx?: LogContext) => void;
}

/**
 * Create a logger instance for a specific module
 */
export function createLogger(module: string): ModuleLogger {
  return {
    debug: (message, ctx) => log('DEBUG', module, message, ctx),
    info: (message, ctx) => log('INFO', module, message, ctx),
    warn: (message, ctx) => log('WARN', module, message, ctx),
    error: (message, ctx) => log('ERROR', module, message, ctx),
  };
}

/**
 * Pre-configured loggers for each module
 */
export const logger = {
  keeper: createLogger('Keeper'),
  engine: createLogger('Engine'),
  swap: createLogger('Swap'),
  config: createLogger('Config'),
  notify: createLogger('Notify'),
};
