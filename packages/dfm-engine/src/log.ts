/**
 * Scoped leveled logger. Writes to stderr — stdout belongs to the MCP
 * stdio transport.
 *
 *   const log = createLogger('engine');
 *   log.info('analysis complete', { violations: 3 });
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;
    console.error(context ? `${line} ${JSON.stringify(context)}` : line);
  };
  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}
