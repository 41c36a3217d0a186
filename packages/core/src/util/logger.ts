import winston from 'winston';

const { combine, timestamp, printf, errors, json } = winston.format;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'text' | 'json';
}

// Human-readable line: timestamp, level, message, then metadata as JSON
const textFormat = printf(({ level, message, timestamp: ts, ...metadata }) => {
  let line = `${String(ts)} [${level}]: ${String(message)}`;
  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }
  return line;
});

/**
 * Console logger. Every level goes to stderr so stdout carries only
 * command output.
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const format =
    options.format === 'json'
      ? combine(timestamp(), errors({ stack: true }), json())
      : combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), textFormat);

  return winston.createLogger({
    level: options.level ?? 'warn',
    format,
    transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
  });
}

export function silentLogger(): winston.Logger {
  return winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });
}
