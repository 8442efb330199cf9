import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface LogContext {
  accountId?: string;
  command?: string;
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function loggerOptions(level: LogLevel = 'warn'): LoggerOptions {
  return {
    level,
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    // Secrets and derived keys must never reach a log line
    redact: ['secret', 'key', '*.secret', '*.key'],
  };
}

/**
 * JSON logger for the CLI. Writes to stderr unless another destination is
 * given, since stdout carries the generated code.
 */
export function createLogger(opts: { level?: LogLevel; destination?: DestinationStream } = {}): Logger {
  return pino(loggerOptions(opts.level), opts.destination ?? pino.destination(2));
}

/** Library default: discards everything. */
export const silentLogger: Logger = pino({ level: 'silent' });

export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}
