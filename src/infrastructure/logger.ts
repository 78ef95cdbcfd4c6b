import { pino, type Logger } from 'pino';

/**
 * Root pino logger for a process. Components receive it (or a child) and
 * log structured objects first, message second.
 */
export function createLogger(name: string, level: string = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino({ name, level });
}
