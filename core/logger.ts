import { pino, type Logger } from 'pino';
import type { LogSink } from './types.js';

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return pino({ name: 'a11y-lint', level });
}

/** Adapts engine log events to a pino logger. */
export function toSink(logger: Logger): LogSink {
  return ({ level, msg, ...fields }) => {
    logger[level](fields, msg);
  };
}
