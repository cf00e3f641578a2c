import pino from 'pino';
import { stdTimeFunctions } from 'pino';
import type { DestinationStream, Level, LoggerOptions } from 'pino';

export type RecordLogLevel = 'debug' | 'warn';

/** Records log resolution traces at `debug` and declaration problems at `warn`. */
export type RecordLogger = Record<RecordLogLevel, (message: string, meta?: Record<string, unknown>) => void>;

export const noopLogger: RecordLogger = { debug() {}, warn() {} };

export interface CreateRecordLoggerOptions {
  level?: Level | 'silent';
  name?: string;
  destination?: DestinationStream;
}

export const createLoggerOptions = (level: Level | 'silent', name?: string): LoggerOptions => ({
  level,
  name,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createRecordLogger(options: CreateRecordLoggerOptions = {}): RecordLogger {
  const loggerOptions = createLoggerOptions(options.level ?? 'info', options.name);
  const instance = options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);

  return {
    debug: (message, meta) => instance.debug(meta ?? {}, message),
    warn: (message, meta) => instance.warn(meta ?? {}, message)
  } satisfies RecordLogger;
}
