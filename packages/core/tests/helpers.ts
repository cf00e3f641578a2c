import type { RecordLogLevel, RecordLogger } from '../src/index';

export interface CapturedLogEntry {
  level: RecordLogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export function createCaptureLogger(): { logger: RecordLogger; entries: CapturedLogEntry[] } {
  const entries: CapturedLogEntry[] = [];
  const capture =
    (level: RecordLogLevel) =>
    (message: string, meta?: Record<string, unknown>) => {
      entries.push({ level, message, meta });
    };

  return {
    logger: {
      debug: capture('debug'),
      warn: capture('warn')
    },
    entries
  };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the callback to throw');
}
