import { z } from 'zod';

import { ConfigurationError } from './errors';
import type { ConfigurationIssue } from './errors';
import { noopLogger } from './logger';
import type { RecordLogLevel, RecordLogger } from './logger';

export interface RecordSettings {
  applyTransformToDefault: boolean;
  logger: RecordLogger;
  name?: string;
}

export type RecordSettingsInput = Partial<RecordSettings>;

const LOGGER_METHODS = ['debug', 'warn'] as const satisfies readonly RecordLogLevel[];

export function isRecordLogger(value: unknown): value is RecordLogger {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return LOGGER_METHODS.every((method) => typeof Reflect.get(value, method) === 'function');
}

export const recordSettingsSchema = z
  .object({
    applyTransformToDefault: z.boolean().optional(),
    logger: z
      .custom<RecordLogger>(isRecordLogger, {
        message: 'Expected a logger with debug and warn methods'
      })
      .optional(),
    name: z.string().trim().min(1, 'Record name must not be empty').optional()
  })
  .strict();

export const DEFAULT_RECORD_SETTINGS: Readonly<RecordSettings> = Object.freeze({
  applyTransformToDefault: false,
  logger: noopLogger
});

export function toConfigurationIssues(error: z.ZodError): ConfigurationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path,
    message: issue.message
  }));
}

export function resolveRecordSettings(
  current: Readonly<RecordSettings>,
  input: unknown,
  context: string
): RecordSettings {
  const result = recordSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(context, toConfigurationIssues(result.error));
  }

  const next = result.data;
  return {
    applyTransformToDefault: next.applyTransformToDefault ?? current.applyTransformToDefault,
    logger: next.logger ?? current.logger,
    name: next.name ?? current.name
  } satisfies RecordSettings;
}
