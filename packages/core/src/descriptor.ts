import { z } from 'zod';

import { ConfigurationError } from './errors';
import type { ConfigurationIssue } from './errors';
import { toConfigurationIssues } from './settings';
import type { PropertyOptions, PropertyTransform } from './types';

export interface PropertyDescriptor<TContext> {
  readonly name: string;
  readonly sourceKeys: readonly string[];
  readonly required: boolean;
  readonly hasDefault: boolean;
  readonly defaultValue: unknown;
  readonly transform?: PropertyTransform<TContext>;
  readonly applyTransformToDefault?: boolean;
  readonly identity: boolean;
  readonly accessor: boolean;
}

const sourceKeySchema = z.string().min(1, 'Source keys must be non-empty strings');

export const propertyNameSchema = z
  .string()
  .min(1, 'Property name must not be empty')
  .refine((value) => value.trim() === value, 'Property name must not have surrounding whitespace');

export const propertyOptionsSchema = z
  .object({
    required: z.boolean().optional(),
    from: z
      .union([sourceKeySchema, z.array(sourceKeySchema).min(1, 'At least one source key is required')])
      .optional(),
    default: z.unknown().optional(),
    nil: z.boolean().optional(),
    with: z
      .union([
        z.string().min(1, 'Method name must not be empty'),
        z.custom<(...args: never[]) => unknown>((value) => typeof value === 'function', {
          message: 'Expected a transform function or a method name'
        })
      ])
      .optional(),
    identity: z.boolean().optional(),
    applyTransformToDefault: z.boolean().optional(),
    accessor: z.boolean().optional()
  })
  .strict();

function collectIssues(name: unknown, options: unknown): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];

  const nameResult = propertyNameSchema.safeParse(name);
  if (!nameResult.success) {
    issues.push(...toConfigurationIssues(nameResult.error).map((issue) => ({ ...issue, path: ['name'] })));
  }

  const optionsResult = propertyOptionsSchema.safeParse(options);
  if (!optionsResult.success) {
    issues.push(...toConfigurationIssues(optionsResult.error));
    return issues;
  }

  const parsed = optionsResult.data;
  const declaresDefault = typeof options === 'object' && options !== null && Object.hasOwn(options, 'default');
  if (parsed.required && (declaresDefault || parsed.nil)) {
    issues.push({
      path: ['required'],
      message: 'A required property cannot also declare a default (or nil)'
    });
  }

  return issues;
}

/**
 * Validates declaration options and freezes them into a descriptor.
 *
 * @throws ConfigurationError when the options are malformed or combine `required` with `default`/`nil`.
 */
export function createPropertyDescriptor<TContext>(
  name: string,
  options: PropertyOptions<TContext>,
  recordType: string
): PropertyDescriptor<TContext> {
  const issues = collectIssues(name, options);
  if (issues.length > 0) {
    throw new ConfigurationError(`${recordType}.${name}`, issues);
  }

  const from = options.from ?? name;
  const sourceKeys = Object.freeze(typeof from === 'string' ? [from] : [...from]);
  const declaresDefault = Object.hasOwn(options, 'default');

  return Object.freeze({
    name,
    sourceKeys,
    required: options.required ?? false,
    hasDefault: declaresDefault || options.nil === true,
    defaultValue: declaresDefault ? options.default : null,
    transform: options.with,
    applyTransformToDefault: options.applyTransformToDefault,
    identity: options.identity ?? false,
    accessor: options.accessor ?? true
  } satisfies PropertyDescriptor<TContext>);
}

export function primarySourceKey<TContext>(descriptor: PropertyDescriptor<TContext>): string {
  return descriptor.sourceKeys[0] ?? descriptor.name;
}
