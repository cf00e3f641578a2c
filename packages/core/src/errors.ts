export type LazyRecordErrorCode =
  | 'RECORD_CONFIGURATION_INVALID'
  | 'RECORD_REQUIRED_ATTRIBUTE'
  | 'RECORD_MISSING_ATTRIBUTE'
  | 'RECORD_UNKNOWN_PROPERTY'
  | 'RECORD_TRANSFORM_FAILED';

export interface ConfigurationIssue {
  path: (string | number)[];
  message: string;
}

export abstract class LazyRecordError extends Error {
  abstract readonly code: LazyRecordErrorCode;

  constructor(message: string) {
    super(message);
    this.name = 'LazyRecordError';
  }
}

function formatIssue({ path, message }: ConfigurationIssue): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

export class ConfigurationError extends LazyRecordError {
  readonly code = 'RECORD_CONFIGURATION_INVALID';
  readonly issues: ConfigurationIssue[];

  constructor(context: string, issues: ConfigurationIssue[]) {
    const details = issues.map((issue) => `  • ${formatIssue(issue)}`).join('\n');
    super(`[${context}] Invalid record configuration\n${details}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class RequiredAttributeError extends LazyRecordError {
  readonly code = 'RECORD_REQUIRED_ATTRIBUTE';
  readonly property: string;
  readonly recordType: string;

  constructor(property: string, recordType: string) {
    super(`${recordType} requires \`${property}\``);
    this.name = 'RequiredAttributeError';
    this.property = property;
    this.recordType = recordType;
  }
}

export class MissingAttributeError extends LazyRecordError {
  readonly code = 'RECORD_MISSING_ATTRIBUTE';
  readonly sourceKey: string;
  readonly property: string;
  readonly recordType: string;

  constructor(options: { sourceKey: string; property: string; recordType: string }) {
    super(`\`${options.sourceKey}\` is missing for ${options.recordType}`);
    this.name = 'MissingAttributeError';
    this.sourceKey = options.sourceKey;
    this.property = options.property;
    this.recordType = options.recordType;
  }
}

export class UnknownPropertyError extends LazyRecordError {
  readonly code = 'RECORD_UNKNOWN_PROPERTY';
  readonly property: string;
  readonly recordType: string;

  constructor(property: string, recordType: string) {
    super(`\`${property}\` isn't defined for ${recordType}`);
    this.name = 'UnknownPropertyError';
    this.property = property;
    this.recordType = recordType;
  }
}

export class TransformError extends LazyRecordError {
  readonly code = 'RECORD_TRANSFORM_FAILED';
  readonly property: string;
  readonly method: string;

  constructor(property: string, method: string, received: string) {
    super(`Cannot transform \`${property}\`: ${received} has no method '${method}'`);
    this.name = 'TransformError';
    this.property = property;
    this.method = method;
  }
}
