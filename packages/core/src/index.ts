export type {
  DefaultGenerator,
  PropertyOptions,
  PropertyTransform,
  RefreshProtocol,
  SourceData,
  SourceEntries,
  TransformFunction
} from './types';
export {
  createPropertyDescriptor,
  primarySourceKey,
  propertyNameSchema,
  propertyOptionsSchema,
  type PropertyDescriptor
} from './descriptor';
export { PropertyRegistry, type PropertyRegistryOptions } from './registry';
export { AttributeResolver, type ResolverHost } from './resolver';
export { RecordBase } from './record';
export {
  DEFAULT_RECORD_SETTINGS,
  isRecordLogger,
  recordSettingsSchema,
  resolveRecordSettings,
  type RecordSettings,
  type RecordSettingsInput
} from './settings';
export type { RecordLogLevel, RecordLogger, CreateRecordLoggerOptions } from './logger';
export { noopLogger, createRecordLogger, createLoggerOptions } from './logger';
export {
  LazyRecordError,
  ConfigurationError,
  RequiredAttributeError,
  MissingAttributeError,
  UnknownPropertyError,
  TransformError,
  type ConfigurationIssue,
  type LazyRecordErrorCode
} from './errors';
