import { createPropertyDescriptor } from './descriptor';
import type { PropertyDescriptor } from './descriptor';
import { DEFAULT_RECORD_SETTINGS, resolveRecordSettings } from './settings';
import type { RecordSettings, RecordSettingsInput } from './settings';
import type { PropertyOptions } from './types';

const ANONYMOUS_RECORD = 'AnonymousRecord';

export interface PropertyRegistryOptions<TContext> {
  label?: string;
  descriptors?: Iterable<PropertyDescriptor<TContext>>;
  settings?: Readonly<RecordSettings>;
}

/**
 * Ordered property metadata for one record class. Subclasses work on a snapshot
 * produced by {@link PropertyRegistry.inherit}, so declarations never leak upwards.
 */
export class PropertyRegistry<TContext> {
  private readonly descriptors = new Map<string, PropertyDescriptor<TContext>>();
  private readonly label: string;
  private currentSettings: Readonly<RecordSettings>;

  constructor(options: PropertyRegistryOptions<TContext> = {}) {
    this.label = options.label && options.label.length > 0 ? options.label : ANONYMOUS_RECORD;
    this.currentSettings = options.settings ?? DEFAULT_RECORD_SETTINGS;
    for (const descriptor of options.descriptors ?? []) {
      this.descriptors.set(descriptor.name, descriptor);
    }
  }

  get recordType(): string {
    return this.currentSettings.name ?? this.label;
  }

  get settings(): Readonly<RecordSettings> {
    return this.currentSettings;
  }

  get size(): number {
    return this.descriptors.size;
  }

  declare(name: string, options: PropertyOptions<TContext> = {}): string {
    const descriptor = createPropertyDescriptor(name, options, this.recordType);
    if (this.descriptors.has(descriptor.name)) {
      this.currentSettings.logger.warn('Property re-declared', {
        recordType: this.recordType,
        property: descriptor.name
      });
    }
    this.descriptors.set(descriptor.name, descriptor);
    return descriptor.name;
  }

  configure(input: RecordSettingsInput): Readonly<RecordSettings> {
    this.currentSettings = Object.freeze(resolveRecordSettings(this.currentSettings, input, this.recordType));
    return this.currentSettings;
  }

  inherit(label?: string): PropertyRegistry<TContext> {
    return new PropertyRegistry<TContext>({
      label: label ?? this.label,
      descriptors: this.descriptors.values(),
      settings: this.currentSettings.name === undefined ? this.currentSettings : { ...this.currentSettings, name: undefined }
    });
  }

  lookup(name: string): PropertyDescriptor<TContext> | undefined {
    return this.descriptors.get(name);
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  names(): string[] {
    return Array.from(this.descriptors.keys());
  }

  requiredNames(): string[] {
    return this.filterNames((descriptor) => descriptor.required);
  }

  identityNames(): string[] {
    return this.filterNames((descriptor) => descriptor.identity);
  }

  private filterNames(predicate: (descriptor: PropertyDescriptor<TContext>) => boolean): string[] {
    const names: string[] = [];
    for (const descriptor of this.descriptors.values()) {
      if (predicate(descriptor)) {
        names.push(descriptor.name);
      }
    }
    return names;
  }
}
