import { primarySourceKey } from './descriptor';
import type { PropertyDescriptor } from './descriptor';
import { MissingAttributeError, RequiredAttributeError, TransformError, UnknownPropertyError } from './errors';
import type { PropertyRegistry } from './registry';
import type { RefreshProtocol, SourceData } from './types';

export interface ResolverHost<TContext> extends RefreshProtocol {
  /** Passed to transforms and default generators. */
  readonly context: TContext;
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

function callNamedMethod(property: string, method: string, value: unknown): unknown {
  if (value === null || value === undefined) {
    throw new TransformError(property, method, describeValue(value));
  }
  const target: unknown = Reflect.get(Object(value), method);
  if (typeof target !== 'function') {
    throw new TransformError(property, method, describeValue(value));
  }
  const result: unknown = Reflect.apply(target, value, []);
  return result;
}

function produceDefault(defaultValue: unknown, context: unknown): unknown {
  if (typeof defaultValue === 'function') {
    const generated: unknown = Reflect.apply(defaultValue, undefined, [context]);
    return generated;
  }
  return defaultValue;
}

/**
 * Per-record value store. Reads resolve in the order
 * write overlay → computed cache → (one refresh) → source data → default.
 */
export class AttributeResolver<TContext> {
  readonly registry: PropertyRegistry<TContext>;
  private readonly host: ResolverHost<TContext>;
  private readonly sourceData: Map<string, unknown>;
  private readonly computedCache = new Map<string, unknown>();
  private readonly writeOverlay = new Map<string, unknown>();
  private fullyLoaded = false;
  private refreshing = false;
  private refreshHeld = false;

  constructor(registry: PropertyRegistry<TContext>, sourceData: SourceData, host: ResolverHost<TContext>) {
    this.registry = registry;
    this.host = host;
    this.sourceData = new Map(Object.entries(sourceData));
  }

  get recordType(): string {
    return this.registry.recordType;
  }

  verifyRequired(): void {
    for (const name of this.registry.requiredNames()) {
      const descriptor = this.descriptorFor(name);
      if (this.findSourceKey(descriptor) === undefined) {
        throw new RequiredAttributeError(name, this.recordType);
      }
    }
  }

  read(name: string): unknown {
    const descriptor = this.descriptorFor(name);
    if (this.writeOverlay.has(name)) {
      return this.writeOverlay.get(name);
    }
    if (this.computedCache.has(name)) {
      return this.computedCache.get(name);
    }

    const value = this.load(descriptor);
    this.computedCache.set(name, value);
    return value;
  }

  write(name: string, value: unknown): void {
    this.descriptorFor(name);
    this.writeOverlay.set(name, value);
  }

  unset(name: string): void {
    this.descriptorFor(name);
    this.writeOverlay.delete(name);
    this.computedCache.delete(name);
  }

  evict(name?: string): void {
    if (name === undefined) {
      this.computedCache.clear();
      return;
    }
    this.descriptorFor(name);
    this.computedCache.delete(name);
  }

  assertDeclared(name: string): void {
    this.descriptorFor(name);
  }

  /**
   * Calls the host's refresh and merges the result. A reload requested while a
   * refresh is already running is skipped.
   */
  reload(): void {
    if (this.refreshing) {
      this.registry.settings.logger.debug('Skipping nested refresh', { recordType: this.recordType });
      return;
    }

    this.mergeReloadResult(this.runRefresh());
  }

  mergeReloadResult(data: SourceData): void {
    const keys = Object.keys(data);
    for (const key of keys) {
      this.sourceData.set(key, data[key]);
    }
    this.computedCache.clear();
    this.registry.settings.logger.debug('Merged reload result', {
      recordType: this.recordType,
      keys,
      fullyLoaded: this.fullyLoaded
    });
  }

  toMap(strict: boolean): SourceData {
    if (strict) {
      this.resolveAll();
    }
    const entries: [string, unknown][] = [];
    for (const name of this.registry.names()) {
      if (this.writeOverlay.has(name)) {
        entries.push([name, this.writeOverlay.get(name)]);
      } else if (this.computedCache.has(name)) {
        entries.push([name, this.computedCache.get(name)]);
      } else if (strict) {
        entries.push([name, this.read(name)]);
      }
    }
    return Object.fromEntries(entries);
  }

  isFullyLoaded(): boolean {
    return this.fullyLoaded;
  }

  markFullyLoaded(loaded: boolean): void {
    this.fullyLoaded = loaded;
  }

  hasSource(key: string): boolean {
    return this.sourceData.has(key);
  }

  cachedNames(): string[] {
    return Array.from(this.computedCache.keys());
  }

  writtenNames(): string[] {
    return Array.from(this.writeOverlay.keys());
  }

  private descriptorFor(name: string): PropertyDescriptor<TContext> {
    const descriptor = this.registry.lookup(name);
    if (!descriptor) {
      throw new UnknownPropertyError(name, this.recordType);
    }
    return descriptor;
  }

  private runRefresh(): SourceData {
    this.refreshing = true;
    try {
      return this.host.refresh();
    } finally {
      this.refreshing = false;
    }
  }

  /**
   * Refreshes at most once for the whole record, then resolves every
   * property that is neither written nor cached against the same data.
   */
  private resolveAll(): void {
    const pending = this.registry
      .names()
      .filter((name) => !this.writeOverlay.has(name) && !this.computedCache.has(name));
    const needsRefresh = pending.some((name) => this.findSourceKey(this.descriptorFor(name)) === undefined);
    if (needsRefresh && !this.fullyLoaded) {
      this.registry.settings.logger.debug('Refreshing record to resolve all properties', {
        recordType: this.recordType,
        pending
      });
      this.reload();
    }

    this.refreshHeld = true;
    try {
      for (const name of this.registry.names()) {
        if (!this.writeOverlay.has(name)) {
          this.read(name);
        }
      }
    } finally {
      this.refreshHeld = false;
    }
  }

  private findSourceKey(descriptor: PropertyDescriptor<TContext>): string | undefined {
    return descriptor.sourceKeys.find((key) => this.sourceData.has(key));
  }

  private load(descriptor: PropertyDescriptor<TContext>): unknown {
    if (this.findSourceKey(descriptor) === undefined && !this.fullyLoaded && !this.refreshHeld) {
      this.registry.settings.logger.debug('Refreshing record to resolve property', {
        recordType: this.recordType,
        property: descriptor.name
      });
      this.reload();
    }

    const sourceKey = this.findSourceKey(descriptor);
    if (sourceKey !== undefined) {
      return this.transform(descriptor, this.sourceData.get(sourceKey));
    }

    if (!descriptor.hasDefault) {
      throw new MissingAttributeError({
        sourceKey: primarySourceKey(descriptor),
        property: descriptor.name,
        recordType: this.recordType
      });
    }

    const value = produceDefault(descriptor.defaultValue, this.host.context);
    const applyToDefault = descriptor.applyTransformToDefault ?? this.registry.settings.applyTransformToDefault;
    return applyToDefault ? this.transform(descriptor, value) : value;
  }

  private transform(descriptor: PropertyDescriptor<TContext>, value: unknown): unknown {
    const { transform } = descriptor;
    if (transform === undefined) {
      return value;
    }
    if (typeof transform === 'function') {
      return transform(value, this.host.context);
    }
    return callNamedMethod(descriptor.name, transform, value);
  }
}
