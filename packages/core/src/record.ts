import { isDeepStrictEqual } from 'node:util';

import { ConfigurationError, MissingAttributeError } from './errors';
import { PropertyRegistry } from './registry';
import { AttributeResolver } from './resolver';
import type { RecordSettings, RecordSettingsInput } from './settings';
import type { PropertyOptions, SourceData, SourceEntries } from './types';

const registries = new WeakMap<object, PropertyRegistry<RecordBase>>();
const installedAccessors = new WeakSet<Function>();

// Instance fields are not visible on the prototype.
const RESERVED_NAMES = new Set(['resolver']);

function isEntryIterable(entries: SourceEntries): entries is Iterable<readonly [string, unknown]> {
  return typeof Reflect.get(entries, Symbol.iterator) === 'function';
}

function registryFor(target: Function): PropertyRegistry<RecordBase> {
  const existing = registries.get(target);
  if (existing) {
    return existing;
  }

  let registry: PropertyRegistry<RecordBase>;
  const parent: unknown = Object.getPrototypeOf(target);
  if (target !== RecordBase && typeof parent === 'function') {
    registry = registryFor(parent).inherit(target.name);
  } else {
    registry = new PropertyRegistry<RecordBase>({ label: target.name });
  }
  registries.set(target, registry);
  return registry;
}

/**
 * Base class for lazily materialized records.
 *
 * @example
 * ```ts
 * class User extends RecordBase {
 *   declare readonly id: number;
 *   declare readonly displayName: string;
 *
 *   static {
 *     this.declareProperty('id', { required: true, identity: true });
 *     this.declareProperty('displayName', { from: ['nickname', 'fullName'] });
 *   }
 *
 *   protected refresh(): SourceData {
 *     this.markFullyLoaded();
 *     return fetchUserSync(this.read('id'));
 *   }
 * }
 * ```
 *
 * Typed accessors are declared with `declare` so that no class field shadows the
 * prototype accessor installed by {@link RecordBase.declareProperty}.
 */
export class RecordBase {
  private readonly resolver: AttributeResolver<RecordBase>;

  constructor(attributes: SourceData = {}) {
    this.resolver = new AttributeResolver<RecordBase>(registryFor(new.target), attributes, {
      context: this,
      refresh: () => this.refresh()
    });
    this.resolver.verifyRequired();
  }

  /**
   * Declares a property on this class. Subclasses inherit a snapshot of the
   * properties declared before their own first declaration or instantiation.
   *
   * @returns the property name
   */
  static declareProperty(name: string, options: PropertyOptions<RecordBase> = {}): string {
    const registry = registryFor(this);
    if (options.accessor !== false) {
      assertAccessorAvailable(this, registry, name);
    }

    const declared = registry.declare(name, options);
    if (options.accessor !== false) {
      const get = function (this: RecordBase): unknown {
        return this.read(declared);
      };
      installedAccessors.add(get);
      Object.defineProperty(this.prototype, declared, {
        configurable: true,
        enumerable: false,
        get,
        set(this: RecordBase, value: unknown) {
          this.write(declared, value);
        }
      });
    }
    return declared;
  }

  static property(name: string, options: PropertyOptions<RecordBase> = {}): string {
    return this.declareProperty(name, options);
  }

  static properties(): readonly string[] {
    return registryFor(this).names();
  }

  static registry(): PropertyRegistry<RecordBase> {
    return registryFor(this);
  }

  static configure(settings: RecordSettingsInput): Readonly<RecordSettings> {
    return registryFor(this).configure(settings);
  }

  /** @throws MissingAttributeError when no value can be produced, even after a refresh. */
  read(name: string): unknown {
    return this.resolver.read(name);
  }

  /** Like {@link RecordBase.read}, but returns null for missing values. */
  get(name: string): unknown {
    try {
      return this.resolver.read(name);
    } catch (error) {
      if (error instanceof MissingAttributeError) {
        return null;
      }
      throw error;
    }
  }

  write(name: string, value: unknown): void {
    this.resolver.write(name, value);
  }

  set(name: string, value: unknown): void {
    this.resolver.write(name, value);
  }

  setAll(entries: SourceEntries): void {
    const pairs = isEntryIterable(entries) ? Array.from(entries) : Object.entries(entries);
    for (const [name] of pairs) {
      this.resolver.assertDeclared(name);
    }
    for (const [name, value] of pairs) {
      this.resolver.write(name, value);
    }
  }

  /** Drops an explicit write (and the cached value) so the next read resolves from source. */
  unset(name: string): void {
    this.resolver.unset(name);
  }

  invalidate(name?: string): void {
    this.resolver.evict(name);
  }

  reload(): this {
    this.resolver.reload();
    return this;
  }

  isFullyLoaded(): boolean {
    return this.resolver.isFullyLoaded();
  }

  toMap(strict = true): SourceData {
    return this.resolver.toMap(strict);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof RecordBase) || other.constructor !== this.constructor) {
      return false;
    }
    if (other === this) {
      return true;
    }

    const identity = this.resolver.registry.identityNames();
    if (identity.length === 0) {
      return false;
    }
    return identity.every((name) => isDeepStrictEqual(this.get(name), other.get(name)));
  }

  toString(): string {
    const identity = this.resolver.registry.identityNames();
    const fields = identity.map((name) => `${name}=${String(this.get(name))}`);
    return fields.length > 0 ? `${this.resolver.recordType}{${fields.join(', ')}}` : this.resolver.recordType;
  }

  protected markFullyLoaded(loaded = true): void {
    this.resolver.markFullyLoaded(loaded);
  }

  /**
   * Fetches fresh source data. The default marks the record fully loaded and
   * returns nothing new.
   */
  protected refresh(): SourceData {
    this.markFullyLoaded();
    return {};
  }
}

function findMember(prototype: object, name: string): PropertyDescriptor | undefined {
  let current: object | null = prototype;
  while (current) {
    const descriptor = Object.getOwnPropertyDescriptor(current, name);
    if (descriptor) {
      return descriptor;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

function assertAccessorAvailable(target: typeof RecordBase, registry: PropertyRegistry<RecordBase>, name: string): void {
  if (!RESERVED_NAMES.has(name) && !(name in target.prototype)) {
    return;
  }
  const existing = findMember(target.prototype, name);
  if (existing?.get && installedAccessors.has(existing.get)) {
    return;
  }
  throw new ConfigurationError(`${registry.recordType}.${name}`, [
    {
      path: ['name'],
      message: `'${name}' conflicts with an existing member; declare it with accessor: false`
    }
  ]);
}
