export type SourceData = Record<string, unknown>;

export type SourceEntries = SourceData | Iterable<readonly [string, unknown]>;

/**
 * Transform applied to a source-derived value before it is cached. Receives the
 * owning record so it can read sibling properties.
 */
export type TransformFunction<TContext> = (value: unknown, record: TContext) => unknown;

/**
 * Either a transform function or the name of a zero-argument method to call on
 * the raw value (`'trim'`, `'toUpperCase'`, ...).
 */
export type PropertyTransform<TContext> = TransformFunction<TContext> | string;

export type DefaultGenerator<TContext> = (record: TContext) => unknown;

export interface PropertyOptions<TContext> {
  /** The source payload passed at construction must contain the key. */
  required?: boolean;
  /** Source key, or ordered candidate keys searched left to right. Defaults to the property name. */
  from?: string | readonly string[];
  /** Value used when no source key is present. Functions are called lazily with the record. */
  default?: unknown;
  /** Shortcut for `default: null`. */
  nil?: boolean;
  with?: PropertyTransform<TContext>;
  /** Compared by `equals`. */
  identity?: boolean;
  /** Overrides the class-level `applyTransformToDefault` setting for this property. */
  applyTransformToDefault?: boolean;
  /** Install a prototype getter/setter named after the property. Defaults to true. */
  accessor?: boolean;
}

/**
 * Implemented by model authors to fetch fresh source data. The result is merged
 * into the record's source payload. Implementations mark the record fully loaded
 * once further refreshes would not produce anything new; until then every cache
 * miss on an absent key calls refresh again.
 */
export interface RefreshProtocol {
  refresh(): SourceData;
}
