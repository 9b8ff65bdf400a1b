import { isDeepStrictEqual } from "node:util"
import type { Field } from "@/fields/base"
import { FieldError } from "@/fields/issues"
import { Dictionary } from "@/fields/structures"
import { formatErrors } from "@/types"
import { logger } from "@/utils/logger"
import { deepFreeze, deepMerge, isPlainObject } from "@/utils/objects"

/**
 * Top-level setting names mapped to the fields validating them
 */
export type SettingsSchema = Record<string, Field>

/**
 * Settings values, possibly nested
 */
export type SettingsData = Record<string, unknown>

/**
 * Raised when a settings class is constructed with data that does not match its schema
 */
export class ImproperlyConfigured extends Error {
  override name = "ImproperlyConfigured" as const

  public readonly errors: readonly FieldError[]

  constructor(settingsName: string, errors: readonly FieldError[]) {
    super(`Invalid settings for ${settingsName}:\n  - ${formatErrors(errors)}`)
    this.errors = errors

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ImproperlyConfigured)
    }
  }
}

/**
 * The schema and defaults a settings class ends up with after merging its bases
 */
export interface EffectiveSettings {
  readonly schema: Readonly<SettingsSchema>
  readonly defaults: Readonly<SettingsData>
}

const log = logger.child({ component: "Settings" })

/**
 * Validated, read-only settings.
 *
 * Subclasses declare their own `schema` and `defaults` as static members. A class inherits the
 * schema and defaults of its `extends` parent and of every class listed in its static `bases`,
 * which is how several settings classes are combined:
 *
 * - bases are merged from the last listed to the first, so earlier bases win conflicts
 * - the class's own `schema` and `defaults` are merged last and win over every base
 * - schemas merge by top-level key, defaults merge recursively through nested plain objects
 *
 * Construction merges `data` over the effective defaults and validates the result against the
 * effective schema as a strict dictionary, throwing `ImproperlyConfigured` on any error.
 *
 * @example
 * ```ts
 * class ServerSettings extends Settings {
 *   static override schema: SettingsSchema = { host: new UnicodeString(), port: new Integer({ gt: 0 }) }
 *   static override defaults: SettingsData = { host: "localhost", port: 8080 }
 * }
 *
 * class TlsSettings extends Settings {
 *   static override schema: SettingsSchema = { tls: new Dictionary({ enabled: new Boolean() }) }
 *   static override defaults: SettingsData = { tls: { enabled: false } }
 * }
 *
 * class AppSettings extends ServerSettings {
 *   static override bases = [TlsSettings]
 *   static override defaults: SettingsData = { port: 9000 }
 * }
 *
 * new AppSettings({ tls: { enabled: true } }).get("port") // 9000
 * ```
 */
export class Settings implements Iterable<[string, unknown]> {
  static schema: SettingsSchema = {}
  static defaults: SettingsData = {}
  static bases: readonly (typeof Settings)[] = []

  static readonly ImproperlyConfigured = ImproperlyConfigured

  readonly #data: Readonly<SettingsData>

  constructor(data: SettingsData = {}) {
    const name = new.target.name
    if (!isPlainObject(data)) {
      throw new ImproperlyConfigured(name, [new FieldError("Not a dict")])
    }

    const { schema, defaults } = resolveSettings(new.target)
    const merged = deepMerge(defaults, data)
    const errors = new Dictionary(schema).errors(merged)
    if (errors.length > 0) {
      log.warn("Settings failed validation", { settings: name, errors: errors.length })
      throw new ImproperlyConfigured(name, errors)
    }

    this.#data = deepFreeze(merged)
  }

  /**
   * Value of `key`, or `fallback` when the key is not set
   */
  get(key: string, fallback?: unknown): unknown {
    return Object.hasOwn(this.#data, key) ? this.#data[key] : fallback
  }

  has(key: string): boolean {
    return Object.hasOwn(this.#data, key)
  }

  keys(): string[] {
    return Object.keys(this.#data)
  }

  values(): unknown[] {
    return Object.values(this.#data)
  }

  entries(): [string, unknown][] {
    return Object.entries(this.#data)
  }

  get size(): number {
    return this.keys().length
  }

  [Symbol.iterator](): Iterator<[string, unknown]> {
    return this.entries()[Symbol.iterator]()
  }

  /**
   * Whether `other` is a settings object of the same class holding equal data
   */
  equals(other: unknown): boolean {
    return (
      other instanceof Settings &&
      other.constructor === this.constructor &&
      isDeepStrictEqual(other.toJSON(), this.toJSON())
    )
  }

  /**
   * The validated data. The returned object is frozen.
   */
  toJSON(): Readonly<SettingsData> {
    return this.#data
  }
}

const resolved = new WeakMap<typeof Settings, EffectiveSettings>()

function isSettingsClass(value: unknown): value is typeof Settings {
  return value === Settings || (typeof value === "function" && value.prototype instanceof Settings)
}

/**
 * Compute (and memoize) the effective schema and defaults of a settings class
 */
export function resolveSettings(cls: typeof Settings): EffectiveSettings {
  const cached = resolved.get(cls)
  if (cached) {
    return cached
  }

  const parent: unknown = Object.getPrototypeOf(cls)
  const ownBases = Object.hasOwn(cls, "bases") ? cls.bases : []
  const bases = [parent, ...ownBases].filter(isSettingsClass)

  let schema: SettingsSchema = {}
  let defaults: SettingsData = {}
  for (const base of [...bases].reverse()) {
    const effective = resolveSettings(base)
    schema = { ...schema, ...effective.schema }
    defaults = deepMerge(defaults, effective.defaults)
  }

  if (Object.hasOwn(cls, "schema")) {
    schema = { ...schema, ...cls.schema }
  }
  if (Object.hasOwn(cls, "defaults")) {
    defaults = deepMerge(defaults, cls.defaults)
  }

  const effective: EffectiveSettings = {
    schema: Object.freeze(schema),
    defaults: deepFreeze(defaults),
  }
  resolved.set(cls, effective)
  return effective
}

/**
 * Deep-merge several defaults fragments, later fragments winning conflicts
 */
export function mergeDefaults(...fragments: readonly SettingsData[]): SettingsData {
  return fragments.reduce<SettingsData>((merged, fragment) => deepMerge(merged, fragment), {})
}
