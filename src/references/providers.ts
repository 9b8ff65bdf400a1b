import { Dictionary, SchemalessDictionary } from "@/fields/structures"
import { FieldConfigurationError, isInstantiable, type Constructor } from "@/types"

/**
 * Schema of the keyword arguments a class is constructed with
 */
export type ProviderSchema = Dictionary | SchemalessDictionary

/**
 * Maps classes to the schema of their constructor arguments.
 *
 * A class inherits the schema of its closest registered ancestor, so registering a base class
 * covers every subclass that does not register its own.
 *
 * @example
 * ```ts
 * providers.register(RedisBackend, new Dictionary({ host: new UnicodeString(), port: new Integer() }))
 * providers.lookup(ClusteredRedisBackend) // the RedisBackend schema
 * ```
 */
export class ProviderRegistry {
  readonly #schemas = new WeakMap<Constructor, ProviderSchema>()

  /**
   * Register `schema` for `cls`, replacing any schema registered for the same class
   */
  register(cls: Constructor, schema: ProviderSchema): this {
    if (!isInstantiable(cls)) {
      throw new FieldConfigurationError("Only classes can be registered as providers")
    }
    if (!(schema instanceof Dictionary) && !(schema instanceof SchemalessDictionary)) {
      throw new FieldConfigurationError("Provider schema must be a Dictionary or SchemalessDictionary field")
    }
    this.#schemas.set(cls, schema)
    return this
  }

  /**
   * Remove the schema registered directly on `cls`
   */
  unregister(cls: Constructor): boolean {
    return this.#schemas.delete(cls)
  }

  /**
   * Find the schema of `cls` or of its closest registered ancestor
   */
  lookup(cls: Constructor): ProviderSchema | undefined {
    let current: unknown = cls
    while (isInstantiable(current)) {
      const schema = this.#schemas.get(current)
      if (schema) {
        return schema
      }
      const parent: unknown = Object.getPrototypeOf(current)
      current = parent
    }
    return undefined
  }

  has(cls: Constructor): boolean {
    return this.lookup(cls) !== undefined
  }
}

/**
 * The process-wide registry used by every `ClassConfigurationSchema` not given its own
 */
export const providers = new ProviderRegistry()
