import * as z from "zod"
import { Field, FieldOptionsSchema, parseOptions, type FieldOptions } from "@/fields/base"
import { FieldError } from "@/fields/issues"
import {
  ERROR_CODE_MISSING,
  ERROR_CODE_UNKNOWN,
  FieldConfigurationError,
  ValidationError,
  isInstantiable,
  type Constructor,
  type Instantiable,
  type Introspection,
} from "@/types"
import { logger } from "@/utils/logger"
import { canWrite, isPlainObject } from "@/utils/objects"
import { TypePath } from "@/references/fields"
import { ProviderRegistry, providers, type ProviderSchema } from "@/references/providers"
import { ReferenceResolver, defaultResolver } from "@/references/resolver"

export interface ClassConfigurationSchemaOptions<T = unknown> extends FieldOptions {
  /** Configured classes must be this class or one of its subclasses */
  baseClass?: Constructor<T>
  /** Reference used when the configuration has no `path` */
  defaultPath?: string
  /** Resolve and check `defaultPath` at construction. Defaults to `true`. */
  eagerDefaultValidation?: boolean
  /** Whether `errors()` writes the resolved class into the configuration. Defaults to `true`. */
  addClassObjectToDict?: boolean
  /** Key the resolved class is written under. Defaults to `"object"`. */
  classObjectKey?: string
  resolver?: ReferenceResolver
  registry?: ProviderRegistry
}

const ClassConfigurationSchemaOptionsSchema = FieldOptionsSchema.extend({
  defaultPath: z.string().min(1).optional(),
  eagerDefaultValidation: z.boolean().default(true),
  addClassObjectToDict: z.boolean().default(true),
  classObjectKey: z
    .string()
    .min(1)
    .refine((key) => key !== "path" && key !== "kwargs", { message: 'cannot be "path" or "kwargs"' })
    .default("object"),
})

/**
 * A class configuration that passed the path checks
 */
export interface ResolvedClassConfiguration {
  /** The reference, after `defaultPath` was applied */
  path: string
  cls: Instantiable
  kwargs: unknown
}

/**
 * Result of `ClassConfigurationSchema.check()`. `resolved` is set once the path resolved to a
 * registered class, even when the keyword arguments have errors.
 */
export interface ClassConfigurationCheck {
  errors: FieldError[]
  resolved?: ResolvedClassConfiguration
}

interface ProviderEntry {
  path: string
  cls: Instantiable
  schema: ProviderSchema
}

/**
 * Validates `{ path, kwargs }` objects describing a class to construct.
 *
 * `path` is a reference to a class (optionally bound to `baseClass`) that has a constructor
 * argument schema in the provider registry; `kwargs` is validated against that schema.
 *
 * `errors()` writes the defaulted `path`, and unless `addClassObjectToDict` is `false` the
 * resolved class under `classObjectKey`, into the validated object. That key is accepted when the
 * same object is validated again. Objects that cannot take both keys (frozen, sealed, read-only)
 * are not written to. Use `check()` to validate without touching the input.
 *
 * @example
 * ```ts
 * providers.register(FileBackend, new Dictionary({ directory: new UnicodeString() }))
 *
 * const schema = new ClassConfigurationSchema({ baseClass: Backend })
 * const backend = schema.instantiate({ path: "app/backends:FileBackend", kwargs: { directory: "/tmp" } })
 * ```
 */
export class ClassConfigurationSchema<T = unknown> extends Field {
  readonly type: string = "class_config_dictionary"

  readonly baseClass?: Constructor<T>
  readonly defaultPath?: string
  readonly eagerDefaultValidation: boolean
  readonly addClassObjectToDict: boolean
  readonly classObjectKey: string
  readonly pathField: TypePath
  readonly registry: ProviderRegistry

  readonly #resolver: ReferenceResolver
  readonly #schemaCache = new Map<string, ProviderEntry>()
  private readonly log = logger.child({ component: "ClassConfigurationSchema" })

  constructor(options: ClassConfigurationSchemaOptions<T> = {}) {
    super(options)
    const parsed = parseOptions(ClassConfigurationSchemaOptionsSchema, options, new.target.name)
    if (options.baseClass !== undefined) {
      if (!isInstantiable(options.baseClass)) {
        throw new FieldConfigurationError(`${new.target.name} baseClass must be a class`)
      }
      this.baseClass = options.baseClass
    }
    this.defaultPath = parsed.defaultPath
    this.eagerDefaultValidation = parsed.eagerDefaultValidation
    this.addClassObjectToDict = parsed.addClassObjectToDict
    this.classObjectKey = parsed.classObjectKey
    this.registry = options.registry ?? providers
    this.#resolver = options.resolver ?? defaultResolver
    this.pathField = new TypePath({ baseClasses: this.baseClass, resolver: this.#resolver })

    if (this.defaultPath !== undefined && this.eagerDefaultValidation) {
      const result = this.provider(this.defaultPath)
      if ("errors" in result) {
        this.log.warn("Default path failed validation", { defaultPath: this.defaultPath })
        throw new ValidationError(result.errors, "default path")
      }
    }
  }

  /**
   * Resolve `path` to a registered class, caching the result per path
   */
  private provider(path: unknown): ProviderEntry | { errors: FieldError[] } {
    if (typeof path === "string") {
      const cached = this.#schemaCache.get(path)
      if (cached) {
        return cached
      }
    }

    const errors = this.pathField.errors(path)
    if (errors.length > 0) {
      return { errors }
    }
    if (typeof path !== "string") {
      return { errors: [new FieldError("Not a unicode string")] }
    }

    const cls = this.#resolver.resolve(path)
    if (!isInstantiable(cls)) {
      return { errors: [new FieldError("Not a type")] }
    }

    const schema = this.registry.lookup(cls)
    if (!schema) {
      return {
        errors: [new FieldError(`Neither class '${path}' nor one of its superclasses has a registered provider schema`)],
      }
    }

    const entry = { path, cls, schema }
    this.#schemaCache.set(path, entry)
    return entry
  }

  /**
   * Validate a configuration without modifying it
   */
  check(value: unknown): ClassConfigurationCheck {
    if (!isPlainObject(value)) {
      return { errors: [new FieldError("Not a mapping (dictionary)")] }
    }

    const allowed = ["path", "kwargs", this.classObjectKey]
    const extraKeys = Object.keys(value)
      .filter((key) => !allowed.includes(key))
      .sort()
    if (extraKeys.length > 0) {
      return { errors: [new FieldError(`Extra keys present: ${extraKeys.join(", ")}`, { code: ERROR_CODE_UNKNOWN })] }
    }

    const hasPath = Object.hasOwn(value, "path")
    if (!hasPath && this.defaultPath === undefined) {
      return {
        errors: [new FieldError("Missing key (and no default specified): path", { code: ERROR_CODE_MISSING, pointer: "path" })],
      }
    }

    // empty values fall back to the default as well
    const path: unknown = hasPath && value.path ? value.path : (this.defaultPath ?? value.path)
    const entry = this.provider(path)
    if ("errors" in entry) {
      return { errors: entry.errors.map((error) => error.withPointer("path")) }
    }

    const kwargs = Object.hasOwn(value, "kwargs") ? value.kwargs : {}
    return {
      errors: entry.schema.errors(kwargs).map((error) => error.withPointer("kwargs")),
      resolved: { path: entry.path, cls: entry.cls, kwargs },
    }
  }

  errors(value: unknown): FieldError[] {
    const { errors, resolved } = this.check(value)
    if (!resolved || !isPlainObject(value)) {
      return errors
    }

    const updates: Record<string, unknown> = { path: resolved.path }
    if (this.addClassObjectToDict) {
      updates[this.classObjectKey] = resolved.cls
    }
    // frozen, sealed or read-only configurations are left as they are
    if (Object.keys(updates).every((key) => canWrite(value, key))) {
      Object.assign(value, updates)
    }
    return errors
  }

  /**
   * Validate `configuration` and construct the configured class with its `kwargs`.
   * Throws `ValidationError` when the configuration is invalid.
   */
  instantiate(configuration: unknown): T {
    const { errors, resolved } = this.check(configuration)
    if (errors.length > 0 || !resolved) {
      throw new ValidationError(errors, "class configuration")
    }

    const instance: unknown = new resolved.cls(resolved.kwargs)
    if (!this.isInstance(instance)) {
      throw new ValidationError([new FieldError(`Not an instance of ${this.baseClass?.name}`)], "class configuration")
    }
    return instance
  }

  private isInstance(value: unknown): value is T {
    return this.baseClass === undefined || value instanceof this.baseClass
  }

  introspect(): Introspection {
    // only the eagerly resolved default is known up front
    const defaultEntry =
      this.defaultPath !== undefined && this.eagerDefaultValidation ? this.#schemaCache.get(this.defaultPath) : undefined
    return this.describe({
      base_class: this.baseClass?.name,
      default_path: this.defaultPath,
      switch_field: "path",
      switch_field_schema: this.pathField.introspect(),
      kwargs_field: "kwargs",
      kwargs_contents_map: defaultEntry ? { [defaultEntry.path]: defaultEntry.schema.introspect() } : undefined,
    })
  }
}
