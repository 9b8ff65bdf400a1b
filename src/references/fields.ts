import { Field, assertField, type FieldOptions } from "@/fields/base"
import { FieldError, ResolutionFieldError, type FieldWarning } from "@/fields/issues"
import { TypeReference, type TypeReferenceOptions } from "@/fields/meta"
import { ReferenceResolutionError, type Introspection } from "@/types"
import { ReferenceResolver, defaultResolver } from "@/references/resolver"

export interface ObjectPathOptions extends FieldOptions {
  /** Validates the resolved object */
  valueSchema?: Field
  /** Resolver used for lookups. Defaults to the shared resolver and cache. */
  resolver?: ReferenceResolver
}

/**
 * Accepts reference strings (`"module:Member.Nested"` or `"module.member"`) that resolve to an
 * existing object. Resolution failures are reported as `ResolutionFieldError`s; a `valueSchema`
 * then validates the resolved object itself.
 */
export class ObjectPath extends Field {
  readonly type: string = "object_path"

  readonly valueSchema?: Field
  readonly resolver: ReferenceResolver

  constructor(options: ObjectPathOptions = {}) {
    super(options)
    if (options.valueSchema !== undefined) {
      assertField(options.valueSchema, `${new.target.name} valueSchema`)
      this.valueSchema = options.valueSchema
    }
    this.resolver = options.resolver ?? defaultResolver
  }

  /**
   * Resolve `reference`, converting a resolution failure into a field error
   */
  protected lookup(reference: string): { value: unknown } | { error: ResolutionFieldError } {
    try {
      return { value: this.resolver.resolve(reference) }
    } catch (err) {
      if (err instanceof ReferenceResolutionError) {
        return { error: new ResolutionFieldError(err.message, { reference, reason: err.reason }) }
      }
      throw err
    }
  }

  errors(value: unknown): FieldError[] {
    if (typeof value !== "string") {
      return [new FieldError("Not a unicode string")]
    }

    const result = this.lookup(value)
    if ("error" in result) {
      return [result.error]
    }
    return this.valueSchema ? this.valueSchema.errors(result.value) : []
  }

  override warnings(value: unknown): FieldWarning[] {
    if (typeof value !== "string" || !this.valueSchema) {
      return []
    }
    const result = this.lookup(value)
    return "value" in result ? this.valueSchema.warnings(result.value) : []
  }

  introspect(): Introspection {
    return this.describe({ value_schema: this.valueSchema?.introspect() })
  }
}

export interface TypePathOptions extends FieldOptions, TypeReferenceOptions {
  resolver?: ReferenceResolver
}

/**
 * An `ObjectPath` whose target must be a class, optionally a subclass of `baseClasses`
 */
export class TypePath extends ObjectPath {
  constructor(options: TypePathOptions = {}) {
    super({
      description: options.description,
      resolver: options.resolver,
      valueSchema: new TypeReference({ baseClasses: options.baseClasses }),
    })
  }
}
