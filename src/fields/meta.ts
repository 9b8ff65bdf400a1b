import * as z from "zod"
import { Field, FieldListSchema, FieldOptionsSchema, FieldSchema, parseOptions, type FieldOptions } from "@/fields/base"
import { FieldError, type FieldWarning } from "@/fields/issues"
import { ERROR_CODE_MISSING, ERROR_CODE_UNKNOWN, isInstantiable, type Constructor, type Introspection } from "@/types"
import { isPlainObject, readPath } from "@/utils/objects"

/**
 * Branch key used by `Polymorph` when the switch value has no branch of its own
 */
export const DEFAULT_BRANCH = "__default__"

type Branch = { field: Field } | { error: FieldError }

/**
 * A discriminated union over plain objects.
 *
 * The value found at `switchField` (a key, or a dotted path into nested objects) picks the field
 * the whole object is validated with. Branches are matched exactly: only a string switch value
 * equal to a branch key selects that branch, so `1` never selects the `"1"` branch. Values without
 * a branch fall back to `__default__`; when that is also missing, validation stops with a single
 * `UNKNOWN` error.
 *
 * Every branch sees the complete object, switch key included, so branch schemas have to declare
 * the switch key with a field that accepts the value that selects them.
 *
 * @example
 * ```ts
 * const pet = new Polymorph("type", {
 *   dog: new Dictionary({ type: new Constant(["dog"]), barks: new Boolean() }),
 *   __default__: new Dictionary({ type: new UnicodeString() }),
 * })
 * ```
 */
export class Polymorph extends Field {
  readonly type: string = "polymorph"

  readonly switchField: string
  readonly contentsMap: Readonly<Record<string, Field>>

  constructor(switchField: string, contentsMap: Record<string, Field>, options: FieldOptions = {}) {
    super(options)
    const parsed = parseOptions(
      z.object({
        switchField: z.string().min(1),
        contentsMap: z.record(z.string(), FieldSchema),
      }),
      { switchField, contentsMap },
      "Polymorph",
    )
    this.switchField = parsed.switchField
    this.contentsMap = Object.freeze({ ...parsed.contentsMap })
  }

  private branch(value: Record<string, unknown>): Branch {
    const switchValue = readPath(value, this.switchField)
    const fallback: Field | undefined = this.contentsMap[DEFAULT_BRANCH]

    if (!switchValue.found) {
      return fallback
        ? { field: fallback }
        : {
            error: new FieldError(`Missing key: ${this.switchField}`, { code: ERROR_CODE_MISSING, pointer: this.switchField }),
          }
    }

    const key = String(switchValue.value)
    const selected: Field | undefined =
      typeof switchValue.value === "string" && Object.hasOwn(this.contentsMap, key) ? this.contentsMap[key] : fallback
    if (!selected) {
      return { error: new FieldError(`Invalid switch value '${key}'`, { code: ERROR_CODE_UNKNOWN }) }
    }
    return { field: selected }
  }

  errors(value: unknown): FieldError[] {
    if (!isPlainObject(value)) {
      return [new FieldError("Not a dict")]
    }

    const branch = this.branch(value)
    return "error" in branch ? [branch.error] : branch.field.errors(value)
  }

  override warnings(value: unknown): FieldWarning[] {
    if (!isPlainObject(value)) {
      return []
    }

    const branch = this.branch(value)
    return "field" in branch ? branch.field.warnings(value) : []
  }

  introspect(): Introspection {
    return this.describe({
      switch_field: this.switchField,
      contents_map: Object.fromEntries(Object.entries(this.contentsMap).map(([key, field]) => [key, field.introspect()])),
    })
  }
}

/**
 * Passes when at least one option passes. When none does, the errors of every option are
 * returned together, in option order.
 */
export class Any extends Field {
  readonly type: string = "any"

  readonly options: readonly Field[]

  constructor(options: readonly Field[], fieldOptions: FieldOptions = {}) {
    super(fieldOptions)
    this.options = parseOptions(FieldListSchema, options, "Any")
  }

  errors(value: unknown): FieldError[] {
    const result: FieldError[] = []
    for (const option of this.options) {
      const errors = option.errors(value)
      if (errors.length === 0) {
        return []
      }
      result.push(...errors)
    }
    return result
  }

  override warnings(value: unknown): FieldWarning[] {
    const result: FieldWarning[] = []
    for (const option of this.options) {
      // the first passing option decides
      if (option.isValid(value)) {
        return option.warnings(value)
      }
      result.push(...option.warnings(value))
    }
    return result
  }

  introspect(): Introspection {
    return this.describe({
      options: this.options.map((option) => option.introspect()),
    })
  }
}

/**
 * Passes when every requirement passes. All requirements always run and their errors are
 * concatenated.
 */
export class All extends Field {
  readonly type: string = "all"

  readonly requirements: readonly Field[]

  constructor(requirements: readonly Field[], options: FieldOptions = {}) {
    super(options)
    this.requirements = parseOptions(FieldListSchema, requirements, "All")
  }

  errors(value: unknown): FieldError[] {
    return this.requirements.flatMap((requirement) => requirement.errors(value))
  }

  override warnings(value: unknown): FieldWarning[] {
    return this.requirements.flatMap((requirement) => requirement.warnings(value))
  }

  introspect(): Introspection {
    return this.describe({
      requirements: this.requirements.map((requirement) => requirement.introspect()),
    })
  }
}

export interface BooleanValidatorOptions extends FieldOptions {
  /** Predicate deciding whether a value is valid */
  validator: (value: unknown) => boolean
  /** Human-readable summary of the predicate, shown in introspection */
  validatorDescription: string
  /** Message of the error returned when the predicate fails */
  error: string
}

const BooleanValidatorOptionsSchema = FieldOptionsSchema.extend({
  validator: z.custom<(value: unknown) => boolean>((value) => typeof value === "function", {
    message: "must be a function",
  }),
  validatorDescription: z.string(),
  error: z.string(),
})

/**
 * Wraps a predicate. A predicate that throws is reported as an error instead of propagating.
 */
export class BooleanValidator extends Field {
  readonly type: string = "boolean_validator"

  readonly validator: (value: unknown) => boolean
  readonly validatorDescription: string
  readonly error: string

  constructor(options: BooleanValidatorOptions) {
    super(options)
    const parsed = parseOptions(BooleanValidatorOptionsSchema, options, new.target.name)
    this.validator = parsed.validator
    this.validatorDescription = parsed.validatorDescription
    this.error = parsed.error
  }

  errors(value: unknown): FieldError[] {
    let ok: boolean
    try {
      ok = this.validator(value)
    } catch (err) {
      return [new FieldError(`Validator encountered an error (invalid type?): ${String(err)}`)]
    }
    return ok ? [] : [new FieldError(this.error)]
  }

  introspect(): Introspection {
    return this.describe({ validator: this.validatorDescription })
  }
}

const ClassSchema = z.custom<Constructor>(isInstantiable, { message: "must be a class" })

const ClassListSchema = z.union([ClassSchema, z.array(ClassSchema).min(1)]).transform((value) => (Array.isArray(value) ? value : [value]))

/**
 * Check whether `candidate` is `base` or one of its subclasses
 */
export function isSubclass(candidate: Constructor, base: Constructor): boolean {
  return candidate === base || Object.prototype.isPrototypeOf.call(base.prototype, candidate.prototype)
}

const className = (cls: Constructor): string => cls.name || "<anonymous class>"

/**
 * Accepts instances of `validType`, or of any of several classes when given a list
 */
export class ObjectInstance extends Field {
  readonly type: string = "object_instance"

  readonly validTypes: readonly Constructor[]

  constructor(validType: Constructor | readonly Constructor[], options: FieldOptions = {}) {
    super(options)
    this.validTypes = parseOptions(ClassListSchema, validType, "ObjectInstance")
  }

  errors(value: unknown): FieldError[] {
    if (!this.validTypes.some((cls) => value instanceof cls)) {
      return [new FieldError(`Not an instance of ${this.validTypes.map(className).join(" or ")}`)]
    }
    return []
  }

  introspect(): Introspection {
    return this.describe({ valid_type: this.validTypes.map(className).join(", ") })
  }
}

export interface TypeReferenceOptions extends FieldOptions {
  /** When set, the class must be one of these or a subclass of one of them */
  baseClasses?: Constructor | readonly Constructor[]
}

/**
 * Accepts classes, optionally restricted to subclasses of `baseClasses`
 */
export class TypeReference extends Field {
  readonly type: string = "type_reference"

  readonly baseClasses?: readonly Constructor[]

  constructor(options: TypeReferenceOptions = {}) {
    super(options)
    if (options.baseClasses !== undefined) {
      this.baseClasses = parseOptions(ClassListSchema, options.baseClasses, `${new.target.name} baseClasses`)
    }
  }

  errors(value: unknown): FieldError[] {
    if (!isInstantiable(value)) {
      return [new FieldError("Not a type")]
    }

    const baseClasses = this.baseClasses
    if (baseClasses && !baseClasses.some((base) => isSubclass(value, base))) {
      return [
        new FieldError(`Type ${className(value)} is not one of or a subclass of one of: ${baseClasses.map(className).join(", ")}`),
      ]
    }

    return []
  }

  introspect(): Introspection {
    return this.describe({ base_classes: this.baseClasses?.map(className) })
  }
}
