import * as z from "zod"
import { FieldConfigurationError, type Introspection } from "@/types"
import type { FieldError, FieldWarning, Validation } from "@/fields/issues"

/**
 * Options shared by every field
 */
export interface FieldOptions {
  /** Human-readable description, carried into introspection */
  description?: string
}

/**
 * The abstract base every field inherits from.
 *
 * A field is a node in a schema tree. It is configured once at construction and then only
 * answers questions about values: `errors()` lists what is wrong with a value (never throwing
 * for invalid data) and `introspect()` describes the field as a JSON document.
 *
 * @example
 * ```ts
 * class Even extends Field {
 *   readonly type = "even"
 *
 *   errors(value: unknown) {
 *     return typeof value === "number" && value % 2 === 0 ? [] : [new FieldError("Not even")]
 *   }
 *
 *   introspect() {
 *     return this.describe()
 *   }
 * }
 * ```
 */
export abstract class Field {
  /** Introspection type name, lowercase snake case */
  abstract readonly type: string

  readonly description?: string

  constructor(options: FieldOptions = {}) {
    const parsed = parseOptions(FieldOptionsSchema, options, new.target.name)
    if (parsed.description !== undefined) {
      this.description = parsed.description
    }
  }

  /**
   * Returns every error found in `value`. An empty list means the value is valid.
   */
  abstract errors(value: unknown): FieldError[]

  /**
   * Returns non-fatal issues found in `value`
   */
  warnings(_value: unknown): FieldWarning[] {
    return []
  }

  /**
   * Runs both `errors()` and `warnings()`
   */
  validate(value: unknown): Validation {
    return {
      errors: this.errors(value),
      warnings: this.warnings(value),
    }
  }

  /**
   * Shorthand for `errors(value).length === 0`
   */
  isValid(value: unknown): boolean {
    return this.errors(value).length === 0
  }

  /**
   * Returns a JSON-serializable document describing this field
   */
  abstract introspect(): Introspection

  /**
   * Build an introspection document with this field's type and description plus `extra`,
   * dropping every key whose value is `undefined`.
   */
  protected describe(extra: Record<string, Introspection[string]> = {}): Introspection {
    return compact({
      type: this.type,
      description: this.description,
      ...extra,
    })
  }
}

/**
 * Remove `undefined` entries from an introspection document
 */
export function compact(document: Introspection): Introspection {
  const result: Introspection = { type: document.type }
  for (const [key, value] of Object.entries(document)) {
    if (value !== undefined) {
      result[key] = value
    }
  }
  return result
}

/**
 * Check whether a value is a field
 */
export function isField(value: unknown): value is Field {
  return value instanceof Field
}

/**
 * Throws unless `value` is a field
 */
export function assertField(value: unknown, label: string): asserts value is Field {
  if (!isField(value)) {
    throw new FieldConfigurationError(`${label} must be a field instance, is actually: ${describeValue(value)}`)
  }
}

/**
 * Short printable form of any value, used in error messages
 */
export function describeValue(value: unknown): string {
  if (typeof value === "string") return `"${value}"`
  if (typeof value === "function") return value.name ? `[class ${value.name}]` : "[function]"
  if (value === null || typeof value !== "object") return String(value)
  if (Array.isArray(value)) return "array"
  return value.constructor?.name ?? "object"
}

/**
 * Zod schema matching any field instance
 */
export const FieldSchema = z.custom<Field>(isField, { message: "must be a field instance" })

/**
 * Zod schema matching a list of field instances
 */
export const FieldListSchema = z.array(FieldSchema)

export const FieldOptionsSchema = z.object({
  description: z.string().optional(),
})

/**
 * Numeric comparison bounds
 */
export const BoundsSchema = z.object({
  gt: z.number().optional(),
  gte: z.number().optional(),
  lt: z.number().optional(),
  lte: z.number().optional(),
})

/**
 * Length limits for sized values. `min_length` must not exceed `max_length`.
 */
export const LengthSchema = z
  .object({
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().nonnegative().optional(),
  })
  .refine((v) => v.minLength === undefined || v.maxLength === undefined || v.minLength <= v.maxLength, {
    message: "minLength cannot be greater than maxLength",
  })

/**
 * Parse constructor options with a zod schema, turning failures into a `FieldConfigurationError`
 * that names the field being built.
 */
export function parseOptions<S extends z.ZodType>(schema: S, options: unknown, owner: string): z.output<S> {
  const result = schema.safeParse(options)
  if (!result.success) {
    throw new FieldConfigurationError(
      `Invalid options for ${owner}`,
      result.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)),
    )
  }
  return result.data
}
