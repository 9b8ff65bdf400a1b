import * as z from "zod"
import { Field, FieldOptionsSchema, assertField, parseOptions, type FieldOptions } from "@/fields/base"
import { FieldWarning, type FieldError } from "@/fields/issues"
import { WARNING_CODE_FIELD_DEPRECATED, type Introspection } from "@/types"

export interface DeprecatedOptions extends FieldOptions {
  /** Warning message. Defaults to `"This field has been deprecated"`. */
  message?: string
}

const DeprecatedOptionsSchema = FieldOptionsSchema.extend({
  message: z.string().default("This field has been deprecated"),
})

/**
 * Marks a field as deprecated. Validation is delegated to the wrapped field unchanged and a
 * `FIELD_DEPRECATED` warning is added on top of its own warnings.
 */
export class Deprecated extends Field {
  readonly type: string
  readonly field: Field
  readonly message: string

  constructor(field: Field, options: DeprecatedOptions = {}) {
    super(options)
    assertField(field, "Deprecated field")
    const parsed = parseOptions(DeprecatedOptionsSchema, options, new.target.name)
    this.field = field
    this.type = field.type
    this.message = parsed.message
  }

  errors(value: unknown): FieldError[] {
    return this.field.errors(value)
  }

  override warnings(value: unknown): FieldWarning[] {
    return [...this.field.warnings(value), new FieldWarning(this.message, { code: WARNING_CODE_FIELD_DEPRECATED })]
  }

  introspect(): Introspection {
    return { ...this.field.introspect(), deprecated: true }
  }
}
