import * as z from "zod"
import { Field, assertField, BoundsSchema, FieldOptionsSchema, LengthSchema, parseOptions, type FieldOptions } from "@/fields/base"
import { FieldError, type FieldWarning } from "@/fields/issues"
import { ERROR_CODE_UNKNOWN, type Introspection } from "@/types"

/**
 * Accepts every value
 */
export class Anything extends Field {
  readonly type: string = "anything"

  errors(_value: unknown): FieldError[] {
    return []
  }

  introspect(): Introspection {
    return this.describe()
  }
}

/**
 * A value that compares by identity-free equality: `null`, `undefined`, strings, numbers,
 * booleans, bigints and symbols. Objects and arrays are not hashable.
 */
export type HashableValue = string | number | boolean | bigint | symbol | null | undefined

export function isHashable(value: unknown): value is HashableValue {
  return value === null || (typeof value !== "object" && typeof value !== "function")
}

/**
 * Accepts primitive values, the values usable as membership keys by value
 */
export class Hashable extends Anything {
  override readonly type: string = "hashable"

  override errors(value: unknown): FieldError[] {
    if (!isHashable(value)) {
      return [new FieldError("Value is not hashable")]
    }
    return []
  }
}

/**
 * Accepts `true` and `false`
 */
export class Boolean extends Field {
  readonly type: string = "boolean"

  errors(value: unknown): FieldError[] {
    if (typeof value !== "boolean") {
      return [new FieldError("Not a boolean")]
    }
    return []
  }

  introspect(): Introspection {
    return this.describe()
  }
}

export interface BoundOptions<T> {
  gt?: T
  gte?: T
  lt?: T
  lte?: T
}

/**
 * Check `value` against `gt`/`lt`/`gte`/`lte`, returning one error per violated bound.
 * `format` renders a bound inside the message.
 */
export function boundErrors(
  value: number | bigint,
  bounds: BoundOptions<number>,
  format: (bound: number) => string = String,
): FieldError[] {
  const errors: FieldError[] = []
  if (bounds.gt !== undefined && value <= bounds.gt) {
    errors.push(new FieldError(`Value not > ${format(bounds.gt)}`))
  }
  if (bounds.lt !== undefined && value >= bounds.lt) {
    errors.push(new FieldError(`Value not < ${format(bounds.lt)}`))
  }
  if (bounds.gte !== undefined && value < bounds.gte) {
    errors.push(new FieldError(`Value not >= ${format(bounds.gte)}`))
  }
  if (bounds.lte !== undefined && value > bounds.lte) {
    errors.push(new FieldError(`Value not <= ${format(bounds.lte)}`))
  }
  return errors
}

export interface NumberOptions extends FieldOptions, BoundOptions<number> {}

const NumberOptionsSchema = FieldOptionsSchema.extend(BoundsSchema.shape)

/**
 * Accepts integers of any size (integral numbers and bigints), optionally bounded with `gt`, `gte`, `lt` and `lte`
 */
export class Integer extends Field {
  readonly type: string = "integer"
  protected readonly noun: string = "an integer"

  readonly gt?: number
  readonly gte?: number
  readonly lt?: number
  readonly lte?: number

  constructor(options: NumberOptions = {}) {
    super(options)
    const parsed = parseOptions(NumberOptionsSchema, options, new.target.name)
    this.gt = parsed.gt
    this.gte = parsed.gte
    this.lt = parsed.lt
    this.lte = parsed.lte
  }

  protected accepts(value: unknown): value is number | bigint {
    return Number.isInteger(value) || typeof value === "bigint"
  }

  errors(value: unknown): FieldError[] {
    if (!this.accepts(value)) {
      return [new FieldError(`Not ${this.noun}`)]
    }
    return boundErrors(value, this)
  }

  introspect(): Introspection {
    return this.describe({
      gt: this.gt,
      gte: this.gte,
      lt: this.lt,
      lte: this.lte,
    })
  }
}

/**
 * Accepts any number except `NaN`, optionally bounded with `gt`, `gte`, `lt` and `lte`
 */
export class Float extends Integer {
  override readonly type: string = "float"
  protected override readonly noun: string = "a float"

  protected override accepts(value: unknown): value is number {
    return typeof value === "number" && !Number.isNaN(value)
  }
}

export interface StringOptions extends FieldOptions {
  minLength?: number
  maxLength?: number
  /** When `false`, whitespace-only values are rejected. Defaults to `true`. */
  allowBlank?: boolean
}

const StringOptionsSchema = FieldOptionsSchema.extend({
  allowBlank: z.boolean().default(true),
}).and(LengthSchema)

/**
 * Shared implementation of the character and byte string fields
 */
abstract class SizedString<T> extends Field {
  protected abstract readonly noun: string

  readonly minLength?: number
  readonly maxLength?: number
  readonly allowBlank: boolean

  constructor(options: StringOptions = {}) {
    super(options)
    const parsed = parseOptions(StringOptionsSchema, options, new.target.name)
    this.minLength = parsed.minLength
    this.maxLength = parsed.maxLength
    this.allowBlank = parsed.allowBlank
  }

  protected abstract accepts(value: unknown): value is T

  protected abstract sizeOf(value: T): number

  protected abstract isBlank(value: T): boolean

  errors(value: unknown): FieldError[] {
    if (!this.accepts(value)) {
      return [new FieldError(`Not a ${this.noun}`)]
    }
    const size = this.sizeOf(value)
    if (this.minLength !== undefined && size < this.minLength) {
      return [new FieldError(`String must have a length of at least ${this.minLength}`)]
    }
    if (this.maxLength !== undefined && size > this.maxLength) {
      return [new FieldError(`String must have a length no more than ${this.maxLength}`)]
    }
    if (!this.allowBlank && this.isBlank(value)) {
      return [new FieldError("String cannot be blank")]
    }
    return []
  }

  introspect(): Introspection {
    return this.describe({
      min_length: this.minLength,
      max_length: this.maxLength,
      // the default is hidden
      allow_blank: this.allowBlank ? undefined : false,
    })
  }
}

/**
 * Accepts strings, optionally limited with `minLength`, `maxLength` and `allowBlank`.
 * Lengths count code points, so `"😀"` has a length of 1.
 */
export class UnicodeString extends SizedString<string> {
  readonly type: string = "unicode"
  protected readonly noun: string = "unicode string"

  protected accepts(value: unknown): value is string {
    return typeof value === "string"
  }

  protected sizeOf(value: string): number {
    return [...value].length
  }

  protected isBlank(value: string): boolean {
    return value.trim().length === 0
  }
}

// ASCII whitespace: tab, line feed, vertical tab, form feed, carriage return, space
const WHITESPACE_BYTES = new globalThis.Set([0x09, 0x0a, 0x0b, 0x0c, 0x0d, 0x20])

/**
 * Accepts byte arrays (`Uint8Array`, including `Buffer`), optionally limited with
 * `minLength`, `maxLength` and `allowBlank`
 */
export class ByteString extends SizedString<Uint8Array> {
  readonly type: string = "bytes"
  protected readonly noun: string = "byte string"

  protected accepts(value: unknown): value is Uint8Array {
    return value instanceof Uint8Array
  }

  protected sizeOf(value: Uint8Array): number {
    return value.length
  }

  protected isBlank(value: Uint8Array): boolean {
    return value.every((byte) => WHITESPACE_BYTES.has(byte))
  }
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/
const SPECIAL_DECIMAL_PATTERN = /^[+-]?(inf|infinity|s?nan)$/i

/**
 * Accepts strings that hold a decimal number, such as `"12.50"` or `"-1e3"`
 */
export class UnicodeDecimal extends Field {
  readonly type: string = "unicode_decimal"

  errors(value: unknown): FieldError[] {
    if (typeof value !== "string") {
      return [new FieldError("Invalid decimal value (not unicode string)")]
    }
    const trimmed = value.trim()
    if (!DECIMAL_PATTERN.test(trimmed) && !SPECIAL_DECIMAL_PATTERN.test(trimmed)) {
      return [new FieldError("Invalid decimal value (parse error)")]
    }
    return []
  }

  introspect(): Introspection {
    return this.describe()
  }
}

/**
 * Values a `Constant` can be configured with. These are exactly the JSON primitives, so every
 * constant survives introspection unchanged; `null` is the only absent value.
 */
export type ConstantValue = string | number | boolean | null

const ConstantValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

const isConstantValue = (value: unknown): value is ConstantValue =>
  value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean"

const renderConstant = (value: ConstantValue): string => (typeof value === "string" ? `"${value}"` : String(value))

const byString = (a: ConstantValue, b: ConstantValue): number => {
  const left = String(a)
  const right = String(b)
  return left < right ? -1 : left > right ? 1 : 0
}

/**
 * Accepts exactly one of the configured values. Comparison is by value; objects and arrays
 * never match. Failures are reported with code `UNKNOWN` and list every allowed value.
 */
export class Constant extends Field {
  readonly type: string = "constant"

  readonly values: ReadonlySet<ConstantValue>
  readonly #message: string

  constructor(values: readonly ConstantValue[], options: FieldOptions = {}) {
    super(options)
    const parsed = parseOptions(z.array(ConstantValueSchema).min(1, "You must provide at least one constant value"), values, "Constant")
    this.values = new globalThis.Set(parsed)

    const rendered = [...this.values].sort(byString).map(renderConstant)
    this.#message = rendered.length === 1 ? `Value is not ${rendered[0]}` : `Value is not one of: ${rendered.join(", ")}`
  }

  errors(value: unknown): FieldError[] {
    if (!isConstantValue(value) || !this.values.has(value)) {
      return [new FieldError(this.#message, { code: ERROR_CODE_UNKNOWN })]
    }
    return []
  }

  introspect(): Introspection {
    return this.describe({
      values: [...this.values].sort(byString),
    })
  }
}

/**
 * Accepts only `null` (or `undefined`). Useful as the return schema of a function that returns nothing.
 */
export class Null extends Field {
  readonly type: string = "null"

  errors(value: unknown): FieldError[] {
    if (value !== null && value !== undefined) {
      return [new FieldError("Value is not null")]
    }
    return []
  }

  introspect(): Introspection {
    return this.describe()
  }
}

/**
 * Accepts `null` or `undefined`, and otherwise delegates to the wrapped field.
 * This is the only way to let a field accept an absent value.
 */
export class Nullable extends Field {
  readonly type: string = "nullable"

  readonly field: Field

  constructor(field: Field, options: FieldOptions = {}) {
    super(options)
    assertField(field, "Nullable field")
    this.field = field
  }

  errors(value: unknown): FieldError[] {
    if (value === null || value === undefined) {
      return []
    }
    return this.field.errors(value)
  }

  override warnings(value: unknown): FieldWarning[] {
    if (value === null || value === undefined) {
      return []
    }
    return this.field.warnings(value)
  }

  introspect(): Introspection {
    return this.describe({ nullable: this.field.introspect() })
  }
}
