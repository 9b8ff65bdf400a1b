import * as z from "zod"
import { Field, FieldListSchema, FieldOptionsSchema, LengthSchema, assertField, parseOptions, type FieldOptions } from "@/fields/base"
import { Anything, Hashable } from "@/fields/basic"
import { FieldError, type FieldWarning } from "@/fields/issues"
import { ERROR_CODE_MISSING, ERROR_CODE_UNKNOWN, FieldConfigurationError, type Introspection } from "@/types"
import { isPlainObject } from "@/utils/objects"

export interface SizeOptions extends FieldOptions {
  minLength?: number
  maxLength?: number
}

const SizeOptionsSchema = FieldOptionsSchema.and(LengthSchema)

/**
 * Shared implementation of `List` and `Set`: a container type check, size limits and
 * per-element validation against `contents`
 */
abstract class Collection<C> extends Field {
  protected abstract readonly typeError: string

  readonly contents: Field
  readonly minLength?: number
  readonly maxLength?: number

  constructor(contents: Field, options: SizeOptions = {}) {
    super(options)
    assertField(contents, `${new.target.name} contents`)
    const parsed = parseOptions(SizeOptionsSchema, options, new.target.name)
    this.contents = contents
    this.minLength = parsed.minLength
    this.maxLength = parsed.maxLength
  }

  protected abstract accepts(value: unknown): value is C

  protected abstract sizeOf(value: C): number

  /**
   * Pair every element with the pointer its errors are reported under
   */
  protected abstract elements(value: C): Iterable<[pointer: number | undefined, element: unknown]>

  errors(value: unknown): FieldError[] {
    if (!this.accepts(value)) {
      return [new FieldError(this.typeError)]
    }

    const result: FieldError[] = []
    const size = this.sizeOf(value)
    if (this.maxLength !== undefined && size > this.maxLength) {
      result.push(new FieldError(`List is longer than ${this.maxLength}`))
    } else if (this.minLength !== undefined && size < this.minLength) {
      result.push(new FieldError(`List is shorter than ${this.minLength}`))
    }

    for (const [pointer, element] of this.elements(value)) {
      for (const error of this.contents.errors(element)) {
        result.push(pointer === undefined ? error : error.withPointer(pointer))
      }
    }

    return result
  }

  override warnings(value: unknown): FieldWarning[] {
    if (!this.accepts(value)) {
      return []
    }

    const result: FieldWarning[] = []
    for (const [pointer, element] of this.elements(value)) {
      for (const warning of this.contents.warnings(element)) {
        result.push(pointer === undefined ? warning : warning.withPointer(pointer))
      }
    }
    return result
  }

  introspect(): Introspection {
    return this.describe({
      contents: this.contents.introspect(),
      max_length: this.maxLength,
      min_length: this.minLength,
    })
  }
}

/**
 * An array whose elements all match `contents`, optionally limited in length.
 * Element errors are pointed at the element index.
 */
export class List extends Collection<readonly unknown[]> {
  readonly type: string = "list"
  protected readonly typeError: string = "Not a list"

  protected accepts(value: unknown): value is readonly unknown[] {
    return Array.isArray(value)
  }

  protected sizeOf(value: readonly unknown[]): number {
    return value.length
  }

  protected *elements(value: readonly unknown[]): Iterable<[pointer: number | undefined, element: unknown]> {
    for (const [index, element] of value.entries()) {
      yield [index, element]
    }
  }
}

/**
 * A `Set` whose members all match `contents`, optionally limited in size.
 * Sets are unordered, so member errors keep the pointer the member field gave them.
 */
export class Set extends Collection<ReadonlySet<unknown>> {
  readonly type: string = "set"
  protected readonly typeError: string = "Not a set"

  protected accepts(value: unknown): value is ReadonlySet<unknown> {
    return value instanceof globalThis.Set
  }

  protected sizeOf(value: ReadonlySet<unknown>): number {
    return value.size
  }

  protected *elements(value: ReadonlySet<unknown>): Iterable<[pointer: number | undefined, element: unknown]> {
    for (const member of value) {
      yield [undefined, member]
    }
  }
}

/**
 * A fixed-length array where each position has its own field.
 * Errors are pointed at the position index.
 */
export class Tuple extends Field {
  readonly type: string = "tuple"

  readonly contents: readonly Field[]

  constructor(contents: readonly Field[], options: FieldOptions = {}) {
    super(options)
    this.contents = parseOptions(FieldListSchema, contents, "Tuple")
  }

  errors(value: unknown): FieldError[] {
    if (!Array.isArray(value)) {
      return [new FieldError("Not a tuple")]
    }

    const result: FieldError[] = []
    if (value.length !== this.contents.length) {
      result.push(new FieldError(`Number of elements ${value.length} does not match expected ${this.contents.length}`))
    }

    const length = Math.min(value.length, this.contents.length)
    for (let index = 0; index < length; index++) {
      for (const error of this.contents[index].errors(value[index])) {
        result.push(error.withPointer(index))
      }
    }

    return result
  }

  override warnings(value: unknown): FieldWarning[] {
    if (!Array.isArray(value)) {
      return []
    }
    return this.contents.flatMap((field, index) =>
      index < value.length ? field.warnings(value[index]).map((warning) => warning.withPointer(index)) : [],
    )
  }

  introspect(): Introspection {
    return this.describe({
      contents: this.contents.map((field) => field.introspect()),
    })
  }
}

export interface DictionaryOptions extends FieldOptions {
  /** Keys that may be absent */
  optionalKeys?: readonly string[]
  /** Whether keys not in `contents` are accepted. Defaults to `false`. */
  allowExtraKeys?: boolean
}

export interface DictionaryExtension {
  /** Extra or overriding key fields */
  contents?: Record<string, Field>
  /** Optional keys, merged with the current set unless `replaceOptionalKeys` is set */
  optionalKeys?: readonly string[]
  allowExtraKeys?: boolean
  description?: string
  replaceOptionalKeys?: boolean
}

const DictionaryOptionsSchema = FieldOptionsSchema.extend({
  optionalKeys: z.array(z.string()).default([]),
  allowExtraKeys: z.boolean().default(false),
})

/**
 * A plain object with a field per key.
 *
 * Keys are checked in declaration order: a missing required key is a `MISSING` error pointed
 * at that key, a present key is validated by its field with errors nested under the key, and
 * keys outside `contents` are reported together as one `UNKNOWN` error unless `allowExtraKeys`.
 */
export class Dictionary extends Field {
  readonly type: string = "dictionary"

  readonly contents: Readonly<Record<string, Field>>
  readonly optionalKeys: ReadonlySet<string>
  readonly allowExtraKeys: boolean

  constructor(contents: Record<string, Field>, options: DictionaryOptions = {}) {
    super(options)
    if (!isPlainObject(contents)) {
      throw new FieldConfigurationError("Dictionary contents must be a plain object of fields")
    }
    for (const [key, field] of Object.entries(contents)) {
      assertField(field, `Dictionary key "${key}"`)
    }
    const parsed = parseOptions(DictionaryOptionsSchema, options, new.target.name)

    this.contents = Object.freeze({ ...contents })
    this.optionalKeys = new globalThis.Set(parsed.optionalKeys)
    this.allowExtraKeys = parsed.allowExtraKeys
  }

  errors(value: unknown): FieldError[] {
    if (!isPlainObject(value)) {
      return [new FieldError("Not a dict")]
    }

    const result: FieldError[] = []
    for (const [key, field] of Object.entries(this.contents)) {
      if (!Object.hasOwn(value, key)) {
        if (!this.optionalKeys.has(key)) {
          result.push(new FieldError(`Missing key: ${key}`, { code: ERROR_CODE_MISSING, pointer: key }))
        }
        continue
      }
      for (const error of field.errors(value[key])) {
        result.push(error.withPointer(key))
      }
    }

    if (!this.allowExtraKeys) {
      const extraKeys = Object.keys(value)
        .filter((key) => !Object.hasOwn(this.contents, key))
        .sort()
      if (extraKeys.length > 0) {
        result.push(new FieldError(`Extra keys present: ${extraKeys.join(", ")}`, { code: ERROR_CODE_UNKNOWN }))
      }
    }

    return result
  }

  override warnings(value: unknown): FieldWarning[] {
    if (!isPlainObject(value)) {
      return []
    }
    return Object.entries(this.contents).flatMap(([key, field]) =>
      Object.hasOwn(value, key) ? field.warnings(value[key]).map((warning) => warning.withPointer(key)) : [],
    )
  }

  /**
   * Create a new `Dictionary` from this one with more (or overriding) key fields, more optional
   * keys and, when given, a different `allowExtraKeys` or `description`. This dictionary is left
   * unchanged.
   */
  extend(extension: DictionaryExtension = {}): Dictionary {
    const optionalKeys = extension.optionalKeys ?? []

    return new Dictionary(
      { ...this.contents, ...extension.contents },
      {
        optionalKeys: extension.replaceOptionalKeys ? optionalKeys : [...this.optionalKeys, ...optionalKeys],
        allowExtraKeys: extension.allowExtraKeys ?? this.allowExtraKeys,
        description: extension.description ?? this.description,
      },
    )
  }

  introspect(): Introspection {
    return this.describe({
      contents: Object.fromEntries(Object.entries(this.contents).map(([key, field]) => [key, field.introspect()])),
      optional_keys: [...this.optionalKeys].sort(),
      allow_extra_keys: this.allowExtraKeys,
    })
  }
}

export interface SchemalessDictionaryOptions extends SizeOptions {
  /** Field every key must match. Defaults to `Hashable`. */
  keyType?: Field
  /** Field every value must match. Defaults to `Anything`. */
  valueType?: Field
}

/**
 * A plain object (or `Map`) without a fixed key set. Every key is checked against `keyType` and
 * every value against `valueType`, both with errors pointed at the key.
 */
export class SchemalessDictionary extends Field {
  readonly type: string = "schemaless_dictionary"

  readonly keyType: Field
  readonly valueType: Field
  readonly minLength?: number
  readonly maxLength?: number

  constructor(options: SchemalessDictionaryOptions = {}) {
    super(options)
    const parsed = parseOptions(SizeOptionsSchema, options, new.target.name)
    if (options.keyType !== undefined) assertField(options.keyType, "SchemalessDictionary keyType")
    if (options.valueType !== undefined) assertField(options.valueType, "SchemalessDictionary valueType")

    this.keyType = options.keyType ?? new Hashable()
    this.valueType = options.valueType ?? new Anything()
    this.minLength = parsed.minLength
    this.maxLength = parsed.maxLength
  }

  errors(value: unknown): FieldError[] {
    const entries = entriesOf(value)
    if (!entries) {
      return [new FieldError("Not a dict")]
    }

    const result: FieldError[] = []
    if (this.maxLength !== undefined && entries.length > this.maxLength) {
      result.push(new FieldError(`Dict contains more than ${this.maxLength} value(s)`))
    } else if (this.minLength !== undefined && entries.length < this.minLength) {
      result.push(new FieldError(`Dict contains fewer than ${this.minLength} value(s)`))
    }

    for (const [key, item] of entries) {
      const pointer = String(key)
      for (const error of this.keyType.errors(key)) {
        result.push(error.withPointer(pointer))
      }
      for (const error of this.valueType.errors(item)) {
        result.push(error.withPointer(pointer))
      }
    }

    return result
  }

  override warnings(value: unknown): FieldWarning[] {
    return (entriesOf(value) ?? []).flatMap(([key, item]) =>
      this.valueType.warnings(item).map((warning) => warning.withPointer(String(key))),
    )
  }

  introspect(): Introspection {
    return this.describe({
      max_length: this.maxLength,
      min_length: this.minLength,
      // defaults are left out, exact class match so subclasses still show
      key_type: this.keyType.constructor === Hashable ? undefined : this.keyType.introspect(),
      value_type: this.valueType.constructor === Anything ? undefined : this.valueType.introspect(),
    })
  }
}

function entriesOf(value: unknown): [unknown, unknown][] | undefined {
  if (value instanceof Map) {
    return [...value.entries()]
  }
  if (isPlainObject(value)) {
    return Object.entries(value)
  }
  return undefined
}
