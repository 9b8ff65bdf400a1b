import { Field, assertField } from "@/fields/base"
import type { FieldError } from "@/fields/issues"
import { Dictionary, List, SchemalessDictionary, Tuple } from "@/fields/structures"
import { FieldConfigurationError, ValidationError } from "@/types"
import { isPlainObject } from "@/utils/objects"

/**
 * Check `value` against `field`, throwing a `ValidationError` that lists every error found.
 * `noun` names the value in the error message (`Invalid keyword arguments: ...`).
 */
export function validate(field: Field, value: unknown, noun: string = "value"): void {
  const errors = field.errors(value)
  if (errors.length > 0) {
    throw new ValidationError(errors, noun)
  }
}

/**
 * Schemas checked by `validateCall`. Each one is optional; an omitted schema skips that check.
 */
export interface CallSchema {
  /** Positional arguments, as a `Tuple` of positions or a `List` of any length */
  args?: Tuple | List
  /** Keyword arguments, passed as a trailing plain object */
  kwargs?: Dictionary | SchemalessDictionary
  /** The return value */
  returns?: Field
}

/**
 * Wrap `fn` so its arguments are validated before it runs and its result after it returns.
 *
 * When `kwargs` is given, a trailing plain-object argument holds the keyword arguments and
 * everything before it the positional ones; a call without one validates `{}`. Argument errors
 * are reported together, pointed under `args` and `kwargs`, and `fn` is not called. `this` is
 * forwarded, so methods can be wrapped too.
 *
 * @example
 * ```ts
 * const greet = validateCall(
 *   {
 *     args: new Tuple([new UnicodeString()]),
 *     kwargs: new Dictionary({ greeting: new UnicodeString() }, { optionalKeys: ["greeting"] }),
 *     returns: new UnicodeString(),
 *   },
 *   (name: string, options: { greeting?: string } = {}) => `${options.greeting ?? "Hello"}, ${name}`,
 * )
 *
 * greet("Ada") // "Hello, Ada"
 * greet(42) // throws ValidationError: Invalid arguments: args.0: Not a unicode string
 * ```
 */
export function validateCall<A extends unknown[], R>(schema: CallSchema, fn: (...args: A) => R): (...args: A) => R {
  if (schema.args !== undefined && !(schema.args instanceof Tuple) && !(schema.args instanceof List)) {
    throw new FieldConfigurationError("Positional arguments schema must be a Tuple or List field")
  }
  if (
    schema.kwargs !== undefined &&
    !(schema.kwargs instanceof Dictionary) &&
    !(schema.kwargs instanceof SchemalessDictionary)
  ) {
    throw new FieldConfigurationError("Keyword arguments schema must be a Dictionary or SchemalessDictionary field")
  }
  if (schema.returns !== undefined) {
    assertField(schema.returns, "Return value schema")
  }

  const { args: argsSchema, kwargs: kwargsSchema, returns: returnsSchema } = schema

  return function (this: unknown, ...args: A): R {
    const errors: FieldError[] = []
    let positional: unknown[] = args
    if (kwargsSchema) {
      const last: unknown = args[args.length - 1]
      const hasKeywords = args.length > 0 && isPlainObject(last)
      positional = hasKeywords ? args.slice(0, -1) : args
      errors.push(...kwargsSchema.errors(hasKeywords ? last : {}).map((error) => error.withPointer("kwargs")))
    }
    if (argsSchema) {
      errors.unshift(...argsSchema.errors(positional).map((error) => error.withPointer("args")))
    }
    if (errors.length > 0) {
      throw new ValidationError(errors, "arguments")
    }

    const result = fn.apply(this, args)

    if (returnsSchema) {
      validate(returnsSchema, result, "return value")
    }
    return result
  }
}
