import { describe, it, expect, vi } from "vitest"
import { Field } from "@/fields/base"
import { Integer, UnicodeString } from "@/fields/basic"
import type { FieldError } from "@/fields/issues"
import { Dictionary, List, SchemalessDictionary, Tuple } from "@/fields/structures"
import { FieldConfigurationError, ValidationError, type Introspection } from "@/types"
import { validate, validateCall } from "@/validator"

describe("validate", () => {
  it("should pass valid values silently", () => {
    expect(() => validate(new Integer(), 3)).not.toThrow()
  })

  it("should throw every error with its pointer", () => {
    const field = new Dictionary({ name: new UnicodeString(), age: new Integer() })

    expect(() => validate(field, { name: 1 }, "person")).toThrow(
      "Invalid person:\n  - name: Not a unicode string\n  - age: Missing key: age",
    )
  })

  it("should expose the errors on the thrown error", () => {
    try {
      validate(new Integer(), "x")
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      expect(err instanceof ValidationError && err.errors.map((error) => error.message)).toEqual(["Not an integer"])
    }
  })
})

describe("validateCall", () => {
  const greet = validateCall(
    {
      args: new Tuple([new UnicodeString()]),
      kwargs: new Dictionary({ greeting: new UnicodeString() }, { optionalKeys: ["greeting"] }),
      returns: new UnicodeString(),
    },
    (name: unknown, options: { greeting?: unknown } = {}) => `${String(options.greeting ?? "Hello")}, ${String(name)}`,
  )

  it("should call through with valid arguments", () => {
    expect(greet("Ada")).toBe("Hello, Ada")
    expect(greet("Ada", { greeting: "Hi" })).toBe("Hi, Ada")
  })

  it("should report args and kwargs errors together", () => {
    expect(() => greet(42, { greeting: 1 })).toThrow(
      "Invalid arguments:\n  - args.0: Not a unicode string\n  - kwargs.greeting: Not a unicode string",
    )
  })

  it("should not call the function with invalid arguments", () => {
    const fn = vi.fn((count: unknown) => count)
    const wrapped = validateCall({ args: new Tuple([new Integer()]) }, fn)

    expect(() => wrapped("three")).toThrow("Invalid arguments:\n  - args.0: Not an integer")
    expect(fn).not.toHaveBeenCalled()
  })

  it("should validate an absent kwargs object as empty", () => {
    const wrapped = validateCall({ kwargs: new Dictionary({ limit: new Integer() }) }, () => "done")

    expect(() => wrapped()).toThrow("Invalid arguments:\n  - kwargs.limit: Missing key: limit")
  })

  it("should validate variadic arguments with a List", () => {
    const sum = validateCall({ args: new List(new Integer()) }, (...values: number[]) => values.reduce((a, b) => a + b, 0))

    expect(sum(1, 2, 3)).toBe(6)
    expect(() => sum(1, 2.5)).toThrow("Invalid arguments:\n  - args.1: Not an integer")
  })

  it("should validate the return value", () => {
    const wrapped = validateCall({ returns: new Integer() }, () => "not a number")

    expect(() => wrapped()).toThrow("Invalid return value:\n  - Not an integer")
  })

  it("should forward this", () => {
    const receivers: unknown[] = []
    const owner = {
      run: validateCall({ args: new Tuple([]) }, function (this: unknown) {
        receivers.push(this)
      }),
    }

    owner.run()

    expect(receivers).toEqual([owner])
  })

  it("should accept a schemaless kwargs schema", () => {
    const wrapped = validateCall({ kwargs: new SchemalessDictionary({ valueType: new Integer() }) }, (_options?: object) => true)

    expect(wrapped({ a: 1 })).toBe(true)
    expect(() => wrapped({ a: "x" })).toThrow("Invalid arguments:\n  - kwargs.a: Not an integer")
  })

  it("should refuse an args schema that is not a Tuple or List", () => {
    class Pair extends Field {
      readonly type = "pair"
      readonly contents: readonly Field[] = []

      errors(): FieldError[] {
        return []
      }

      introspect(): Introspection {
        return this.describe()
      }
    }

    expect(() => validateCall({ args: new Pair() }, () => undefined)).toThrow(FieldConfigurationError)
    expect(() => validateCall({ args: new Pair() }, () => undefined)).toThrow(
      "Positional arguments schema must be a Tuple or List field",
    )
  })
})
