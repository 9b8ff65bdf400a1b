import { describe, it, expect } from "vitest"
import { Field } from "@/fields/base"
import { Constant, Integer, Nullable, UnicodeString } from "@/fields/basic"
import { FieldError } from "@/fields/issues"
import { Any, BooleanValidator, Polymorph, TypeReference } from "@/fields/meta"
import { Deprecated } from "@/fields/modifiers"
import { Dictionary, List, SchemalessDictionary, Tuple } from "@/fields/structures"
import { DateTime } from "@/fields/temporal"
import { ObjectPath } from "@/references/fields"
import { FieldConfigurationError, type Introspection } from "@/types"
import { fromIntrospection, registerReconstructor } from "@/describe/reconstruct"

class Animal {}

describe("fromIntrospection", () => {
  it("should rebuild a field that validates the same way", () => {
    const copy = fromIntrospection(new List(new Integer({ gte: 0 })).introspect())

    expect(copy).toBeInstanceOf(List)
    expect(copy.errors([1, -1]).map((error) => error.toJSON())).toEqual([
      { code: "INVALID", message: "Value not >= 0", pointer: "1" },
    ])
  })

  it("should rebuild nested structures with their options", () => {
    const original = new Dictionary(
      {
        id: new Integer({ gt: 0 }),
        name: new UnicodeString({ minLength: 1, allowBlank: false, description: "Display name" }),
        tags: new SchemalessDictionary({ valueType: new Tuple([new UnicodeString(), new Nullable(new Integer())]), maxLength: 5 }),
        kind: new Constant(["a", "b"]),
        since: new DateTime({ gte: new Date("2020-01-01T00:00:00.000Z") }),
      },
      { optionalKeys: ["tags"], allowExtraKeys: true, description: "A record" },
    )

    const copy = fromIntrospection(original.introspect())

    expect(copy.introspect()).toEqual(original.introspect())
    expect(copy.errors({ id: 1, name: " ", kind: "c", since: new Date("2019-06-01T00:00:00.000Z") }).map((error) => error.pointer)).toEqual([
      "name",
      "kind",
      "since",
    ])
  })

  it("should rebuild constants that validate the same values", () => {
    const original = new Constant([null, false, 0, "none"])
    const copy = fromIntrospection(original.introspect())

    for (const value of [null, false, 0, "none", undefined, "null", "false", "0", ""]) {
      expect(copy.errors(value).map((error) => error.toJSON())).toEqual(original.errors(value).map((error) => error.toJSON()))
    }
    expect(copy.errors(null)).toEqual([])
    expect(copy.errors("null")).toHaveLength(1)
  })

  it("should rebuild polymorphs and unions", () => {
    const original = new Polymorph("type", {
      count: new Dictionary({ type: new Constant(["count"]), value: new Any([new Integer(), new UnicodeString()]) }),
    })

    const copy = fromIntrospection(original.introspect())

    expect(copy.introspect()).toEqual(original.introspect())
    expect(copy.errors({ type: "other" }).map((error) => error.message)).toEqual(["Invalid switch value 'other'"])
  })

  it("should wrap deprecated documents", () => {
    const copy = fromIntrospection(new Deprecated(new Integer()).introspect())

    expect(copy).toBeInstanceOf(Deprecated)
    expect(copy.warnings(1).map((warning) => warning.code)).toEqual(["FIELD_DEPRECATED"])
    expect(copy.introspect()).toEqual({ type: "integer", deprecated: true })
  })

  it("should rebuild unbound type references and object paths", () => {
    expect(fromIntrospection(new TypeReference().introspect())).toBeInstanceOf(TypeReference)
    expect(fromIntrospection(new ObjectPath({ valueSchema: new Integer() }).introspect()).introspect()).toEqual({
      type: "object_path",
      value_schema: { type: "integer" },
    })
  })

  it("should refuse documents that do not describe their field completely", () => {
    const validator = new BooleanValidator({ validator: () => true, validatorDescription: "always", error: "never" })

    expect(() => fromIntrospection(validator.introspect())).toThrow('Cannot rebuild a "boolean_validator" field from its introspection')
    expect(() => fromIntrospection(new TypeReference({ baseClasses: Animal }).introspect())).toThrow(
      'Cannot rebuild a "type_reference" field bound to Animal',
    )
  })

  it("should refuse malformed documents", () => {
    expect(() => fromIntrospection({ type: "integer", gt: "zero" })).toThrow(FieldConfigurationError)
    expect(() => fromIntrospection({ type: "list" })).toThrow(FieldConfigurationError)
  })

  it("should use registered reconstructors", () => {
    class Even extends Field {
      readonly type = "even"

      errors(value: unknown): FieldError[] {
        return typeof value === "number" && value % 2 === 0 ? [] : [new FieldError("Not even")]
      }

      introspect(): Introspection {
        return this.describe()
      }
    }

    registerReconstructor("even", (document) => new Even({ description: document.description }))

    const copy = fromIntrospection(new List(new Even({ description: "even numbers" })).introspect())

    expect(copy.errors([2, 3]).map((error) => error.toJSON())).toEqual([{ code: "INVALID", message: "Not even", pointer: "1" }])
  })
})
