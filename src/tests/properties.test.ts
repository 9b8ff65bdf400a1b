import { describe, it, expect, vi } from "vitest"
import { Constant, Float, Integer, Nullable, UnicodeString } from "@/fields/basic"
import { Any, Polymorph } from "@/fields/meta"
import { Dictionary, List, Tuple } from "@/fields/structures"
import { ResolutionCache } from "@/references/cache"
import { ReferenceResolver } from "@/references/resolver"
import { Settings, resolveSettings, type SettingsData, type SettingsSchema } from "@/settings"
import { fromIntrospection } from "@/describe/reconstruct"

const asJSON = (errors: { toJSON(): unknown }[]) => errors.map((error) => error.toJSON())

const person = new Dictionary({
  name: new UnicodeString(),
  height: new Float({ gt: 0 }),
  age: new Integer({ gte: 0 }),
})

describe("validation properties", () => {
  it("should return no errors for valid values", () => {
    expect(person.errors({ name: "Ada", height: 1.7, age: 36 })).toEqual([])
    expect(new List(person).errors([{ name: "Ada", height: 1.7, age: 36 }])).toEqual([])
  })

  it("should return exactly one error for a single violation", () => {
    expect(asJSON(person.errors({ name: "Ada", height: 1.7, age: "old" }))).toEqual([
      { code: "INVALID", message: "Not an integer", pointer: "age" },
    ])
    expect(asJSON(new List(person).errors([{ name: "Ada", height: 1.7, age: 36 }, { name: "Bo", height: 0, age: 2 }]))).toEqual([
      { code: "INVALID", message: "Value not > 0", pointer: "1.height" },
    ])
  })

  it("should return the same errors when called twice", () => {
    const value = { name: 4, height: -1 }

    expect(asJSON(person.errors(value))).toEqual(asJSON(person.errors(value)))
    expect(value).toEqual({ name: 4, height: -1 })
  })

  it("should report every missing key in declared order", () => {
    expect(asJSON(person.errors({}))).toEqual([
      { code: "MISSING", message: "Missing key: name", pointer: "name" },
      { code: "MISSING", message: "Missing key: height", pointer: "height" },
      { code: "MISSING", message: "Missing key: age", pointer: "age" },
    ])
  })

  it("should check exclusive bounds", () => {
    const field = new Float({ gt: 0 })

    expect(asJSON(field.errors(-2.0))).toEqual([{ code: "INVALID", message: "Value not > 0" }])
    expect(field.errors(1.9)).toEqual([])
  })

  it("should list every allowed constant, sorted", () => {
    const eyes = new Constant(["blue", "brown", "black", "green", "yellow", "hazel"])

    expect(asJSON(eyes.errors("purple"))).toEqual([
      { code: "UNKNOWN", message: 'Value is not one of: "black", "blue", "brown", "green", "hazel", "yellow"' },
    ])
  })

  describe("polymorph", () => {
    const branches = {
      dog: new Dictionary({ type: new Constant(["dog"]), barks: new Integer() }),
      cat: new Dictionary({ type: new Constant(["cat"]) }),
    }

    it("should select the branch named by the switch value", () => {
      const pet = new Polymorph("type", branches)

      expect(asJSON(pet.errors({ type: "dog", barks: "loud" }))).toEqual([
        { code: "INVALID", message: "Not an integer", pointer: "barks" },
      ])
    })

    it("should reject an unknown switch value without a default", () => {
      const pet = new Polymorph("type", branches)

      expect(asJSON(pet.errors({ type: "fish" }))).toEqual([{ code: "UNKNOWN", message: "Invalid switch value 'fish'" }])
    })

    it("should fall back to the default branch", () => {
      const pet = new Polymorph("type", {
        ...branches,
        __default__: new Dictionary({ type: new UnicodeString(), fins: new Integer() }),
      })

      expect(pet.errors({ type: "fish", fins: 2 })).toEqual([])
      expect(asJSON(pet.errors({ type: "fish" }))).toEqual([{ code: "MISSING", message: "Missing key: fins", pointer: "fins" }])
    })
  })
})

describe("introspection round trip", () => {
  const original = new Dictionary(
    {
      id: new Integer({ gt: 0 }),
      tags: new List(new UnicodeString({ maxLength: 3 }), { maxLength: 2 }),
      point: new Tuple([new Float(), new Float()]),
      note: new Nullable(new UnicodeString()),
      value: new Any([new Integer(), new Constant(["none"])]),
    },
    { optionalKeys: ["note"] },
  )

  const inputs: unknown[] = [
    { id: 1, tags: ["a"], point: [0, 1], value: 3 },
    { id: 0, tags: ["long", "b", "c"], point: [0], note: 5, value: "some" },
    { id: 1, tags: [], point: [0, "x"], note: null, value: "none", extra: true },
    [],
    {},
  ]

  it("should rebuild a field that validates identically", () => {
    const copy = fromIntrospection(original.introspect())

    for (const input of inputs) {
      expect(asJSON(copy.errors(input))).toEqual(asJSON(original.errors(input)))
    }
  })
})

describe("settings merge", () => {
  class ParentSettings extends Settings {
    static override schema: SettingsSchema = {
      foo: new Integer(),
      bar: new Dictionary({ baz: new Integer(), qux: new UnicodeString() }),
    }
    static override defaults: SettingsData = { foo: 1, bar: { baz: 2, qux: "x" } }
  }

  class ChildSettings extends ParentSettings {
    static override defaults: SettingsData = { bar: { baz: 3 } }
  }

  it("should prefer the subclass default and keep the parent's other keys", () => {
    expect(resolveSettings(ChildSettings).defaults).toEqual({ foo: 1, bar: { baz: 3, qux: "x" } })
  })
})

describe("resolution cache", () => {
  it("should look a reference up once", () => {
    const loader = vi.fn((_moduleName: string) => ({ answer: 42 }))
    const resolver = new ReferenceResolver({ loader, cache: new ResolutionCache() })

    expect(resolver.resolve("numbers:answer")).toBe(42)
    expect(resolver.resolve("numbers:answer")).toBe(42)
    expect(loader).toHaveBeenCalledTimes(1)
  })
})
