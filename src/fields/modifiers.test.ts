import { describe, it, expect } from "vitest"
import { Integer } from "@/fields/basic"
import { Deprecated } from "@/fields/modifiers"
import { Dictionary } from "@/fields/structures"

describe("Deprecated", () => {
  it("should validate like the wrapped field", () => {
    const field = new Deprecated(new Integer({ gte: 0 }))

    expect(field.type).toBe("integer")
    expect(field.errors(3)).toEqual([])
    expect(field.errors(-1).map((error) => error.message)).toEqual(["Value not >= 0"])
  })

  it("should always add a deprecation warning", () => {
    const field = new Deprecated(new Integer(), { message: "Use ages instead" })

    expect(field.warnings(1).map((warning) => [warning.code, warning.message])).toEqual([["FIELD_DEPRECATED", "Use ages instead"]])
    expect(field.warnings("not even valid").map((warning) => warning.code)).toEqual(["FIELD_DEPRECATED"])
  })

  it("should keep inner warnings ahead of its own", () => {
    const field = new Deprecated(new Deprecated(new Integer(), { message: "inner" }), { message: "outer" })

    expect(field.warnings(1).map((warning) => warning.message)).toEqual(["inner", "outer"])
  })

  it("should use the default message", () => {
    expect(new Deprecated(new Integer()).warnings(1).map((warning) => warning.message)).toEqual(["This field has been deprecated"])
  })

  it("should be pointed at its key inside a dictionary", () => {
    const field = new Dictionary({ old: new Deprecated(new Integer()) }, { optionalKeys: ["old"] })

    expect(field.warnings({}).length).toBe(0)
    expect(field.warnings({ old: 1 }).map((warning) => warning.pointer)).toEqual(["old"])
  })

  it("should introspect as the wrapped field marked deprecated", () => {
    expect(new Deprecated(new Integer({ lt: 5 })).introspect()).toEqual({ type: "integer", lt: 5, deprecated: true })
  })
})
