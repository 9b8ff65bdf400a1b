import { describe, it, expect, vi, afterEach } from "vitest"
import { configure } from "@/config"
import { UnicodeString } from "@/fields/basic"
import { ResolutionFieldError } from "@/fields/issues"
import { Dictionary } from "@/fields/structures"
import { ResolutionCache } from "@/references/cache"
import { ClassConfigurationSchema } from "@/references/class-config"
import { ProviderRegistry } from "@/references/providers"
import { ReferenceResolver } from "@/references/resolver"
import { FieldConfigurationError, ValidationError } from "@/types"

class Backend {
  readonly options: unknown

  constructor(options: unknown) {
    this.options = options
  }
}
class FileBackend extends Backend {}
class MemoryBackend extends Backend {}
class OrphanBackend extends Backend {}
class Rock {}

const FILE = "app/backends:FileBackend"
const MEMORY = "app/backends:MemoryBackend"

const createResolver = () =>
  new ReferenceResolver({
    cache: new ResolutionCache(),
    loader: (moduleName) => {
      if (moduleName !== "app/backends") {
        throw new Error(`Cannot find module '${moduleName}'`)
      }
      return { Backend, FileBackend, MemoryBackend, OrphanBackend, Rock }
    },
  })

const registry = new ProviderRegistry()
  .register(FileBackend, new Dictionary({ directory: new UnicodeString() }))
  .register(MemoryBackend, new Dictionary({}))

const createSchema = (options: { defaultPath?: string; addClassObjectToDict?: boolean; eagerDefaultValidation?: boolean } = {}) =>
  new ClassConfigurationSchema({ baseClass: Backend, resolver: createResolver(), registry, ...options })

const asJSON = (errors: { toJSON(): unknown }[]) => errors.map((error) => error.toJSON())

describe("ClassConfigurationSchema", () => {
  afterEach(() => {
    vi.restoreAllMocks()
    configure({ logLevel: "warn" })
  })

  describe("check()", () => {
    const schema = createSchema()

    it("should accept a valid configuration", () => {
      const { errors, resolved } = schema.check({ path: FILE, kwargs: { directory: "/tmp" } })

      expect(errors).toEqual([])
      expect(resolved).toEqual({ path: FILE, cls: FileBackend, kwargs: { directory: "/tmp" } })
    })

    it("should require a mapping", () => {
      expect(asJSON(schema.check("app/backends:FileBackend").errors)).toEqual([
        { code: "INVALID", message: "Not a mapping (dictionary)" },
      ])
    })

    it("should reject extra keys", () => {
      expect(asJSON(schema.check({ path: FILE, kwargs: {}, retries: 3, debug: true }).errors)).toEqual([
        { code: "UNKNOWN", message: "Extra keys present: debug, retries" },
      ])
    })

    it("should require a path without a default", () => {
      expect(asJSON(schema.check({ kwargs: {} }).errors)).toEqual([
        { code: "MISSING", message: "Missing key (and no default specified): path", pointer: "path" },
      ])
    })

    it("should point path errors at the path", () => {
      expect(asJSON(schema.check({ path: "app/backends:Rock" }).errors)).toEqual([
        { code: "INVALID", message: "Type Rock is not one of or a subclass of one of: Backend", pointer: "path" },
      ])
      expect(asJSON(schema.check({ path: 7 }).errors)).toEqual([
        { code: "INVALID", message: "Not a unicode string", pointer: "path" },
      ])
    })

    it("should keep resolution details on path errors", () => {
      const [error] = schema.check({ path: "app/backends:Nope" }).errors

      expect(error).toBeInstanceOf(ResolutionFieldError)
      expect(error.toJSON()).toEqual({ code: "INVALID", message: 'Module "app/backends" has no member "Nope"', pointer: "path" })
    })

    it("should require a registered provider schema", () => {
      expect(asJSON(schema.check({ path: "app/backends:OrphanBackend" }).errors)).toEqual([
        {
          code: "INVALID",
          message: "Neither class 'app/backends:OrphanBackend' nor one of its superclasses has a registered provider schema",
          pointer: "path",
        },
      ])
    })

    it("should point kwargs errors under kwargs and still resolve the class", () => {
      const { errors, resolved } = schema.check({ path: FILE, kwargs: { directory: 5 } })

      expect(asJSON(errors)).toEqual([{ code: "INVALID", message: "Not a unicode string", pointer: "kwargs.directory" }])
      expect(resolved?.cls).toBe(FileBackend)
    })

    it("should validate missing kwargs as an empty object", () => {
      expect(asJSON(schema.check({ path: FILE }).errors)).toEqual([
        { code: "MISSING", message: "Missing key: directory", pointer: "kwargs.directory" },
      ])
    })

    it("should not modify the configuration", () => {
      const configuration = { path: FILE, kwargs: { directory: "/tmp" } }

      schema.check(configuration)

      expect(configuration).toEqual({ path: FILE, kwargs: { directory: "/tmp" } })
    })
  })

  describe("errors()", () => {
    it("should write the resolved class into the configuration", () => {
      const schema = createSchema()
      const configuration: Record<string, unknown> = { path: FILE, kwargs: { directory: "/tmp" } }

      expect(schema.errors(configuration)).toEqual([])
      expect(configuration.object).toBe(FileBackend)
      expect(schema.errors(configuration)).toEqual([])
    })

    it("should leave the class out when disabled", () => {
      const schema = createSchema({ addClassObjectToDict: false })
      const configuration: Record<string, unknown> = { path: FILE, kwargs: { directory: "/tmp" } }

      schema.errors(configuration)

      expect(Object.keys(configuration)).toEqual(["path", "kwargs"])
    })

    it("should use a custom class key", () => {
      const schema = new ClassConfigurationSchema({ resolver: createResolver(), registry, classObjectKey: "cls" })
      const configuration: Record<string, unknown> = { path: MEMORY }

      expect(schema.errors(configuration)).toEqual([])
      expect(configuration.cls).toBe(MemoryBackend)
    })

    it("should validate frozen configurations without writing to them", () => {
      const schema = createSchema()
      const configuration = Object.freeze({ path: FILE, kwargs: { directory: "/tmp" } })

      expect(schema.errors(configuration)).toEqual([])
      expect(Object.keys(configuration)).toEqual(["path", "kwargs"])
    })

    it("should leave sealed configurations untouched", () => {
      const schema = createSchema({ defaultPath: MEMORY })
      const configuration: Record<string, unknown> = Object.seal({ kwargs: {} })

      expect(schema.errors(configuration)).toEqual([])
      expect(configuration).toEqual({ kwargs: {} })
    })
  })

  describe("defaultPath", () => {
    it("should fill in the default path", () => {
      const schema = createSchema({ defaultPath: MEMORY })
      const configuration: Record<string, unknown> = {}

      expect(schema.errors(configuration)).toEqual([])
      expect(configuration.path).toBe(MEMORY)
      expect(configuration.object).toBe(MemoryBackend)
    })

    it("should treat an empty path as absent", () => {
      const configuration: Record<string, unknown> = { path: "" }

      expect(createSchema({ defaultPath: MEMORY }).errors(configuration)).toEqual([])
      expect(configuration.path).toBe(MEMORY)
    })

    it("should validate the default eagerly and log the failure", () => {
      configure({ logLevel: "warn" })
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)

      expect(() => createSchema({ defaultPath: "app/backends:Nope" })).toThrow(
        'Invalid default path:\n  - Module "app/backends" has no member "Nope"',
      )
      expect(warn).toHaveBeenCalledWith("[shapeguard] Default path failed validation", {
        component: "ClassConfigurationSchema",
        defaultPath: "app/backends:Nope",
      })
    })

    it("should defer a lazy default until validation", () => {
      const schema = createSchema({ defaultPath: "app/backends:Nope", eagerDefaultValidation: false })

      expect(asJSON(schema.check({}).errors)).toEqual([
        { code: "INVALID", message: 'Module "app/backends" has no member "Nope"', pointer: "path" },
      ])
    })
  })

  describe("instantiate()", () => {
    const schema = createSchema()

    it("should construct the configured class with its kwargs", () => {
      const backend = schema.instantiate({ path: FILE, kwargs: { directory: "/tmp" } })

      expect(backend).toBeInstanceOf(FileBackend)
      expect(backend.options).toEqual({ directory: "/tmp" })
    })

    it("should throw every error at once", () => {
      expect(() => schema.instantiate({ path: FILE, kwargs: { directory: 5 } })).toThrow(
        "Invalid class configuration:\n  - kwargs.directory: Not a unicode string",
      )
      expect(() => schema.instantiate({})).toThrow(ValidationError)
    })
  })

  it("should refuse reserved class keys", () => {
    expect(() => new ClassConfigurationSchema({ classObjectKey: "kwargs" })).toThrow(FieldConfigurationError)
  })

  it("should introspect the eagerly resolved default", () => {
    expect(createSchema({ defaultPath: MEMORY }).introspect()).toEqual({
      type: "class_config_dictionary",
      base_class: "Backend",
      default_path: MEMORY,
      switch_field: "path",
      switch_field_schema: { type: "object_path", value_schema: { type: "type_reference", base_classes: ["Backend"] } },
      kwargs_field: "kwargs",
      kwargs_contents_map: { [MEMORY]: { type: "dictionary", contents: {}, optional_keys: [], allow_extra_keys: false } },
    })
  })

  it("should introspect without a default", () => {
    expect(createSchema().introspect()).toEqual({
      type: "class_config_dictionary",
      base_class: "Backend",
      switch_field: "path",
      switch_field_schema: { type: "object_path", value_schema: { type: "type_reference", base_classes: ["Backend"] } },
      kwargs_field: "kwargs",
    })
  })
})
