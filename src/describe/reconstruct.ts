import * as z from "zod"
import { Field, parseOptions } from "@/fields/base"
import {
  Anything,
  Boolean,
  ByteString,
  Constant,
  Float,
  Hashable,
  Integer,
  Null,
  Nullable,
  UnicodeDecimal,
  UnicodeString,
} from "@/fields/basic"
import { All, Any, Polymorph, TypeReference } from "@/fields/meta"
import { Deprecated } from "@/fields/modifiers"
import { Dictionary, List, SchemalessDictionary, Set, Tuple } from "@/fields/structures"
import { DateTime } from "@/fields/temporal"
import { ObjectPath } from "@/references/fields"
import { FieldConfigurationError, type Introspection } from "@/types"
import { isIntrospection } from "@/describe/types"

/**
 * Builds a field from its introspection document. `rebuild` turns nested documents into fields.
 */
export type Reconstructor = (document: Introspection, rebuild: (document: Introspection) => Field) => Field

const DocumentSchema = z.custom<Introspection>(isIntrospection, { message: "must be an introspection document" })

const Described = z.object({ description: z.string().optional() })

const Bounds = Described.extend({
  gt: z.number().optional(),
  gte: z.number().optional(),
  lt: z.number().optional(),
  lte: z.number().optional(),
})

const Sized = Described.extend({
  min_length: z.number().optional(),
  max_length: z.number().optional(),
})

const IsoDate = z.iso.datetime().transform((value) => new Date(value))

const reconstructors = new Map<string, Reconstructor>()

/**
 * Teach `fromIntrospection` to rebuild fields of `type`, replacing any existing builder
 */
export function registerReconstructor(type: string, reconstructor: Reconstructor): void {
  reconstructors.set(type, reconstructor)
}

/**
 * Parse a document with `schema`, failing with a `FieldConfigurationError` that names the type
 */
function read<S extends z.ZodType>(schema: S, document: Introspection): z.output<S> {
  return parseOptions(schema, document, `introspection of type "${document.type}"`)
}

/**
 * Rebuild a field from the document its `introspect()` returned.
 *
 * Only documents that fully describe their field can be rebuilt: predicates, classes and
 * provider schemas are not part of an introspection document, so `boolean_validator`,
 * `object_instance`, `class_config_dictionary` and class-bound `type_reference` documents throw
 * a `FieldConfigurationError`, as does any type without a registered reconstructor.
 *
 * @example
 * ```ts
 * const copy = fromIntrospection(new List(new Integer({ gte: 0 })).introspect())
 * copy.errors([1, -1]) // [FieldError { pointer: "1", message: "Value not >= 0" }]
 * ```
 */
export function fromIntrospection(document: Introspection): Field {
  if (!isIntrospection(document)) {
    throw new FieldConfigurationError("Value is not an introspection document")
  }

  const reconstructor = reconstructors.get(document.type)
  if (!reconstructor) {
    throw new FieldConfigurationError(`Cannot rebuild a "${document.type}" field from its introspection`)
  }

  const field = reconstructor(document, fromIntrospection)
  return document.deprecated === true && !(field instanceof Deprecated) ? new Deprecated(field) : field
}

const simple = (build: (options: { description?: string }) => Field): Reconstructor => (document) => build(read(Described, document))

registerReconstructor("anything", simple((options) => new Anything(options)))
registerReconstructor("hashable", simple((options) => new Hashable(options)))
registerReconstructor("boolean", simple((options) => new Boolean(options)))
registerReconstructor("unicode_decimal", simple((options) => new UnicodeDecimal(options)))
registerReconstructor("null", simple((options) => new Null(options)))

registerReconstructor("integer", (document) => new Integer(read(Bounds, document)))
registerReconstructor("float", (document) => new Float(read(Bounds, document)))

const StringDocument = Sized.extend({ allow_blank: z.boolean().optional() })

const stringOptions = (document: Introspection) => {
  const { description, min_length, max_length, allow_blank } = read(StringDocument, document)
  return { description, minLength: min_length, maxLength: max_length, allowBlank: allow_blank }
}

registerReconstructor("unicode", (document) => new UnicodeString(stringOptions(document)))
registerReconstructor("bytes", (document) => new ByteString(stringOptions(document)))

registerReconstructor("constant", (document) => {
  const { description, values } = read(
    Described.extend({ values: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])) }),
    document,
  )
  return new Constant(values, { description })
})

registerReconstructor("datetime", (document) => {
  const options = read(
    Described.extend({
      gt: IsoDate.optional(),
      gte: IsoDate.optional(),
      lt: IsoDate.optional(),
      lte: IsoDate.optional(),
    }),
    document,
  )
  return new DateTime(options)
})

registerReconstructor("nullable", (document, rebuild) => {
  const { description, nullable } = read(Described.extend({ nullable: DocumentSchema }), document)
  return new Nullable(rebuild(nullable), { description })
})

const CollectionDocument = Sized.extend({ contents: DocumentSchema })

registerReconstructor("list", (document, rebuild) => {
  const { description, contents, min_length, max_length } = read(CollectionDocument, document)
  return new List(rebuild(contents), { description, minLength: min_length, maxLength: max_length })
})

registerReconstructor("set", (document, rebuild) => {
  const { description, contents, min_length, max_length } = read(CollectionDocument, document)
  return new Set(rebuild(contents), { description, minLength: min_length, maxLength: max_length })
})

registerReconstructor("tuple", (document, rebuild) => {
  const { description, contents } = read(Described.extend({ contents: z.array(DocumentSchema) }), document)
  return new Tuple(contents.map(rebuild), { description })
})

registerReconstructor("dictionary", (document, rebuild) => {
  const { description, contents, optional_keys, allow_extra_keys } = read(
    Described.extend({
      contents: z.record(z.string(), DocumentSchema),
      optional_keys: z.array(z.string()).default([]),
      allow_extra_keys: z.boolean().default(false),
    }),
    document,
  )
  return new Dictionary(Object.fromEntries(Object.entries(contents).map(([key, value]) => [key, rebuild(value)])), {
    description,
    optionalKeys: optional_keys,
    allowExtraKeys: allow_extra_keys,
  })
})

registerReconstructor("schemaless_dictionary", (document, rebuild) => {
  const { description, key_type, value_type, min_length, max_length } = read(
    Sized.extend({ key_type: DocumentSchema.optional(), value_type: DocumentSchema.optional() }),
    document,
  )
  return new SchemalessDictionary({
    description,
    keyType: key_type && rebuild(key_type),
    valueType: value_type && rebuild(value_type),
    minLength: min_length,
    maxLength: max_length,
  })
})

registerReconstructor("polymorph", (document, rebuild) => {
  const { description, switch_field, contents_map } = read(
    Described.extend({ switch_field: z.string(), contents_map: z.record(z.string(), DocumentSchema) }),
    document,
  )
  return new Polymorph(
    switch_field,
    Object.fromEntries(Object.entries(contents_map).map(([key, value]) => [key, rebuild(value)])),
    { description },
  )
})

registerReconstructor("any", (document, rebuild) => {
  const { description, options } = read(Described.extend({ options: z.array(DocumentSchema) }), document)
  return new Any(options.map(rebuild), { description })
})

registerReconstructor("all", (document, rebuild) => {
  const { description, requirements } = read(Described.extend({ requirements: z.array(DocumentSchema) }), document)
  return new All(requirements.map(rebuild), { description })
})

registerReconstructor("type_reference", (document) => {
  const { description, base_classes } = read(Described.extend({ base_classes: z.array(z.string()).optional() }), document)
  if (base_classes) {
    throw new FieldConfigurationError(`Cannot rebuild a "type_reference" field bound to ${base_classes.join(", ")}`)
  }
  return new TypeReference({ description })
})

registerReconstructor("object_path", (document, rebuild) => {
  const { description, value_schema } = read(Described.extend({ value_schema: DocumentSchema.optional() }), document)
  return new ObjectPath({ description, valueSchema: value_schema && rebuild(value_schema) })
})
