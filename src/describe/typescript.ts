import type { Introspection } from "@/types"
import { logger } from "@/utils/logger"
import { documentKey, isIntrospection, type SchemaMeta } from "@/describe/types"
import type { SchemaRegistry } from "@/describe/registry"

/**
 * Generate indentation spaces
 */
const space = (depth: number) => " ".repeat(depth)

/**
 * Capitalize a string
 */
const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1)

/**
 * Convert a schema ID to a TypeScript type name (PascalCase)
 */
export const toTypeName = (id: string) => capitalize(id).replace(/[-_.](.)/g, (_, char: string) => char.toUpperCase())

/**
 * Build a map from introspection documents to registry IDs
 */
function buildDocumentToIdMap(registry: SchemaRegistry | undefined): Map<string, string> {
  const documentToId = new Map<string, string>()
  if (registry) {
    for (const entry of registry.values()) {
      documentToId.set(documentKey(entry.field.introspect()), entry.meta.id)
    }
  }
  return documentToId
}

const child = (document: Introspection, key: string): Introspection | undefined => {
  const value = document[key]
  return isIntrospection(value) ? value : undefined
}

const children = (document: Introspection, key: string): Introspection[] => {
  const value = document[key]
  return Array.isArray(value) ? value.filter(isIntrospection) : []
}

const childEntries = (document: Introspection, key: string): [string, Introspection][] => {
  const value = document[key]
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return []
  }
  return Object.entries(value).flatMap(([name, entry]): [string, Introspection][] => (isIntrospection(entry) ? [[name, entry]] : []))
}

const isCompound = (type: string) => type.includes(" | ") || type.includes(" & ")

/**
 * Wrap union and intersection types in parentheses where they are embedded in another type
 */
const group = (type: string) => (isCompound(type) ? `(${type})` : type)

/**
 * Render a property comment from a nested document's description and deprecation flag
 */
function propertyComment(document: Introspection): string {
  const parts = [document.deprecated === true ? "(deprecated)" : undefined, document.description].filter(Boolean)
  return parts.length > 0 ? ` // ${parts.join(" ")}` : ""
}

interface RenderContext {
  registry: SchemaRegistry | undefined
  documentToId: Map<string, string>
  referencedTypes: Set<string>
}

/**
 * Convert an introspection document to a TypeScript type body string (without type declaration).
 * Also collects referenced registry types during traversal.
 */
function toTs(document: Introspection, referential: boolean, depth: number, context: RenderContext): string {
  if (!isIntrospection(document)) {
    logger.error("Provided document is not an introspection document", { document: String(document) })
    throw new TypeError(`Provided document is not an introspection document: ${String(document)}`)
  }

  // Registered documents are referenced by name instead of inlined
  const schemaId = context.documentToId.get(documentKey(document))
  if (schemaId && referential) {
    context.referencedTypes.add(schemaId)
    return toTypeName(schemaId)
  }

  const nested = (inner: Introspection, innerDepth: number = depth) => toTs(inner, true, innerDepth, context)

  switch (document.type) {
    case "boolean":
      return "boolean"
    case "integer":
    case "float":
      return "number"
    case "unicode":
    case "unicode_decimal":
    case "object_path":
      return "string"
    case "bytes":
      return "Uint8Array"
    case "datetime":
      return "Date"
    case "null":
      return "null"
    case "type_reference":
      return "Function"
    case "constant": {
      const values = Array.isArray(document.values) ? document.values : []
      if (values.length === 0) return "never"
      return values.map((value) => (typeof value === "string" ? JSON.stringify(value) : String(value))).join(" | ")
    }
    case "nullable": {
      const inner = child(document, "nullable")
      return inner ? `${nested(inner)} | null` : "unknown"
    }
    case "list": {
      const contents = child(document, "contents")
      return contents ? `${group(nested(contents))}[]` : "unknown[]"
    }
    case "set": {
      const contents = child(document, "contents")
      return `Set<${contents ? nested(contents) : "unknown"}>`
    }
    case "tuple":
      return `[${children(document, "contents")
        .map((item) => nested(item))
        .join(", ")}]`
    case "dictionary": {
      const indent = 2
      const newDepth = depth + indent
      const optionalKeys = Array.isArray(document.optional_keys) ? document.optional_keys : []

      const properties = childEntries(document, "contents").map(([key, value]) => {
        const optional = optionalKeys.includes(key) ? "?" : ""
        return `${space(newDepth)}${key}${optional}: ${nested(value, newDepth)}${propertyComment(value)}`
      })
      if (document.allow_extra_keys === true) {
        properties.push(`${space(newDepth)}[key: string]: unknown`)
      }

      return properties.length > 0 ? `{\n${properties.join("\n")}\n${space(depth)}}` : "{}"
    }
    case "schemaless_dictionary": {
      const keyType = child(document, "key_type")
      const valueType = child(document, "value_type")
      const key = keyType ? nested(keyType) : "string"
      return `Record<${key === "number" ? "number" : "string"}, ${valueType ? nested(valueType) : "unknown"}>`
    }
    case "polymorph":
      return childEntries(document, "contents_map")
        .map(([, branch]) => nested(branch))
        .join(" | ")
    case "any":
      return children(document, "options")
        .map((option) => nested(option))
        .join(" | ")
    case "all":
      return children(document, "requirements")
        .map((requirement) => group(nested(requirement)))
        .join(" & ")
    case "class_config_dictionary": {
      const newDepth = depth + 2
      const path = typeof document.default_path === "string" ? "path?" : "path"
      return `{\n${space(newDepth)}${path}: string\n${space(newDepth)}kwargs?: Record<string, unknown>\n${space(depth)}}`
    }
    default:
      return "unknown"
  }
}

/**
 * Format a JSDoc comment from metadata
 */
function formatJsDoc(meta: Partial<SchemaMeta> | undefined, document: Introspection): string {
  const description = meta?.description ?? document.description
  if (!description) {
    return ""
  }

  return `/**\n * ${description.split("\n").join("\n * ")}\n */\n`
}

/**
 * Rendered type information including the type definition string
 */
interface RenderedType {
  typeName: string
  typeDefinition: string
  isUtility: boolean
}

/**
 * Render a document as a type definition, preceded by every registered type it references
 * that has not been rendered yet.
 */
function renderDocumentInternal(
  document: Introspection,
  meta: Partial<SchemaMeta> | undefined,
  typeName: string,
  context: Omit<RenderContext, "referencedTypes">,
  alreadyRendered: Set<string>,
): RenderedType[] {
  if (alreadyRendered.has(typeName)) {
    return []
  }

  const referencedTypes = new Set<string>()
  const typeBody = toTs(document, false, 0, { ...context, referencedTypes })

  const renderedTypes: RenderedType[] = []
  // Mark before recursing so self-referencing documents terminate
  alreadyRendered.add(typeName)

  for (const refId of referencedTypes) {
    const refEntry = context.registry?.get(refId)
    if (refEntry && !alreadyRendered.has(toTypeName(refEntry.meta.id))) {
      renderedTypes.push(
        ...renderDocumentInternal(refEntry.field.introspect(), refEntry.meta, toTypeName(refEntry.meta.id), context, alreadyRendered),
      )
    }
  }

  renderedTypes.push({
    typeName,
    typeDefinition: `${formatJsDoc(meta, document)}type ${typeName} = ${typeBody}\n\n`,
    isUtility: meta?.utility ?? false,
  })

  return renderedTypes
}

/**
 * Format rendered types into sections (utility types first, then main types).
 * Only adds section headers when both main and utility types are present.
 */
function formatWithSections(renderedTypes: RenderedType[]): string {
  const mainTypes = renderedTypes.filter((t) => !t.isUtility)
  const utilityTypes = renderedTypes.filter((t) => t.isUtility)

  const needsSections = mainTypes.length > 0 && utilityTypes.length > 0

  let result = ""

  if (utilityTypes.length > 0) {
    if (needsSections) {
      result += "// --- Utility Types ---\n\n"
    }
    for (const t of utilityTypes) {
      result += t.typeDefinition
    }
  }

  if (mainTypes.length > 0) {
    if (needsSections) {
      result += "// --- Main Types ---\n\n"
    }
    for (const t of mainTypes) {
      result += t.typeDefinition
    }
  }

  return result
}

/**
 * Convert an introspection document to TypeScript type definitions.
 * Includes the main type and any registry types it references.
 *
 * @param document - The document to convert, usually `field.introspect()`
 * @param registry - Optional registry whose schemas are rendered as named references
 * @param typeName - Name for the main type (default: "Output")
 */
export function introspectionToTypescript(document: Introspection, registry?: SchemaRegistry, typeName: string = "Output"): string {
  const documentToId = buildDocumentToIdMap(registry)
  const schemaId = documentToId.get(documentKey(document))
  const meta = schemaId && registry ? registry.getMeta(schemaId) : undefined

  const renderedTypes = renderDocumentInternal(document, meta, typeName, { registry, documentToId }, new Set())

  return formatWithSections(renderedTypes).trimEnd()
}

/**
 * Convert all schemas in a registry to TypeScript type definitions, one type per schema ID.
 */
export function registryToTypescript(registry: SchemaRegistry): string {
  const documentToId = buildDocumentToIdMap(registry)
  const alreadyRendered = new Set<string>()
  const allRenderedTypes: RenderedType[] = []

  for (const entry of registry.values()) {
    const typeName = toTypeName(entry.meta.id)
    allRenderedTypes.push(
      ...renderDocumentInternal(entry.field.introspect(), entry.meta, typeName, { registry, documentToId }, alreadyRendered),
    )
  }

  return formatWithSections(allRenderedTypes).trimEnd()
}
