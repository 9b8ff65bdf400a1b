import type { Introspection } from "@/types"
import { documentKey, isIntrospection } from "@/describe/types"
import type { SchemaRegistry } from "@/describe/registry"
import { isPlainObject } from "@/utils/objects"

/**
 * Build a lookup map from introspection documents to their registry IDs
 */
function buildDocumentMap(registry: SchemaRegistry): Map<string, string> {
  const documentToId = new Map<string, string>()

  for (const entry of registry.values()) {
    documentToId.set(documentKey(entry.field.introspect()), entry.meta.id)
  }

  return documentToId
}

/**
 * Nested documents directly below `document`: single documents, lists of documents
 * (`options`, tuple `contents`) and maps of documents (dictionary `contents`, `contents_map`)
 */
function nestedDocuments(document: Introspection): Introspection[] {
  const nested: Introspection[] = []

  for (const [key, value] of Object.entries(document)) {
    if (key === "type" || key === "description") continue

    if (isIntrospection(value)) {
      nested.push(value)
    } else if (Array.isArray(value)) {
      nested.push(...value.filter(isIntrospection))
    } else if (isPlainObject(value)) {
      nested.push(...Object.values(value).filter(isIntrospection))
    }
  }

  return nested
}

/**
 * Collect the registered schemas a document refers to, at any depth. Traversal stops at a
 * registered document: its own dependencies are collected when it is visited by ID.
 */
function collectDirectDependencies(root: Introspection, documentToId: Map<string, string>): Set<string> {
  const deps = new Set<string>()

  const traverse = (node: Introspection) => {
    for (const child of nestedDocuments(node)) {
      const knownId = documentToId.get(documentKey(child))
      if (knownId) {
        deps.add(knownId)
        continue
      }
      traverse(child)
    }
  }

  traverse(root)

  return deps
}

/**
 * Recursively collect all dependencies for a set of schemas
 * @param schemaIds - The schema IDs to collect dependencies for
 * @param registry - The registry containing schema definitions
 * @param visited - Set of already visited schema IDs (for recursion)
 * @returns Array of all schema IDs including dependencies
 */
export function collectSchemaDependencies(
  schemaIds: string[],
  registry: SchemaRegistry,
  visited: Set<string> = new Set<string>(),
): string[] {
  const allDependencies = new Set<string>()
  const documentToId = buildDocumentMap(registry)

  function collect(schemaId: string) {
    if (visited.has(schemaId)) return
    visited.add(schemaId)

    const entry = registry.get(schemaId)
    if (!entry) return

    const { field, meta } = entry

    // Add explicit dependencies from metadata
    for (const explicitDep of meta.dependencies ?? []) {
      if (registry.has(explicitDep)) {
        allDependencies.add(explicitDep)
        collect(explicitDep)
      }
    }

    // Collect dependencies from the document structure
    for (const depId of collectDirectDependencies(field.introspect(), documentToId)) {
      if (registry.has(depId)) {
        allDependencies.add(depId)
        collect(depId)
      }
    }
  }

  // Requested schemas are stored under their primary ID, even when asked for by alias
  for (const id of schemaIds) {
    const entry = registry.get(id)
    if (entry) {
      allDependencies.add(entry.meta.id)
    }
  }

  // Add all "always" schemas
  for (const entry of registry.values()) {
    if (entry.meta.always) {
      allDependencies.add(entry.meta.id)
    }
  }

  for (const id of [...allDependencies]) {
    collect(id)
  }

  return Array.from(allDependencies)
}
