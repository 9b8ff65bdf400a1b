import type { Field } from "@/fields/base"
import type { Introspection } from "@/types"
import { isPlainObject } from "@/utils/objects"

/**
 * Metadata for describing a schema in the registry
 */
export interface SchemaMeta {
  /** Unique identifier for this schema */
  id: string
  /** Human-readable description of the schema */
  description?: string
  /** Alternative names that can reference this schema */
  aliases?: string[]
  /** If true, this is a utility type (referenced by other types, rendered in its own section) */
  utility?: boolean
  /** IDs of schemas to keep alongside this one in a `subset()`, beyond those its document refers to */
  dependencies?: string[]
  /** If true, every `subset()` includes this schema */
  always?: boolean
}

/**
 * Entry stored in the registry
 */
export interface RegistryEntry {
  field: Field
  meta: SchemaMeta
}

/**
 * Check whether a value is an introspection document: a plain object with a string `type`
 */
export function isIntrospection(value: unknown): value is Introspection {
  return isPlainObject(value) && typeof value.type === "string"
}

/**
 * Registered schemas are matched by the JSON form of their introspection, so structurally
 * identical nested documents count as references to the registered schema
 */
export const documentKey = (document: Introspection) => JSON.stringify(document)
