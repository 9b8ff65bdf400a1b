import type { Field } from "@/fields/base"
import type { Introspection } from "@/types"
import type { RegistryEntry, SchemaMeta } from "@/describe/types"
import { collectSchemaDependencies } from "@/describe/dependencies"
import { registryToTypescript } from "@/describe/typescript"

/**
 * Named schemas with metadata, used to render and document a set of related schemas together.
 */
export class SchemaRegistry {
  private _schemas: Map<string, RegistryEntry> = new Map()
  private _fieldToId: Map<Field, string> = new Map()

  /**
   * Register a field with metadata
   * @returns this for method chaining
   */
  add(field: Field, meta: SchemaMeta): this {
    if (!meta.id) {
      throw new Error("Schema metadata must include an id")
    }

    this._schemas.set(meta.id, { field, meta })
    this._fieldToId.set(field, meta.id)

    if (meta.aliases) {
      for (const alias of meta.aliases) {
        // Don't overwrite existing schemas with aliases
        if (!this._schemas.has(alias)) {
          this._schemas.set(alias, { field, meta })
        }
      }
    }

    return this
  }

  /**
   * Get an entry by ID or alias
   */
  get(id: string): RegistryEntry | undefined {
    return this._schemas.get(id)
  }

  /**
   * Get just the field by ID or alias
   */
  getField(id: string): Field | undefined {
    return this._schemas.get(id)?.field
  }

  /**
   * Get just the metadata by ID or alias
   */
  getMeta(id: string): SchemaMeta | undefined {
    return this._schemas.get(id)?.meta
  }

  has(id: string): boolean {
    return this._schemas.has(id)
  }

  hasField(field: Field): boolean {
    return this._fieldToId.has(field)
  }

  getIdForField(field: Field): string | undefined {
    return this._fieldToId.get(field)
  }

  /**
   * Remove a schema by ID, along with its aliases
   * @returns true if the schema was removed
   */
  remove(id: string): boolean {
    const entry = this._schemas.get(id)
    if (!entry) return false

    this._schemas.delete(entry.meta.id)
    this._fieldToId.delete(entry.field)

    for (const alias of entry.meta.aliases ?? []) {
      if (this._schemas.get(alias)?.field === entry.field) {
        this._schemas.delete(alias)
      }
    }

    return true
  }

  /**
   * Get all unique entries (excludes alias duplicates)
   */
  *values(): IterableIterator<RegistryEntry> {
    const seen = new Set<Field>()
    for (const entry of this._schemas.values()) {
      if (!seen.has(entry.field)) {
        seen.add(entry.field)
        yield entry
      }
    }
  }

  /**
   * Get all unique entries as [id, entry] pairs (excludes alias duplicates)
   */
  *entries(): IterableIterator<[string, RegistryEntry]> {
    for (const entry of this.values()) {
      yield [entry.meta.id, entry]
    }
  }

  /**
   * Get all unique schema IDs (excludes aliases)
   */
  *ids(): IterableIterator<string> {
    for (const entry of this.values()) {
      yield entry.meta.id
    }
  }

  /**
   * Number of unique schemas (excludes aliases)
   */
  get size(): number {
    return this._fieldToId.size
  }

  clear(): void {
    this._schemas.clear()
    this._fieldToId.clear()
  }

  /**
   * Introspect every registered schema, keyed by ID
   */
  introspect(): Record<string, Introspection> {
    const result: Record<string, Introspection> = {}
    for (const [id, entry] of this.entries()) {
      result[id] = entry.field.introspect()
    }
    return result
  }

  /**
   * Collect the given schema IDs plus every registered schema they depend on
   * @param schemaIds - IDs or aliases of the schemas to start from
   * @returns Primary IDs of all schemas needed to describe the given ones
   */
  collectDependencies(schemaIds: string[]): string[] {
    return collectSchemaDependencies(schemaIds, this)
  }

  /**
   * Create a new registry containing only the specified schemas and their dependencies
   * @param schemaIds - The schema IDs to include
   * @returns A new registry with the trimmed set of schemas
   */
  subset(schemaIds: string[]): SchemaRegistry {
    const allIds = this.collectDependencies(schemaIds)
    const newRegistry = new SchemaRegistry()

    for (const id of allIds) {
      const entry = this.get(id)
      if (entry) {
        newRegistry.add(entry.field, entry.meta)
      }
    }

    return newRegistry
  }

  /**
   * Convert all registered schemas to TypeScript type definitions
   */
  toTypescript(): string {
    return registryToTypescript(this)
  }
}
