/**
 * shapeguard/describe
 *
 * Tooling built on introspection documents: a schema registry, TypeScript type generation and
 * rebuilding fields from their documents.
 *
 * @example
 * ```ts
 * import { SchemaRegistry, registryToTypescript } from "shapeguard/describe"
 * import { Dictionary, UnicodeString } from "shapeguard"
 *
 * const registry = new SchemaRegistry()
 * registry.add(new Dictionary({ name: new UnicodeString() }), { id: "user" })
 *
 * const typescript = registryToTypescript(registry)
 * ```
 */

// Types
export type { SchemaMeta, RegistryEntry } from "@/describe/types"
export { isIntrospection } from "@/describe/types"

// Registry
export { SchemaRegistry } from "@/describe/registry"

// TypeScript conversion utilities
export { introspectionToTypescript, registryToTypescript, toTypeName } from "@/describe/typescript"

// Rebuilding fields from introspection
export { fromIntrospection, registerReconstructor, type Reconstructor } from "@/describe/reconstruct"
