import { createRequire } from "node:module"
import { ReferenceResolutionError } from "@/types"
import { logger } from "@/utils/logger"
import { ResolutionCache, defaultResolutionCache } from "@/references/cache"

/**
 * Loads a module by name and returns its exports
 */
export type ModuleLoader = (moduleName: string) => unknown

/**
 * A parsed reference: the module to load and the member path to walk inside it
 */
export interface ParsedReference {
  moduleName: string
  memberPath: string[]
}

const registeredModules = new Map<string, unknown>()

/**
 * Make `exports` resolvable under `name` without going through `require`. Registered modules take
 * precedence over installed packages of the same name.
 */
export function registerModule(name: string, exports: unknown): void {
  registeredModules.set(name, exports)
}

/**
 * Remove a module added with `registerModule`. Returns whether it was registered.
 */
export function unregisterModule(name: string): boolean {
  return registeredModules.delete(name)
}

const requireModule = createRequire(import.meta.url)

/**
 * Loader used when a resolver is not given its own: registered modules first, then `require`
 */
export const defaultModuleLoader: ModuleLoader = (moduleName) => {
  if (registeredModules.has(moduleName)) {
    return registeredModules.get(moduleName)
  }
  const exports: unknown = requireModule(moduleName)
  return exports
}

/**
 * Split a reference into its module and member path.
 *
 * - `"module:Member.Nested"` loads `module` and walks `Member`, then `Nested`
 * - `"module.member"` splits at the last dot and reads a single top-level member
 */
export function parseReference(reference: string): ParsedReference {
  const colon = reference.indexOf(":")
  const separator = colon >= 0 ? colon : reference.lastIndexOf(".")
  if (separator < 0) {
    throw syntaxError(reference)
  }

  const moduleName = reference.slice(0, separator)
  const memberPath = reference.slice(separator + 1).split(".")
  if (!moduleName || memberPath.some((segment) => segment.length === 0)) {
    throw syntaxError(reference)
  }

  return { moduleName, memberPath }
}

function syntaxError(reference: string): ReferenceResolutionError {
  return new ReferenceResolutionError({
    reference,
    reason: "syntax",
    message: `Value "${reference}" is not a valid reference`,
  })
}

export interface ReferenceResolverOptions {
  loader?: ModuleLoader
  cache?: ResolutionCache
}

/**
 * Resolves reference strings to the objects they name.
 *
 * Every successful resolution is stored in the cache, so later lookups of the same string (from
 * any resolver sharing the cache) skip loading entirely.
 *
 * @example
 * ```ts
 * registerModule("app/handlers", { HttpHandler })
 * defaultResolver.resolve("app/handlers:HttpHandler") // HttpHandler
 * ```
 */
export class ReferenceResolver {
  readonly loader: ModuleLoader
  readonly cache: ResolutionCache
  private readonly log = logger.child({ component: "ReferenceResolver" })

  constructor(options: ReferenceResolverOptions = {}) {
    this.loader = options.loader ?? defaultModuleLoader
    this.cache = options.cache ?? defaultResolutionCache
  }

  /**
   * Resolve `reference`, throwing a `ReferenceResolutionError` when it is malformed, its module
   * cannot be loaded, or a member along the path does not exist.
   */
  resolve(reference: string): unknown {
    return this.cache.getOrPopulate(reference, () => this.load(reference))
  }

  private load(reference: string): unknown {
    try {
      const { moduleName, memberPath } = parseReference(reference)

      let current: unknown
      try {
        current = this.loader(moduleName)
      } catch (err) {
        throw ReferenceResolutionError.fromLoadFailure(reference, moduleName, err)
      }

      for (const [index, segment] of memberPath.entries()) {
        if (current === null || current === undefined || !(segment in Object(current))) {
          throw new ReferenceResolutionError({
            reference,
            reason: "attribute",
            message: `Module "${moduleName}" has no member "${memberPath.slice(0, index + 1).join(".")}"`,
          })
        }
        const next: unknown = Reflect.get(Object(current), segment)
        current = next
      }

      this.log.debug("Resolved reference", { reference })
      return current
    } catch (err) {
      if (err instanceof ReferenceResolutionError) {
        this.log.debug("Reference resolution failed", { reference, reason: err.reason })
      }
      throw err
    }
  }
}

/**
 * Resolver backed by the default loader and the process-wide cache
 */
export const defaultResolver = new ReferenceResolver()
