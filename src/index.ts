/**
 * shapeguard
 *
 * Declarative schema validation. Compose fields describing the shape of your data, then ask
 * them what is wrong with a value: every problem comes back as a `FieldError` with a code and a
 * pointer to where it was found. Fields never coerce or transform values.
 *
 * @example
 * ```ts
 * import { Dictionary, Float, Integer, UnicodeString, validate } from "shapeguard"
 *
 * const person = new Dictionary({
 *   name: new UnicodeString({ allowBlank: false }),
 *   height: new Float({ gt: 0 }),
 *   age: new Integer({ gte: 0 }),
 * })
 *
 * person.errors({ name: "Ada", height: -2 })
 * // [FieldError { code: "INVALID", pointer: "height", message: "Value not > 0" },
 * //  FieldError { code: "MISSING", pointer: "age", message: "Missing key: age" }]
 *
 * validate(person, { name: "Ada", height: 1.7, age: 36 }) // passes silently
 * ```
 *
 * `Boolean` and `Set` share their names with JavaScript globals; import them under another name
 * or use the `fields` namespace (`fields.Boolean`) where that matters.
 */

// Fields
export * from "./fields"
export * as fields from "./fields"

// References
export { ResolutionCache, defaultResolutionCache, type CacheStore } from "./references/cache"
export {
  ReferenceResolver,
  defaultResolver,
  defaultModuleLoader,
  parseReference,
  registerModule,
  unregisterModule,
  type ModuleLoader,
  type ParsedReference,
  type ReferenceResolverOptions,
} from "./references/resolver"
export { ObjectPath, TypePath, type ObjectPathOptions, type TypePathOptions } from "./references/fields"
export { ProviderRegistry, providers, type ProviderSchema } from "./references/providers"
export {
  ClassConfigurationSchema,
  type ClassConfigurationSchemaOptions,
  type ClassConfigurationCheck,
  type ResolvedClassConfiguration,
} from "./references/class-config"

// Call validation
export { validate, validateCall, type CallSchema } from "./validator"

// Settings
export * from "./settings-entry"

// Errors, codes and shared types
export {
  ERROR_CODE_INVALID,
  ERROR_CODE_MISSING,
  ERROR_CODE_UNKNOWN,
  WARNING_CODE_WARNING,
  WARNING_CODE_FIELD_DEPRECATED,
  FieldConfigurationError,
  ValidationError,
  ReferenceResolutionError,
  formatErrors,
  isInstantiable,
  type ErrorCode,
  type WarningCode,
  type Introspection,
  type IntrospectionValue,
  type Constructor,
  type Instantiable,
  type ResolutionFailureReason,
} from "./types"

// Library configuration
export { configure, getConfig, loadConfig, type LibraryConfig, type LogLevel } from "./config"
export type { Logger } from "./utils/logger"
