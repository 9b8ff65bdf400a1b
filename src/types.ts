import type { FieldError } from "@/fields/issues"

/**
 * Any value that can appear inside an introspection document.
 * Only JSON primitives, arrays and plain objects are allowed.
 */
export type IntrospectionValue = string | number | boolean | null | IntrospectionValue[] | { [key: string]: IntrospectionValue } | Introspection

/**
 * Self-description of a field.
 *
 * `type` is always present and names the field kind in lowercase snake case
 * (`"unicode"`, `"schemaless_dictionary"`, ...). Nested fields appear as nested documents.
 */
export interface Introspection {
  type: string
  description?: string
  [key: string]: IntrospectionValue | undefined
}

/**
 * Diagnostic codes returned by `Field.errors()`
 */
export type ErrorCode = "MISSING" | "UNKNOWN" | "INVALID"

/**
 * Diagnostic codes returned by `Field.warnings()`
 */
export type WarningCode = "WARNING" | "FIELD_DEPRECATED"

export const ERROR_CODE_INVALID = "INVALID" satisfies ErrorCode
export const ERROR_CODE_MISSING = "MISSING" satisfies ErrorCode
export const ERROR_CODE_UNKNOWN = "UNKNOWN" satisfies ErrorCode

export const WARNING_CODE_WARNING = "WARNING" satisfies WarningCode
export const WARNING_CODE_FIELD_DEPRECATED = "FIELD_DEPRECATED" satisfies WarningCode

/**
 * Any class (constructor function). Used by the type reference fields.
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T

/**
 * A class that can be instantiated with arbitrary arguments
 */
export type Instantiable<T = unknown> = new (...args: unknown[]) => T

/**
 * Check whether a value is a class (or any function with a prototype that `new` can build)
 */
export function isInstantiable(value: unknown): value is Instantiable {
  return typeof value === "function" && typeof value.prototype === "object" && value.prototype !== null
}

/**
 * Format a list of field errors as `pointer: message` lines
 */
export function formatErrors(errors: readonly FieldError[]): string {
  return errors.map((error) => (error.pointer ? `${error.pointer}: ${error.message}` : error.message)).join("\n  - ")
}

/**
 * Raised when a field (or any other schema object) is constructed with invalid options.
 */
export class FieldConfigurationError extends Error {
  override name = "FieldConfigurationError" as const

  /** The option issues that caused the failure, as `path: message` strings */
  public readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message)
    this.issues = issues

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FieldConfigurationError)
    }
  }
}

/**
 * Raised at the validation boundary (`validate()`, `validateCall()`, eager default validation)
 * when a value does not match its schema. Carries every error found.
 */
export class ValidationError extends Error {
  override name = "ValidationError" as const

  public readonly errors: readonly FieldError[]

  constructor(errors: readonly FieldError[], noun: string = "value") {
    super(`Invalid ${noun}:\n  - ${formatErrors(errors)}`)
    this.errors = errors

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError)
    }
  }
}

/**
 * Raised when a reference string cannot be resolved to an object.
 */
export class ReferenceResolutionError extends Error {
  override name = "ReferenceResolutionError" as const

  public readonly reference: string
  public readonly reason: ResolutionFailureReason
  public override readonly cause: unknown

  constructor(options: { reference: string; reason: ResolutionFailureReason; message: string; cause?: unknown }) {
    super(options.message)
    this.reference = options.reference
    this.reason = options.reason
    this.cause = options.cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReferenceResolutionError)
    }
  }

  /**
   * Wrap an unknown module loading failure
   */
  static fromLoadFailure(reference: string, moduleName: string, err: unknown): ReferenceResolutionError {
    if (err instanceof ReferenceResolutionError) {
      return err
    }

    const detail = err instanceof Error ? err.message : String(err)
    return new ReferenceResolutionError({
      reference,
      reason: "module",
      message: `Cannot load module "${moduleName}": ${detail}`,
      cause: err,
    })
  }
}

/**
 * Why a reference string could not be resolved
 * - `syntax`: the string is not a `module:path` or `module.name` reference
 * - `module`: the module could not be loaded
 * - `attribute`: the module loaded but the named member does not exist
 */
export type ResolutionFailureReason = "syntax" | "module" | "attribute"
