import {
  ERROR_CODE_INVALID,
  WARNING_CODE_WARNING,
  type ErrorCode,
  type ResolutionFailureReason,
  type WarningCode,
} from "@/types"

/**
 * Join a key or index in front of an existing pointer
 */
export function prefixPointer(prefix: string | number, pointer?: string): string {
  return pointer ? `${prefix}.${pointer}` : String(prefix)
}

/**
 * An error found while validating a value. Instances are frozen.
 */
export class FieldError {
  readonly code: ErrorCode
  readonly message: string
  readonly pointer?: string

  constructor(message: string, options: { code?: ErrorCode; pointer?: string } = {}) {
    this.message = message
    this.code = options.code ?? ERROR_CODE_INVALID
    if (options.pointer !== undefined) {
      this.pointer = options.pointer
    }
    if (new.target === FieldError) {
      Object.freeze(this)
    }
  }

  /**
   * Return a copy of this error whose pointer is nested under `prefix`
   */
  withPointer(prefix: string | number): FieldError {
    return this.copy(prefixPointer(prefix, this.pointer))
  }

  protected copy(pointer: string): FieldError {
    return new FieldError(this.message, { code: this.code, pointer })
  }

  toJSON(): { code: ErrorCode; message: string; pointer?: string } {
    return this.pointer === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, pointer: this.pointer }
  }
}

/**
 * An `INVALID` error caused by a reference that could not be resolved, as opposed to a
 * value that does not match its schema.
 */
export class ResolutionFieldError extends FieldError {
  readonly reference: string
  readonly reason: ResolutionFailureReason

  constructor(message: string, options: { reference: string; reason: ResolutionFailureReason; pointer?: string }) {
    super(message, { code: ERROR_CODE_INVALID, pointer: options.pointer })
    this.reference = options.reference
    this.reason = options.reason
    Object.freeze(this)
  }

  protected override copy(pointer: string): FieldError {
    return new ResolutionFieldError(this.message, { reference: this.reference, reason: this.reason, pointer })
  }
}

/**
 * A non-fatal issue found while validating a value
 */
export class FieldWarning {
  readonly code: WarningCode
  readonly message: string
  readonly pointer?: string

  constructor(message: string, options: { code?: WarningCode; pointer?: string } = {}) {
    this.message = message
    this.code = options.code ?? WARNING_CODE_WARNING
    if (options.pointer !== undefined) {
      this.pointer = options.pointer
    }
    Object.freeze(this)
  }

  withPointer(prefix: string | number): FieldWarning {
    return new FieldWarning(this.message, { code: this.code, pointer: prefixPointer(prefix, this.pointer) })
  }
}

/**
 * Result of `Field.validate()`
 */
export interface Validation {
  errors: FieldError[]
  warnings: FieldWarning[]
}
