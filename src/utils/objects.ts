/**
 * Plain object check: object literals and `Object.create(null)` objects, but not arrays,
 * class instances, maps or dates
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Whether assigning `target[key]` would succeed: an own writable property (or one with a
 * setter), or a new key on an extensible object
 */
export function canWrite(target: object, key: string): boolean {
  const descriptor = Object.getOwnPropertyDescriptor(target, key)
  if (!descriptor) {
    return Object.isExtensible(target)
  }
  return descriptor.writable ?? descriptor.set !== undefined
}

/**
 * Read a dotted path (`"a.b.c"`) out of nested plain objects.
 * Returns `found: false` when any segment is missing.
 */
export function readPath(value: unknown, path: string): { found: true; value: unknown } | { found: false } {
  let current: unknown = value
  for (const segment of path.split(".")) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
      return { found: false }
    }
    current = current[segment]
  }
  return { found: true, value: current }
}

/**
 * Deep-merge `override` over `base`. Plain objects are merged key by key; any other value in
 * `override` replaces the one in `base`. Neither input is modified: plain objects and arrays in
 * the result are copies.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(base)) {
    result[key] = deepCopy(value)
  }

  for (const [key, value] of Object.entries(override)) {
    const existing = result[key]
    result[key] = isPlainObject(value) && isPlainObject(existing) ? deepMerge(existing, value) : deepCopy(value)
  }

  return result
}

/**
 * Copy nested plain objects and arrays. Any other value is returned as is.
 */
export function deepCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(deepCopy)
  }
  if (isPlainObject(value)) {
    return deepMerge({}, value)
  }
  return value
}

/**
 * Recursively freeze plain objects and arrays
 */
export function deepFreeze<T>(value: T): T {
  if (Array.isArray(value) || isPlainObject(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}
