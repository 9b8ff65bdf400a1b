import * as z from "zod"

/**
 * Log levels understood by the library logger
 */
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"])

export type LogLevel = z.infer<typeof LogLevelSchema>

/**
 * Runtime configuration of the library itself (not of user settings classes)
 */
export const LibraryConfigSchema = z.object({
  /** Minimum level written to the console */
  logLevel: LogLevelSchema.default("warn"),
})

export type LibraryConfig = z.infer<typeof LibraryConfigSchema>

/**
 * Read configuration from the environment. Unknown log levels fall back to the default.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): LibraryConfig {
  const level = LogLevelSchema.safeParse(env.SHAPEGUARD_LOG_LEVEL?.toLowerCase())
  return LibraryConfigSchema.parse({ logLevel: level.success ? level.data : undefined })
}

let current: LibraryConfig = loadConfig()

/**
 * Get the active configuration
 */
export function getConfig(): LibraryConfig {
  return current
}

/**
 * Override parts of the active configuration. Returns the new configuration.
 */
export function configure(update: Partial<LibraryConfig>): LibraryConfig {
  current = LibraryConfigSchema.parse({ ...current, ...update })
  return current
}
