import { getConfig, type LogLevel } from "@/config"

type EmittingLevel = Exclude<LogLevel, "silent">

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

/**
 * Console-backed logger. The level threshold is read from the library configuration
 * on every call so `configure()` takes effect immediately.
 */
export interface Logger {
  /** Create a child logger with additional metadata merged in */
  child(metadata: Record<string, unknown>): Logger
  debug(event: string, metadata?: Record<string, unknown>): void
  info(event: string, metadata?: Record<string, unknown>): void
  warn(event: string, metadata?: Record<string, unknown>): void
  error(event: string, metadata?: Record<string, unknown>): void
}

class ConsoleLogger implements Logger {
  constructor(private readonly metadata: Record<string, unknown> = {}) {}

  child(metadata: Record<string, unknown>): Logger {
    return new ConsoleLogger({ ...this.metadata, ...metadata })
  }

  debug(event: string, metadata?: Record<string, unknown>): void {
    this.log("debug", event, metadata)
  }

  info(event: string, metadata?: Record<string, unknown>): void {
    this.log("info", event, metadata)
  }

  warn(event: string, metadata?: Record<string, unknown>): void {
    this.log("warn", event, metadata)
  }

  error(event: string, metadata?: Record<string, unknown>): void {
    this.log("error", event, metadata)
  }

  private log(level: EmittingLevel, event: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[getConfig().logLevel]) {
      return
    }

    const merged = { ...this.metadata, ...metadata }
    const line = `[shapeguard] ${event}`

    if (Object.keys(merged).length > 0) {
      console[level](line, merged)
    } else {
      console[level](line)
    }
  }
}

export const logger: Logger = new ConsoleLogger()
