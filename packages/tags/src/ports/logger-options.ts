import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * @default "info"
   */
  level: LogLevelName

  /**
   * Pretty-print output through `pino-pretty` for local debugging.
   * Written uncolored when an explicit destination stream is given.
   * @default false
   */
  prettify?: boolean
}
