/**
 * Process wide configuration for relation operations
 */

import {
  DefaultLogger,
  LogLevel,
  NoopLogWriter,
  type LogWriter,
  type Logger,
} from "@tabula/core/logging"
import { setTracingEnabled } from "@tabula/core/observability/tracing"

/**
 * Options that control how relation operations report on themselves
 */
export interface RelationOptions {
  /** The minimum {@link LogLevel} for the relation logger (default is WARN) */
  logLevel?: LogLevel
  /** The {@link LogWriter} for the relation logger (default is a no-op) */
  logWriter?: LogWriter
  /** Flag to create spans around joins, ordering and grouping (default is true) */
  tracing?: boolean
}

const DEFAULT_OPTIONS: Readonly<Required<RelationOptions>> = {
  logLevel: LogLevel.WARN,
  logWriter: NoopLogWriter,
  tracing: true,
}

let CURRENT_OPTIONS: Required<RelationOptions> = { ...DEFAULT_OPTIONS }

let RELATION_LOGGER: Logger = createLogger(CURRENT_OPTIONS)

function createLogger(options: Required<RelationOptions>): Logger {
  return new DefaultLogger({
    name: "Relation",
    level: options.logLevel,
    writer: options.logWriter,
  })
}

/**
 * Update the options used by all relations, leaving any values that are not
 * provided untouched
 *
 * @param options The {@link RelationOptions} to apply
 */
export function configureRelations(options: RelationOptions): void {
  CURRENT_OPTIONS = {
    logLevel: options.logLevel ?? CURRENT_OPTIONS.logLevel,
    logWriter: options.logWriter ?? CURRENT_OPTIONS.logWriter,
    tracing: options.tracing ?? CURRENT_OPTIONS.tracing,
  }

  RELATION_LOGGER = createLogger(CURRENT_OPTIONS)
  setTracingEnabled(CURRENT_OPTIONS.tracing)
}

/**
 * Restore the default {@link RelationOptions}
 */
export function resetRelationOptions(): void {
  configureRelations(DEFAULT_OPTIONS)
}

export function getRelationOptions(): Readonly<Required<RelationOptions>> {
  return CURRENT_OPTIONS
}

/**
 * @returns The {@link Logger} shared by relation operations
 */
export function getRelationLogger(): Logger {
  return RELATION_LOGGER
}
