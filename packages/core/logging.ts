/**
 * Logging interfaces
 */

import { HiResClock, type Timestamp } from "./time"

/**
 * Levels for logging information
 */
export enum LogLevel {
  FATAL = 0,
  ERROR = 10,
  WARN = 20,
  INFO = 30,
  DEBUG = 40,
}

/**
 * Defines some simple structure for log information
 */
export interface LogData {
  level: LogLevel
  message: string
  timestamp?: Timestamp
  source?: string
  context?: unknown
}

/**
 * Formatter for {@link LogData} entries
 */
export type LogFormatter = (data: LogData) => string

/**
 * Levels to strings
 */
const ReadableLogLevels = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.FATAL]: "FATAL",
} as const

/**
 * Simple format for {@link LogData} objects
 *
 * @param data The {@link LogData} to format
 * @returns A string with the time, source, level and message
 */
export const SimpleLogFormatter: LogFormatter = (data: LogData) =>
  `${data.timestamp ? `[${data.timestamp.toISOString()}]:` : ""}${data.source ? `(${data.source}) ` : ""}${ReadableLogLevels[data.level]} - ${data.message}`

/**
 * Simple interface for writing {@link LogData} to some source
 */
export interface LogWriter {
  /**
   * Writes the {@link LogData} to the underlying source
   *
   * @param data The {@link LogData} to write
   */
  log(data: LogData): void
}

/**
 * {@link LogWriter} that does nothing
 */
export const NoopLogWriter: LogWriter = {
  log(_data: LogData): void {},
}

/**
 * Simple {@link LogWriter} that outputs to the console
 */
export class ConsoleLogWriter implements LogWriter {
  private _formatter: LogFormatter

  constructor(formatter?: LogFormatter) {
    this._formatter = formatter ?? SimpleLogFormatter
  }

  log(data: LogData): void {
    // eslint-disable-next-line no-console
    console.log(this._formatter(data))
  }
}

/**
 * Simple interface for logging information
 */
export interface Logger {
  /** The current {@link LogLevel} */
  readonly level: LogLevel

  /** The source for events logged here */
  readonly name?: string

  /**
   * Update the {@link LogLevel} minimum to write with
   * @param level The new {@link LogLevel} to use
   */
  setLevel(level: LogLevel): void

  /**
   * Check if messages at the given level will reach the writer
   *
   * @param level The {@link LogLevel} to check
   */
  enabled(level: LogLevel): boolean

  /**
   * Writes a {@link LogLevel.DEBUG} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  debug(message: string, context?: unknown): void

  /**
   * Writes a {@link LogLevel.INFO} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  info(message: string, context?: unknown): void

  /**
   * Writes a {@link LogLevel.WARN} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  warn(message: string, context?: unknown): void

  /**
   * Writes a {@link LogLevel.ERROR} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  error(message: string, context?: unknown): void

  /**
   * Writes a {@link LogLevel.FATAL} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  fatal(message: string, context?: unknown): void
}

/**
 * Options for configuring loggers
 */
export interface LoggerOptions {
  /** Optional {@link LogLevel} for initial logging, default is {@link LogLevel.WARN} */
  level?: LogLevel
  /** Optional source for the logs */
  name?: string
  /** Optional {@link LogWriter} with default of {@link NoopLogWriter} */
  writer?: LogWriter
}

type MessageLogger = (message: string, context?: unknown) => void

const NO_OP_LOGGER: MessageLogger = (
  _message: string,
  _context?: unknown,
): void => {}

/**
 * Simple logger that swaps each level between a no-op and a bound writer call
 * whenever the level changes, so disabled levels cost a single function call
 */
export class DefaultLogger implements Logger {
  private _level: LogLevel
  private readonly _writer: LogWriter
  readonly name?: string

  debug: MessageLogger = NO_OP_LOGGER
  info: MessageLogger = NO_OP_LOGGER
  warn: MessageLogger = NO_OP_LOGGER
  error: MessageLogger = NO_OP_LOGGER
  fatal: MessageLogger

  constructor(options?: LoggerOptions) {
    this._level = options?.level ?? LogLevel.WARN
    this._writer = options?.writer ?? NoopLogWriter
    this.name = options?.name

    // Fatal is always written
    this.fatal = this._bind(LogLevel.FATAL)

    this.setLevel(this._level)
  }

  get level(): LogLevel {
    return this._level
  }

  enabled(level: LogLevel): boolean {
    return level <= this._level
  }

  setLevel(level: LogLevel): void {
    this._level = level

    this.debug = this._select(LogLevel.DEBUG)
    this.info = this._select(LogLevel.INFO)
    this.warn = this._select(LogLevel.WARN)
    this.error = this._select(LogLevel.ERROR)
  }

  private _select(level: LogLevel): MessageLogger {
    return this.enabled(level) ? this._bind(level) : NO_OP_LOGGER
  }

  private _bind(level: LogLevel): MessageLogger {
    return (message: string, context?: unknown): void => {
      this._writer.log({
        source: this.name,
        timestamp: HiResClock.timestamp(),
        message,
        level,
        context,
      })
    }
  }
}
