/**
 * Console logging for the registry.
 *
 * Each logger carries a scope (usually the class name) and is gated by a
 * LoggingConfig. Objects are rendered with util.inspect.
 */

import { inspect } from 'node:util'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LoggingConfig {
  /** Turn console logging on or off */
  enabled: boolean
  /** Lowest level that is written */
  level: LogLevel
  /** Prefix that makes registry logs easy to spot */
  prefix: string
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

const format = (value: unknown): unknown => {
  if (typeof value === 'object' && value !== null && !(value instanceof Error)) {
    return inspect(value, { depth: 4, breakLength: 120 })
  }
  return value
}

export function createLogger(scope: string, config: LoggingConfig): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!config.enabled || LEVEL_ORDER[level] < LEVEL_ORDER[config.level]) return

    const line = `${config.prefix} [${new Date().toISOString()}] [${level}] [${scope}] ${message}`
    const rendered = args.map(format)

    if (level === 'error') {
      console.error(line, ...rendered)
    } else if (level === 'warn') {
      console.warn(line, ...rendered)
    } else {
      console.log(line, ...rendered)
    }
  }

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args)
  }
}

/** Logger that discards everything */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}
