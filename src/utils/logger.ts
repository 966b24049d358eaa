/**
 * pino loggers for rg-cost-report.
 *
 * Logs always go to stderr so that stdout carries only command output
 * (the `Wrote N rows` line, the echoed YAML or the `--json` envelope).
 *
 *   LOG_LEVEL   explicit level; otherwise info in production, debug under
 *               NODE_ENV=test|development, warn for plain CLI use
 *   LOG_PRETTY  `true`/`false` forces pino-pretty on or off
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel !== undefined && envLevel !== '') return envLevel
  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info'
    case 'test':
    case 'development':
      return 'debug'
    default:
      return 'warn'
  }
}

function isPrettyMode(): boolean {
  const flag = process.env.LOG_PRETTY
  if (flag !== undefined) return flag === 'true'
  // pino-pretty runs in a worker thread; keep CLI and production runs on plain JSON
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

/**
 * Pino options shared by every rg-cost-report logger: level labels, ISO
 * timestamps and redaction of token-carrying fields.
 */
export function loggerOptions(name: string, level: string): pino.LoggerOptions {
  return {
    name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }
}

/**
 * Create a named logger writing to stderr.
 * @param name - Module identifier, e.g. `collection` or `collect-cmd`
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const baseOptions = loggerOptions(options.name ?? name, options.level ?? getDefaultLogLevel())

  if (options.pretty ?? isPrettyMode()) {
    // pino-pretty is a devDependency; transport errors surface asynchronously
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  }

  // stdout carries the command's own output
  return pino(baseOptions, pino.destination(2))
}
