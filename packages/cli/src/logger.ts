/**
 * Structured Logger
 *
 * pino logger shared by the CLI and the components it builds. Logs go to
 * stderr so that stdout carries only the action lines and the summary.
 */

import pino from 'pino'

export type Logger = pino.Logger

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export function createLogger(level = 'info'): Logger {
  return pino({ level }, pino.destination(2))
}
