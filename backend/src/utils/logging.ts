/**
 * @file src/utils/logging.ts
 * @description
 * Console logging for the CAPL backend with per-file switches and the
 * elapsed time since the previous line.
 */

import { inspect } from 'node:util'
import loggingConfig from './logging.config.js'

let lastLogTime = performance.now()

export const log = {
  info: (...args: unknown[]) => console.log('[info]', ...args),
  warn: (...args: unknown[]) => console.warn('[warn]', ...args),
  error: (...args: unknown[]) => console.error('[error]', ...args)
}

// ANSI colors for slow gaps between lines
const colorForElapsed = (elapsed: number): string => {
  if (elapsed > 1.0) return '\x1b[31m'
  if (elapsed > 0.5) return '\x1b[33m'
  if (elapsed > 0.3) return '\x1b[93m'
  return ''
}

const safeFormat = (val: unknown): unknown => {
  if (typeof val === 'object' && val !== null) {
    return inspect(val, { depth: 4, breakLength: 120 })
  }
  return val
}

export const isLoggingEnabled = (file: string): boolean =>
  loggingConfig[file] !== undefined ? loggingConfig[file] : loggingConfig.default

export const setLoggingEnabled = (file: string, enabled: boolean): void => {
  loggingConfig[file] = enabled
}

export const logWithTimestamp = (file: string = 'unknown', message: unknown = 'No message', ...args: unknown[]): void => {
  if (!isLoggingEnabled(file)) return

  const now = performance.now()
  const elapsed = (now - lastLogTime) / 1000
  lastLogTime = now

  const timestamp = new Date().toISOString()
  const color = colorForElapsed(elapsed)
  const reset = color === '' ? '' : '\x1b[0m'

  console.log(
    `${color}[${timestamp}] [${elapsed.toFixed(3)}s] [${file}]${reset}`,
    safeFormat(message),
    ...args.map(safeFormat)
  )
}
