/**
 * @file Debug Logger
 *
 * Turns the `debug` compile option into a logger function.
 *
 * @module mql-compiler/logging/debug-logger
 */

import type { DebugLogger } from '../types/index.js'

/**
 * No-op logger used when debugging is disabled.
 */
export const silentLogger: DebugLogger = () => {}

/**
 * Create the debug logger based on configuration.
 *
 * @param debug - `false`/omitted for no logging, `true` for the console, or
 *   a custom logger function
 * @param scope - Prefix label for console output
 */
export function createDebugLogger(
  debug: boolean | DebugLogger | undefined,
  scope: string = 'FilterCompiler'
): DebugLogger {
  if (!debug) {
    return silentLogger
  }

  if (typeof debug === 'function') {
    return debug
  }

  // Default console logger
  return (message: string, data?: Record<string, unknown>) => {
    const timestamp = new Date().toISOString()
    const prefix = `[${scope} ${timestamp}]`
    if (data) {
      console.log(prefix, message, data)
    } else {
      console.log(prefix, message)
    }
  }
}
