/**
 * Console logging with a per-module prefix.
 *
 * Debug output is off unless dev mode is enabled, either through
 * `enableDevMode()` or the `MVVM_RELAY_DEBUG` environment variable.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

const readDebugFlag = (): boolean => {
  if (typeof process === 'undefined') return false
  const flag = process.env.MVVM_RELAY_DEBUG
  return flag === '1' || flag === 'true'
}

let devMode = readDebugFlag()

/**
 * Turns debug logging on or off for every logger.
 */
export function enableDevMode(enabled = true): void {
  devMode = enabled
}

export function isDevMode(): boolean {
  return devMode
}

/**
 * Creates a logger that prefixes each line with `[mvvm-relay:<scope>]`.
 *
 * @example
 * ```ts
 * const log = createLogger('bus')
 * log.error('Subscriber failed', error)
 * // [mvvm-relay:bus] Subscriber failed Error: ...
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[mvvm-relay:${scope}]`
  return {
    debug: (message, ...details) => {
      if (devMode) console.debug(`${prefix} ${message}`, ...details)
    },
    info: (message, ...details) => console.info(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ${message}`, ...details)
  }
}
