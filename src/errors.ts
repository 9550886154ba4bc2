/**
 * Error types raised by the binding and messaging framework.
 */

/**
 * Base class for every error the framework throws.
 */
export class MvvmError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MvvmError'
  }
}

/**
 * Raised when a weak handle is invoked after its receiver or function
 * has been collected or disposed. The message bus catches it and drops
 * the handle; it never reaches application code through `drain`.
 */
export class TargetUnavailableError extends MvvmError {
  constructor(message = 'Object no longer available') {
    super(message)
    this.name = 'TargetUnavailableError'
  }
}

export function isTargetUnavailable(error: unknown): error is TargetUnavailableError {
  return error instanceof TargetUnavailableError
}
