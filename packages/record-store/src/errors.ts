/**
 * Raised when the store cannot be read for a merge or written back.
 * Surfaces to the caller after the lock marker has been removed.
 */
export class StoreWriteError extends Error {
  readonly category = 'store' as const
  readonly isRetryable = false

  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'StoreWriteError'
  }
}
