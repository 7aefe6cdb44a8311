import { randomUUID } from 'node:crypto'
import { open, readFile, unlink } from 'node:fs/promises'
import { createLogger, type ILogger } from '@listingvault/logger'

export const DEFAULT_LOCK_MAX_WAIT_MS = 10_000
export const DEFAULT_LOCK_POLL_MS = 100

export interface FileLockHandle {
  path: string
  token: string
  /** False when the wait ceiling elapsed and the caller proceeded without the lock */
  acquired: boolean
}

export interface FileLockOptions {
  maxWaitMs?: number
  pollMs?: number
  logger?: ILogger
}

const defaultLogger = createLogger('record-store').child('lock')

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

/**
 * Acquire a sentinel-file lock with an owner token.
 *
 * Polls until the sentinel can be created exclusively. After `maxWaitMs` the
 * handle is returned with `acquired: false` and the caller proceeds anyway.
 */
export async function acquireFileLock(
  lockPath: string,
  options: FileLockOptions = {}
): Promise<FileLockHandle> {
  const maxWaitMs = options.maxWaitMs ?? DEFAULT_LOCK_MAX_WAIT_MS
  const pollMs = options.pollMs ?? DEFAULT_LOCK_POLL_MS
  const log = options.logger ?? defaultLogger
  const token = randomUUID()
  const startedAt = Date.now()

  for (;;) {
    try {
      const handle = await open(lockPath, 'wx')
      try {
        await handle.writeFile(token, 'utf8')
      } finally {
        await handle.close()
      }
      return { path: lockPath, token, acquired: true }
    } catch (error) {
      if (!hasCode(error, 'EEXIST')) {
        throw error
      }
    }

    const waitedMs = Date.now() - startedAt
    if (waitedMs >= maxWaitMs) {
      log.warn('Lock wait ceiling exceeded, proceeding without lock', {
        lockPath,
        waitedMs,
      })
      return { path: lockPath, token, acquired: false }
    }
    await sleep(pollMs)
  }
}

/**
 * Remove the sentinel. An owned lock is removed only while it still holds our
 * token; a force-proceeded writer clears whatever marker is left.
 * Errors are logged and never thrown.
 */
export async function releaseFileLock(handle: FileLockHandle, logger?: ILogger): Promise<void> {
  const log = logger ?? defaultLogger
  try {
    if (handle.acquired) {
      const current = await readFile(handle.path, 'utf8')
      if (current !== handle.token) {
        log.warn('Lock owned by another writer, leaving it in place', { lockPath: handle.path })
        return
      }
    }
    await unlink(handle.path)
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return
    log.warn('Failed to remove lock marker', { lockPath: handle.path }, error)
  }
}

/**
 * In-process queue per key. Tasks for the same key run one at a time in
 * submission order; a failing task does not block the ones behind it.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => {}
    const current = new Promise<void>(resolve => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await task()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}
