import process from 'node:process'
import {open, readFile, rm, stat} from 'node:fs/promises'
import {setTimeout} from 'node:timers/promises'
import {LockTimeoutError, isErrnoCode} from '../errors.js'

export type LockInfo = {
  pid: number;
  acquiredAt: string;
}

export type FileLockOptions = {
  /** Maximum time to wait for a live holder to release the lock (default 60s) */
  timeoutMs?: number;
  /** Delay between attempts while the lock is held (default 100ms) */
  pollMs?: number;
}

/** A lock file still being written by its creator is empty for a moment. */
const malformedGraceMs = 5000

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return isErrnoCode(error, 'EPERM')
  }
}

function parseLockInfo(content: string): LockInfo | undefined {
  try {
    const parsed: unknown = JSON.parse(content)
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      const acquiredAt = 'acquiredAt' in parsed && typeof parsed.acquiredAt === 'string' ? parsed.acquiredAt : ''
      return {pid: parsed.pid, acquiredAt}
    }

    return undefined
  } catch {
    return undefined
  }
}

/**
 * Cross-process exclusive lock backed by a file created with `O_EXCL`.
 *
 * The lock file records the holder's pid. Locks left behind by dead
 * processes, and malformed lock files, are reclaimed automatically.
 */
export class FileLock {
  /**
   * Acquires the lock, waiting while a live process holds it.
   * @throws {LockTimeoutError} If the holder does not release it in time
   */
  static async acquire(lockPath: string, options: FileLockOptions = {}): Promise<FileLock> {
    const timeoutMs = options.timeoutMs ?? 60_000
    const pollMs = options.pollMs ?? 100
    const deadline = Date.now() + timeoutMs

    for (;;) {
      const info: LockInfo = {pid: process.pid, acquiredAt: new Date().toISOString()}
      try {
        const handle = await open(lockPath, 'wx')
        try {
          await handle.writeFile(JSON.stringify(info), 'utf8')
        } finally {
          await handle.close()
        }

        return new FileLock(lockPath, info)
      } catch (error) {
        if (!isErrnoCode(error, 'EEXIST')) {
          throw error
        }
      }

      const holder = await FileLock.check(lockPath)
      if (Date.now() >= deadline) {
        throw new LockTimeoutError(lockPath, holder?.pid ?? 0)
      }

      // Reclaimed: retry at once
      if (holder) {
        await setTimeout(pollMs)
      }
    }
  }

  /**
   * Returns the live holder of a lock, if any.
   * Removes stale lock files from dead processes and malformed ones.
   * @throws If the lock path exists but cannot be read
   */
  static async check(lockPath: string): Promise<LockInfo | undefined> {
    let content: string
    try {
      content = await readFile(lockPath, 'utf8')
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return undefined
      }

      throw error
    }

    const info = parseLockInfo(content)
    if (!info) {
      const stats = await stat(lockPath).catch(() => undefined)
      if (stats && Date.now() - stats.mtimeMs < malformedGraceMs) {
        return {pid: 0, acquiredAt: stats.mtime.toISOString()}
      }

      await rm(lockPath, {force: true})
      return undefined
    }

    if (!isPidAlive(info.pid)) {
      await rm(lockPath, {force: true})
      return undefined
    }

    return info
  }

  private released = false

  private constructor(
    private readonly lockPath: string,
    readonly info: LockInfo
  ) {}

  /**
   * Releases the lock by removing the lock file. Idempotent.
   */
  async release(): Promise<void> {
    if (this.released) {
      return
    }

    this.released = true
    await rm(this.lockPath, {force: true})
  }
}
