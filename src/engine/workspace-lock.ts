import process from 'node:process'
import {mkdir, readFile, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {WorkspaceLockedError, type LockInfo} from '../errors.js'

const lockFileName = 'kiln.lock'

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return error instanceof Error && 'code' in error && error.code === 'EPERM'
  }
}

function isLockInfo(value: unknown): value is LockInfo {
  return typeof value === 'object' && value !== null
    && 'pid' in value && typeof value.pid === 'number'
    && 'startedAt' in value && typeof value.startedAt === 'string'
    && 'version' in value && typeof value.version === 'number'
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Exclusive lock on a workspace directory.
 * One coordinating process builds a workspace at a time.
 */
export class WorkspaceLock {
  /**
   * Acquires the lock, cleaning a stale one left by a dead process.
   * @throws WorkspaceLockedError when a live process holds the lock
   */
  static async acquire(workspaceRoot: string): Promise<WorkspaceLock> {
    const existing = await WorkspaceLock.check(workspaceRoot)
    if (existing) {
      throw new WorkspaceLockedError(workspaceRoot, existing)
    }

    const info: LockInfo = {
      pid: process.pid,
      startedAt: new Date().toISOString(),
      version: 1
    }

    await mkdir(workspaceRoot, {recursive: true})
    const lockPath = join(workspaceRoot, lockFileName)
    try {
      // `wx` fails if another process created the file since the check
      await writeFile(lockPath, JSON.stringify(info, null, 2), {encoding: 'utf8', flag: 'wx'})
    } catch (error) {
      const holder = await WorkspaceLock.check(workspaceRoot)
      if (holder) {
        throw new WorkspaceLockedError(workspaceRoot, holder, {cause: error})
      }

      throw error
    }

    return new WorkspaceLock(lockPath, info)
  }

  /**
   * Returns the holder of the lock, or undefined when the workspace is free.
   * Malformed locks and locks of dead processes are removed.
   */
  static async check(workspaceRoot: string): Promise<LockInfo | undefined> {
    const lockPath = join(workspaceRoot, lockFileName)

    let content: string
    try {
      content = await readFile(lockPath, 'utf8')
    } catch (error) {
      if (isMissing(error)) {
        return undefined
      }

      throw error
    }

    let info: unknown
    try {
      info = JSON.parse(content)
    } catch {
      info = undefined
    }

    if (!isLockInfo(info) || !isPidAlive(info.pid)) {
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

  async release(): Promise<void> {
    if (this.released) {
      return
    }

    this.released = true
    await rm(this.lockPath, {force: true})
  }
}
