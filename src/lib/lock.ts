/**
 * Advisory repository lock: <repo>/.devtwin.lock holds the owning PID.
 */

import fs from 'node:fs'
import { getLockPath } from './paths.js'
import { RepositoryLayoutError, RepositoryLockedError } from './errors.js'

export interface RepoLock {
  path: string
  pid: number
  release: () => void
}

/**
 * Signal 0 probes existence. EPERM means alive under another user.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    return err instanceof Error && 'code' in err && err.code === 'EPERM'
  }
}

function readLockPid(lockPath: string): number | null {
  try {
    const pid = Number.parseInt(fs.readFileSync(lockPath, 'utf-8').trim(), 10)
    return Number.isNaN(pid) ? null : pid
  } catch {
    return null
  }
}

/**
 * Take the lock or throw RepositoryLockedError. A lock left by a dead
 * process (or an unreadable one) is reclaimed.
 */
export function acquireRepoLock(repoRoot: string, pid: number = process.pid): RepoLock {
  const lockPath = getLockPath(repoRoot)

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      fs.writeFileSync(lockPath, `${pid}\n`, { flag: 'wx' })
      return {
        path: lockPath,
        pid,
        release: () => releaseRepoLock(lockPath, pid)
      }
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined
      if (code === 'ENOENT') {
        throw new RepositoryLayoutError(repoRoot, 'directory does not exist', err)
      }
      if (code !== 'EEXIST') {
        throw err
      }
    }

    const holder = readLockPid(lockPath)
    if (holder !== null && holder !== pid && isProcessAlive(holder)) {
      throw new RepositoryLockedError(lockPath, holder)
    }
    fs.rmSync(lockPath, { force: true })
  }

  throw new RepositoryLockedError(lockPath, readLockPid(lockPath) ?? -1)
}

/**
 * Remove the lock if it still belongs to pid
 */
export function releaseRepoLock(lockPath: string, pid: number = process.pid): void {
  if (readLockPid(lockPath) === pid) {
    fs.rmSync(lockPath, { force: true })
  }
}

/**
 * Run fn while holding the lock
 */
export function withRepoLock<T>(repoRoot: string, fn: () => T): T {
  const lock = acquireRepoLock(repoRoot)
  try {
    return fn()
  } finally {
    lock.release()
  }
}
