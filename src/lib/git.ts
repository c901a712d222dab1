/**
 * devtwin Git Store
 *
 * Thin synchronous wrappers over the git CLI. Every helper returns a
 * GitResult instead of throwing; the caller decides how to report.
 */

import fs from 'node:fs'
import path from 'node:path'
import { runCommand, type CommandRunner } from './exec.js'

export interface GitResult {
  success: boolean
  message: string
}

export interface GitLogEntry {
  hash: string
  date: string
  message: string
}

export const DEFAULT_GIT_EMAIL = 'devtwin@localhost'
export const DEFAULT_GIT_NAME = 'devtwin'

function git(repoRoot: string, args: string[], runner: CommandRunner): GitResult {
  const result = runner('git', args, { cwd: repoRoot })
  const message = (result.stdout + result.stderr).trim()
  return { success: result.code === 0, message }
}

export function isGitRepo(repoRoot: string): boolean {
  return fs.existsSync(path.join(repoRoot, '.git'))
}

export function gitInit(repoRoot: string, runner: CommandRunner = runCommand): GitResult {
  if (isGitRepo(repoRoot)) {
    return { success: true, message: 'already a git repository' }
  }
  return git(repoRoot, ['init'], runner)
}

export function gitAddAll(repoRoot: string, runner: CommandRunner = runCommand): GitResult {
  return git(repoRoot, ['add', '.'], runner)
}

/**
 * Commit staged changes. Nothing staged ⇒ success without a commit.
 * Sets a local identity when none is configured.
 */
export function gitCommit(repoRoot: string, message: string, runner: CommandRunner = runCommand): GitResult {
  const staged = runner('git', ['diff', '--cached', '--quiet'], { cwd: repoRoot })
  if (staged.code === 0) {
    return { success: true, message: 'nothing to commit' }
  }

  const email = runner('git', ['config', 'user.email'], { cwd: repoRoot })
  if (!email.stdout.trim()) {
    runner('git', ['config', 'user.email', DEFAULT_GIT_EMAIL], { cwd: repoRoot })
    runner('git', ['config', 'user.name', DEFAULT_GIT_NAME], { cwd: repoRoot })
  }

  return git(repoRoot, ['commit', '-m', message], runner)
}

export function gitPush(repoRoot: string, remote = 'origin', branch = 'main', runner: CommandRunner = runCommand): GitResult {
  return git(repoRoot, ['push', remote, branch], runner)
}

export function gitPull(repoRoot: string, remote = 'origin', branch = 'main', runner: CommandRunner = runCommand): GitResult {
  return git(repoRoot, ['pull', '--ff-only', remote, branch], runner)
}

/**
 * Replace a remote: any existing remote of that name is removed first
 */
export function gitRemoteAdd(repoRoot: string, name: string, url: string, runner: CommandRunner = runCommand): GitResult {
  runner('git', ['remote', 'remove', name], { cwd: repoRoot })
  return git(repoRoot, ['remote', 'add', name, url], runner)
}

export function gitSetBranch(repoRoot: string, branch = 'main', runner: CommandRunner = runCommand): GitResult {
  return git(repoRoot, ['branch', '-M', branch], runner)
}

export function gitResetHard(repoRoot: string, commit: string, runner: CommandRunner = runCommand): GitResult {
  return git(repoRoot, ['reset', '--hard', commit], runner)
}

/**
 * Newest-first history; empty when git fails (no commits yet)
 */
export function gitLog(repoRoot: string, limit = 20, runner: CommandRunner = runCommand): GitLogEntry[] {
  const result = runner('git', ['log', '--pretty=format:%h\t%ad\t%s', '--date=short', `-n${limit}`], { cwd: repoRoot })
  if (result.code !== 0) return []

  const entries: GitLogEntry[] = []
  for (const line of result.stdout.split('\n')) {
    const parts = line.split('\t')
    if (parts.length < 3) continue
    const [hash, date, ...rest] = parts
    entries.push({ hash, date, message: rest.join('\t') })
  }
  return entries
}

/**
 * https://<user>:<token>@<host>/<user>/<repo>.git
 */
export function buildRemoteUrl(options: { user: string; token?: string; repo: string; host?: string }): string {
  const host = options.host || 'github.com'
  const auth = options.token
    ? `${encodeURIComponent(options.user)}:${encodeURIComponent(options.token)}@`
    : ''
  return `https://${auth}${host}/${options.user}/${options.repo}.git`
}

/**
 * Strip credentials from a remote URL for display
 */
export function redactRemoteUrl(url: string): string {
  return url.replace(/\/\/[^@/\s]+@/g, '//')
}
