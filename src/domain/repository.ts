/**
 * devtwin Repository
 *
 * Bootstrap (init) and git-backed history of a device repository.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { DevtwinConfig } from '../types.js'
import { DOCUMENT_EXT, listDocuments } from '../lib/documents.js'
import { ensureConfig, loadConfig, saveConfig, saveLocalConfig } from '../lib/config-loader.js'
import {
  CONFIG_LOCAL_FILE,
  LOCK_FILE,
  ensureRepoLayout,
  formatTimestamp,
  getLiveDir,
  getPluginsDir,
  getSchemaDir,
  getStateDir,
  getTemplatePluginsDir,
  getTemplateSchemaDir
} from '../lib/paths.js'
import { runCommand, type CommandRunner } from '../lib/exec.js'
import {
  buildRemoteUrl,
  gitAddAll,
  gitCommit,
  gitInit,
  gitLog,
  gitPull,
  gitPush,
  gitRemoteAdd,
  gitResetHard,
  gitSetBranch,
  redactRemoteUrl,
  type GitLogEntry,
  type GitResult
} from '../lib/git.js'
import { runSnapshot, type SnapshotOptions } from './snapshot.js'
import type { SnapshotResult } from './types.js'

// ============================================================================
// Init
// ============================================================================

export const GITIGNORE_ENTRIES = [CONFIG_LOCAL_FILE, LOCK_FILE]

export interface InitOptions extends SnapshotOptions {
  runner?: CommandRunner
}

export interface InitResult {
  repoRoot: string
  configCreated: boolean
  /** Bundled manifests copied into plugins/ */
  manifests: string[]
  /** Fragments copied from live/ into state/ */
  seeded: string[]
  git: GitResult
  snapshot: SnapshotResult
}

/**
 * Copy bundled manifests into <repo>/plugins, replacing same-named directories
 */
export function installBundledManifests(repoRoot: string): string[] {
  const source = getTemplatePluginsDir()
  if (!fs.existsSync(source)) return []

  const installed: string[] = []
  const dirs = fs.readdirSync(source, { withFileTypes: true }).filter(e => e.isDirectory()).map(e => e.name).sort()
  for (const dir of dirs) {
    const dest = path.join(getPluginsDir(repoRoot), dir)
    fs.rmSync(dest, { recursive: true, force: true })
    fs.cpSync(path.join(source, dir), dest, { recursive: true })
    installed.push(dir)
  }
  return installed
}

export function installBundledSchemas(repoRoot: string): string[] {
  const source = getTemplateSchemaDir()
  if (!fs.existsSync(source)) return []

  const schemas = fs.readdirSync(source).filter(name => name.endsWith('.json')).sort()
  for (const name of schemas) {
    fs.copyFileSync(path.join(source, name), path.join(getSchemaDir(repoRoot), name))
  }
  return schemas
}

/**
 * Ensure .gitignore lists the local-only files, keeping existing lines
 */
export function ensureGitignore(repoRoot: string): void {
  const gitignorePath = path.join(repoRoot, '.gitignore')
  const existing = fs.existsSync(gitignorePath) ? fs.readFileSync(gitignorePath, 'utf-8') : ''
  const lines = existing.split('\n').map(line => line.trim())
  const missing = GITIGNORE_ENTRIES.filter(entry => !lines.includes(entry))
  if (missing.length === 0) return

  const prefix = existing && !existing.endsWith('\n') ? `${existing}\n` : existing
  fs.writeFileSync(gitignorePath, `${prefix}${missing.join('\n')}\n`, 'utf-8')
}

/**
 * Copy live/ documents into state/ for fragments that have no desired state yet
 */
export function seedStateFromLive(repoRoot: string): string[] {
  const existing = new Set(listDocuments(getStateDir(repoRoot)))
  const seeded: string[] = []
  for (const fragment of listDocuments(getLiveDir(repoRoot))) {
    if (existing.has(fragment)) continue
    fs.copyFileSync(
      path.join(getLiveDir(repoRoot), `${fragment}${DOCUMENT_EXT}`),
      path.join(getStateDir(repoRoot), `${fragment}${DOCUMENT_EXT}`)
    )
    seeded.push(fragment)
  }
  return seeded
}

export function initRepository(repoRoot: string, options: InitOptions = {}): InitResult {
  const runner = options.runner ?? runCommand

  ensureRepoLayout(repoRoot)
  const manifests = installBundledManifests(repoRoot)
  installBundledSchemas(repoRoot)
  const configCreated = ensureConfig(repoRoot)
  ensureGitignore(repoRoot)
  const git = gitInit(repoRoot, runner)

  const snapshot = runSnapshot(repoRoot, options)
  const seeded = seedStateFromLive(repoRoot)

  return { repoRoot, configCreated, manifests, seeded, git, snapshot }
}

// ============================================================================
// Version store
// ============================================================================

export interface CommitOptions {
  push?: boolean
  now?: Date
  runner?: CommandRunner
}

export interface CommitResult {
  message: string
  commit: GitResult
  push?: GitResult
}

function remoteOf(config: DevtwinConfig): { name: string; branch: string } {
  return {
    name: config.remote?.name || 'origin',
    branch: config.remote?.branch || 'main'
  }
}

/**
 * Stage everything and commit "snapshot <timestamp>", optionally pushing
 */
export function commitSnapshot(repoRoot: string, options: CommitOptions = {}): CommitResult {
  const runner = options.runner ?? runCommand
  const message = `snapshot ${formatTimestamp(options.now)}`

  const added = gitAddAll(repoRoot, runner)
  if (!added.success) {
    return { message, commit: added }
  }

  const commit = gitCommit(repoRoot, message, runner)
  if (!options.push || !commit.success) {
    return { message, commit }
  }

  return { message, commit, push: pushRepository(repoRoot, runner) }
}

/**
 * git may echo the credential-bearing remote URL
 */
function redacted(result: GitResult): GitResult {
  return { ...result, message: redactRemoteUrl(result.message) }
}

export function pushRepository(repoRoot: string, runner: CommandRunner = runCommand): GitResult {
  const { name, branch } = remoteOf(loadConfig(repoRoot))
  return redacted(gitPush(repoRoot, name, branch, runner))
}

export function pullRepository(repoRoot: string, runner: CommandRunner = runCommand): GitResult {
  const { name, branch } = remoteOf(loadConfig(repoRoot))
  return redacted(gitPull(repoRoot, name, branch, runner))
}

export function getHistory(repoRoot: string, limit = 20, runner: CommandRunner = runCommand): GitLogEntry[] {
  return gitLog(repoRoot, limit, runner)
}

export function resetRepository(repoRoot: string, commit: string, runner: CommandRunner = runCommand): GitResult {
  return gitResetHard(repoRoot, commit, runner)
}

// ============================================================================
// Remote setup
// ============================================================================

export interface RemoteOptions {
  user: string
  repo: string
  token?: string
  host?: string
  name?: string
  runner?: CommandRunner
}

/**
 * Point the repository at https://<user>:<token>@<host>/<user>/<repo>.git on
 * branch main. user/repo/host go to config.yaml, the token to config.local.yaml.
 */
export function setupRemote(repoRoot: string, options: RemoteOptions): GitResult {
  const runner = options.runner ?? runCommand
  const config = loadConfig(repoRoot)
  const name = options.name || config.remote?.name || 'origin'
  const host = options.host || config.remote?.host || 'github.com'
  const token = options.token ?? config.remote?.token

  const url = buildRemoteUrl({ user: options.user, token, repo: options.repo, host })
  const added = gitRemoteAdd(repoRoot, name, url, runner)
  if (!added.success) {
    return { success: false, message: redactRemoteUrl(added.message) }
  }

  // unborn branches can fail to rename; the push names the branch anyway
  gitSetBranch(repoRoot, 'main', runner)

  saveConfig(repoRoot, {
    ...config,
    remote: { ...config.remote, name, host, branch: 'main', user: options.user, repo: options.repo }
  })
  if (options.token) {
    saveLocalConfig(repoRoot, { remote: { token: options.token } })
  }

  return { success: true, message: `remote ${name} → ${redactRemoteUrl(url)}` }
}
