/**
 * devtwin Repository Paths
 *
 * Canonical layout of a device repository:
 *
 *   <repo>/config.yaml
 *   <repo>/config.local.yaml
 *   <repo>/state/<fragment>.yaml
 *   <repo>/live/<fragment>.yaml
 *   <repo>/plan/latest.yaml
 *   <repo>/plan/history/<timestamp>.yaml
 *   <repo>/logs/current/index.yaml
 *   <repo>/logs/<timestamp>/
 *   <repo>/plugins/<name>/plugin.yaml
 *   <repo>/schema/*.json
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { DOCUMENT_EXT } from './documents.js'
import { RepositoryLayoutError } from './errors.js'

export const DEFAULT_REPO_NAME = 'devtwin-device'
export const CONFIG_FILE = 'config.yaml'
export const CONFIG_LOCAL_FILE = 'config.local.yaml'
export const MANIFEST_FILE = 'plugin.yaml'
export const LOCK_FILE = '.devtwin.lock'
export const LOG_INDEX = 'index'
export const PLAN_LATEST = 'latest'

/**
 * Resolve the repository root: explicit value, then DEVTWIN_REPO, then ~/devtwin-device
 */
export function resolveRepoRoot(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return path.resolve(expandHome(explicit))
  if (env.DEVTWIN_REPO) return path.resolve(expandHome(env.DEVTWIN_REPO))
  return path.join(os.homedir(), DEFAULT_REPO_NAME)
}

export function expandHome(p: string): string {
  if (p === '~') return os.homedir()
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2))
  return p
}

export const getConfigPath = (repoRoot: string) => path.join(repoRoot, CONFIG_FILE)
export const getLocalConfigPath = (repoRoot: string) => path.join(repoRoot, CONFIG_LOCAL_FILE)
export const getStateDir = (repoRoot: string) => path.join(repoRoot, 'state')
export const getLiveDir = (repoRoot: string) => path.join(repoRoot, 'live')
export const getLogsDir = (repoRoot: string) => path.join(repoRoot, 'logs')
export const getLogsCurrentDir = (repoRoot: string) => path.join(getLogsDir(repoRoot), 'current')
export const getPlanDir = (repoRoot: string) => path.join(repoRoot, 'plan')
export const getPlanHistoryDir = (repoRoot: string) => path.join(getPlanDir(repoRoot), 'history')
export const getPluginsDir = (repoRoot: string) => path.join(repoRoot, 'plugins')
export const getSchemaDir = (repoRoot: string) => path.join(repoRoot, 'schema')
export const getLockPath = (repoRoot: string) => path.join(repoRoot, LOCK_FILE)

export function getStatePath(repoRoot: string, fragment: string): string {
  return path.join(getStateDir(repoRoot), `${fragment}${DOCUMENT_EXT}`)
}

export function getLivePath(repoRoot: string, fragment: string): string {
  return path.join(getLiveDir(repoRoot), `${fragment}${DOCUMENT_EXT}`)
}

export function getPlanPath(repoRoot: string): string {
  return path.join(getPlanDir(repoRoot), `${PLAN_LATEST}${DOCUMENT_EXT}`)
}

export function getLogIndexPath(repoRoot: string): string {
  return path.join(getLogsCurrentDir(repoRoot), `${LOG_INDEX}${DOCUMENT_EXT}`)
}

/**
 * UTC timestamp used for rotated logs and archived plans: YYYY-MM-DDTHH-MM-SSZ
 */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/:/g, '-')
}

/**
 * Create the canonical directory layout (idempotent)
 */
export function ensureRepoLayout(repoRoot: string): string {
  const dirs = [
    repoRoot,
    getStateDir(repoRoot),
    getLiveDir(repoRoot),
    getLogsCurrentDir(repoRoot),
    getPlanHistoryDir(repoRoot),
    getPluginsDir(repoRoot),
    getSchemaDir(repoRoot)
  ]

  for (const dir of dirs) {
    try {
      fs.mkdirSync(dir, { recursive: true })
    } catch (err) {
      throw new RepositoryLayoutError(repoRoot, `cannot create ${dir}`, err)
    }
  }

  return repoRoot
}

// ============================================================================
// Bundled templates
// ============================================================================

/**
 * Directory holding bundled provider manifests and schemas.
 * Resolved from this module: src/lib → ../../templates (and dist/lib alike).
 */
export function getTemplatesDir(): string {
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'templates')
}

export const getTemplatePluginsDir = () => path.join(getTemplatesDir(), 'plugins')
export const getTemplateSchemaDir = () => path.join(getTemplatesDir(), 'schema')
