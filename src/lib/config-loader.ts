/**
 * devtwin Config Loader
 *
 * Loads <repo>/config.yaml merged over defaults, then <repo>/config.local.yaml
 * (credentials and host-only overrides, gitignored).
 */

import fs from 'node:fs'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import type { DevtwinConfig } from '../types.js'
import { InvalidConfigError } from './errors.js'
import { isRecord } from './documents.js'
import { expandHome, getConfigPath, getLocalConfigPath } from './paths.js'

export const DEFAULT_ENABLED_PROVIDERS = [
  'packages.debian',
  'services.systemd',
  'files.mirror',
  'cron.user',
  'logs.systemd_journal',
  'logs.files'
]

export const DEFAULT_PLAN_EXECUTION_LIMIT = 200

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: DevtwinConfig = {
  version: '1',
  providers: {
    enable: [...DEFAULT_ENABLED_PROVIDERS]
  },
  files: {
    roots: [],
    max_size_mb: 1
  },
  logs: {
    plan_execution_limit: DEFAULT_PLAN_EXECUTION_LIMIT,
    journal_lines: 200,
    paths: []
  },
  remote: {
    name: 'origin',
    branch: 'main',
    host: 'github.com'
  }
}

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
function expandEnvVars(str: string): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return process.env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return process.env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return process.env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item))
  }

  if (isRecord(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item)
    }
    return result
  }

  return value
}

/**
 * Deep merge plain objects; arrays and scalars from source replace target
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined && sourceValue !== null) {
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Load a single raw config file
 */
function loadConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigError(err instanceof Error ? err.message : String(err), configPath, err)
  }

  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  const expanded = expandEnvVarsInValue(parsed)
  return isRecord(expanded) ? expanded : {}
}

// ============================================================================
// Normalization
// ============================================================================

function stringList(value: unknown, field: string, configPath: string): string[] | undefined {
  if (value === undefined || value === null) return undefined
  if (!Array.isArray(value) || value.some(item => typeof item !== 'string')) {
    throw new InvalidConfigError(`${field} must be a list of strings`, configPath)
  }
  return value.filter((item): item is string => typeof item === 'string')
}

function optionalNumber(value: unknown, field: string, configPath: string): number | undefined {
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new InvalidConfigError(`${field} must be a non-negative number`, configPath)
  }
  return value
}

function optionalString(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined
  return String(value)
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key]
  return isRecord(value) ? value : {}
}

/**
 * Turn a merged raw mapping into a typed config
 */
export function normalizeConfig(raw: Record<string, unknown>, configPath: string = 'config.yaml'): DevtwinConfig {
  const providers = section(raw, 'providers')
  const files = section(raw, 'files')
  const logs = section(raw, 'logs')
  const remote = section(raw, 'remote')

  return {
    version: '1',
    providers: {
      enable: stringList(providers.enable, 'providers.enable', configPath) ?? [...DEFAULT_ENABLED_PROVIDERS]
    },
    files: {
      roots: stringList(files.roots, 'files.roots', configPath) ?? [],
      max_size_mb: optionalNumber(files.max_size_mb, 'files.max_size_mb', configPath)
    },
    logs: {
      plan_execution_limit: optionalNumber(logs.plan_execution_limit, 'logs.plan_execution_limit', configPath),
      journal_lines: optionalNumber(logs.journal_lines, 'logs.journal_lines', configPath),
      paths: stringList(logs.paths, 'logs.paths', configPath) ?? []
    },
    remote: {
      name: optionalString(remote.name),
      branch: optionalString(remote.branch),
      host: optionalString(remote.host),
      user: optionalString(remote.user),
      repo: optionalString(remote.repo),
      token: optionalString(remote.token)
    }
  }
}

/**
 * Load configuration for a repository.
 * Missing config.yaml ⇒ defaults.
 */
export function loadConfig(repoRoot: string): DevtwinConfig {
  const configPath = getConfigPath(repoRoot)
  const defaults = toRawConfig(DEFAULT_CONFIG)

  let merged = deepMerge(defaults, loadConfigFile(configPath))
  const local = loadConfigFile(getLocalConfigPath(repoRoot))
  if (Object.keys(local).length > 0) {
    merged = deepMerge(merged, local)
  }

  return normalizeConfig(merged, configPath)
}

function toRawConfig(config: DevtwinConfig): Record<string, unknown> {
  const raw: unknown = JSON.parse(JSON.stringify(config))
  return isRecord(raw) ? raw : {}
}

/**
 * Write config.yaml. Credentials are never written here; see saveLocalConfig.
 */
export function saveConfig(repoRoot: string, config: DevtwinConfig): void {
  const { remote, ...rest } = config
  const publicRemote = remote ? { ...remote, token: undefined } : undefined
  const content = stringifyYaml(toRawConfig({ ...rest, remote: publicRemote }))
  fs.mkdirSync(repoRoot, { recursive: true })
  fs.writeFileSync(getConfigPath(repoRoot), `# devtwin configuration\n${content}`, 'utf-8')
}

/**
 * Merge values into config.local.yaml
 */
export function saveLocalConfig(repoRoot: string, values: Record<string, unknown>): void {
  const localPath = getLocalConfigPath(repoRoot)
  const merged = deepMerge(loadConfigFile(localPath), values)
  fs.mkdirSync(repoRoot, { recursive: true })
  fs.writeFileSync(localPath, stringifyYaml(merged), { encoding: 'utf-8', mode: 0o600 })
}

/**
 * Create config.yaml with defaults when it does not exist
 */
export function ensureConfig(repoRoot: string): boolean {
  if (fs.existsSync(getConfigPath(repoRoot))) return false
  saveConfig(repoRoot, DEFAULT_CONFIG)
  return true
}

export function isProviderEnabled(config: DevtwinConfig, name: string): boolean {
  return config.providers.enable.includes(name)
}

export function getFilesystemRoots(config: DevtwinConfig): string[] {
  return (config.files?.roots ?? []).map(expandHome)
}

export function setFilesystemRoots(repoRoot: string, roots: string[]): DevtwinConfig {
  const config = loadConfig(repoRoot)
  const updated: DevtwinConfig = {
    ...config,
    files: { ...config.files, roots: [...roots] }
  }
  saveConfig(repoRoot, updated)
  return updated
}

export function getPlanExecutionLimit(config: DevtwinConfig): number {
  return config.logs?.plan_execution_limit ?? DEFAULT_PLAN_EXECUTION_LIMIT
}

/**
 * Human-readable config (token masked)
 */
export function formatConfig(config: DevtwinConfig): string {
  const token = config.remote?.token
  const display = {
    ...config,
    remote: config.remote ? { ...config.remote, token: token ? maskToken(token) : undefined } : undefined
  }
  return stringifyYaml(toRawConfig(display))
}

function maskToken(value: string): string {
  if (value.length <= 4) return '****'
  return value.slice(0, 2) + '****' + value.slice(-2)
}
