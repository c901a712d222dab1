/**
 * devtwin Types
 */

// ============================================================================
// Documents
// ============================================================================

/**
 * Any value a YAML document can hold
 */
export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | { [key: string]: DocumentValue }

/**
 * A top-level document: always a mapping
 */
export type Document = Record<string, DocumentValue>

// ============================================================================
// Configuration
// ============================================================================

export interface ProvidersConfig {
  /** Provider names to load, in no particular order (load order is discovery order) */
  enable: string[]
}

export interface FilesConfig {
  /** Directories mirrored by files.mirror */
  roots?: string[]
  /** Files above this size are skipped */
  max_size_mb?: number
}

export interface LogsConfig {
  /** Newest plan_execution records kept in the log index */
  plan_execution_limit?: number
  /** Lines captured by logs.systemd_journal */
  journal_lines?: number
  /** Log files summarized by logs.files */
  paths?: string[]
}

export interface RemoteConfig {
  name?: string
  branch?: string
  host?: string
  user?: string
  repo?: string
  /** Kept in config.local.yaml */
  token?: string
}

export interface DevtwinConfig {
  version: '1'
  providers: ProvidersConfig
  files?: FilesConfig
  logs?: LogsConfig
  remote?: RemoteConfig
}

// ============================================================================
// CLI
// ============================================================================

export interface CLIArgs {
  _: string[]
  // Global flags
  repo?: string
  verbose?: boolean
  quiet?: boolean
  json?: boolean
  // Command flags
  'dry-run'?: boolean
  yes?: boolean
  commit?: boolean
  push?: boolean
  limit?: number
  user?: string
  token?: string
  name?: string
  host?: string
}
