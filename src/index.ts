/**
 * devtwin
 *
 * Device-state reconciliation: snapshot live host state, diff it against a
 * desired state kept in git, plan and apply corrective actions.
 *
 * @example
 * ```ts
 * import { runSnapshot, computePlan, executePlan } from 'devtwin'
 *
 * runSnapshot('/home/me/devtwin-device')
 * const { summary } = computePlan('/home/me/devtwin-device')
 * if (summary.total > 0) executePlan('/home/me/devtwin-device')
 * ```
 */

export * from './domain/index.js'
export * from './providers/index.js'

export type { Document, DocumentValue, DevtwinConfig, ProvidersConfig, FilesConfig, LogsConfig, RemoteConfig } from './types.js'

export { loadConfig, saveConfig, formatConfig, getFilesystemRoots, setFilesystemRoots, DEFAULT_CONFIG } from './lib/config-loader.js'
export { loadDocument, dumpDocument, parseDocument, formatDocument } from './lib/documents.js'
export { resolveRepoRoot, ensureRepoLayout } from './lib/paths.js'
export { acquireRepoLock, withRepoLock } from './lib/lock.js'
export { runCommand, checkDependencies, commandExists } from './lib/exec.js'
export type { CommandRunner, CommandResult } from './lib/exec.js'
export type { GitResult, GitLogEntry } from './lib/git.js'

export {
  DevtwinError,
  ConfigError,
  InvalidConfigError,
  ProviderError,
  ProviderConstructionError,
  ProviderRuntimeError,
  InvalidManifestError,
  FragmentOwnershipError,
  RepositoryError,
  RepositoryLayoutError,
  RepositoryLockedError,
  InvalidDocumentError,
  OperationError,
  ExternalCommandError,
  isDevtwinError,
  formatErrorForCli
} from './lib/errors.js'
