/**
 * devtwin Domain Types
 *
 * Provider contract, manifests, plans and the records produced by the
 * snapshot/plan/apply/status engines.
 */

import type { Document, DocumentValue, DevtwinConfig } from '../types.js'

// ============================================================================
// Context
// ============================================================================

/**
 * Per-run context handed to every provider. Built fresh for each operation.
 */
export interface TwinContext {
  readonly repoRoot: string
  readonly config: Readonly<DevtwinConfig>
}

// ============================================================================
// Manifests
// ============================================================================

export type ProviderKind = 'config' | 'logs'

export const PROVIDER_KINDS: readonly ProviderKind[] = ['config', 'logs']

export interface ProviderManifest {
  /** Unique provider key, e.g. "services.systemd" */
  name: string
  kind: ProviderKind
  provides: {
    /** Fragments owned exclusively by this provider, in order */
    state_fragments: string[]
  }
  /** Advisory; never used for ordering */
  dependencies: string[]
  /** Registration-table key (defaults to name) */
  entrypoint: string
  description?: string
  /** Directory the manifest was read from */
  manifestPath: string
}

// ============================================================================
// Plans
// ============================================================================

/**
 * One corrective operation. Only `op` is read by the engine; the rest is
 * interpreted by the owning provider.
 */
export interface Action {
  op: string
  [field: string]: DocumentValue
}

/**
 * provider name → ordered actions
 */
export type PlanDocument = Record<string, Action[]>

export interface ActionOutcome {
  action: Action
  ok: boolean
  message?: string
}

// ============================================================================
// Provider contract
// ============================================================================

export interface ConfigProvider {
  detect(context: TwinContext): boolean
  /** fragment name → payload */
  dumpState(context: TwinContext): Document
  /**
   * Inputs are wrapped under the fragment key: `{ [fragment]: payload }`.
   * Returns `{ [providerName]: actions }`.
   */
  plan(desired: Document, live: Document): PlanDocument
  apply(actions: Action[], context: TwinContext): ActionOutcome[]
  /** Non-fatal problems from the last dumpState, cleared on read */
  takeWarnings?(): string[]
}

export interface LogsProvider {
  detect(context: TwinContext): boolean
  /** log key → payload, merged into logs/current/index */
  dumpLogs(context: TwinContext): Document
}

/**
 * Base for config providers: available everywhere unless overridden.
 */
export abstract class BaseConfigProvider implements ConfigProvider {
  abstract readonly name: string

  detect(_context: TwinContext): boolean {
    return true
  }

  abstract dumpState(context: TwinContext): Document
  abstract plan(desired: Document, live: Document): PlanDocument
  abstract apply(actions: Action[], context: TwinContext): ActionOutcome[]
}

export abstract class BaseLogsProvider implements LogsProvider {
  abstract readonly name: string

  detect(_context: TwinContext): boolean {
    return true
  }

  abstract dumpLogs(context: TwinContext): Document
}

export interface LoadedProvider<T> {
  manifest: ProviderManifest
  instance: T
}

// ============================================================================
// Log index
// ============================================================================

export const PLAN_EXECUTION_KEY = 'plan_execution'

export interface ExecutionRecord {
  provider: string
  actions: Action[]
  appliedAt: string
}

// ============================================================================
// Engine results
// ============================================================================

export interface ProviderFailure {
  provider: string
  operation: string
  message: string
}

export interface ProviderWarning {
  provider: string
  message: string
}

export interface SnapshotResult {
  /** Fragments written to live/ */
  fragments: string[]
  /** Keys merged into logs/current/index */
  logKeys: string[]
  /** Directory logs/current was rotated to, when it had content */
  rotatedTo: string | null
  failures: ProviderFailure[]
  warnings: ProviderWarning[]
}

export interface PlanSummary {
  providers: Array<{ provider: string; actions: number }>
  total: number
}

export interface PlanResult {
  plan: PlanDocument
  summary: PlanSummary
  planPath: string
}

export interface ProviderApplyResult {
  provider: string
  actions: Action[]
  outcomes: ActionOutcome[]
}

export interface ApplyResult {
  /** Plan had no actions; nothing was called or written */
  noop: boolean
  dryRun: boolean
  applied: ProviderApplyResult[]
  /** Plan entries whose provider is no longer enabled or present */
  skipped: string[]
  failures: ProviderFailure[]
  /** Archived copy under plan/history, when anything ran */
  archivedTo: string | null
}

/**
 * fragment → drift (true = state/ and live/ differ)
 */
export type StatusReport = Record<string, boolean>
