/**
 * devtwin Plan Execution Engine
 *
 * Replays plan/latest through the owning config providers and appends an
 * execution record per provider to the plan_execution list of the log index.
 *
 * - Entries whose provider is no longer loaded are skipped (stale plan).
 * - Provider entries with no actions are ignored.
 * - A provider that throws is recorded as a failure; the loop continues.
 * - Convergence is not re-verified; run snapshot + status for that.
 */

import path from 'node:path'
import type { Document, DocumentValue } from '../types.js'
import { DOCUMENT_EXT, documentList, dumpDocument, loadDocument } from '../lib/documents.js'
import { getPlanExecutionLimit } from '../lib/config-loader.js'
import { formatTimestamp, getLogIndexPath, getPlanHistoryDir } from '../lib/paths.js'
import { captureFailure, prepareRun, type EngineOptions } from './engine.js'
import { readLatestPlan, summarizePlan } from './plan.js'
import type {
  ActionOutcome,
  ApplyResult,
  ConfigProvider,
  ExecutionRecord,
  PlanDocument,
  ProviderApplyResult,
  ProviderFailure
} from './types.js'
import { PLAN_EXECUTION_KEY } from './types.js'

// ============================================================================
// Types
// ============================================================================

export interface ExecutePlanOptions extends EngineOptions {
  /** Report what would run without calling providers or writing */
  dryRun?: boolean
  /** Clock for appliedAt and the archive name */
  now?: Date
}

// ============================================================================
// Execution log
// ============================================================================

function recordToDocument(record: ExecutionRecord): Document {
  return {
    provider: record.provider,
    actions: record.actions,
    appliedAt: record.appliedAt
  }
}

/**
 * Append records to logs/current/index plan_execution, keeping the newest `limit`
 */
export function appendExecutionRecords(repoRoot: string, records: ExecutionRecord[], limit: number): DocumentValue[] {
  const indexPath = getLogIndexPath(repoRoot)
  const index = loadDocument(indexPath)

  const combined: DocumentValue[] = [
    ...documentList(index[PLAN_EXECUTION_KEY]),
    ...records.map(recordToDocument)
  ]
  const kept = limit > 0 ? combined.slice(-limit) : []

  index[PLAN_EXECUTION_KEY] = kept
  dumpDocument(indexPath, index)
  return kept
}

function archivePlan(repoRoot: string, plan: PlanDocument, now: Date): string {
  const archivePath = path.join(getPlanHistoryDir(repoRoot), `${formatTimestamp(now)}${DOCUMENT_EXT}`)
  dumpDocument(archivePath, plan)
  return archivePath
}

// ============================================================================
// Plan execution
// ============================================================================

export function executePlan(repoRoot: string, options: ExecutePlanOptions = {}): ApplyResult {
  const { dryRun = false } = options
  const now = options.now ?? new Date()
  const plan = readLatestPlan(repoRoot)

  const result: ApplyResult = {
    noop: false,
    dryRun,
    applied: [],
    skipped: [],
    failures: [],
    archivedTo: null
  }

  if (summarizePlan(plan).total === 0) {
    return { ...result, noop: true }
  }

  const run = prepareRun(repoRoot, options)
  const providers = new Map<string, ConfigProvider>()
  for (const { manifest, instance } of run.configProviders()) {
    providers.set(manifest.name, instance)
  }

  const records: ExecutionRecord[] = []
  const failures: ProviderFailure[] = []

  for (const [name, actions] of Object.entries(plan)) {
    if (actions.length === 0) continue

    const provider = providers.get(name)
    if (!provider) {
      result.skipped.push(name)
      continue
    }

    if (dryRun) {
      result.applied.push({ provider: name, actions, outcomes: [] })
      continue
    }

    let outcomes: ActionOutcome[]
    try {
      outcomes = provider.apply(actions, run.context)
    } catch (err) {
      failures.push(captureFailure(name, 'apply', err))
      continue
    }

    const applied: ProviderApplyResult = { provider: name, actions, outcomes }
    result.applied.push(applied)
    records.push({ provider: name, actions, appliedAt: now.toISOString() })
  }

  result.failures = failures

  if (!dryRun && records.length > 0) {
    appendExecutionRecords(repoRoot, records, getPlanExecutionLimit(run.context.config))
    result.archivedTo = archivePlan(repoRoot, plan, now)
  }

  return result
}

/**
 * Outcomes that did not succeed, across providers
 */
export function failedOutcomes(result: ApplyResult): Array<{ provider: string; outcome: ActionOutcome }> {
  return result.applied.flatMap(entry =>
    entry.outcomes
      .filter(outcome => !outcome.ok)
      .map(outcome => ({ provider: entry.provider, outcome }))
  )
}
