/**
 * devtwin Plan Engine
 *
 * For each enabled config provider and each fragment it owns, compares the
 * desired document (state/) with the observed one (live/) and collects the
 * provider's corrective actions into plan/latest.
 */

import type { Document } from '../types.js'
import { documentList, dumpDocument, isDocument, loadDocument } from '../lib/documents.js'
import { getLivePath, getPlanPath, getStatePath } from '../lib/paths.js'
import { prepareRun, type EngineOptions } from './engine.js'
import type { Action, PlanDocument, PlanResult, PlanSummary } from './types.js'

// ============================================================================
// Plan document helpers
// ============================================================================

/**
 * Narrow a mapping into an Action (needs a string `op`)
 */
export function toAction(value: Document): Action | null {
  const op = value.op
  if (typeof op !== 'string' || !op) return null
  return { ...value, op }
}

/**
 * Read a loaded document as a plan; non-list entries and items without an
 * `op` are dropped.
 */
export function toPlanDocument(data: Document): PlanDocument {
  const plan: PlanDocument = {}
  for (const [provider, value] of Object.entries(data)) {
    plan[provider] = documentList(value)
      .map(toAction)
      .filter((action): action is Action => action !== null)
  }
  return plan
}

export function readLatestPlan(repoRoot: string): PlanDocument {
  return toPlanDocument(loadDocument(getPlanPath(repoRoot)))
}

export function summarizePlan(plan: PlanDocument): PlanSummary {
  const providers = Object.entries(plan).map(([provider, actions]) => ({
    provider,
    actions: actions.length
  }))
  return {
    providers,
    total: providers.reduce((sum, p) => sum + p.actions, 0)
  }
}

/**
 * Fragment payload from a wrapped document; missing ⇒ {}
 */
export function fragmentPayload(data: Document, fragment: string): Document {
  const payload = data[fragment]
  return isDocument(payload) ? payload : {}
}

// ============================================================================
// Plan computation
// ============================================================================

export function computePlan(repoRoot: string, options: EngineOptions = {}): PlanResult {
  const run = prepareRun(repoRoot, options)
  const plan: PlanDocument = {}

  for (const { manifest, instance } of run.configProviders()) {
    for (const fragment of manifest.provides.state_fragments) {
      const desired = fragmentPayload(loadDocument(getStatePath(repoRoot, fragment)), fragment)
      const live = fragmentPayload(loadDocument(getLivePath(repoRoot, fragment)), fragment)
      const entries = instance.plan({ [fragment]: desired }, { [fragment]: live })
      Object.assign(plan, entries)
    }
  }

  const planPath = getPlanPath(repoRoot)
  dumpDocument(planPath, plan)

  return { plan, summary: summarizePlan(plan), planPath }
}
