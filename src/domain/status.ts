/**
 * devtwin Status
 *
 * Drift per fragment: state/<f> compared with live/<f> by structural
 * equality, ignoring mapping key order.
 */

import type { DocumentValue } from '../types.js'
import { listDocuments, loadDocument } from '../lib/documents.js'
import { getLivePath, getStateDir, getStatePath } from '../lib/paths.js'
import type { StatusReport } from './types.js'

export function deepEqual(a: DocumentValue | undefined, b: DocumentValue | undefined): boolean {
  if (a === b) return true
  if (a === null || b === null || a === undefined || b === undefined) return false
  if (typeof a !== 'object' || typeof b !== 'object') return false

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    return a.every((item, i) => deepEqual(item, b[i]))
  }

  const keysA = Object.keys(a)
  const keysB = Object.keys(b)
  if (keysA.length !== keysB.length) return false
  return keysA.every(key => Object.hasOwn(b, key) && deepEqual(a[key], b[key]))
}

export function computeStatus(repoRoot: string): StatusReport {
  const report: StatusReport = {}
  for (const fragment of listDocuments(getStateDir(repoRoot))) {
    const desired = loadDocument(getStatePath(repoRoot, fragment))
    const live = loadDocument(getLivePath(repoRoot, fragment))
    report[fragment] = !deepEqual(desired, live)
  }
  return report
}

export function driftedFragments(report: StatusReport): string[] {
  return Object.entries(report).filter(([, drift]) => drift).map(([name]) => name)
}
