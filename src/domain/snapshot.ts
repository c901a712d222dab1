/**
 * devtwin Snapshot Engine
 *
 * Captures live state from every enabled config provider into live/ and log
 * summaries from every enabled logs provider into logs/current/index.
 * A provider that throws is recorded and skipped; the others still run.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { Document } from '../types.js'
import { dumpDocument } from '../lib/documents.js'
import {
  ensureRepoLayout,
  formatTimestamp,
  getLivePath,
  getLogIndexPath,
  getLogsCurrentDir,
  getLogsDir
} from '../lib/paths.js'
import { captureFailure, prepareRun, type EngineOptions } from './engine.js'
import type { ProviderFailure, ProviderWarning, SnapshotResult } from './types.js'

export interface SnapshotOptions extends EngineOptions {
  /** Clock for the rotation directory name */
  now?: Date
}

/**
 * Move a non-empty logs/current to logs/<timestamp>, replacing any directory
 * of that name, and recreate an empty logs/current.
 */
export function rotateLogs(repoRoot: string, now: Date = new Date()): string | null {
  const current = getLogsCurrentDir(repoRoot)
  let rotatedTo: string | null = null

  if (fs.existsSync(current) && fs.readdirSync(current).length > 0) {
    const dest = path.join(getLogsDir(repoRoot), formatTimestamp(now))
    fs.rmSync(dest, { recursive: true, force: true })
    fs.renameSync(current, dest)
    rotatedTo = dest
  }

  fs.mkdirSync(current, { recursive: true })
  return rotatedTo
}

export function runSnapshot(repoRoot: string, options: SnapshotOptions = {}): SnapshotResult {
  ensureRepoLayout(repoRoot)
  const run = prepareRun(repoRoot, options)

  const rotatedTo = rotateLogs(repoRoot, options.now)
  const failures: ProviderFailure[] = []
  const warnings: ProviderWarning[] = []
  const fragments: string[] = []

  for (const { manifest, instance } of run.configProviders()) {
    let payload: Document
    try {
      payload = instance.dumpState(run.context)
    } catch (err) {
      failures.push(captureFailure(manifest.name, 'dumpState', err))
      continue
    }
    for (const message of instance.takeWarnings?.() ?? []) {
      warnings.push({ provider: manifest.name, message })
    }

    for (const fragment of manifest.provides.state_fragments) {
      dumpDocument(getLivePath(repoRoot, fragment), { [fragment]: payload[fragment] ?? {} })
      fragments.push(fragment)
    }
  }

  const index: Document = {}
  for (const { manifest, instance } of run.logsProviders()) {
    try {
      Object.assign(index, instance.dumpLogs(run.context))
    } catch (err) {
      failures.push(captureFailure(manifest.name, 'dumpLogs', err))
    }
  }

  const logKeys = Object.keys(index)
  if (logKeys.length > 0) {
    dumpDocument(getLogIndexPath(repoRoot), index)
  }

  return { fragments, logKeys, rotatedTo, failures, warnings }
}
