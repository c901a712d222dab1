/**
 * devtwin CLI - Snapshot Command
 *
 * Usage:
 *   devtwin snapshot                 Capture live state and logs
 *   devtwin snapshot --commit        ...and commit the repository
 *   devtwin snapshot --push          ...commit and push
 */

import { runSnapshot } from '../../domain/snapshot.js'
import { commitSnapshot } from '../../domain/repository.js'
import { withRepoLock } from '../../lib/lock.js'
import { ensureRepoLayout } from '../../lib/paths.js'
import { c, print } from '../lib/colors.js'
import { formatFailure, formatWarning } from '../lib/format.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

export async function runSnapshotCommand(context: CommandContext): Promise<ExitCode> {
  const { args, repoRoot, verbose, jsonOutput } = context
  const push = args.push === true
  const commit = push || args.commit === true

  ensureRepoLayout(repoRoot)
  const { snapshot, committed } = withRepoLock(repoRoot, () => {
    const snapshot = runSnapshot(repoRoot)
    const committed = commit ? commitSnapshot(repoRoot, { push }) : null
    return { snapshot, committed }
  })

  const gitFailed = committed !== null && (!committed.commit.success || committed.push?.success === false)

  if (jsonOutput) {
    ui.outputJson({ ...snapshot, git: committed })
    return gitFailed ? 1 : 0
  }

  if (snapshot.rotatedTo) {
    ui.verbose(`rotated logs/current → ${snapshot.rotatedTo}`, verbose)
  }
  for (const failure of snapshot.failures) {
    print.warning(formatFailure(failure))
  }
  for (const warning of snapshot.warnings) {
    print.warning(formatWarning(warning))
  }

  print.success(`Snapshot: ${snapshot.fragments.length} fragment(s), ${snapshot.logKeys.length} log key(s)`)
  for (const fragment of snapshot.fragments) {
    ui.log(`  ${c.fragment(fragment)}`)
  }

  if (committed) {
    if (committed.commit.success) {
      print.success(`Committed: ${committed.commit.message || committed.message}`)
    } else {
      print.error(`Commit failed: ${committed.commit.message}`)
    }
    if (committed.push) {
      if (committed.push.success) print.success('Pushed')
      else print.error(`Push failed: ${committed.push.message}`)
    }
  }

  return gitFailed ? 1 : 0
}
