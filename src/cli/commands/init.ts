/**
 * devtwin CLI - Init Command
 *
 * Creates the device repository, installs bundled manifests and schemas,
 * takes a first snapshot and seeds state/ from it.
 */

import { initRepository } from '../../domain/repository.js'
import { withRepoLock } from '../../lib/lock.js'
import { ensureRepoLayout } from '../../lib/paths.js'
import { c, print } from '../lib/colors.js'
import { formatFailure, formatWarning } from '../lib/format.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

export async function runInit(context: CommandContext): Promise<ExitCode> {
  const { repoRoot, verbose, jsonOutput } = context

  ensureRepoLayout(repoRoot)
  const result = withRepoLock(repoRoot, () => initRepository(repoRoot))

  if (jsonOutput) {
    ui.outputJson(result)
    return 0
  }

  ui.verbose(`manifests: ${result.manifests.join(', ') || '(none)'}`, verbose)
  if (!result.git.success) {
    print.warning(`git init failed: ${result.git.message}`)
  }
  for (const failure of result.snapshot.failures) {
    print.warning(formatFailure(failure))
  }
  for (const warning of result.snapshot.warnings) {
    print.warning(formatWarning(warning))
  }

  print.success(`Initialized device repository at ${c.path(repoRoot)}`)
  ui.log(`  ${c.label('config:')} ${result.configCreated ? 'created' : 'kept existing'}`)
  ui.log(`  ${c.label('live fragments:')} ${result.snapshot.fragments.join(', ') || '(none)'}`)
  ui.log(`  ${c.label('seeded state:')} ${result.seeded.join(', ') || '(none)'}`)
  ui.log('')
  ui.log(`Next: edit state/*.yaml, then ${c.command('devtwin plan')}`)
  return 0
}
