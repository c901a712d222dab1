/**
 * devtwin CLI - Plan Command
 *
 * Computes plan/latest.yaml from state/ and live/ and prints it.
 */

import { computePlan } from '../../domain/plan.js'
import { withRepoLock } from '../../lib/lock.js'
import { ensureRepoLayout } from '../../lib/paths.js'
import { c, print } from '../lib/colors.js'
import { formatPlan } from '../lib/format.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

export async function runPlan(context: CommandContext): Promise<ExitCode> {
  const { repoRoot, verbose, jsonOutput } = context

  ensureRepoLayout(repoRoot)
  const result = withRepoLock(repoRoot, () => computePlan(repoRoot))

  if (jsonOutput) {
    ui.outputJson({ plan: result.plan, summary: result.summary })
    return 0
  }

  ui.verbose(`wrote ${result.planPath}`, verbose)

  if (result.summary.total === 0) {
    print.success('No changes. Live state matches desired state.')
    return 0
  }

  for (const line of formatPlan(result.plan)) {
    ui.output(line)
  }
  ui.log('')
  ui.log(`${c.highlight(String(result.summary.total))} action(s). Run ${c.command('devtwin apply')} to execute.`)
  return 0
}
