/**
 * devtwin CLI - Apply Command
 *
 * Executes plan/latest.yaml against the host.
 *
 * Usage:
 *   devtwin apply              Show the plan and ask before executing
 *   devtwin apply --yes        Execute without asking (required without a TTY)
 *   devtwin apply --dry-run    Show what would run
 */

import * as readline from 'node:readline'
import { executePlan, failedOutcomes } from '../../domain/apply.js'
import { readLatestPlan, summarizePlan } from '../../domain/plan.js'
import { withRepoLock } from '../../lib/lock.js'
import { c, print, symbols } from '../lib/colors.js'
import { describeAction, formatFailure, formatPlan } from '../lib/format.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

/**
 * Prompt user for interactive confirmation
 */
async function promptConfirmation(message: string): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stderr
    })

    rl.question(message, (answer) => {
      rl.close()
      resolve(['y', 'yes'].includes(answer.trim().toLowerCase()))
    })
  })
}

export async function runApply(context: CommandContext): Promise<ExitCode> {
  const { args, repoRoot, dryRun, jsonOutput } = context

  const plan = readLatestPlan(repoRoot)
  const summary = summarizePlan(plan)

  if (summary.total === 0) {
    if (jsonOutput) ui.outputJson({ noop: true })
    else print.info('No plan to apply.')
    return 0
  }

  if (!dryRun && args.yes !== true) {
    if (!process.stdin.isTTY) {
      print.error('Refusing to apply without confirmation in non-interactive mode')
      ui.log(`  Use ${c.command('devtwin apply --yes')}`)
      return 1
    }
    formatPlan(plan).forEach(line => ui.log(line))
    const confirmed = await promptConfirmation(`\nApply ${summary.total} action(s)? [y/N] `)
    if (!confirmed) {
      print.info('Aborted')
      return 1
    }
  }

  const result = withRepoLock(repoRoot, () => executePlan(repoRoot, { dryRun }))
  const failed = failedOutcomes(result)
  const exitCode: ExitCode = result.failures.length > 0 || failed.length > 0 ? 1 : 0

  if (jsonOutput) {
    ui.outputJson(result)
    return exitCode
  }

  for (const entry of result.applied) {
    ui.output(`${c.provider(entry.provider)}${dryRun ? c.muted(' (dry run)') : ''}`)
    entry.actions.forEach((action, i) => {
      const outcome = entry.outcomes[i]
      const mark = dryRun ? symbols.tilde : outcome?.ok ? symbols.success : symbols.error
      const note = outcome?.message ? ` ${c.muted(outcome.message)}` : ''
      ui.output(`  ${mark} ${describeAction(action)}${note}`)
    })
  }

  for (const name of result.skipped) {
    print.warning(`Skipped ${c.provider(name)}: provider is not enabled or not available`)
  }
  for (const failure of result.failures) {
    print.error(formatFailure(failure))
  }

  if (dryRun) {
    print.info('Dry run: nothing was executed')
  } else if (exitCode === 0) {
    print.success(`Applied ${result.applied.length} provider(s). Run ${c.command('devtwin snapshot')} to verify.`)
  } else {
    print.error(`${failed.length} action(s) failed, ${result.failures.length} provider(s) failed`)
  }

  return exitCode
}
