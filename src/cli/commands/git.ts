/**
 * devtwin CLI - Version Store Commands
 *
 *   devtwin pull                       Fast-forward from the remote
 *   devtwin push                       Push to the remote
 *   devtwin history [--limit N]        Recent commits
 *   devtwin reset <commit>             Hard reset state, live and plan to a commit
 *   devtwin remote --user U [--token T] [--name R] [--host H]
 */

import os from 'node:os'
import type { GitResult } from '../../lib/git.js'
import {
  getHistory,
  pullRepository,
  pushRepository,
  resetRepository,
  setupRemote
} from '../../domain/repository.js'
import { withRepoLock } from '../../lib/lock.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

function report(result: GitResult, context: CommandContext, successText: string): ExitCode {
  if (context.jsonOutput) {
    ui.outputJson(result)
  } else if (result.success) {
    print.success(successText)
    if (result.message) ui.verbose(result.message, context.verbose)
  } else {
    print.error(result.message || 'git command failed')
  }
  return result.success ? 0 : 1
}

export async function runPull(context: CommandContext): Promise<ExitCode> {
  const result = withRepoLock(context.repoRoot, () => pullRepository(context.repoRoot))
  return report(result, context, 'Pulled')
}

export async function runPush(context: CommandContext): Promise<ExitCode> {
  return report(pushRepository(context.repoRoot), context, 'Pushed')
}

export async function runHistory(context: CommandContext): Promise<ExitCode> {
  const limit = context.args.limit ?? 20
  const entries = getHistory(context.repoRoot, limit)

  if (context.jsonOutput) {
    ui.outputJson(entries)
    return 0
  }

  if (entries.length === 0) {
    print.info(`No history yet. Run ${c.command('devtwin snapshot --commit')}.`)
    return 0
  }

  ui.output(ui.formatTable(
    [
      { key: 'hash', header: 'Commit' },
      { key: 'date', header: 'Date' },
      { key: 'message', header: 'Message' }
    ],
    entries.map(entry => ({ hash: entry.hash, date: entry.date, message: entry.message }))
  ))
  return 0
}

export async function runReset(context: CommandContext): Promise<ExitCode> {
  const commit = context.args._[1]
  if (!commit) {
    print.error('Commit required')
    ui.log(`  Usage: ${c.command('devtwin reset <commit>')}`)
    return 1
  }

  const result = withRepoLock(context.repoRoot, () => resetRepository(context.repoRoot, commit))
  return report(result, context, `Repository reset to ${commit}`)
}

export async function runRemote(context: CommandContext): Promise<ExitCode> {
  const { args, repoRoot } = context
  if (!args.user) {
    print.error('--user is required')
    ui.log(`  Usage: ${c.command('devtwin remote --user <name> [--token <token>] [--name <repo>] [--host <host>]')}`)
    return 1
  }

  const repo = args.name || `twin-${os.hostname()}`
  const result = withRepoLock(repoRoot, () => setupRemote(repoRoot, {
    user: args.user ?? '',
    token: args.token,
    repo,
    host: args.host
  }))
  return report(result, context, result.message)
}
