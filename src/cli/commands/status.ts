/**
 * devtwin CLI - Status Command
 *
 * Drift per fragment between state/ and live/. Exit code is 0 either way;
 * use --json to consume the result.
 */

import { computeStatus } from '../../domain/status.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

export async function runStatus(context: CommandContext): Promise<ExitCode> {
  const { repoRoot, jsonOutput } = context
  const report = computeStatus(repoRoot)

  if (jsonOutput) {
    ui.outputJson(report)
    return 0
  }

  const fragments = Object.keys(report)
  if (fragments.length === 0) {
    print.info(`No desired state in ${c.path(repoRoot)}/state. Run ${c.command('devtwin init')} first.`)
    return 0
  }

  ui.output(ui.formatTable(
    [
      { key: 'fragment', header: 'Fragment' },
      { key: 'status', header: 'Status' }
    ],
    fragments.map(fragment => ({
      fragment,
      status: report[fragment] ? c.drift('drift') : c.inSync('in sync')
    }))
  ))
  return 0
}
