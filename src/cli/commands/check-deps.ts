/**
 * devtwin CLI - Check Dependencies Command
 */

import { DEFAULT_DEPENDENCIES, checkDependencies } from '../../lib/exec.js'
import { print, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

export async function runCheckDeps(context: CommandContext): Promise<ExitCode> {
  const requested = context.args._.slice(1)
  const results = checkDependencies(requested.length > 0 ? requested : DEFAULT_DEPENDENCIES)
  const missing = Object.entries(results).filter(([, found]) => !found).map(([name]) => name)

  if (context.jsonOutput) {
    ui.outputJson(results)
    return missing.includes('git') ? 1 : 0
  }

  for (const [name, found] of Object.entries(results)) {
    ui.output(`${found ? symbols.success : symbols.error} ${name}`)
  }

  if (missing.length > 0) {
    print.warning(`Missing: ${missing.join(', ')}. Providers that need them are skipped.`)
  }
  // git is the only hard requirement
  return missing.includes('git') ? 1 : 0
}
