/**
 * devtwin CLI - Config Command
 *
 *   devtwin config [show]          Effective configuration (token masked)
 *   devtwin config path            Path of config.yaml
 *   devtwin config roots [dir...]  Show or replace files.mirror roots
 */

import path from 'node:path'
import { formatConfig, getFilesystemRoots, loadConfig, setFilesystemRoots } from '../../lib/config-loader.js'
import { getConfigPath } from '../../lib/paths.js'
import { withRepoLock } from '../../lib/lock.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

export async function runConfig(context: CommandContext): Promise<ExitCode> {
  const { args, repoRoot, jsonOutput } = context
  const subcommand = args._[1] ?? 'show'

  switch (subcommand) {
    case 'show': {
      const config = loadConfig(repoRoot)
      if (jsonOutput) {
        ui.outputJson({ ...config, remote: { ...config.remote, token: config.remote?.token ? '****' : undefined } })
      } else {
        ui.outputRaw(formatConfig(config))
      }
      return 0
    }

    case 'path':
      ui.output(getConfigPath(repoRoot))
      return 0

    case 'roots': {
      const dirs = args._.slice(2)
      if (dirs.length === 0) {
        const roots = getFilesystemRoots(loadConfig(repoRoot))
        if (jsonOutput) ui.outputJson(roots)
        else if (roots.length === 0) print.info('No filesystem roots configured')
        else roots.forEach(root => ui.output(root))
        return 0
      }

      const resolved = dirs.map(dir => path.resolve(dir))
      withRepoLock(repoRoot, () => setFilesystemRoots(repoRoot, resolved))
      print.success(`files.mirror roots: ${resolved.map(r => c.path(r)).join(', ')}`)
      return 0
    }

    default:
      print.error(`Unknown config subcommand: ${subcommand}`)
      ui.log(`  Available: ${c.command('show')}, ${c.command('path')}, ${c.command('roots')}`)
      return 1
  }
}
