/**
 * devtwin CLI - Logs Command
 *
 * Prints logs/current/index.yaml.
 */

import { formatDocument, loadDocument } from '../../lib/documents.js'
import { getLogIndexPath } from '../../lib/paths.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

export async function runLogs(context: CommandContext): Promise<ExitCode> {
  const { repoRoot, jsonOutput } = context
  const indexPath = getLogIndexPath(repoRoot)
  const index = loadDocument(indexPath)

  if (jsonOutput) {
    ui.outputJson(index)
    return 0
  }

  if (Object.keys(index).length === 0) {
    print.info(`No logs found at ${c.path(indexPath)}`)
    return 0
  }

  ui.outputRaw(formatDocument(index))
  return 0
}
