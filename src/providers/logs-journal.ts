/**
 * logs.systemd_journal: recent journal lines captured into logs/current
 */

import fs from 'node:fs'
import path from 'node:path'
import type { Document } from '../types.js'
import { runChecked } from '../lib/exec.js'
import { getLogsCurrentDir } from '../lib/paths.js'
import { BaseLogsProvider, type TwinContext } from '../domain/types.js'
import { nonEmptyLines, resolveOptions, type ProviderOptions, type ResolvedProviderOptions } from './shared.js'

export const JOURNAL_LOG_KEY = 'systemd_journal'
export const JOURNAL_FILE = 'systemd_journal.log'
export const DEFAULT_JOURNAL_LINES = 200

export class SystemdJournalLogsProvider extends BaseLogsProvider {
  readonly name: string
  private readonly options: ResolvedProviderOptions

  constructor(options: ProviderOptions = {}) {
    super()
    this.options = resolveOptions('logs.systemd_journal', options)
    this.name = this.options.name
  }

  detect(): boolean {
    return this.options.which('journalctl')
  }

  dumpLogs(context: TwinContext): Document {
    const lines = context.config.logs?.journal_lines ?? DEFAULT_JOURNAL_LINES
    const result = runChecked(this.options.runner, 'journalctl', ['-n', String(lines), '--no-pager', '-o', 'short-iso'])
    const entries = nonEmptyLines(result.stdout)

    const target = path.join(getLogsCurrentDir(context.repoRoot), JOURNAL_FILE)
    fs.mkdirSync(path.dirname(target), { recursive: true })
    fs.writeFileSync(target, entries.length > 0 ? `${entries.join('\n')}\n` : '', 'utf-8')

    return {
      [JOURNAL_LOG_KEY]: {
        entries: entries.length,
        file: JOURNAL_FILE
      }
    }
  }
}
