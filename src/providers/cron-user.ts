/**
 * cron.user: the invoking user's crontab, compared as literal text
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { Document } from '../types.js'
import { errorMessage } from '../lib/errors.js'
import { BaseConfigProvider, type Action, type ActionOutcome, type PlanDocument } from '../domain/types.js'
import {
  BACKUP_SUFFIX,
  commandOutcome,
  compactTimestamp,
  payloadOf,
  rejected,
  resolveOptions,
  stringField,
  type ProviderOptions,
  type ResolvedProviderOptions
} from './shared.js'

export const CRON_FRAGMENT = 'cron'

export interface CronProviderOptions extends ProviderOptions {
  /** Where crontab backups are written (default: home directory) */
  backupDir?: string
}

/**
 * Entries are the non-blank, non-comment lines
 */
export function parseCrontab(content: string): Document {
  const entries = content.split('\n')
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'))
  return { content, entries }
}

export class CronUserProvider extends BaseConfigProvider {
  readonly name: string
  private readonly options: ResolvedProviderOptions
  private readonly backupDir: string

  constructor(options: CronProviderOptions = {}) {
    super()
    this.options = resolveOptions('cron.user', options)
    this.name = this.options.name
    this.backupDir = options.backupDir ?? os.homedir()
  }

  detect(): boolean {
    return this.options.which('crontab')
  }

  /**
   * No crontab (non-zero exit) reads as empty
   */
  dumpState(): Document {
    const result = this.options.runner('crontab', ['-l'])
    const content = result.code === 0 ? result.stdout : ''
    return { [CRON_FRAGMENT]: parseCrontab(content) }
  }

  plan(desired: Document, live: Document): PlanDocument {
    const wanted = stringField(payloadOf(desired, CRON_FRAGMENT).content) ?? ''
    const current = stringField(payloadOf(live, CRON_FRAGMENT).content) ?? ''

    const actions: Action[] = wanted === current ? [] : [{ op: 'update', content: wanted }]
    return { [this.name]: actions }
  }

  apply(actions: Action[]): ActionOutcome[] {
    return actions.map(action => {
      if (action.op !== 'update') return rejected(action, `unsupported op "${action.op}"`)
      const content = stringField(action.content)
      if (content === undefined) return rejected(action, 'action has no content')

      try {
        const backup = this.backup()
        const outcome = this.install(action, content)
        return outcome.ok && backup ? { ...outcome, message: `backup ${backup}` } : outcome
      } catch (err) {
        return rejected(action, `crontab update failed: ${errorMessage(err)}`)
      }
    })
  }

  private backup(): string | null {
    const current = this.options.runner('crontab', ['-l'])
    if (current.code !== 0) return null
    const backupPath = path.join(this.backupDir, `.crontab${BACKUP_SUFFIX}${compactTimestamp(this.options.now())}`)
    fs.writeFileSync(backupPath, current.stdout, 'utf-8')
    return backupPath
  }

  private install(action: Action, content: string): ActionOutcome {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'devtwin-cron-'))
    const tmpFile = path.join(tmpDir, 'crontab.cron')
    try {
      fs.writeFileSync(tmpFile, content, 'utf-8')
      return commandOutcome(action, 'crontab', [tmpFile], this.options.runner('crontab', [tmpFile]))
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true })
    }
  }
}
