/**
 * system.info: read-only host facts (uname, hostname, os-release, kernel)
 */

import fs from 'node:fs'
import os from 'node:os'
import type { Document } from '../types.js'
import { BaseConfigProvider, type Action, type ActionOutcome, type PlanDocument } from '../domain/types.js'
import { rejected, resolveOptions, type ProviderOptions, type ResolvedProviderOptions } from './shared.js'

export const SYSTEM_FRAGMENT = 'system'

export interface SystemInfoOptions extends ProviderOptions {
  osReleasePath?: string
  platform?: NodeJS.Platform
}

/**
 * KEY=value lines; surrounding quotes removed, comments skipped
 */
export function parseOsRelease(text: string): Document {
  const result: Document = {}
  for (const raw of text.split('\n')) {
    const line = raw.trim()
    if (!line || line.startsWith('#')) continue
    const eq = line.indexOf('=')
    if (eq < 0) continue
    const key = line.slice(0, eq)
    const value = line.slice(eq + 1).trim().replace(/^["']+|["']+$/g, '')
    result[key] = value
  }
  return result
}

export class SystemInfoProvider extends BaseConfigProvider {
  readonly name: string
  private readonly options: ResolvedProviderOptions
  private readonly osReleasePath: string
  private readonly platform: NodeJS.Platform

  constructor(options: SystemInfoOptions = {}) {
    super()
    this.options = resolveOptions('system.info', options)
    this.name = this.options.name
    this.osReleasePath = options.osReleasePath ?? '/etc/os-release'
    this.platform = options.platform ?? process.platform
  }

  detect(): boolean {
    return this.platform === 'linux'
  }

  dumpState(): Document {
    const { runner } = this.options

    const uname = runner('uname', ['-a'])
    const hostname = runner('hostname', [])

    const osRelease = fs.existsSync(this.osReleasePath)
      ? parseOsRelease(fs.readFileSync(this.osReleasePath, 'utf-8'))
      : {}

    return {
      [SYSTEM_FRAGMENT]: {
        uname: uname.code === 0 ? uname.stdout.trim() : '',
        hostname: hostname.code === 0 ? hostname.stdout.trim() : os.hostname(),
        os_release: osRelease,
        kernel: os.release()
      }
    }
  }

  plan(): PlanDocument {
    return { [this.name]: [] }
  }

  apply(actions: Action[]): ActionOutcome[] {
    return actions.map(action => rejected(action, `${this.name} is read-only`))
  }
}
