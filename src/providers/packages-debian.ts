/**
 * packages.debian: installed Debian packages (dpkg-query / apt-get)
 *
 * Desired state lists packages with an optional `ensure: present | absent`.
 * Installed packages the desired list does not mention are left alone.
 */

import type { Document } from '../types.js'
import { runChecked } from '../lib/exec.js'
import { BaseConfigProvider, type Action, type ActionOutcome, type PlanDocument } from '../domain/types.js'
import {
  commandOutcome,
  indexBy,
  nonEmptyLines,
  payloadOf,
  rejected,
  resolveOptions,
  stringField,
  type ProviderOptions,
  type ResolvedProviderOptions
} from './shared.js'

export const PACKAGES_FRAGMENT = 'packages'

export class DebianPackagesProvider extends BaseConfigProvider {
  readonly name: string
  private readonly options: ResolvedProviderOptions

  constructor(options: ProviderOptions = {}) {
    super()
    this.options = resolveOptions('packages.debian', options)
    this.name = this.options.name
  }

  detect(): boolean {
    return this.options.which('dpkg-query')
  }

  dumpState(): Document {
    const result = runChecked(this.options.runner, 'dpkg-query', ['-W', '-f=${Package}\t${Version}\n'])

    const packages: Document[] = []
    for (const line of nonEmptyLines(result.stdout)) {
      const tab = line.indexOf('\t')
      if (tab < 0) continue
      packages.push({
        name: line.slice(0, tab),
        source: 'apt',
        installed: true,
        version: line.slice(tab + 1).trim()
      })
    }

    return { [PACKAGES_FRAGMENT]: { packages } }
  }

  plan(desired: Document, live: Document): PlanDocument {
    const wanted = indexBy(payloadOf(desired, PACKAGES_FRAGMENT), 'packages')
    const installed = indexBy(payloadOf(live, PACKAGES_FRAGMENT), 'packages')

    const actions: Action[] = []
    for (const [name, pkg] of wanted) {
      const ensure = stringField(pkg.ensure) ?? 'present'
      if (ensure === 'present' && !installed.has(name)) {
        actions.push({ op: 'install', name })
      } else if (ensure === 'absent' && installed.has(name)) {
        actions.push({ op: 'remove', name })
      }
    }

    return { [this.name]: actions }
  }

  apply(actions: Action[]): ActionOutcome[] {
    return actions.map(action => {
      const name = stringField(action.name)
      if (!name) return rejected(action, 'action has no package name')
      if (action.op !== 'install' && action.op !== 'remove') {
        return rejected(action, `unsupported op "${action.op}"`)
      }

      const args = ['apt-get', action.op, '-y', name]
      return commandOutcome(action, 'sudo', args, this.options.runner('sudo', args))
    })
  }
}
