/**
 * services.systemd: enablement and run state of systemd service units
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

export const SERVICES_FRAGMENT = 'services'

const SERVICE_OPS = ['enable', 'disable', 'start', 'stop']

export class SystemdServicesProvider extends BaseConfigProvider {
  readonly name: string
  private readonly options: ResolvedProviderOptions

  constructor(options: ProviderOptions = {}) {
    super()
    this.options = resolveOptions('services.systemd', options)
    this.name = this.options.name
  }

  detect(): boolean {
    return this.options.which('systemctl')
  }

  dumpState(): Document {
    const { runner } = this.options
    const units = runChecked(runner, 'systemctl', ['list-unit-files', '--type', 'service', '--no-legend'])

    const services: Document[] = []
    for (const line of nonEmptyLines(units.stdout)) {
      const [name, state] = line.trim().split(/\s+/)
      if (!name || !state) continue
      const active = runner('systemctl', ['is-active', name])
      services.push({
        name,
        enabled: state.toLowerCase() === 'enabled',
        running: active.stdout.trim() === 'active'
      })
    }

    return { [SERVICES_FRAGMENT]: { services } }
  }

  /**
   * enabled and running are diffed independently. A service missing from
   * live counts as disabled and stopped.
   */
  plan(desired: Document, live: Document): PlanDocument {
    const wanted = indexBy(payloadOf(desired, SERVICES_FRAGMENT), 'services')
    const current = indexBy(payloadOf(live, SERVICES_FRAGMENT), 'services')

    const actions: Action[] = []
    for (const [name, service] of wanted) {
      const observed = current.get(name)
      const wantEnabled = service.enabled === true
      const wantRunning = service.running === true
      const isEnabled = observed?.enabled === true
      const isRunning = observed?.running === true

      if (wantEnabled && !isEnabled) actions.push({ op: 'enable', name })
      if (!wantEnabled && isEnabled) actions.push({ op: 'disable', name })
      if (wantRunning && !isRunning) actions.push({ op: 'start', name })
      if (!wantRunning && isRunning) actions.push({ op: 'stop', name })
    }

    return { [this.name]: actions }
  }

  apply(actions: Action[]): ActionOutcome[] {
    return actions.map(action => {
      const name = stringField(action.name)
      if (!name) return rejected(action, 'action has no unit name')
      if (!SERVICE_OPS.includes(action.op)) {
        return rejected(action, `unsupported op "${action.op}"`)
      }

      const args = ['systemctl', action.op, name]
      return commandOutcome(action, 'sudo', args, this.options.runner('sudo', args))
    })
  }
}
