/**
 * Human-readable rendering of engine results
 */

import type { Action, PlanDocument, ProviderFailure, ProviderWarning } from '../../domain/types.js'
import { c, symbols } from './colors.js'

/**
 * "enable nginx", "create /etc/app.conf", "update"
 */
export function describeAction(action: Action): string {
  const target = typeof action.name === 'string'
    ? action.name
    : typeof action.path === 'string' ? action.path : ''
  return target ? `${c.op(action.op)} ${c.value(target)}` : c.op(action.op)
}

export function formatPlan(plan: PlanDocument): string[] {
  const lines: string[] = []
  for (const [provider, actions] of Object.entries(plan)) {
    if (actions.length === 0) continue
    lines.push(`${c.provider(provider)} ${c.muted(`(${actions.length})`)}`)
    for (const action of actions) {
      lines.push(`  ${symbols.tilde} ${describeAction(action)}`)
    }
  }
  return lines
}

export function formatFailure(failure: ProviderFailure): string {
  return `${c.provider(failure.provider)} ${c.muted(failure.operation)}: ${failure.message}`
}

export function formatWarning(warning: ProviderWarning): string {
  return `${c.provider(warning.provider)}: ${warning.message}`
}
