/**
 * Context construction
 */

import { loadConfig } from '../lib/config-loader.js'
import type { DevtwinConfig } from '../types.js'
import type { TwinContext } from './types.js'

function freezeDeep<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const item of Object.values(value)) {
      freezeDeep(item)
    }
  }
  return value
}

/**
 * Build a read-only context. Config is re-read from disk unless given.
 */
export function buildContext(repoRoot: string, config?: DevtwinConfig): TwinContext {
  const resolved = config ? structuredClone(config) : loadConfig(repoRoot)
  return freezeDeep({ repoRoot, config: resolved })
}
