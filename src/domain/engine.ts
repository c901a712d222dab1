/**
 * Shared engine plumbing: options, provider loading and failure capture
 */

import type { DevtwinConfig } from '../types.js'
import { ProviderRuntimeError } from '../lib/errors.js'
import { createBuiltinProviderTable } from '../providers/index.js'
import { buildContext } from './context.js'
import { loadConfigProviders, loadLogsProviders, type ProviderTable } from './registry.js'
import type { ConfigProvider, LoadedProvider, LogsProvider, ProviderFailure, TwinContext } from './types.js'

export interface EngineOptions {
  /** Registration table; defaults to the built-in providers */
  table?: ProviderTable
  /** Manifest root; defaults to <repo>/plugins, then the bundled set */
  manifestRoot?: string
  /** Use this config instead of reading config.yaml */
  config?: DevtwinConfig
}

export interface EngineRun {
  context: TwinContext
  configProviders: () => LoadedProvider<ConfigProvider>[]
  logsProviders: () => LoadedProvider<LogsProvider>[]
}

export function prepareRun(repoRoot: string, options: EngineOptions = {}): EngineRun {
  const context = buildContext(repoRoot, options.config)
  const loadOptions = {
    table: options.table ?? createBuiltinProviderTable(),
    manifestRoot: options.manifestRoot
  }
  return {
    context,
    configProviders: () => loadConfigProviders(context, loadOptions),
    logsProviders: () => loadLogsProviders(context, loadOptions)
  }
}

export function captureFailure(provider: string, operation: string, err: unknown): ProviderFailure {
  const wrapped = new ProviderRuntimeError(provider, operation, err)
  return { provider, operation, message: wrapped.message }
}
