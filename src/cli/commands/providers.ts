/**
 * devtwin CLI - Providers Command
 *
 * Lists discovered manifests with enablement and availability on this host.
 */

import { buildContext } from '../../domain/context.js'
import { listProviders, resolveManifestRoot } from '../../domain/registry.js'
import { createBuiltinProviderTable } from '../../providers/index.js'
import { c } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext, ExitCode } from './types.js'

function availability(value: boolean | null): string {
  if (value === null) return c.error('unregistered')
  return value ? c.success('yes') : c.warning('no')
}

export async function runProviders(context: CommandContext): Promise<ExitCode> {
  const { repoRoot, verbose, jsonOutput } = context
  const twin = buildContext(repoRoot)
  const manifestRoot = resolveManifestRoot(repoRoot)
  const listing = listProviders(twin, { table: createBuiltinProviderTable(), manifestRoot })

  if (jsonOutput) {
    ui.outputJson(listing.map(entry => ({
      name: entry.manifest.name,
      kind: entry.manifest.kind,
      fragments: entry.manifest.provides.state_fragments,
      entrypoint: entry.manifest.entrypoint,
      enabled: entry.enabled,
      registered: entry.registered,
      available: entry.available
    })))
    return 0
  }

  ui.verbose(`manifests from ${manifestRoot}`, verbose)
  ui.output(ui.formatTable(
    [
      { key: 'name', header: 'Provider' },
      { key: 'kind', header: 'Kind' },
      { key: 'fragments', header: 'Fragments' },
      { key: 'enabled', header: 'Enabled' },
      { key: 'available', header: 'Available' }
    ],
    listing.map(entry => ({
      name: entry.manifest.name,
      kind: entry.manifest.kind,
      fragments: entry.manifest.provides.state_fragments.join(', ') || '-',
      enabled: entry.enabled ? 'yes' : 'no',
      available: availability(entry.available)
    }))
  ))
  return 0
}
