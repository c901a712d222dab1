/**
 * Tests for the built-in registration table against the bundled manifests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createBuiltinProviderTable } from '../../src/providers/index.js'
import { discoverManifests, listProviders, loadConfigProviders } from '../../src/domain/registry.js'
import { buildContext } from '../../src/domain/context.js'
import { DEFAULT_ENABLED_PROVIDERS, normalizeConfig } from '../../src/lib/config-loader.js'
import { getTemplatePluginsDir } from '../../src/lib/paths.js'
import { makeTempDir, recordingRunner, removeDir } from '../helpers.js'

describe('built-in providers', () => {
  let repo: string

  beforeEach(() => {
    repo = makeTempDir('builtin')
  })

  afterEach(() => {
    removeDir(repo)
  })

  it('should register every bundled manifest', () => {
    const table = createBuiltinProviderTable()
    const manifests = [...discoverManifests(getTemplatePluginsDir()).values()]

    expect(manifests.map(m => m.name)).toEqual([
      'cron.user',
      'files.mirror',
      'logs.files',
      'logs.systemd_journal',
      'packages.debian',
      'services.systemd',
      'system.info'
    ])
    for (const manifest of manifests) {
      expect(table.get(manifest.entrypoint)?.kind).toBe(manifest.kind)
    }
  })

  it('should load the default providers without fragment conflicts', () => {
    const table = createBuiltinProviderTable({ runner: recordingRunner().runner, which: () => true })
    const context = buildContext(repo, normalizeConfig({ providers: { enable: DEFAULT_ENABLED_PROVIDERS } }))

    const loaded = loadConfigProviders(context, { table, manifestRoot: getTemplatePluginsDir() })
    expect(loaded.map(p => p.manifest.name)).toEqual(['cron.user', 'files.mirror', 'packages.debian', 'services.systemd'])
  })

  it('should drop providers whose tools are missing', () => {
    const table = createBuiltinProviderTable({ which: () => false })
    const context = buildContext(repo, normalizeConfig({}))

    const listing = listProviders(context, { table, manifestRoot: getTemplatePluginsDir() })
    const available = Object.fromEntries(listing.map(entry => [entry.manifest.name, entry.available]))
    expect(available).toMatchObject({
      'cron.user': false,
      'files.mirror': true,
      'logs.files': true,
      'logs.systemd_journal': false,
      'packages.debian': false,
      'services.systemd': false
    })
  })
})
