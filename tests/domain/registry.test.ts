/**
 * Tests for manifest discovery and provider loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import {
  ProviderTable,
  assertFragmentOwnership,
  discoverManifests,
  listProviders,
  loadConfigProviders,
  loadLogsProviders,
  parseManifest,
  resolveManifestRoot
} from '../../src/domain/registry.js'
import { buildContext } from '../../src/domain/context.js'
import { normalizeConfig } from '../../src/lib/config-loader.js'
import { getTemplatePluginsDir } from '../../src/lib/paths.js'
import {
  FragmentOwnershipError,
  InvalidManifestError,
  ProviderConstructionError
} from '../../src/lib/errors.js'
import type { ProviderManifest } from '../../src/domain/types.js'
import { FakeConfigProvider, FakeLogsProvider, makeTempDir, removeDir, tableOf, writeManifest } from '../helpers.js'

describe('registry', () => {
  let repo: string
  let manifestRoot: string

  beforeEach(() => {
    repo = makeTempDir('registry')
    manifestRoot = path.join(repo, 'plugins')
    fs.mkdirSync(manifestRoot)
  })

  afterEach(() => {
    removeDir(repo)
  })

  function contextEnabling(...names: string[]) {
    return buildContext(repo, normalizeConfig({ providers: { enable: names } }))
  }

  describe('parseManifest', () => {
    it('should default name, kind and entrypoint', () => {
      writeManifest(manifestRoot, 'custom.thing', {})
      const manifest = parseManifest(path.join(manifestRoot, 'custom.thing'))
      expect(manifest).toMatchObject({
        name: 'custom.thing',
        kind: 'config',
        entrypoint: 'custom.thing',
        provides: { state_fragments: [] },
        dependencies: []
      })
    })

    it('should reject an unknown kind', () => {
      writeManifest(manifestRoot, 'bad', { name: 'bad', kind: 'metrics' })
      expect(() => parseManifest(path.join(manifestRoot, 'bad'))).toThrow(InvalidManifestError)
    })
  })

  describe('discoverManifests', () => {
    it('should read directories in sorted order and skip ones without plugin.yaml', () => {
      writeManifest(manifestRoot, 'zeta', { name: 'zeta', fragments: ['z'] })
      writeManifest(manifestRoot, 'alpha', { name: 'alpha', fragments: ['a'] })
      fs.mkdirSync(path.join(manifestRoot, 'empty'))

      expect([...discoverManifests(manifestRoot).keys()]).toEqual(['alpha', 'zeta'])
      expect(discoverManifests(path.join(repo, 'missing')).size).toBe(0)
    })

    it('should fall back to the bundled manifests', () => {
      expect(resolveManifestRoot(repo)).toBe(getTemplatePluginsDir())
      writeManifest(manifestRoot, 'alpha', { name: 'alpha' })
      expect(resolveManifestRoot(repo)).toBe(manifestRoot)
    })
  })

  describe('loadConfigProviders', () => {
    it('should load enabled, available providers of the requested kind', () => {
      writeManifest(manifestRoot, 'a', { name: 'a', kind: 'config', fragments: ['fa'] })
      writeManifest(manifestRoot, 'b', { name: 'b', kind: 'config', fragments: ['fb'] })
      writeManifest(manifestRoot, 'c', { name: 'c', kind: 'config', fragments: ['fc'] })
      writeManifest(manifestRoot, 'l', { name: 'l', kind: 'logs' })

      const table = tableOf(
        {
          a: new FakeConfigProvider('a', { fragments: ['fa'] }),
          b: new FakeConfigProvider('b', { fragments: ['fb'], available: false }),
          c: new FakeConfigProvider('c', { fragments: ['fc'] })
        },
        { l: new FakeLogsProvider('l', () => ({})) }
      )

      const context = contextEnabling('a', 'b', 'l')
      expect(loadConfigProviders(context, { table, manifestRoot }).map(p => p.manifest.name)).toEqual(['a'])
      expect(loadLogsProviders(context, { table, manifestRoot }).map(p => p.manifest.name)).toEqual(['l'])
    })

    it('should raise when two enabled providers declare the same fragment', () => {
      writeManifest(manifestRoot, 'a', { name: 'a', fragments: ['services'] })
      writeManifest(manifestRoot, 'b', { name: 'b', fragments: ['services'] })
      const table = tableOf({
        a: new FakeConfigProvider('a', { fragments: ['services'] }),
        b: new FakeConfigProvider('b', { fragments: ['services'] })
      })

      expect(() => loadConfigProviders(contextEnabling('a', 'b'), { table, manifestRoot })).toThrow(FragmentOwnershipError)
      expect(loadConfigProviders(contextEnabling('a'), { table, manifestRoot })).toHaveLength(1)
    })

    it('should raise when an entrypoint is not registered', () => {
      writeManifest(manifestRoot, 'a', { name: 'a', entrypoint: 'nowhere' })
      expect(() => loadConfigProviders(contextEnabling('a'), { table: new ProviderTable(), manifestRoot }))
        .toThrow(ProviderConstructionError)
    })

    it('should raise when the entrypoint kind does not match the manifest', () => {
      writeManifest(manifestRoot, 'a', { name: 'a', kind: 'config' })
      const table = tableOf({}, { a: new FakeLogsProvider('a', () => ({})) })
      expect(() => loadConfigProviders(contextEnabling('a'), { table, manifestRoot }))
        .toThrow('entrypoint is a logs provider but the manifest declares kind "config"')
    })

    it('should wrap a factory that throws', () => {
      writeManifest(manifestRoot, 'a', { name: 'a' })
      const table = new ProviderTable().registerConfig('a', () => {
        throw new Error('bad options')
      })
      expect(() => loadConfigProviders(contextEnabling('a'), { table, manifestRoot })).toThrow(/bad options/)
    })

    it('should pass the manifest to the factory', () => {
      writeManifest(manifestRoot, 'renamed', { name: 'renamed', entrypoint: 'shared', fragments: ['x'] })
      const seen: ProviderManifest[] = []
      const table = new ProviderTable().registerConfig('shared', manifest => {
        seen.push(manifest)
        return new FakeConfigProvider(manifest.name, { fragments: manifest.provides.state_fragments })
      })

      loadConfigProviders(contextEnabling('renamed'), { table, manifestRoot })
      expect(seen.map(m => m.name)).toEqual(['renamed'])
    })
  })

  describe('assertFragmentOwnership', () => {
    it('should accept disjoint fragments', () => {
      writeManifest(manifestRoot, 'a', { name: 'a', fragments: ['x'] })
      writeManifest(manifestRoot, 'b', { name: 'b', fragments: ['y'] })
      expect(() => assertFragmentOwnership([...discoverManifests(manifestRoot).values()])).not.toThrow()
    })
  })

  describe('listProviders', () => {
    it('should report enablement, registration and availability', () => {
      writeManifest(manifestRoot, 'a', { name: 'a' })
      writeManifest(manifestRoot, 'b', { name: 'b' })
      writeManifest(manifestRoot, 'c', { name: 'c' })
      const table = tableOf({
        a: new FakeConfigProvider('a', { fragments: [] }),
        b: new FakeConfigProvider('b', { fragments: [], available: false })
      })

      const listing = listProviders(contextEnabling('a'), { table, manifestRoot })
      expect(listing.map(entry => [entry.manifest.name, entry.enabled, entry.registered, entry.available])).toEqual([
        ['a', true, true, true],
        ['b', false, true, false],
        ['c', false, false, null]
      ])
    })
  })

  it('should list registered entrypoints sorted', () => {
    const table = new ProviderTable()
      .registerLogs('z', () => new FakeLogsProvider('z', () => ({})))
      .registerConfig('a', () => new FakeConfigProvider('a', { fragments: [] }))
    expect(table.keys()).toEqual(['a', 'z'])
    expect(table.has('z')).toBe(true)
    expect(table.get('a')?.kind).toBe('config')
  })
})
