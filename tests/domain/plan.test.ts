/**
 * Tests for the plan engine
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import {
  computePlan,
  fragmentPayload,
  readLatestPlan,
  summarizePlan,
  toAction,
  toPlanDocument
} from '../../src/domain/plan.js'
import { createBuiltinProviderTable } from '../../src/providers/index.js'
import { normalizeConfig } from '../../src/lib/config-loader.js'
import { getPlanPath, getTemplatePluginsDir } from '../../src/lib/paths.js'
import type { Document } from '../../src/types.js'
import {
  FakeConfigProvider,
  makeTempDir,
  readText,
  recordingRunner,
  removeDir,
  tableOf,
  writeManifest,
  writeYaml
} from '../helpers.js'

describe('plan', () => {
  let repo: string

  beforeEach(() => {
    repo = makeTempDir('plan')
  })

  afterEach(() => {
    removeDir(repo)
  })

  describe('document helpers', () => {
    it('should require a string op on actions', () => {
      expect(toAction({ op: 'start', name: 'nginx' })).toEqual({ op: 'start', name: 'nginx' })
      expect(toAction({ name: 'nginx' })).toBeNull()
      expect(toAction({ op: 3 })).toBeNull()
    })

    it('should drop malformed plan entries', () => {
      expect(toPlanDocument({
        good: [{ op: 'start', name: 'a' }, { name: 'no-op' }, 'text'],
        notAList: 'x'
      })).toEqual({ good: [{ op: 'start', name: 'a' }], notAList: [] })
    })

    it('should count actions per provider', () => {
      expect(summarizePlan({ a: [{ op: 'x' }, { op: 'y' }], b: [] })).toEqual({
        providers: [{ provider: 'a', actions: 2 }, { provider: 'b', actions: 0 }],
        total: 2
      })
    })

    it('should unwrap fragment payloads', () => {
      expect(fragmentPayload({ services: { services: [] } }, 'services')).toEqual({ services: [] })
      expect(fragmentPayload({}, 'services')).toEqual({})
      expect(fragmentPayload({ services: ['x'] }, 'services')).toEqual({})
    })
  })

  describe('computePlan', () => {
    const config = normalizeConfig({ providers: { enable: ['services.systemd'] } })

    it('should plan enable and start for a desired nginx that is disabled and stopped', () => {
      writeYaml(path.join(repo, 'state', 'services.yaml'), {
        services: { services: [{ name: 'nginx', enabled: true, running: true }] }
      })
      writeYaml(path.join(repo, 'live', 'services.yaml'), {
        services: { services: [{ name: 'nginx', enabled: false, running: false }] }
      })

      const table = createBuiltinProviderTable({ runner: recordingRunner().runner, which: () => true })
      const result = computePlan(repo, { table, manifestRoot: getTemplatePluginsDir(), config })

      expect(result.plan).toEqual({
        'services.systemd': [
          { op: 'enable', name: 'nginx' },
          { op: 'start', name: 'nginx' }
        ]
      })
      expect(result.summary.total).toBe(2)
      expect(readLatestPlan(repo)).toEqual(result.plan)
    })

    it('should hand each provider its fragments wrapped under their names', () => {
      const manifestRoot = path.join(repo, 'plugins')
      writeManifest(manifestRoot, 'multi', { name: 'multi', fragments: ['one', 'two'] })
      writeYaml(path.join(repo, 'state', 'one.yaml'), { one: { v: 1 } })

      const seen: Array<[Document, Document]> = []
      const provider = new FakeConfigProvider('multi', {
        fragments: ['one', 'two'],
        actions: (desired, live) => {
          seen.push([desired, live])
          return []
        }
      })

      computePlan(repo, {
        table: tableOf({ multi: provider }),
        manifestRoot,
        config: normalizeConfig({ providers: { enable: ['multi'] } })
      })

      expect(seen).toEqual([
        [{ one: { v: 1 } }, { one: {} }],
        [{ two: {} }, { two: {} }]
      ])
    })

    it('should keep the last entry when several fragments of one provider plan', () => {
      const manifestRoot = path.join(repo, 'plugins')
      writeManifest(manifestRoot, 'multi', { name: 'multi', fragments: ['one', 'two'] })
      const provider = new FakeConfigProvider('multi', {
        fragments: ['one', 'two'],
        actions: desired => [{ op: 'touch', fragment: Object.keys(desired)[0] }]
      })

      const result = computePlan(repo, {
        table: tableOf({ multi: provider }),
        manifestRoot,
        config: normalizeConfig({ providers: { enable: ['multi'] } })
      })
      expect(result.plan).toEqual({ multi: [{ op: 'touch', fragment: 'two' }] })
    })

    it('should write byte-identical plans for unchanged inputs', () => {
      writeYaml(path.join(repo, 'state', 'services.yaml'), {
        services: { services: [{ name: 'cron', enabled: true, running: true }] }
      })
      const table = createBuiltinProviderTable({ runner: recordingRunner().runner, which: () => true })
      const options = { table, manifestRoot: getTemplatePluginsDir(), config }

      computePlan(repo, options)
      const first = readText(getPlanPath(repo))
      computePlan(repo, options)
      expect(readText(getPlanPath(repo))).toBe(first)
    })

    it('should record providers with nothing to do as empty lists', () => {
      const table = createBuiltinProviderTable({ runner: recordingRunner().runner, which: () => true })
      const result = computePlan(repo, { table, manifestRoot: getTemplatePluginsDir(), config })
      expect(result.plan).toEqual({ 'services.systemd': [] })
      expect(fs.existsSync(getPlanPath(repo))).toBe(true)
    })
  })
})
