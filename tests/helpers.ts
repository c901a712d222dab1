/**
 * Test fixtures: temp repositories, recording command runners, manifests
 * and in-memory providers.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { stringify as stringifyYaml } from 'yaml'
import type { Document } from '../src/types.js'
import type { CommandOptions, CommandResult, CommandRunner } from '../src/lib/exec.js'
import { ProviderTable } from '../src/domain/registry.js'
import {
  BaseConfigProvider,
  BaseLogsProvider,
  type Action,
  type ActionOutcome,
  type PlanDocument,
  type TwinContext
} from '../src/domain/types.js'

export function makeTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `devtwin-${label}-`))
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}

// ============================================================================
// Command runner
// ============================================================================

export interface RecordedCall {
  command: string
  args: string[]
  options?: CommandOptions
}

export type Responder = (command: string, args: string[]) => Partial<CommandResult> | undefined

/**
 * Runner that records every call; unmatched calls exit 0 with no output
 */
export function recordingRunner(respond: Responder = () => undefined): { runner: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = []
  const runner: CommandRunner = (command, args, options) => {
    calls.push({ command, args, options })
    const response = respond(command, args) ?? {}
    return {
      code: response.code ?? 0,
      stdout: response.stdout ?? '',
      stderr: response.stderr ?? ''
    }
  }
  return { runner, calls }
}

export function commandLines(calls: RecordedCall[]): string[] {
  return calls.map(call => [call.command, ...call.args].join(' '))
}

// ============================================================================
// Manifests
// ============================================================================

export interface ManifestSpec {
  name?: string
  kind?: string
  fragments?: string[]
  entrypoint?: string
}

export function writeManifest(root: string, dir: string, spec: ManifestSpec): void {
  const manifestDir = path.join(root, dir)
  fs.mkdirSync(manifestDir, { recursive: true })
  const data: Record<string, unknown> = {}
  if (spec.name !== undefined) data.name = spec.name
  if (spec.kind !== undefined) data.kind = spec.kind
  if (spec.fragments !== undefined) data.provides = { state_fragments: spec.fragments }
  if (spec.entrypoint !== undefined) data.entrypoint = spec.entrypoint
  fs.writeFileSync(path.join(manifestDir, 'plugin.yaml'), stringifyYaml(data), 'utf-8')
}

export function writeYaml(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.writeFileSync(filePath, stringifyYaml(data), 'utf-8')
}

export function readText(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8')
}

// ============================================================================
// In-memory providers
// ============================================================================

export interface FakeConfigBehavior {
  fragments: string[]
  dump?: (context: TwinContext) => Document
  actions?: (desired: Document, live: Document) => Action[]
  apply?: (actions: Action[]) => ActionOutcome[]
  available?: boolean
}

/**
 * Records apply() calls; plan() emits one `set` per fragment whose payloads differ
 */
export class FakeConfigProvider extends BaseConfigProvider {
  readonly applied: Action[][] = []

  constructor(readonly name: string, private readonly behavior: FakeConfigBehavior) {
    super()
  }

  detect(): boolean {
    return this.behavior.available ?? true
  }

  dumpState(context: TwinContext): Document {
    if (this.behavior.dump) return this.behavior.dump(context)
    const result: Document = {}
    for (const fragment of this.behavior.fragments) {
      result[fragment] = { owner: this.name }
    }
    return result
  }

  plan(desired: Document, live: Document): PlanDocument {
    if (this.behavior.actions) {
      return { [this.name]: this.behavior.actions(desired, live) }
    }
    const actions: Action[] = []
    for (const fragment of this.behavior.fragments) {
      if (fragment in desired && JSON.stringify(desired[fragment]) !== JSON.stringify(live[fragment])) {
        actions.push({ op: 'set', fragment })
      }
    }
    return { [this.name]: actions }
  }

  apply(actions: Action[]): ActionOutcome[] {
    this.applied.push(actions)
    if (this.behavior.apply) return this.behavior.apply(actions)
    return actions.map(action => ({ action, ok: true }))
  }
}

export class FakeLogsProvider extends BaseLogsProvider {
  constructor(readonly name: string, private readonly logs: () => Document) {
    super()
  }

  dumpLogs(): Document {
    return this.logs()
  }
}

/**
 * Table whose entrypoints hand out the given instances
 */
export function tableOf(
  config: Record<string, FakeConfigProvider>,
  logs: Record<string, FakeLogsProvider> = {}
): ProviderTable {
  const table = new ProviderTable()
  for (const [entrypoint, provider] of Object.entries(config)) {
    table.registerConfig(entrypoint, () => provider)
  }
  for (const [entrypoint, provider] of Object.entries(logs)) {
    table.registerLogs(entrypoint, () => provider)
  }
  return table
}
