/**
 * devtwin Provider Registry
 *
 * Discovers provider manifests (plugins/<dir>/plugin.yaml), filters them by
 * kind and enablement, constructs instances through a registration table
 * and drops providers whose detect() reports unavailable.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { Document } from '../types.js'
import { loadDocument } from '../lib/documents.js'
import { isProviderEnabled } from '../lib/config-loader.js'
import { MANIFEST_FILE, getPluginsDir, getTemplatePluginsDir } from '../lib/paths.js'
import {
  FragmentOwnershipError,
  InvalidManifestError,
  ProviderConstructionError,
  errorMessage
} from '../lib/errors.js'
import type {
  ConfigProvider,
  LoadedProvider,
  LogsProvider,
  ProviderKind,
  ProviderManifest,
  TwinContext
} from './types.js'
import { PROVIDER_KINDS } from './types.js'

// ============================================================================
// Registration table
// ============================================================================

export type ProviderRegistration =
  | { kind: 'config'; create: (manifest: ProviderManifest) => ConfigProvider }
  | { kind: 'logs'; create: (manifest: ProviderManifest) => LogsProvider }

/**
 * entrypoint → factory
 */
export class ProviderTable {
  private readonly entries = new Map<string, ProviderRegistration>()

  registerConfig(entrypoint: string, create: (manifest: ProviderManifest) => ConfigProvider): this {
    this.entries.set(entrypoint, { kind: 'config', create })
    return this
  }

  registerLogs(entrypoint: string, create: (manifest: ProviderManifest) => LogsProvider): this {
    this.entries.set(entrypoint, { kind: 'logs', create })
    return this
  }

  get(entrypoint: string): ProviderRegistration | undefined {
    return this.entries.get(entrypoint)
  }

  has(entrypoint: string): boolean {
    return this.entries.has(entrypoint)
  }

  keys(): string[] {
    return [...this.entries.keys()].sort()
  }
}

// ============================================================================
// Manifest discovery
// ============================================================================

function isProviderKind(value: unknown): value is ProviderKind {
  return PROVIDER_KINDS.some(kind => kind === value)
}

function stringItems(value: Document[string] | undefined): string[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === 'string')
}

/**
 * Parse one manifest directory. Missing name ⇒ directory name, missing kind ⇒ config.
 */
export function parseManifest(manifestDir: string): ProviderManifest {
  const manifestFile = path.join(manifestDir, MANIFEST_FILE)
  const data = loadDocument(manifestFile)
  const dirName = path.basename(manifestDir)

  const name = typeof data.name === 'string' && data.name ? data.name : dirName

  const rawKind = data.kind ?? 'config'
  if (!isProviderKind(rawKind)) {
    throw new InvalidManifestError(name, manifestFile, `unknown kind "${String(rawKind)}"`)
  }

  const provides = data.provides
  const fragments = typeof provides === 'object' && provides !== null && !Array.isArray(provides)
    ? stringItems(provides.state_fragments)
    : []

  const entrypoint = typeof data.entrypoint === 'string' && data.entrypoint ? data.entrypoint : name

  return {
    name,
    kind: rawKind,
    provides: { state_fragments: fragments },
    dependencies: stringItems(data.dependencies),
    entrypoint,
    description: typeof data.description === 'string' ? data.description : undefined,
    manifestPath: manifestDir
  }
}

/**
 * Manifests under manifestRoot, keyed by name, in sorted directory order
 */
export function discoverManifests(manifestRoot: string): Map<string, ProviderManifest> {
  const manifests = new Map<string, ProviderManifest>()
  if (!fs.existsSync(manifestRoot)) return manifests

  const dirs = fs.readdirSync(manifestRoot, { withFileTypes: true })
    .filter(e => e.isDirectory())
    .map(e => e.name)
    .sort()

  for (const dir of dirs) {
    const manifestDir = path.join(manifestRoot, dir)
    if (!fs.existsSync(path.join(manifestDir, MANIFEST_FILE))) continue
    const manifest = parseManifest(manifestDir)
    manifests.set(manifest.name, manifest)
  }

  return manifests
}

/**
 * <repo>/plugins, or the bundled set when the repository has none
 */
export function resolveManifestRoot(repoRoot: string): string {
  const repoPlugins = getPluginsDir(repoRoot)
  if (discoverManifests(repoPlugins).size > 0) return repoPlugins
  return getTemplatePluginsDir()
}

// ============================================================================
// Loading
// ============================================================================

export interface LoadProvidersOptions {
  table: ProviderTable
  /** Override manifest discovery root */
  manifestRoot?: string
}

function enabledManifests(context: TwinContext, kind: ProviderKind, manifestRoot?: string): ProviderManifest[] {
  const root = manifestRoot ?? resolveManifestRoot(context.repoRoot)
  return [...discoverManifests(root).values()]
    .filter(m => m.kind === kind && isProviderEnabled(context.config, m.name))
}

function construct(manifest: ProviderManifest, table: ProviderTable): ProviderRegistration {
  const registration = table.get(manifest.entrypoint)
  if (!registration) {
    throw new ProviderConstructionError(manifest.name, manifest.entrypoint, 'no provider is registered under this entrypoint')
  }
  if (registration.kind !== manifest.kind) {
    throw new ProviderConstructionError(
      manifest.name,
      manifest.entrypoint,
      `entrypoint is a ${registration.kind} provider but the manifest declares kind "${manifest.kind}"`
    )
  }
  return registration
}

function wrapCreate<T>(manifest: ProviderManifest, create: (manifest: ProviderManifest) => T): T {
  try {
    return create(manifest)
  } catch (err) {
    throw new ProviderConstructionError(manifest.name, manifest.entrypoint, errorMessage(err), err)
  }
}

/**
 * Two enabled config providers may not declare the same fragment
 */
export function assertFragmentOwnership(manifests: ProviderManifest[]): void {
  const owners = new Map<string, string[]>()
  for (const manifest of manifests) {
    for (const fragment of manifest.provides.state_fragments) {
      const list = owners.get(fragment) ?? []
      list.push(manifest.name)
      owners.set(fragment, list)
    }
  }
  for (const [fragment, names] of owners) {
    if (names.length > 1) {
      throw new FragmentOwnershipError(fragment, names)
    }
  }
}

export function loadConfigProviders(context: TwinContext, options: LoadProvidersOptions): LoadedProvider<ConfigProvider>[] {
  const manifests = enabledManifests(context, 'config', options.manifestRoot)
  assertFragmentOwnership(manifests)

  const loaded: LoadedProvider<ConfigProvider>[] = []
  for (const manifest of manifests) {
    const registration = construct(manifest, options.table)
    if (registration.kind !== 'config') continue
    const instance = wrapCreate(manifest, registration.create)
    if (!instance.detect(context)) continue
    loaded.push({ manifest, instance })
  }
  return loaded
}

export function loadLogsProviders(context: TwinContext, options: LoadProvidersOptions): LoadedProvider<LogsProvider>[] {
  const manifests = enabledManifests(context, 'logs', options.manifestRoot)

  const loaded: LoadedProvider<LogsProvider>[] = []
  for (const manifest of manifests) {
    const registration = construct(manifest, options.table)
    if (registration.kind !== 'logs') continue
    const instance = wrapCreate(manifest, registration.create)
    if (!instance.detect(context)) continue
    loaded.push({ manifest, instance })
  }
  return loaded
}

// ============================================================================
// Listing (for `devtwin providers`)
// ============================================================================

export interface ProviderListing {
  manifest: ProviderManifest
  enabled: boolean
  registered: boolean
  available: boolean | null
}

/**
 * Every discovered manifest with enablement and availability.
 * available is null when the provider cannot be constructed.
 */
export function listProviders(context: TwinContext, options: LoadProvidersOptions): ProviderListing[] {
  const root = options.manifestRoot ?? resolveManifestRoot(context.repoRoot)

  return [...discoverManifests(root).values()].map(manifest => {
    const registration = options.table.get(manifest.entrypoint)
    const registered = registration !== undefined && registration.kind === manifest.kind
    let available: boolean | null = null
    if (registration && registered) {
      try {
        available = registration.create(manifest).detect(context)
      } catch {
        available = null
      }
    }
    return { manifest, enabled: isProviderEnabled(context.config, manifest.name), registered, available }
  })
}
