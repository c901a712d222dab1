/**
 * Built-in providers and their registration table
 */

import { ProviderTable } from '../domain/registry.js'
import type { CommandRunner } from '../lib/exec.js'
import { DebianPackagesProvider } from './packages-debian.js'
import { SystemdServicesProvider } from './services-systemd.js'
import { MirrorFilesProvider } from './files-mirror.js'
import { CronUserProvider } from './cron-user.js'
import { SystemInfoProvider } from './system-info.js'
import { SystemdJournalLogsProvider } from './logs-journal.js'
import { FilesLogsProvider } from './logs-files.js'

export { DebianPackagesProvider } from './packages-debian.js'
export { SystemdServicesProvider } from './services-systemd.js'
export { MirrorFilesProvider, type MirrorFilesOptions, type MirrorReader } from './files-mirror.js'
export { CronUserProvider } from './cron-user.js'
export { SystemInfoProvider } from './system-info.js'
export { SystemdJournalLogsProvider } from './logs-journal.js'
export { FilesLogsProvider } from './logs-files.js'
export type { ProviderOptions } from './shared.js'

export interface BuiltinTableOptions {
  runner?: CommandRunner
  which?: (command: string) => boolean
}

/**
 * Entry points are the built-in provider names. The manifest name is passed
 * through so plan entries are keyed by what the manifest declares.
 */
export function createBuiltinProviderTable(options: BuiltinTableOptions = {}): ProviderTable {
  const { runner, which } = options
  return new ProviderTable()
    .registerConfig('packages.debian', m => new DebianPackagesProvider({ name: m.name, runner, which }))
    .registerConfig('services.systemd', m => new SystemdServicesProvider({ name: m.name, runner, which }))
    .registerConfig('files.mirror', m => new MirrorFilesProvider({ name: m.name, runner, which }))
    .registerConfig('cron.user', m => new CronUserProvider({ name: m.name, runner, which }))
    .registerConfig('system.info', m => new SystemInfoProvider({ name: m.name, runner, which }))
    .registerLogs('logs.systemd_journal', m => new SystemdJournalLogsProvider({ name: m.name, runner, which }))
    .registerLogs('logs.files', m => new FilesLogsProvider({ name: m.name }))
}
