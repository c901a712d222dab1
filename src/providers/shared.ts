/**
 * Helpers shared by the built-in providers
 */

import type { Document, DocumentValue } from '../types.js'
import { documentList, isDocument } from '../lib/documents.js'
import { commandExists, formatCommand, runCommand, type CommandResult, type CommandRunner } from '../lib/exec.js'
import type { Action, ActionOutcome } from '../domain/types.js'

export const BACKUP_SUFFIX = '.twinbak-'

export interface ProviderOptions {
  /** Provider key; defaults to the built-in name */
  name?: string
  runner?: CommandRunner
  /** PATH probe used by detect() */
  which?: (command: string) => boolean
  /** Clock for backup names */
  now?: () => Date
}

export interface ResolvedProviderOptions {
  name: string
  runner: CommandRunner
  which: (command: string) => boolean
  now: () => Date
}

export function resolveOptions(defaultName: string, options: ProviderOptions = {}): ResolvedProviderOptions {
  return {
    name: options.name ?? defaultName,
    runner: options.runner ?? runCommand,
    which: options.which ?? (command => commandExists(command)),
    now: options.now ?? (() => new Date())
  }
}

/**
 * Mapping items of `fragment[key]` that carry a string `name`, keyed by it
 */
export function indexBy(fragment: Document, listKey: string, field: string = 'name'): Map<string, Document> {
  const index = new Map<string, Document>()
  for (const item of documentList(fragment[listKey])) {
    const key = item[field]
    if (typeof key === 'string' && key) {
      index.set(key, item)
    }
  }
  return index
}

/**
 * Payload under a fragment key, or {}
 */
export function payloadOf(wrapped: Document, fragment: string): Document {
  const value = wrapped[fragment]
  return isDocument(value) ? value : {}
}

export function stringField(value: DocumentValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined
}

export function commandOutcome(action: Action, command: string, args: string[], result: CommandResult): ActionOutcome {
  if (result.code === 0) {
    return { action, ok: true }
  }
  const detail = result.stderr.trim() || result.stdout.trim()
  return {
    action,
    ok: false,
    message: `${formatCommand(command, args)} exited ${result.code}${detail ? `: ${detail}` : ''}`
  }
}

export function rejected(action: Action, message: string): ActionOutcome {
  return { action, ok: false, message }
}

/**
 * Local-time YYYYMMDDHHMMSS, used in backup file names
 */
export function compactTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
}

export function nonEmptyLines(text: string): string[] {
  return text.split('\n').filter(line => line.trim())
}
