/**
 * files.mirror: text files under the configured filesystem roots
 *
 * Each file is recorded with its content, a truncated sha256 and metadata.
 * Binary files (NUL in the first 512 bytes) and files above max_size_mb
 * are not mirrored. Live-only files are never deleted. Files and folders
 * that cannot be read are left out and reported as warnings.
 */

import crypto from 'node:crypto'
import fs from 'node:fs'
import path from 'node:path'
import type { Document } from '../types.js'
import { errorMessage } from '../lib/errors.js'
import { getFilesystemRoots } from '../lib/config-loader.js'
import { BaseConfigProvider, type Action, type ActionOutcome, type PlanDocument, type TwinContext } from '../domain/types.js'
import {
  BACKUP_SUFFIX,
  compactTimestamp,
  indexBy,
  payloadOf,
  rejected,
  resolveOptions,
  stringField,
  type ProviderOptions,
  type ResolvedProviderOptions
} from './shared.js'

export const FILES_FRAGMENT = 'files'

const DEFAULT_MAX_SIZE_MB = 1
const SNIFF_BYTES = 512

export function contentHash(content: string): string {
  return crypto.createHash('sha256').update(content, 'utf-8').digest('hex').slice(0, 16)
}

export function formatMode(mode: number): string {
  return (mode & 0o7777).toString(8).padStart(4, '0')
}

/**
 * Regular file, not above the size limit, no NUL byte in its head
 */
export function isTextFile(filePath: string, maxBytes: number): boolean {
  const stat = fs.statSync(filePath)
  if (!stat.isFile() || stat.size > maxBytes) return false

  const fd = fs.openSync(filePath, 'r')
  try {
    const head = Buffer.alloc(SNIFF_BYTES)
    const read = fs.readSync(fd, head, 0, SNIFF_BYTES, 0)
    return !head.subarray(0, read).includes(0)
  } finally {
    fs.closeSync(fd)
  }
}

export interface MirrorReader {
  readdir: (dir: string) => fs.Dirent[]
  readFile: (filePath: string) => string
}

const defaultReader: MirrorReader = {
  readdir: dir => fs.readdirSync(dir, { withFileTypes: true }),
  readFile: filePath => fs.readFileSync(filePath, 'utf-8')
}

export interface MirrorFilesOptions extends ProviderOptions {
  reader?: Partial<MirrorReader>
}

function describeReadError(target: string, err: unknown): string {
  const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : errorMessage(err)
  return `unreadable ${target} (${code})`
}

/**
 * Regular files below dir, sorted; symlinks are not followed.
 * Folders that cannot be listed are reported into skipped.
 */
export function walkFiles(
  dir: string,
  skipped: string[] = [],
  readdir: MirrorReader['readdir'] = defaultReader.readdir
): string[] {
  let entries: fs.Dirent[]
  try {
    entries = readdir(dir)
  } catch (err) {
    skipped.push(describeReadError(dir, err))
    return []
  }

  const files: string[] = []
  for (const entry of [...entries].sort((a, b) => a.name.localeCompare(b.name))) {
    const full = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      files.push(...walkFiles(full, skipped, readdir))
    } else if (entry.isFile()) {
      files.push(full)
    }
  }
  return files
}

export class MirrorFilesProvider extends BaseConfigProvider {
  readonly name: string
  private readonly options: ResolvedProviderOptions
  private readonly reader: MirrorReader
  private warnings: string[] = []

  constructor(options: MirrorFilesOptions = {}) {
    super()
    this.options = resolveOptions('files.mirror', options)
    this.name = this.options.name
    this.reader = { ...defaultReader, ...options.reader }
  }

  takeWarnings(): string[] {
    const warnings = this.warnings
    this.warnings = []
    return warnings
  }

  dumpState(context: TwinContext): Document {
    const maxBytes = (context.config.files?.max_size_mb ?? DEFAULT_MAX_SIZE_MB) * 1024 * 1024
    const files: Document[] = []
    const skipped: string[] = []

    for (const rootSetting of getFilesystemRoots(context.config)) {
      const root = path.resolve(rootSetting)
      if (root === path.parse(root).root) continue
      if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) continue

      for (const filePath of walkFiles(root, skipped, this.reader.readdir)) {
        try {
          if (!isTextFile(filePath, maxBytes)) continue
          const stat = fs.statSync(filePath)
          const content = this.reader.readFile(filePath)
          files.push({
            root,
            path: filePath,
            relative: path.relative(root, filePath),
            size: stat.size,
            mode: formatMode(stat.mode),
            mtime: Math.floor(stat.mtimeMs / 1000),
            content,
            hash: contentHash(content)
          })
        } catch (err) {
          skipped.push(describeReadError(filePath, err))
        }
      }
    }

    this.warnings = skipped
    return { [FILES_FRAGMENT]: { files } }
  }

  plan(desired: Document, live: Document): PlanDocument {
    const wanted = indexBy(payloadOf(desired, FILES_FRAGMENT), 'files', 'path')
    const current = indexBy(payloadOf(live, FILES_FRAGMENT), 'files', 'path')

    const actions: Action[] = []
    for (const [filePath, file] of wanted) {
      const observed = current.get(filePath)
      if (!observed) {
        actions.push({ op: 'create', path: filePath, content: file.content ?? null, mode: file.mode ?? null })
      } else if (file.hash !== observed.hash) {
        actions.push({ op: 'replace', path: filePath, content: file.content ?? null, mode: file.mode ?? null })
      }
    }

    return { [this.name]: actions }
  }

  apply(actions: Action[]): ActionOutcome[] {
    return actions.map(action => {
      const filePath = stringField(action.path)
      if (!filePath) return rejected(action, 'action has no path')

      try {
        if (action.op === 'create') {
          fs.mkdirSync(path.dirname(filePath), { recursive: true })
          this.write(filePath, action)
          return { action, ok: true }
        }
        if (action.op === 'replace') {
          const backup = this.backup(filePath)
          this.write(filePath, action)
          return { action, ok: true, message: backup ? `backup ${backup}` : undefined }
        }
        return rejected(action, `unsupported op "${action.op}"`)
      } catch (err) {
        if (err instanceof Error && 'code' in err && (err.code === 'EACCES' || err.code === 'EPERM')) {
          return rejected(action, `permission denied for ${filePath} (may need sudo)`)
        }
        return rejected(action, `${action.op} ${filePath} failed: ${errorMessage(err)}`)
      }
    })
  }

  private write(filePath: string, action: Action): void {
    const content = stringField(action.content)
    if (content !== undefined) {
      fs.writeFileSync(filePath, content, 'utf-8')
    }
    const mode = stringField(action.mode)
    if (mode && /^[0-7]{3,4}$/.test(mode)) {
      fs.chmodSync(filePath, Number.parseInt(mode, 8))
    }
  }

  private backup(filePath: string): string | null {
    if (!fs.existsSync(filePath)) return null
    const backupPath = `${filePath}${BACKUP_SUFFIX}${compactTimestamp(this.options.now())}`
    fs.copyFileSync(filePath, backupPath)
    return backupPath
  }
}
