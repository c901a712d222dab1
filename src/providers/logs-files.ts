/**
 * logs.files: size and freshness of the log files listed in logs.paths
 */

import fs from 'node:fs'
import path from 'node:path'
import type { Document } from '../types.js'
import { expandHome } from '../lib/paths.js'
import { BaseLogsProvider, type TwinContext } from '../domain/types.js'
import { resolveOptions, type ProviderOptions } from './shared.js'

export const FILES_LOG_KEY = 'files'

export class FilesLogsProvider extends BaseLogsProvider {
  readonly name: string

  constructor(options: ProviderOptions = {}) {
    super()
    this.name = resolveOptions('logs.files', options).name
  }

  dumpLogs(context: TwinContext): Document {
    const items: Document[] = []

    for (const setting of context.config.logs?.paths ?? []) {
      const filePath = path.resolve(expandHome(setting))
      if (!fs.existsSync(filePath)) {
        items.push({ path: filePath, exists: false })
        continue
      }
      const stat = fs.statSync(filePath)
      items.push({
        path: filePath,
        exists: true,
        size: stat.size,
        mtime: Math.floor(stat.mtimeMs / 1000)
      })
    }

    return {
      [FILES_LOG_KEY]: {
        entries: items.filter(item => item.exists === true).length,
        items
      }
    }
  }
}
