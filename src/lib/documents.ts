/**
 * devtwin Document Store
 *
 * Load/dump of the YAML documents kept in the repository (state/, live/,
 * plan/, logs/). A missing or empty file reads as an empty mapping.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import type { Document, DocumentValue } from '../types.js'
import { InvalidDocumentError } from './errors.js'

export const DOCUMENT_EXT = '.yaml'

// ============================================================================
// Narrowing
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Normalize a parsed value into the document model
 */
export function toDocumentValue(value: unknown): DocumentValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (Array.isArray(value)) {
    return value.map(item => toDocumentValue(item))
  }
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (isRecord(value)) {
    const result: Record<string, DocumentValue> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = toDocumentValue(item)
    }
    return result
  }
  return String(value)
}

/**
 * Narrow a value to a mapping, or `{}` when it is anything else
 */
export function asDocument(value: unknown): Document {
  const normalized = toDocumentValue(value)
  return isDocument(normalized) ? normalized : {}
}

export function isDocument(value: DocumentValue | undefined): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Items of a list value that are mappings
 */
export function documentList(value: DocumentValue | undefined): Document[] {
  if (!Array.isArray(value)) return []
  return value.filter(isDocument)
}

// ============================================================================
// Text
// ============================================================================

export function parseDocument(text: string, source: string = '<inline>'): Document {
  if (!text.trim()) return {}

  let parsed: unknown
  try {
    parsed = parseYaml(text)
  } catch (err) {
    throw new InvalidDocumentError(source, err instanceof Error ? err.message : String(err), err)
  }

  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new InvalidDocumentError(source, `expected a mapping, got ${Array.isArray(parsed) ? 'a list' : typeof parsed}`)
  }
  return asDocument(parsed)
}

export function formatDocument(data: Document): string {
  return stringifyYaml(data, { lineWidth: 0 })
}

// ============================================================================
// Files
// ============================================================================

/**
 * Read a document; missing file ⇒ `{}`
 */
export function loadDocument(filePath: string): Document {
  if (!fs.existsSync(filePath)) return {}
  return parseDocument(fs.readFileSync(filePath, 'utf-8'), filePath)
}

/**
 * Write a document, creating parent directories
 */
export function dumpDocument(filePath: string, data: Document): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.writeFileSync(filePath, formatDocument(data), 'utf-8')
}

/**
 * Document names (without extension) in a directory, sorted
 */
export function listDocuments(dir: string): string[] {
  if (!fs.existsSync(dir)) return []
  return fs.readdirSync(dir, { withFileTypes: true })
    .filter(e => e.isFile() && e.name.endsWith(DOCUMENT_EXT))
    .map(e => e.name.slice(0, -DOCUMENT_EXT.length))
    .sort()
}
