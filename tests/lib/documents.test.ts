/**
 * Tests for the YAML document store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import {
  asDocument,
  documentList,
  dumpDocument,
  formatDocument,
  listDocuments,
  loadDocument,
  parseDocument,
  toDocumentValue
} from '../../src/lib/documents.js'
import { InvalidDocumentError } from '../../src/lib/errors.js'
import { makeTempDir, removeDir } from '../helpers.js'

describe('documents', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = makeTempDir('documents')
  })

  afterEach(() => {
    removeDir(tempDir)
  })

  describe('parseDocument', () => {
    it('should read blank text as an empty mapping', () => {
      expect(parseDocument('')).toEqual({})
      expect(parseDocument('   \n')).toEqual({})
      expect(parseDocument('# only a comment\n')).toEqual({})
    })

    it('should parse nested mappings and lists', () => {
      const doc = parseDocument('services:\n  services:\n    - name: nginx\n      enabled: true\n')
      expect(doc).toEqual({ services: { services: [{ name: 'nginx', enabled: true }] } })
    })

    it('should reject a top-level list', () => {
      expect(() => parseDocument('- a\n- b\n', 'state/x.yaml')).toThrow(InvalidDocumentError)
      expect(() => parseDocument('- a\n', 'state/x.yaml')).toThrow('expected a mapping, got a list')
    })

    it('should reject a top-level scalar', () => {
      expect(() => parseDocument('42', 'x')).toThrow('expected a mapping, got number')
    })

    it('should wrap YAML syntax errors', () => {
      expect(() => parseDocument('a: [1, 2', 'broken.yaml')).toThrow(InvalidDocumentError)
    })
  })

  describe('toDocumentValue', () => {
    it('should map undefined to null and dates to ISO strings', () => {
      expect(toDocumentValue(undefined)).toBeNull()
      expect(toDocumentValue(new Date('2024-01-02T03:04:05.000Z'))).toBe('2024-01-02T03:04:05.000Z')
      expect(toDocumentValue({ a: [1, undefined] })).toEqual({ a: [1, null] })
    })
  })

  describe('asDocument / documentList', () => {
    it('should fall back to an empty mapping for non-mappings', () => {
      expect(asDocument([1, 2])).toEqual({})
      expect(asDocument('text')).toEqual({})
      expect(asDocument({ k: 'v' })).toEqual({ k: 'v' })
    })

    it('should keep only mapping items of a list', () => {
      expect(documentList([{ a: 1 }, 'x', null, [1], { b: 2 }])).toEqual([{ a: 1 }, { b: 2 }])
      expect(documentList('not a list')).toEqual([])
      expect(documentList(undefined)).toEqual([])
    })
  })

  describe('files', () => {
    it('should read a missing file as an empty mapping', () => {
      expect(loadDocument(path.join(tempDir, 'missing.yaml'))).toEqual({})
    })

    it('should create parent directories when dumping', () => {
      const file = path.join(tempDir, 'live', 'cron.yaml')
      dumpDocument(file, { cron: { content: '', entries: [] } })
      expect(loadDocument(file)).toEqual({ cron: { content: '', entries: [] } })
    })

    it('should produce byte-identical output for equal data', () => {
      const data = { files: { files: [{ path: '/etc/app.conf', content: 'x=1\n' }] } }
      expect(formatDocument(data)).toBe(formatDocument(structuredClone(data)))
    })

    it('should list .yaml documents sorted, ignoring other files and directories', () => {
      fs.writeFileSync(path.join(tempDir, 'services.yaml'), '{}')
      fs.writeFileSync(path.join(tempDir, 'cron.yaml'), '{}')
      fs.writeFileSync(path.join(tempDir, 'notes.txt'), '')
      fs.mkdirSync(path.join(tempDir, 'dir.yaml'))
      expect(listDocuments(tempDir)).toEqual(['cron', 'services'])
      expect(listDocuments(path.join(tempDir, 'nope'))).toEqual([])
    })
  })
})
