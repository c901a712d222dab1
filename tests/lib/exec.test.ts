/**
 * Tests for exec.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import { checkDependencies, commandExists, formatCommand, runChecked } from '../../src/lib/exec.js'
import { ExternalCommandError } from '../../src/lib/errors.js'
import { makeTempDir, recordingRunner, removeDir } from '../helpers.js'

describe('exec', () => {
  let binDir: string

  beforeEach(() => {
    binDir = makeTempDir('bin')
    const tool = path.join(binDir, 'fake-tool')
    fs.writeFileSync(tool, '#!/bin/sh\nexit 0\n')
    fs.chmodSync(tool, 0o755)
    fs.writeFileSync(path.join(binDir, 'not-executable'), '')
    fs.chmodSync(path.join(binDir, 'not-executable'), 0o644)
  })

  afterEach(() => {
    removeDir(binDir)
  })

  describe('formatCommand', () => {
    it('should quote arguments containing whitespace', () => {
      expect(formatCommand('dpkg-query', ['-W', '-f=${Package}\t${Version}\n']))
        .toBe('dpkg-query -W "-f=${Package}\\t${Version}\\n"')
      expect(formatCommand('systemctl', ['start', 'nginx'])).toBe('systemctl start nginx')
    })
  })

  describe('runChecked', () => {
    it('should return the result on success', () => {
      const { runner } = recordingRunner(() => ({ stdout: 'ok' }))
      expect(runChecked(runner, 'true', []).stdout).toBe('ok')
    })

    it('should throw ExternalCommandError on non-zero exit', () => {
      const { runner } = recordingRunner(() => ({ code: 2, stderr: 'denied' }))
      expect(() => runChecked(runner, 'crontab', ['-l'])).toThrow(ExternalCommandError)
      expect(() => runChecked(runner, 'crontab', ['-l'])).toThrow('Command failed (exit 2): crontab -l\ndenied')
    })
  })

  describe('commandExists', () => {
    it('should find executables on PATH only', () => {
      const env = { PATH: binDir }
      expect(commandExists('fake-tool', env)).toBe(true)
      expect(commandExists('not-executable', env)).toBe(false)
      expect(commandExists('missing-tool', env)).toBe(false)
    })

    it('should probe paths directly', () => {
      expect(commandExists(path.join(binDir, 'fake-tool'), {})).toBe(true)
      expect(commandExists(binDir, {})).toBe(false)
    })

    it('should handle an empty PATH', () => {
      expect(commandExists('fake-tool', {})).toBe(false)
    })
  })

  describe('checkDependencies', () => {
    it('should report each command', () => {
      expect(checkDependencies(['fake-tool', 'missing-tool'], { PATH: binDir })).toEqual({
        'fake-tool': true,
        'missing-tool': false
      })
    })
  })
})
