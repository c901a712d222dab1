/**
 * Tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  DevtwinError,
  ConfigError,
  InvalidConfigError,
  ProviderError,
  ProviderConstructionError,
  ProviderRuntimeError,
  FragmentOwnershipError,
  RepositoryLockedError,
  ExternalCommandError,
  OperationError,
  isDevtwinError,
  isConfigError,
  isProviderError,
  isRepositoryError,
  isOperationError,
  errorMessage,
  formatErrorForCli,
  wrapError
} from '../../src/lib/errors.js'

describe('errors', () => {
  describe('hierarchy', () => {
    it('should keep instanceof across levels', () => {
      const err = new InvalidConfigError('bad key', '/repo/config.yaml')
      expect(err).toBeInstanceOf(InvalidConfigError)
      expect(err).toBeInstanceOf(ConfigError)
      expect(err).toBeInstanceOf(DevtwinError)
      expect(err).toBeInstanceOf(Error)
      expect(err.name).toBe('InvalidConfigError')
      expect(err.code).toBe('INVALID_CONFIG')
      expect(err.message).toBe('Invalid config in /repo/config.yaml: bad key')
      expect(err.context).toEqual({ configPath: '/repo/config.yaml' })
    })

    it('should carry the provider on provider errors', () => {
      const err = new ProviderConstructionError('services.systemd', 'nope', 'no provider is registered under this entrypoint')
      expect(err.provider).toBe('services.systemd')
      expect(err.message).toBe(
        'Cannot construct provider "services.systemd" from entrypoint "nope": no provider is registered under this entrypoint'
      )
      expect(isProviderError(err)).toBe(true)
    })

    it('should describe runtime failures with the operation and cause', () => {
      const cause = new Error('dpkg-query missing')
      const err = new ProviderRuntimeError('packages.debian', 'dumpState', cause)
      expect(err.operation).toBe('dumpState')
      expect(err.message).toBe('Provider "packages.debian" failed during dumpState: dpkg-query missing')
      expect(err.cause).toBe(cause)
    })

    it('should list every owner of a contested fragment', () => {
      const err = new FragmentOwnershipError('services', ['a.provider', 'b.provider'])
      expect(err.fragment).toBe('services')
      expect(err.owners).toEqual(['a.provider', 'b.provider'])
      expect(err.provider).toBe('b.provider')
      expect(err.message).toContain('a.provider, b.provider')
    })

    it('should expose the holder pid of a lock', () => {
      const err = new RepositoryLockedError('/repo/.devtwin.lock', 4242)
      expect(err.pid).toBe(4242)
      expect(isRepositoryError(err)).toBe(true)
      expect(err.message).toBe('Repository is locked by process 4242')
    })

    it('should append stderr to external command failures', () => {
      const err = new ExternalCommandError('systemctl is-active nginx', 3, 'inactive\n')
      expect(err).toBeInstanceOf(OperationError)
      expect(isOperationError(err)).toBe(true)
      expect(err.message).toBe('Command failed (exit 3): systemctl is-active nginx\ninactive')
      expect(err.exitCode).toBe(3)
    })
  })

  describe('guards', () => {
    it('should reject plain errors and non-errors', () => {
      expect(isDevtwinError(new Error('x'))).toBe(false)
      expect(isDevtwinError('x')).toBe(false)
      expect(isConfigError(new ProviderError('p', 'm', 'C'))).toBe(false)
    })
  })

  describe('formatting', () => {
    it('should render message and suggestion for the CLI', () => {
      const err = new DevtwinError('broken', 'X', { suggestion: 'fix it' })
      expect(formatErrorForCli(err)).toBe('Error: broken\n  Suggestion: fix it')
      expect(formatErrorForCli(new Error('plain'))).toBe('Error: plain')
      expect(formatErrorForCli('text')).toBe('Error: text')
    })

    it('should take the message of any thrown value', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom')
      expect(errorMessage(42)).toBe('42')
    })

    it('should wrap foreign errors and keep devtwin errors', () => {
      const own = new DevtwinError('mine', 'MINE')
      expect(wrapError(own)).toBe(own)

      const foreign = new Error('theirs')
      const wrapped = wrapError(foreign, 'FOREIGN')
      expect(wrapped.code).toBe('FOREIGN')
      expect(wrapped.message).toBe('theirs')
      expect(wrapped.cause).toBe(foreign)

      expect(wrapError('str').code).toBe('UNKNOWN_ERROR')
    })

    it('should serialize to JSON', () => {
      const json = new DevtwinError('m', 'C', { context: { a: 1 } }).toJSON()
      expect(json.code).toBe('C')
      expect(json.context).toEqual({ a: 1 })
    })
  })
})
