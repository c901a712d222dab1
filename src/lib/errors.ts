/**
 * devtwin Error Hierarchy
 *
 * Typed error classes for the CLI and programmatic usage.
 *
 * Hierarchy:
 *   DevtwinError (base)
 *   ├── ConfigError (configuration issues)
 *   │   └── InvalidConfigError
 *   ├── ProviderError (provider manifests and instances)
 *   │   ├── ProviderConstructionError
 *   │   ├── ProviderRuntimeError
 *   │   ├── InvalidManifestError
 *   │   └── FragmentOwnershipError
 *   ├── RepositoryError (on-disk repository)
 *   │   ├── RepositoryLayoutError
 *   │   ├── RepositoryLockedError
 *   │   └── InvalidDocumentError
 *   └── OperationError (operational failures)
 *       └── ExternalCommandError
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all devtwin errors
 */
export class DevtwinError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'DevtwinError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends DevtwinError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Provider Errors
// =============================================================================

export class ProviderError extends DevtwinError {
  /** Name of the provider involved */
  readonly provider: string

  constructor(provider: string, message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ProviderError'
    this.provider = provider
  }
}

/**
 * Thrown when a manifest's entrypoint cannot be turned into an instance.
 * Aborts registry loading.
 */
export class ProviderConstructionError extends ProviderError {
  constructor(provider: string, entrypoint: string, reason: string, cause?: unknown) {
    super(
      provider,
      `Cannot construct provider "${provider}" from entrypoint "${entrypoint}": ${reason}`,
      'PROVIDER_CONSTRUCTION_FAILED',
      {
        suggestion: 'Check the entrypoint in plugins/<name>/plugin.yaml or re-run "devtwin init" to restore bundled manifests',
        context: { provider, entrypoint },
        cause
      }
    )
    this.name = 'ProviderConstructionError'
  }
}

/**
 * Raised by the engine when a provider throws while dumping state or logs.
 * Captured into results rather than propagated.
 */
export class ProviderRuntimeError extends ProviderError {
  readonly operation: string

  constructor(provider: string, operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      provider,
      `Provider "${provider}" failed during ${operation}: ${reason}`,
      'PROVIDER_RUNTIME_FAILED',
      {
        context: { provider, operation },
        cause
      }
    )
    this.name = 'ProviderRuntimeError'
    this.operation = operation
  }
}

/**
 * Thrown when a plugin.yaml cannot be parsed into a manifest
 */
export class InvalidManifestError extends ProviderError {
  constructor(provider: string, manifestPath: string, reason: string) {
    super(
      provider,
      `Invalid provider manifest ${manifestPath}: ${reason}`,
      'INVALID_MANIFEST',
      {
        suggestion: 'Manifests need a name and a kind of "config" or "logs"',
        context: { manifestPath }
      }
    )
    this.name = 'InvalidManifestError'
  }
}

/**
 * Thrown when two enabled providers declare the same state fragment
 */
export class FragmentOwnershipError extends ProviderError {
  readonly fragment: string
  readonly owners: string[]

  constructor(fragment: string, owners: string[]) {
    super(
      owners[owners.length - 1] ?? '',
      `State fragment "${fragment}" is declared by more than one enabled provider: ${owners.join(', ')}`,
      'FRAGMENT_OWNERSHIP_CONFLICT',
      {
        suggestion: 'Disable one of the providers in config.yaml (providers.enable)',
        context: { fragment, owners }
      }
    )
    this.name = 'FragmentOwnershipError'
    this.fragment = fragment
    this.owners = owners
  }
}

// =============================================================================
// Repository Errors
// =============================================================================

export class RepositoryError extends DevtwinError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'RepositoryError'
  }
}

/**
 * Thrown when the repository layout cannot be created or read
 */
export class RepositoryLayoutError extends RepositoryError {
  constructor(repoRoot: string, reason: string, cause?: unknown) {
    super(
      `Unusable repository at ${repoRoot}: ${reason}`,
      'REPOSITORY_LAYOUT',
      {
        suggestion: 'Run "devtwin init" or pass --repo <dir>',
        context: { repoRoot },
        cause
      }
    )
    this.name = 'RepositoryLayoutError'
  }
}

/**
 * Thrown when another live process holds the repository lock
 */
export class RepositoryLockedError extends RepositoryError {
  readonly pid: number

  constructor(lockPath: string, pid: number) {
    super(
      `Repository is locked by process ${pid}`,
      'REPOSITORY_LOCKED',
      {
        suggestion: `Wait for the other devtwin run to finish, or remove ${lockPath} if it is not running`,
        context: { lockPath, pid }
      }
    )
    this.name = 'RepositoryLockedError'
    this.pid = pid
  }
}

/**
 * Thrown when a state, live, plan or log document is not a mapping
 */
export class InvalidDocumentError extends RepositoryError {
  constructor(documentPath: string, reason: string, cause?: unknown) {
    super(
      `Invalid document ${documentPath}: ${reason}`,
      'INVALID_DOCUMENT',
      {
        suggestion: 'Documents must be YAML mappings; fix or delete the file',
        context: { documentPath },
        cause
      }
    )
    this.name = 'InvalidDocumentError'
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

export class OperationError extends DevtwinError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'OperationError'
  }
}

/**
 * A system command exited non-zero
 */
export class ExternalCommandError extends OperationError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string

  constructor(command: string, exitCode: number, stderr: string) {
    const detail = stderr.trim()
    super(
      `Command failed (exit ${exitCode}): ${command}${detail ? `\n${detail}` : ''}`,
      'EXTERNAL_COMMAND_FAILED',
      {
        context: { command, exitCode }
      }
    )
    this.name = 'ExternalCommandError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isDevtwinError(error: unknown): error is DevtwinError {
  return error instanceof DevtwinError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError
}

export function isRepositoryError(error: unknown): error is RepositoryError {
  return error instanceof RepositoryError
}

export function isOperationError(error: unknown): error is OperationError {
  return error instanceof OperationError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isDevtwinError(error)) {
    return error.toCliOutput()
  }
  return `Error: ${errorMessage(error)}`
}

/**
 * Wrap a generic error into a DevtwinError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): DevtwinError {
  if (isDevtwinError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new DevtwinError(error.message, defaultCode, { cause: error })
  }
  return new DevtwinError(String(error), defaultCode)
}
