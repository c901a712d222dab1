import type { CLIArgs } from '../../types.js'

/**
 * Resolved invocation handed to every command
 */
export interface CommandContext {
  args: CLIArgs
  repoRoot: string
  verbose: boolean
  quiet: boolean
  dryRun: boolean
  jsonOutput: boolean
}

/**
 * Process exit code
 */
export type ExitCode = 0 | 1
