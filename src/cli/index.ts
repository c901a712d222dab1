#!/usr/bin/env node
/**
 * devtwin CLI
 *
 * Device-state reconciliation: snapshot, plan, apply, status
 */

import { createCLI, type CommandParseResult, type CLISchema } from 'cli-args-parser'
import type { CLIArgs } from '../types.js'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { c, print, devtwinFormatter } from './lib/colors.js'
import * as ui from './ui.js'
import { isDevtwinError, formatErrorForCli, errorMessage } from '../lib/errors.js'
import { resolveRepoRoot } from '../lib/paths.js'
import type { CommandContext, ExitCode } from './commands/types.js'

// CLI commands
import { runInit } from './commands/init.js'
import { runSnapshotCommand } from './commands/snapshot.js'
import { runPlan } from './commands/plan.js'
import { runApply } from './commands/apply.js'
import { runStatus } from './commands/status.js'
import { runLogs } from './commands/logs.js'
import { runPull, runPush, runHistory, runReset, runRemote } from './commands/git.js'
import { runConfig } from './commands/config.js'
import { runProviders } from './commands/providers.js'
import { runCheckDeps } from './commands/check-deps.js'

const VERSION = process.env.DEVTWIN_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  try {
    // Walk up from dist/cli or src/cli to the package root
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
          return pkg.version
        }
        return undefined
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch {
    return undefined
  }
}

/**
 * CLI Schema definition
 */
const cliSchema: CLISchema = {
  name: 'devtwin',
  version: VERSION,
  description: 'Snapshot, diff and reconcile the state of this machine',
  autoShort: false,
  strict: true,
  formatter: devtwinFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    repo: {
      short: 'r',
      type: 'string',
      description: 'Device repository (default: $DEVTWIN_REPO or ~/devtwin-device)'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Enable verbose output'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress non-essential output (errors still shown)'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output in JSON format'
    }
  },

  commands: {
    init: {
      description: 'Create the device repository and seed desired state from a first snapshot'
    },

    snapshot: {
      description: 'Capture live state into live/ and logs into logs/current',
      aliases: ['snap'],
      options: {
        commit: {
          type: 'boolean',
          default: false,
          description: 'Commit the repository afterwards'
        },
        push: {
          type: 'boolean',
          default: false,
          description: 'Commit and push afterwards'
        }
      }
    },

    plan: {
      description: 'Compute plan/latest.yaml from state/ and live/'
    },

    apply: {
      description: 'Execute plan/latest.yaml against this machine',
      options: {
        'dry-run': {
          type: 'boolean',
          default: false,
          description: 'Show what would be done without making changes'
        },
        yes: {
          short: 'y',
          type: 'boolean',
          default: false,
          description: 'Skip confirmation'
        }
      }
    },

    status: {
      description: 'Show drift between desired and live state per fragment'
    },

    logs: {
      description: 'Show the current log index'
    },

    pull: {
      description: 'Fast-forward the repository from its remote'
    },

    push: {
      description: 'Push the repository to its remote'
    },

    history: {
      description: 'Show recent commits',
      options: {
        limit: {
          short: 'n',
          type: 'number',
          default: 20,
          description: 'Number of commits'
        }
      }
    },

    reset: {
      description: 'Hard reset the repository to a commit',
      positional: [
        { name: 'commit', description: 'Commit to reset to', required: true }
      ]
    },

    remote: {
      description: 'Configure the git remote (https://<user>:<token>@<host>/<user>/<name>.git)',
      options: {
        user: {
          type: 'string',
          description: 'Account name on the git host'
        },
        token: {
          type: 'string',
          description: 'Access token (stored in config.local.yaml)'
        },
        name: {
          type: 'string',
          description: 'Repository name (default: twin-<hostname>)'
        },
        host: {
          type: 'string',
          description: 'Git host (default: github.com)'
        }
      }
    },

    config: {
      description: 'Show configuration or manage filesystem roots (show | path | roots <dir...>)'
    },

    providers: {
      description: 'List provider manifests and their availability'
    },

    'check-deps': {
      description: 'Check that required system commands are installed'
    }
  }
}

// ============================================================================
// Option narrowing
// ============================================================================

function optString(opts: Record<string, unknown>, key: string): string | undefined {
  const value = opts[key]
  return typeof value === 'string' && value ? value : undefined
}

function optBoolean(opts: Record<string, unknown>, key: string): boolean {
  return opts[key] === true
}

function optNumber(opts: Record<string, unknown>, key: string): number | undefined {
  const value = opts[key]
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number.parseInt(value, 10)
  return undefined
}

/**
 * Convert parsed result into CLIArgs
 */
export function toCliArgs(result: CommandParseResult): CLIArgs {
  const opts = result.options as Record<string, unknown>
  const args: string[] = [...result.command]
  for (const value of Object.values(result.positional)) {
    if (value !== undefined && value !== null) {
      args.push(String(value))
    }
  }
  args.push(...result.rest.map(String))

  return {
    _: args,
    repo: optString(opts, 'repo'),
    verbose: optBoolean(opts, 'verbose'),
    quiet: optBoolean(opts, 'quiet'),
    json: optBoolean(opts, 'json'),
    'dry-run': optBoolean(opts, 'dry-run'),
    yes: optBoolean(opts, 'yes'),
    commit: optBoolean(opts, 'commit'),
    push: optBoolean(opts, 'push'),
    limit: optNumber(opts, 'limit'),
    user: optString(opts, 'user'),
    token: optString(opts, 'token'),
    name: optString(opts, 'name'),
    host: optString(opts, 'host')
  }
}

/**
 * Build context from parsed args
 */
function buildCommandContext(result: CommandParseResult): CommandContext {
  const args = toCliArgs(result)
  const quiet = args.quiet === true

  // Set global quiet mode for UI
  ui.setQuiet(quiet)

  return {
    args,
    repoRoot: resolveRepoRoot(args.repo),
    verbose: args.verbose === true,
    quiet,
    dryRun: args['dry-run'] === true,
    jsonOutput: args.json === true
  }
}

async function dispatch(command: string, context: CommandContext): Promise<ExitCode> {
  switch (command) {
    case 'init':
      return runInit(context)
    case 'snapshot':
    case 'snap':
      return runSnapshotCommand(context)
    case 'plan':
      return runPlan(context)
    case 'apply':
      return runApply(context)
    case 'status':
      return runStatus(context)
    case 'logs':
      return runLogs(context)
    case 'pull':
      return runPull(context)
    case 'push':
      return runPush(context)
    case 'history':
      return runHistory(context)
    case 'reset':
      return runReset(context)
    case 'remote':
      return runRemote(context)
    case 'config':
      return runConfig(context)
    case 'providers':
      return runProviders(context)
    case 'check-deps':
      return runCheckDeps(context)
    default:
      print.error(`Unknown command: ${c.command(command)}`)
      ui.log(`Run "${c.command('devtwin --help')}" for usage information`)
      return 1
  }
}

// Create CLI instance
const cli = createCLI(cliSchema)

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const opts = result.options as Record<string, unknown>

  // Handle help first (before error check, so `apply --help` works)
  if (opts.help || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (opts.version) {
    ui.output(`devtwin v${VERSION}`)
    return
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(error)
    }
    process.exit(1)
  }

  const command = result.command[0]
  const context = buildCommandContext(result)
  ui.verbose(`repository: ${context.repoRoot}`, context.verbose)

  try {
    const code = await dispatch(command, context)
    if (code !== 0) process.exit(code)
  } catch (err) {
    if (isDevtwinError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (context.verbose && err.context) {
        ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
      }
    } else if (context.verbose && err instanceof Error && err.stack) {
      print.error(err.stack)
    } else {
      print.error(errorMessage(err))
    }
    process.exit(1)
  }
}

main().catch(err => {
  const message = isDevtwinError(err)
    ? formatErrorForCli(err)
    : `Fatal error: ${errorMessage(err)}`
  print.error(message)
  process.exit(1)
})
