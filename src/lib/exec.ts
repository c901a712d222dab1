/**
 * devtwin External Commands
 *
 * Synchronous wrapper around system commands (git, dpkg-query, systemctl,
 * crontab, journalctl...). Providers and git helpers take a CommandRunner so
 * tests can substitute a recording stub.
 */

import fs from 'node:fs'
import path from 'node:path'
import { spawnSync } from 'node:child_process'
import { ExternalCommandError } from './errors.js'

export interface CommandResult {
  /** Exit code; 127 when the binary could not be spawned */
  code: number
  stdout: string
  stderr: string
}

export interface CommandOptions {
  cwd?: string
  input?: string
  env?: NodeJS.ProcessEnv
}

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => CommandResult

/**
 * Run a command to completion, never throwing
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const result = spawnSync(command, args, {
    cwd: options.cwd,
    input: options.input,
    env: options.env ?? process.env,
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
    maxBuffer: 64 * 1024 * 1024
  })

  if (result.error) {
    return { code: 127, stdout: '', stderr: result.error.message }
  }

  return {
    code: result.status ?? 1,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? ''
  }
}

/**
 * Join a command line for display
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(part => (/\s/.test(part) ? JSON.stringify(part) : part)).join(' ')
}

/**
 * Run and throw ExternalCommandError on non-zero exit
 */
export function runChecked(runner: CommandRunner, command: string, args: string[], options?: CommandOptions): CommandResult {
  const result = runner(command, args, options)
  if (result.code !== 0) {
    throw new ExternalCommandError(formatCommand(command, args), result.code, result.stderr)
  }
  return result
}

/**
 * Whether an executable is reachable on PATH
 */
export function commandExists(command: string, env: NodeJS.ProcessEnv = process.env): boolean {
  if (command.includes('/')) {
    return isExecutable(command)
  }

  const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean)
  return dirs.some(dir => isExecutable(path.join(dir, command)))
}

function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK)
    return fs.statSync(filePath).isFile()
  } catch {
    return false
  }
}

/**
 * Availability of each command
 */
export function checkDependencies(commands: string[], env: NodeJS.ProcessEnv = process.env): Record<string, boolean> {
  const result: Record<string, boolean> = {}
  for (const command of commands) {
    result[command] = commandExists(command, env)
  }
  return result
}

export const DEFAULT_DEPENDENCIES = ['git', 'sudo', 'dpkg-query', 'apt-get', 'systemctl', 'crontab', 'journalctl']
