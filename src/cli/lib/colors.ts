/**
 * devtwin CLI - Colors Utility
 *
 * Teal palette for the reconciliation CLI.
 * Terminal colors using tuiuiu.js text-utils + ANSI 256.
 * Supports NO_COLOR and FORCE_COLOR.
 */

import {
  colorize,
  style,
  styles as tuiStyles,
  stripAnsi
} from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stdout.isTTY ?? false
}

const enabled = isColorEnabled()

const color = (text: string, col: string): string => {
  if (!enabled) return text
  return colorize(text, col)
}

const styled = (text: string, ...styleNames: (keyof typeof tuiStyles)[]): string => {
  if (!enabled) return text
  return style(text, ...styleNames)
}

/**
 * Palette (ANSI 256):
 * - 37:  Teal        — primary, commands
 * - 44:  Bright teal — highlights
 * - 73:  Sea green   — secondary, options
 * - 109: Slate       — descriptions
 */
const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  teal: (s: string) => enabled ? `\x1b[38;5;37m${s}\x1b[39m` : s,
  brightTeal: (s: string) => enabled ? `\x1b[38;5;44m${s}\x1b[39m` : s,
  seaGreen: (s: string) => enabled ? `\x1b[38;5;73m${s}\x1b[39m` : s,
  slate: (s: string) => enabled ? `\x1b[38;5;109m${s}\x1b[39m` : s,

  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,

  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
  green: (s: string) => enabled ? `\x1b[92m${s}\x1b[39m` : s,
  yellow: (s: string) => enabled ? `\x1b[93m${s}\x1b[39m` : s,
}

export { ansi }

/**
 * Help/version formatter for cli-args-parser
 */
export const devtwinFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.teal(s)),
  'version': s => ansi.brightTeal(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.teal(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.brightTeal(s),
  'option-type': s => ansi.seaGreen(s),
  'option-default': s => ansi.dim(ansi.slate(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.seaGreen(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.teal(s),
}

export { stripAnsi }

export const bold = (text: string) => styled(text, 'bold')
export const dim = (text: string) => styled(text, 'dim')

export const red = (text: string) => color(text, 'red')
export const green = (text: string) => color(text, 'green')
export const yellow = (text: string) => color(text, 'yellow')

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.teal(text)),

  provider: (text: string) => ansi.brightTeal(text),
  fragment: (text: string) => ansi.seaGreen(text),
  op: (text: string) => ansi.bold(ansi.white(text)),
  value: (text: string) => ansi.slate(text),
  path: (text: string) => ansi.seaGreen(text),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),
  info: (text: string) => ansi.teal(text),

  drift: (text: string) => ansi.yellow(text),
  inSync: (text: string) => ansi.green(text),

  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  highlight: (text: string) => ansi.bold(ansi.brightTeal(text)),
  muted: (text: string) => ansi.dim(text),
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  info: enabled ? ansi.teal('ℹ') : '[INFO]',

  bullet: enabled ? ansi.slate('•') : '*',
  arrow: enabled ? ansi.teal('→') : '->',

  plus: enabled ? ansi.green('+') : '+',
  minus: enabled ? ansi.red('-') : '-',
  tilde: enabled ? ansi.yellow('~') : '~',
}

// Format a labeled value
export function labeled(label: string, value: string): string {
  return `${c.label(label + ':')} ${value}`
}

// Print utilities (all to stderr; stdout is for data)
export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
  info: (msg: string) => console.error(`${symbols.info} ${c.info(msg)}`),

  item: (text: string) => console.error(`  ${symbols.bullet} ${text}`),
}
