/**
 * Tapekeeper CLI - Colors
 *
 * ANSI 256 tones for the help screen and run output.
 * Honors NO_COLOR and FORCE_COLOR.
 */

import type { Formatter } from 'cli-args-parser'

const isColorEnabled = (): boolean => {
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stdout.isTTY ?? false
}

const enabled = isColorEnabled()

/**
 * Amber/teal tones (ANSI 256)
 * - 214: amber, commands and barcodes
 * - 37:  teal, pools and options
 * - 109: slate, descriptions
 * - 245: gray, muted text
 */
const tone = (code: number) => (s: string) => enabled ? `\x1b[38;5;${code}m${s}\x1b[39m` : s

const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,
  amber: tone(214),
  teal: tone(37),
  slate: tone(109),
  gray: tone(245),
  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
  green: (s: string) => enabled ? `\x1b[92m${s}\x1b[39m` : s,
  yellow: (s: string) => enabled ? `\x1b[93m${s}\x1b[39m` : s
}

/**
 * Help and version formatter for cli-args-parser
 */
export const tapekeeperFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),
  'program-name': s => ansi.bold(ansi.amber(s)),
  'version': s => ansi.amber(s),
  'description': s => ansi.slate(s),
  'command-name': s => ansi.amber(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.slate(s),
  'option-flag': s => ansi.teal(s),
  'option-type': s => ansi.gray(s),
  'option-default': s => ansi.dim(s),
  'option-description': s => ansi.slate(s),
  'positional-name': s => ansi.teal(s),
  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.teal(s)
}

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.amber(text)),
  instance: (text: string) => ansi.bold(ansi.white(text)),
  pool: (text: string) => ansi.teal(text),
  barcode: (text: string) => ansi.amber(text),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),

  label: (text: string) => ansi.gray(text),
  muted: (text: string) => ansi.dim(text)
}

const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  bullet: enabled ? ansi.gray('•') : '*'
}

export function labeled(label: string, value: string): string {
  return `${c.label(label + ':')} ${value}`
}

export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
  item: (text: string) => console.error(`  ${symbols.bullet} ${text}`)
}
