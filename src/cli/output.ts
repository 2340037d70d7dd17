/**
 * CLI user-facing output
 * Short, no timestamps. Diagnostics go through shared/logger.ts instead.
 */

import chalk from 'chalk'

/** Info message */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

export interface ListItem {
  label: string
  value: string | number | undefined
}

/** Aligned key/value list */
export function list(items: ListItem[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  const maxLabelLen = Math.max(...items.map(i => i.label.length))

  for (const item of items) {
    const label = chalk.gray(item.label.padEnd(maxLabelLen) + ':')
    console.log(`${prefix}${label} ${item.value ?? '-'}`)
  }
}
