import { t } from './theme.js'

/**
 * buildPS1 — construct the colored prompt string.
 *
 * Format: [loopdesk:~/.loopdesk] ❯
 */
export function buildPS1(home: string): string {
  const bracket = t.blueDim

  return (
    bracket('[') +
    t.blue.bold('loopdesk') +
    bracket(':') +
    t.muted(home) +
    bracket(']') +
    bracket(' ❯ ')
  )
}

/**
 * shortenHome — replace a leading user home directory with '~'.
 */
export function shortenHome(path: string, userHome: string): string {
  if (userHome !== '' && (path === userHome || path.startsWith(userHome + '/'))) {
    return '~' + path.slice(userHome.length)
  }
  return path
}
