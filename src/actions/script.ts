const STRICT_PROLOGUE = [
  'set -o errexit',
  'set -o nounset',
  'set -o pipefail'
]

/** Wraps commands in a bash script that stops on the first failure, unset variable or broken pipe. */
export function bashScript(lines: readonly string[]): string {
  return `${STRICT_PROLOGUE.join('\n')}\n\n${lines.join('\n')}\n`
}

/**
 * Quotes a string for safe single-quoted shell command interpolation.
 * Wildcards stay unexpanded; gsutil expands them itself.
 */
export function shellQuote(value: string): string {
  return `'${value.replaceAll('\'', '\'"\'"\'')}'`
}
