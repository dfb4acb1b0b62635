export type Flags = Record<string, string | boolean>

/**
 * `--key value`, `--key=value` and bare `--switch`. Consecutive non-flag
 * tokens after a key are joined with spaces; tokens before the first flag
 * are ignored.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const body = token.slice(2)
    const equals = body.indexOf('=')
    if (equals > 0) {
      flags[body.slice(0, equals)] = body.slice(equals + 1)
      continue
    }

    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[body] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[body] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

/** Comma-separated flag value as a trimmed list */
export function asList(value: string | boolean | undefined): string[] {
  return asString(value)
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
}
