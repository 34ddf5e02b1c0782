import { DEFAULT_PROFILE } from '../config/profile'
import type { PackageManager } from '../host/shellHost'

export type CliOptions = {
  profile: string
  host: string
  packageManager: PackageManager | 'auto'
  timeoutMs?: number
  provenancePath?: string
  help: boolean
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export const USAGE = `Usage: image-verify [options]

Options:
  --profile <name|path>       built-in profile name or profile JSON file (default: ${DEFAULT_PROFILE})
  --host <url>                local://, docker://<container> or podman://<container> (default: local://)
  --package-manager <kind>    auto, dpkg or rpm (default: auto)
  --timeout <ms>              per-query timeout
  --provenance <path>         append JSONL check events to this file
  -h, --help                  show this help`

const VALUE_OPTIONS = new Set(['--profile', '--host', '--package-manager', '--timeout', '--provenance'])

function splitOption(token: string): { option: string; inline: string | null } {
  const eq = token.indexOf('=')
  if (eq === -1) return { option: token, inline: null }
  return { option: token.slice(0, eq), inline: token.slice(eq + 1) }
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = { profile: DEFAULT_PROFILE, host: 'local://', packageManager: 'auto', help: false }

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === '-h' || token === '--help') {
      opts.help = true
      continue
    }

    const { option, inline } = splitOption(token)
    if (!VALUE_OPTIONS.has(option)) throw new UsageError(`unknown option ${token}`)

    let value = inline
    if (value === null) {
      const next = argv[i + 1]
      if (next === undefined || next.startsWith('--')) throw new UsageError(`${option} needs a value`)
      value = next
      i++
    }

    switch (option) {
      case '--profile':
        opts.profile = value
        break
      case '--host':
        opts.host = value
        break
      case '--package-manager':
        if (value !== 'auto' && value !== 'dpkg' && value !== 'rpm') {
          throw new UsageError(`--package-manager must be auto, dpkg or rpm (got "${value}")`)
        }
        opts.packageManager = value
        break
      case '--timeout': {
        const ms = Number(value)
        if (!Number.isInteger(ms) || ms <= 0) throw new UsageError(`--timeout must be a positive integer (got "${value}")`)
        opts.timeoutMs = ms
        break
      }
      case '--provenance':
        opts.provenancePath = value
        break
    }
  }

  return opts
}
