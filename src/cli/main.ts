import type { ExecAdapter } from '../adapters/exec/interface'
import { buildChecks, ProfileError, resolveProfile } from '../config/profile'
import { createShellHost } from '../host/shellHost'
import { parseHostUrl, type Transport } from '../host/transport'
import runVerification from '../verification/engine'
import { exitCodeFor, formatCheckLine, formatFailures, formatTotals } from '../verification/report'
import type { Check } from '../verification/interface'
import { parseCliArgs, USAGE, type CliOptions } from './args'

export type CliIo = {
  out(line: string): void
  err(line: string): void
}

export type MainDeps = {
  io?: CliIo
  /** replaces process spawning, mostly for tests */
  exec?: ExecAdapter
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
}

/**
 * Resolves to the process exit code: 0 when every check passed, 1 when any
 * did not, 2 for usage and profile errors.
 */
export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo

  const usageError = (err: unknown) => {
    io.err(`image-verify: ${err instanceof Error ? err.message : String(err)}`)
    io.err(USAGE)
    return 2
  }

  let opts: CliOptions
  try {
    opts = parseCliArgs(argv)
  } catch (err) {
    return usageError(err)
  }
  if (opts.help) {
    io.out(USAGE)
    return 0
  }

  let transport: Transport
  try {
    transport = parseHostUrl(opts.host)
  } catch (err) {
    return usageError(err)
  }

  let checks: Check[]
  try {
    checks = buildChecks(await resolveProfile(opts.profile))
  } catch (err) {
    if (!(err instanceof ProfileError)) throw err
    io.err(`image-verify: ${err.message}`)
    return 2
  }

  const host = createShellHost({
    transport,
    exec: deps.exec,
    packageManager: opts.packageManager,
    timeoutMs: opts.timeoutMs
  })

  io.out(`Verifying ${transport.describe} against ${opts.profile} (${checks.length} checks)`)
  const result = await runVerification(host, checks, {
    provenancePath: opts.provenancePath,
    onResult: (r) => io.out(formatCheckLine(r))
  })

  for (const line of formatFailures(result)) io.out(line)
  io.out(formatTotals(result))
  return exitCodeFor(result)
}
