import type { ExecAdapter } from '../adapters/exec/interface'
import nodeProcess from '../adapters/exec/nodeProcess'
import { HostQueryError } from './errors'
import type { CommandResult, Host } from './interface'
import { localTransport, shellQuote, type Transport } from './transport'

export type PackageManager = 'dpkg' | 'rpm'

export type ShellHostOptions = {
  transport?: Transport
  exec?: ExecAdapter
  /** defaults to 'auto': probe for dpkg-query, then rpm */
  packageManager?: PackageManager | 'auto'
  /** per query */
  timeoutMs?: number
}

const DEBUG = !!process.env.IMAGE_VERIFY_DEBUG

const DETECT_PACKAGE_MANAGER =
  'if command -v dpkg-query >/dev/null 2>&1; then echo dpkg; elif command -v rpm >/dev/null 2>&1; then echo rpm; fi'

/**
 * Host backed by POSIX commands. Every query is a small shell script run
 * through the transport, so the same code inspects the local machine or a
 * running container.
 */
export function createShellHost(options: ShellHostOptions = {}): Host {
  const transport = options.transport ?? localTransport
  const exec = options.exec ?? nodeProcess
  const configured = options.packageManager ?? 'auto'
  let packageManager: Promise<PackageManager> | undefined =
    configured === 'auto' ? undefined : Promise.resolve(configured)

  let reachable: Promise<void> | undefined

  // a container that is gone, or a daemon that is down, makes docker exit 1 like `test -e` would
  async function ensureReachable(ping: string): Promise<void> {
    const res = await exec.run({ cmd: ping, timeoutMs: options.timeoutMs })
    if (res.code === 0 && !res.timedOut) return
    const reason = res.timedOut
      ? `timed out after ${options.timeoutMs}ms`
      : res.error ?? (res.stderr.trim() || `exit status ${res.code ?? res.signal ?? 'unknown'}`)
    throw new HostQueryError(ping, `${transport.describe} is not reachable: ${reason}`)
  }

  async function run(script: string): Promise<CommandResult> {
    if (transport.ping !== undefined) {
      reachable ??= ensureReachable(transport.ping)
      await reachable
    }

    if (DEBUG) console.log(`[${transport.describe}] ${script}`)
    const res = await exec.run({ cmd: transport.wrap(script), timeoutMs: options.timeoutMs })

    if (res.timedOut) {
      throw new HostQueryError(script, `${transport.describe}: timed out after ${options.timeoutMs}ms`)
    }
    if (res.code === null) {
      throw new HostQueryError(script, `${transport.describe}: ${res.error ?? `terminated by ${res.signal ?? 'signal'}`}`)
    }
    return { exitStatus: res.code, stdout: res.stdout, stderr: res.stderr }
  }

  // exit 0 means yes, exit 1 means no; anything else means the question could not be asked
  async function probe(script: string): Promise<boolean> {
    const res = await run(script)
    if (res.exitStatus === 0) return true
    if (res.exitStatus === 1) return false
    throw new HostQueryError(script, `exit status ${res.exitStatus}: ${res.stderr.trim()}`)
  }

  async function detectPackageManager(): Promise<PackageManager> {
    const res = await run(DETECT_PACKAGE_MANAGER)
    const found = res.stdout.trim()
    if (found === 'dpkg' || found === 'rpm') return found
    throw new HostQueryError('package manager detection', `neither dpkg-query nor rpm found on ${transport.describe}`)
  }

  async function packageIsInstalled(name: string): Promise<boolean> {
    packageManager ??= detectPackageManager()
    const manager = await packageManager

    const script =
      manager === 'dpkg'
        ? `dpkg-query -W -f '\${Package} \${Status}\\n' ${shellQuote(name)}`
        : `rpm -q --qf '%{NAME}\\n' ${shellQuote(name)}`
    const res = await run(script)
    if (res.exitStatus === 1) return false
    if (res.exitStatus !== 0) {
      throw new HostQueryError(script, `exit status ${res.exitStatus}: ${res.stderr.trim()}`)
    }

    const lines = res.stdout.split('\n').map((l) => l.trim().split(/\s+/))
    if (manager === 'rpm') return lines.some((fields) => fields[0] === name)
    // "<package> <want> <flag> <status>", e.g. "flex install ok installed"
    return lines.some((fields) => fields[0] === name && fields[fields.length - 1] === 'installed')
  }

  async function fileMode(path: string): Promise<number> {
    const script = `stat -c %a ${shellQuote(path)}`
    const res = await run(script)
    if (res.exitStatus !== 0) {
      throw new HostQueryError(script, `exit status ${res.exitStatus}: ${res.stderr.trim()}`)
    }
    const text = res.stdout.trim()
    if (!/^[0-7]+$/.test(text)) throw new HostQueryError(script, `unexpected output "${text}"`)
    return parseInt(text, 8)
  }

  async function userGroups(name: string): Promise<string[]> {
    const script = `id -Gn ${shellQuote(name)}`
    const res = await run(script)
    if (res.exitStatus !== 0) {
      throw new HostQueryError(script, `exit status ${res.exitStatus}: ${res.stderr.trim()}`)
    }
    return res.stdout.split(/\s+/).filter((g) => g.length > 0)
  }

  return {
    packageIsInstalled,
    fileExists: (path) => probe(`test -e ${shellQuote(path)}`),
    fileIsSymlink: (path) => probe(`test -L ${shellQuote(path)}`),
    fileMode,
    userExists: (name) => probe(`id -u ${shellQuote(name)}`),
    userGroups,
    run
  }
}

export default createShellHost
