import { spawn, type ChildProcess } from 'child_process'
import type { ExecAdapter, ExecOutcome, ExecRequest } from './interface'

function terminate(child: ChildProcess) {
  if (child.pid === undefined) return
  try {
    // the shell runs in its own process group; take the whole pipeline down
    process.kill(-child.pid, 'SIGTERM')
  } catch {
    child.kill('SIGTERM')
  }
}

/**
 * Runs a command line through /bin/sh and collects its output.
 * Never rejects: a spawn failure or a timeout resolves with `code: null`.
 */
const nodeProcess: ExecAdapter = {
  run(req: ExecRequest): Promise<ExecOutcome> {
    return new Promise<ExecOutcome>((resolve) => {
      const child = spawn(req.cmd, { shell: true, detached: true })

      const out: Buffer[] = []
      const err: Buffer[] = []
      let timedOut = false
      let timer: NodeJS.Timeout | undefined

      child.stdout.on('data', (d: Buffer) => out.push(d))
      child.stderr.on('data', (d: Buffer) => err.push(d))

      if (typeof req.timeoutMs === 'number' && req.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true
          terminate(child)
        }, req.timeoutMs)
      }

      const finish = (code: number | null, signal: NodeJS.Signals | null, error?: string) => {
        if (timer) clearTimeout(timer)
        resolve({
          code,
          stdout: Buffer.concat(out).toString('utf8'),
          stderr: Buffer.concat(err).toString('utf8'),
          signal,
          timedOut,
          ...(error === undefined ? {} : { error })
        })
      }

      child.on('error', (e) => finish(null, null, String(e)))
      child.on('close', (code, signal) => finish(code, signal))
    })
  }
}

export default nodeProcess
