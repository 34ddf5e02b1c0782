/** One shell command line, run to completion. */
export type ExecRequest = {
  cmd: string
  timeoutMs?: number
}

export type ExecOutcome = {
  /** null when the shell never started or was ended by a signal */
  code: number | null
  stdout: string
  stderr: string
  signal: NodeJS.Signals | null
  /** set even when the shell traps SIGTERM and exits with a code */
  timedOut: boolean
  /** spawn failure, e.g. ENOENT for /bin/sh */
  error?: string
}

export interface ExecAdapter {
  run(req: ExecRequest): Promise<ExecOutcome>
}
