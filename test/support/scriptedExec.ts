import type { ExecAdapter, ExecOutcome, ExecRequest } from '../../src/adapters/exec/interface'

export type Reply = {
  code: number | null
  stdout?: string
  stderr?: string
  timedOut?: boolean
  error?: string
}

export type ScriptedExec = ExecAdapter & { calls: ExecRequest[] }

/**
 * ExecAdapter stand-in: answers each command line from `handler` instead of
 * spawning a process. Unknown commands behave like a missing binary (127).
 */
export function createScriptedExec(handler: (cmd: string) => Reply | undefined): ScriptedExec {
  const calls: ExecRequest[] = []
  return {
    calls,
    async run(opts: ExecRequest): Promise<ExecOutcome> {
      calls.push(opts)
      const reply = handler(opts.cmd) ?? { code: 127, stderr: `sh: ${opts.cmd.split(' ')[0]}: not found\n` }
      return {
        code: reply.code,
        stdout: reply.stdout ?? '',
        stderr: reply.stderr ?? '',
        signal: null,
        timedOut: reply.timedOut ?? false,
        ...(reply.error === undefined ? {} : { error: reply.error })
      }
    }
  }
}
