import { describe, expect, it } from 'vitest'
import nodeProcess from './nodeProcess'

describe('NodeProcess ExecAdapter', () => {
  it('runs a shell pipeline and captures stdout', async () => {
    const res = await nodeProcess.run({ cmd: `printf 'en_US.utf8\\nC.utf8\\n' | grep en_US` })
    expect(res.code).toBe(0)
    expect(res.stdout).toBe('en_US.utf8\n')
    expect(res.timedOut).toBe(false)
  })

  it('keeps stderr apart from stdout', async () => {
    const res = await nodeProcess.run({ cmd: `sh -c "echo visible; echo hidden 1>&2; exit 3"` })
    expect(res.code).toBe(3)
    expect(res.stdout).toBe('visible\n')
    expect(res.stderr).toBe('hidden\n')
  })

  it('marks timed out commands and reports no exit code', async () => {
    const res = await nodeProcess.run({ cmd: `sleep 2`, timeoutMs: 100 })
    expect(res.timedOut).toBe(true)
    expect(res.code).toBeNull()
  })

  it('marks a timeout even when the shell traps SIGTERM and exits', async () => {
    const res = await nodeProcess.run({ cmd: `trap 'exit 7' TERM; sleep 2 & wait`, timeoutMs: 100 })
    expect(res.timedOut).toBe(true)
    expect(res.code).toBe(7)
  })
})
