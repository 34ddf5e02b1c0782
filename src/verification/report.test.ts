import { describe, expect, test } from 'vitest'
import { summarize } from './engine'
import { exitCodeFor, formatCheckLine, formatSummary } from './report'

const result = summarize('run-1', [
  { name: 'ssh-config', status: 'pass', message: '/etc/ssh/sshd_config exists', durationMs: 1 },
  {
    name: 'init-system-script',
    status: 'fail',
    message: '/tmp/init_system.sh has mode 0750, expected 0755',
    expected: '0755',
    actual: '0750',
    durationMs: 2
  },
  { name: 'locale-generated', status: 'error', message: 'host query failed (locale -a): exit status 2: ', durationMs: 3 }
])

describe('report', () => {
  test('formats one line per check', () => {
    expect(result.checks.map(formatCheckLine)).toEqual([
      'PASS  ssh-config',
      'FAIL  init-system-script: /tmp/init_system.sh has mode 0750, expected 0755',
      'ERROR locale-generated: host query failed (locale -a): exit status 2: '
    ])
  })

  test('lists failures with expected and actual values before the totals', () => {
    expect(formatSummary(result).slice(3)).toEqual([
      'Failures:',
      '  init-system-script: /tmp/init_system.sh has mode 0750, expected 0755',
      '    expected: 0755',
      '    actual:   0750',
      '  locale-generated: host query failed (locale -a): exit status 2: ',
      '3 checks: 1 passed, 1 failed, 1 errors'
    ])
  })

  test('maps success onto the exit code', () => {
    expect(exitCodeFor(result)).toBe(1)
    const ok = summarize('run-2', [result.checks[0]])
    expect(exitCodeFor(ok)).toBe(0)
    expect(formatSummary(ok)).toEqual(['PASS  ssh-config', '1 checks: 1 passed, 0 failed, 0 errors'])
  })
})
