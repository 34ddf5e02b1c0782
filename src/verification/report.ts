import type { CheckResult, CheckStatus, VerificationResult } from './interface'

const LABELS: Record<CheckStatus, string> = {
  pass: 'PASS ',
  fail: 'FAIL ',
  error: 'ERROR'
}

export function formatCheckLine(result: CheckResult): string {
  const head = `${LABELS[result.status]} ${result.name}`
  return result.status === 'pass' ? head : `${head}: ${result.message}`
}

export function formatTotals(result: VerificationResult): string {
  return `${result.checks.length} checks: ${result.passed} passed, ${result.failed} failed, ${result.errors} errors`
}

/** Lines listing each check that did not pass; empty when all passed. */
export function formatFailures(result: VerificationResult): string[] {
  const bad = result.checks.filter((c) => c.status !== 'pass')
  if (bad.length === 0) return []

  const lines = ['Failures:']
  for (const c of bad) {
    lines.push(`  ${c.name}: ${c.message}`)
    if (c.expected !== undefined || c.actual !== undefined) {
      lines.push(`    expected: ${c.expected ?? '-'}`)
      lines.push(`    actual:   ${c.actual ?? '-'}`)
    }
  }
  return lines
}

export function formatSummary(result: VerificationResult): string[] {
  return [...result.checks.map(formatCheckLine), ...formatFailures(result), formatTotals(result)]
}

export function exitCodeFor(result: VerificationResult): number {
  return result.success ? 0 : 1
}
