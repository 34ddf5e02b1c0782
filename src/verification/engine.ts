import fs from 'fs'
import path from 'path'
import type { Host } from '../host/interface'
import { appendProvenanceEvent } from '../logging/provenance'
import type { Check, CheckResult, VerificationResult } from './interface'

export type EngineOptions = {
  /** JSONL file that receives one event per check and a summary event */
  provenancePath?: string
  runId?: string
  /** called as each check finishes, before the next one starts */
  onResult?: (result: CheckResult) => void
}

function newRunId(): string {
  return Date.now().toString(36) + '-' + Math.random().toString(36).slice(2, 8)
}

async function evaluate(host: Host, check: Check): Promise<CheckResult> {
  const start = Date.now()
  try {
    const verdict = await check.run(host)
    return {
      name: check.name,
      status: verdict.passed ? 'pass' : 'fail',
      message: verdict.message,
      ...(verdict.expected === undefined ? {} : { expected: verdict.expected }),
      ...(verdict.actual === undefined ? {} : { actual: verdict.actual }),
      durationMs: Date.now() - start
    }
  } catch (err) {
    // the host could not answer; the check errors, the run goes on
    return {
      name: check.name,
      status: 'error',
      message: err instanceof Error ? err.message : String(err),
      durationMs: Date.now() - start
    }
  }
}

export function summarize(runId: string, checks: CheckResult[]): VerificationResult {
  const passed = checks.filter((c) => c.status === 'pass').length
  const failed = checks.filter((c) => c.status === 'fail').length
  const errors = checks.filter((c) => c.status === 'error').length
  return { runId, checks, passed, failed, errors, success: passed === checks.length }
}

/**
 * Run every check against the host, one at a time. A failing or erroring
 * check never stops the run, so one pass reports every problem.
 */
export async function runVerification(
  host: Host,
  checks: readonly Check[],
  options: EngineOptions = {}
): Promise<VerificationResult> {
  const runId = options.runId ?? newRunId()
  const provPath = options.provenancePath
  if (provPath) fs.mkdirSync(path.dirname(provPath), { recursive: true })

  const results: CheckResult[] = []
  for (const check of checks) {
    const result = await evaluate(host, check)
    results.push(result)
    options.onResult?.(result)

    if (provPath) {
      appendProvenanceEvent(provPath, {
        runId,
        name: check.name,
        type: 'verification.check',
        payload: { description: check.description, ...result }
      })
    }
  }

  const summary = summarize(runId, results)
  if (provPath) {
    appendProvenanceEvent(provPath, {
      runId,
      type: 'verification.summary',
      payload: { passed: summary.passed, failed: summary.failed, errors: summary.errors, success: summary.success }
    })
  }
  return summary
}

export default runVerification
