import type { Host } from '../host/interface'

export type CheckVerdict = {
  passed: boolean
  message: string
  expected?: string
  actual?: string
}

/**
 * One named, independent assertion over a host.
 */
export type Check = {
  name: string
  description?: string
  run(host: Host): Promise<CheckVerdict>
}

export type CheckStatus = 'pass' | 'fail' | 'error'

export type CheckResult = {
  name: string
  status: CheckStatus
  message: string
  expected?: string
  actual?: string
  durationMs: number
}

export type VerificationResult = {
  runId: string
  checks: CheckResult[]
  passed: number
  failed: number
  errors: number
  /** true only when every check passed */
  success: boolean
}
