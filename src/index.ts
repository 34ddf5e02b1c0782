export type { ExecAdapter, ExecOutcome, ExecRequest } from './adapters/exec/interface'
export { default as nodeProcess } from './adapters/exec/nodeProcess'
export { builtinProfiles, buildChecks, loadProfileFile, parseMode, parseProfile, ProfileError, resolveProfile } from './config/profile'
export { HostQueryError } from './host/errors'
export type { CommandResult, Host } from './host/interface'
export { createShellHost, type PackageManager, type ShellHostOptions } from './host/shellHost'
export { containerTransport, localTransport, parseHostUrl, shellQuote, type Transport } from './host/transport'
export { appendProvenanceEvent, readProvenanceEvents, type ProvenanceEvent } from './logging/provenance'
export type { ImageProfile } from './types/profileSchema'
export * from './verification/checks'
export { runVerification, type EngineOptions } from './verification/engine'
export type { Check, CheckResult, CheckStatus, CheckVerdict, VerificationResult } from './verification/interface'
export { exitCodeFor, formatCheckLine, formatFailures, formatSummary, formatTotals } from './verification/report'
