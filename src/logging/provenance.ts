import fs from 'fs'

export type ProvenanceEvent = {
  runId?: string
  name?: string
  type: 'verification.check' | 'verification.summary'
  payload: Record<string, unknown>
  timestamp?: string
}

/**
 * Append a JSONL provenance event to a file, creating it if needed.
 * Synchronous so that events land in the order checks finish.
 */
export function appendProvenanceEvent(filePath: string, event: ProvenanceEvent): void {
  const e = { ...event, timestamp: event.timestamp ?? new Date().toISOString() }
  fs.appendFileSync(filePath, JSON.stringify(e) + '\n', { encoding: 'utf8' })
}

export function readProvenanceEvents(filePath: string): ProvenanceEvent[] {
  return fs
    .readFileSync(filePath, { encoding: 'utf8' })
    .split('\n')
    .filter((l) => l.trim().length > 0)
    .map((l): ProvenanceEvent => JSON.parse(l))
}
