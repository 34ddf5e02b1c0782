/**
 * A host query that could not be answered at all: the command did not start,
 * was killed, timed out, or exited with a status the query does not expect.
 */
export class HostQueryError extends Error {
  readonly query: string

  constructor(query: string, reason: string) {
    super(`host query failed (${query}): ${reason}`)
    this.name = 'HostQueryError'
    this.query = query
  }
}
