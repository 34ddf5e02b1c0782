export type ContainerEngine = 'docker' | 'podman'

/**
 * Turns a shell script into the command line that runs it on the target.
 */
export type Transport = {
  /** human-readable target, used in logs and error messages */
  describe: string
  wrap(script: string): string
  /** command line that exits 0 only when the target can run scripts at all */
  ping?: string
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

export const localTransport: Transport = {
  describe: 'local://',
  wrap: (script) => script
}

export function containerTransport(container: string, engine: ContainerEngine = 'docker'): Transport {
  return {
    describe: `${engine}://${container}`,
    ping: `${engine} exec ${shellQuote(container)} true`,
    wrap: (script) => `${engine} exec ${shellQuote(container)} sh -c ${shellQuote(script)}`
  }
}

/**
 * Accepts `local://`, `docker://<container>` and `podman://<container>`.
 */
export function parseHostUrl(spec: string): Transport {
  if (spec === 'local://' || spec === 'local') return localTransport

  const match = spec.match(/^(docker|podman):\/\/(.+)$/)
  if (!match) throw new Error(`unsupported host "${spec}" (expected local://, docker://<name> or podman://<name>)`)

  const engine: ContainerEngine = match[1] === 'podman' ? 'podman' : 'docker'
  return containerTransport(match[2], engine)
}
