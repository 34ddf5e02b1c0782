/**
 * Read-only view of the system under test. The verifier only ever asks
 * questions through this interface; it never changes the host.
 */

export type CommandResult = {
  exitStatus: number
  stdout: string
  stderr: string
}

export interface Host {
  /** Exact name match, no version constraint. */
  packageIsInstalled(name: string): Promise<boolean>
  /** Follows symlinks: a dangling link does not exist. */
  fileExists(path: string): Promise<boolean>
  fileIsSymlink(path: string): Promise<boolean>
  /** POSIX permission bits, e.g. 0o755 */
  fileMode(path: string): Promise<number>
  userExists(name: string): Promise<boolean>
  userGroups(name: string): Promise<string[]>
  run(command: string): Promise<CommandResult>
}
