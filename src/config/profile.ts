import fs from 'fs/promises'
import Ajv from 'ajv'
import cbdbUbuntu2204 from '../../profiles/cbdb-ubuntu22.04.json'
import profileJsonSchema, { type ImageProfile } from '../types/profileSchema'
import {
  commandOutputContains,
  fileExists,
  fileExistsOrSymlink,
  fileHasMode,
  packagesInstalled,
  userInGroups
} from '../verification/checks'
import type { Check } from '../verification/interface'

const ajv = new Ajv({ allErrors: true, strict: false })
const validate = ajv.compile<ImageProfile>(profileJsonSchema)

export class ProfileError extends Error {
  readonly source: string

  constructor(source: string, message: string) {
    super(`${source}: ${message}`)
    this.name = 'ProfileError'
    this.source = source
  }
}

/** Profiles shipped with the tool, addressable by name. */
export const builtinProfiles = new Map<string, unknown>([['cbdb-ubuntu22.04', cbdbUbuntu2204]])

export const DEFAULT_PROFILE = 'cbdb-ubuntu22.04'

/** "0755", "755" or "04755" -> permission bits */
export function parseMode(mode: string): number {
  if (!/^[0-7]{3,5}$/.test(mode)) throw new Error(`invalid file mode "${mode}"`)
  return parseInt(mode, 8)
}

/**
 * Build the checks a profile describes: packages, then users, files and commands
 * in the order they are listed.
 */
export function buildChecks(profile: ImageProfile): Check[] {
  const checks: Check[] = []

  if (profile.packages) {
    checks.push(packagesInstalled(profile.packages.required, profile.packages.name))
  }
  for (const u of profile.users ?? []) {
    checks.push(userInGroups(u.user, u.groups ?? [], u.name))
  }
  for (const f of profile.files ?? []) {
    if (f.mode !== undefined) checks.push(fileHasMode(f.path, parseMode(f.mode), f.name))
    else if (f.allowSymlink) checks.push(fileExistsOrSymlink(f.path, f.name))
    else checks.push(fileExists(f.path, f.name))
  }
  for (const c of profile.commands ?? []) {
    checks.push(commandOutputContains(c.command, c.stdoutContains, c.name))
  }
  return checks
}

export function parseProfile(value: unknown, source: string): ImageProfile {
  if (!validate(value)) {
    throw new ProfileError(source, 'invalid profile: ' + ajv.errorsText(validate.errors, { dataVar: 'profile' }))
  }

  const seen = new Set<string>()
  for (const check of buildChecks(value)) {
    if (seen.has(check.name)) throw new ProfileError(source, `duplicate check name "${check.name}"`)
    seen.add(check.name)
  }
  return value
}

export async function loadProfileFile(filePath: string): Promise<ImageProfile> {
  let raw: string
  try {
    raw = await fs.readFile(filePath, 'utf8')
  } catch (err) {
    throw new ProfileError(filePath, 'cannot read profile: ' + (err instanceof Error ? err.message : String(err)))
  }

  let obj: unknown
  try {
    obj = JSON.parse(raw)
  } catch (err) {
    throw new ProfileError(filePath, 'profile is not valid JSON: ' + (err instanceof Error ? err.message : String(err)))
  }
  return parseProfile(obj, filePath)
}

/** A built-in profile name, or the path of a profile JSON file. */
export async function resolveProfile(ref: string): Promise<ImageProfile> {
  const builtin = builtinProfiles.get(ref)
  if (builtin !== undefined) return parseProfile(builtin, `builtin:${ref}`)
  return loadProfileFile(ref)
}
