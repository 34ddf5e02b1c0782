import type { Host } from '../host/interface'
import type { Check, CheckVerdict } from './interface'

function pass(message: string): CheckVerdict {
  return { passed: true, message }
}

function fail(message: string, expected?: string, actual?: string): CheckVerdict {
  return { passed: false, message, expected, actual }
}

/** 0o755 -> "0755" */
export function formatMode(mode: number): string {
  return '0' + mode.toString(8).padStart(3, '0')
}

/**
 * Every distinct package must be installed. All missing packages are
 * reported, not just the first one.
 */
export function packagesInstalled(packages: Iterable<string>, name = 'installed-packages'): Check {
  const wanted = [...new Set(packages)]
  return {
    name,
    description: `${wanted.length} packages installed`,
    async run(host: Host) {
      const missing: string[] = []
      for (const pkg of wanted) {
        if (!(await host.packageIsInstalled(pkg))) missing.push(pkg)
      }
      if (missing.length > 0) {
        return fail(`missing packages: ${missing.join(', ')}`, 'installed', missing.join(', '))
      }
      return pass(`${wanted.length} packages installed`)
    }
  }
}

export function userInGroups(user: string, groups: readonly string[], name = `user:${user}`): Check {
  return {
    name,
    description: groups.length > 0 ? `user ${user} in ${groups.join(', ')}` : `user ${user} exists`,
    async run(host: Host) {
      if (!(await host.userExists(user))) {
        return fail(`user ${user} does not exist`, 'present', 'absent')
      }
      if (groups.length === 0) return pass(`user ${user} exists`)

      const actual = await host.userGroups(user)
      const absent = groups.filter((g) => !actual.includes(g))
      if (absent.length > 0) {
        return fail(
          `user ${user} is not a member of ${absent.join(', ')}`,
          groups.join(' '),
          actual.length > 0 ? actual.join(' ') : '(none)'
        )
      }
      return pass(`user ${user} is a member of ${groups.join(', ')}`)
    }
  }
}

export function fileExists(path: string, name = `file:${path}`): Check {
  return {
    name,
    description: `${path} exists`,
    async run(host: Host) {
      if (await host.fileExists(path)) return pass(`${path} exists`)
      return fail(`${path} does not exist`, 'present', 'absent')
    }
  }
}

/** Passes for a path that exists, or for a symlink even when its target does not. */
export function fileExistsOrSymlink(path: string, name = `file:${path}`): Check {
  return {
    name,
    description: `${path} exists or is a symlink`,
    async run(host: Host) {
      if (await host.fileExists(path)) return pass(`${path} exists`)
      if (await host.fileIsSymlink(path)) return pass(`${path} is a symlink`)
      return fail(`${path} does not exist and is not a symlink`, 'present or symlink', 'absent')
    }
  }
}

/**
 * Exact comparison: 0o775 does not satisfy an expected 0o755.
 */
export function fileHasMode(path: string, mode: number, name = `file:${path}`): Check {
  const expected = formatMode(mode)
  return {
    name,
    description: `${path} exists with mode ${expected}`,
    async run(host: Host) {
      if (!(await host.fileExists(path))) {
        return fail(`${path} does not exist`, expected, 'absent')
      }
      const actual = await host.fileMode(path)
      if (actual !== mode) {
        return fail(`${path} has mode ${formatMode(actual)}, expected ${expected}`, expected, formatMode(actual))
      }
      return pass(`${path} has mode ${expected}`)
    }
  }
}

/**
 * The command must exit 0 and print `needle` on stdout. stderr is never inspected.
 */
export function commandOutputContains(command: string, needle: string, name = `command:${command}`): Check {
  return {
    name,
    description: `\`${command}\` prints ${needle}`,
    async run(host: Host) {
      const res = await host.run(command)
      if (res.exitStatus !== 0) {
        return fail(`\`${command}\` exited with status ${res.exitStatus}`, '0', String(res.exitStatus))
      }
      if (!res.stdout.includes(needle)) {
        return fail(`stdout of \`${command}\` does not contain "${needle}"`, needle, res.stdout.trim())
      }
      return pass(`\`${command}\` printed ${needle}`)
    }
  }
}
