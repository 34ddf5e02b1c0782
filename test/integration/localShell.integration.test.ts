import fs from 'fs'
import os from 'os'
import path from 'path'
import { beforeAll, describe, expect, it } from 'vitest'
import { buildChecks, parseProfile } from '../../src/config/profile'
import { createShellHost } from '../../src/host/shellHost'
import { readProvenanceEvents } from '../../src/logging/provenance'
import { runVerification } from '../../src/verification/engine'

describe('Integration: local shell host -> provenance', () => {
  let root: string

  beforeAll(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'iv-int-'))
    await fs.promises.writeFile(path.join(root, 'sshd_config'), 'PermitRootLogin no\n')
    await fs.promises.writeFile(path.join(root, 'init.sh'), '#!/bin/sh\n')
    await fs.promises.chmod(path.join(root, 'init.sh'), 0o755)
    await fs.promises.writeFile(path.join(root, 'loose.sh'), '#!/bin/sh\n')
    await fs.promises.chmod(path.join(root, 'loose.sh'), 0o777)
    await fs.promises.symlink(path.join(root, 'zoneinfo', 'UTC'), path.join(root, 'localtime'))
  })

  it('inspects real files and commands and logs every outcome', async () => {
    const profile = parseProfile(
      {
        name: 'local',
        files: [
          { name: 'ssh-config', path: path.join(root, 'sshd_config') },
          { name: 'timezone', path: path.join(root, 'localtime'), allowSymlink: true },
          { name: 'limits', path: path.join(root, 'limits.conf') },
          { name: 'init-script', path: path.join(root, 'init.sh'), mode: '0755' },
          { name: 'loose-script', path: path.join(root, 'loose.sh'), mode: '0755' }
        ],
        commands: [
          { name: 'locale', command: `printf 'C.utf8\\nen_US.utf8\\n' | grep en_US.utf8`, stdoutContains: 'en_US.utf8' },
          { name: 'stderr-only', command: 'echo en_US.utf8 1>&2', stdoutContains: 'en_US.utf8' }
        ]
      },
      'inline'
    )
    const prov = path.join(root, 'prov.log')

    const res = await runVerification(createShellHost({ packageManager: 'dpkg' }), buildChecks(profile), {
      provenancePath: prov
    })

    expect(res.checks.map((c) => [c.name, c.status])).toEqual([
      ['ssh-config', 'pass'],
      ['timezone', 'pass'],
      ['limits', 'fail'],
      ['init-script', 'pass'],
      ['loose-script', 'fail'],
      ['locale', 'pass'],
      ['stderr-only', 'fail']
    ])
    expect(res.checks[4].actual).toBe('0777')

    const events = readProvenanceEvents(prov)
    expect(events.length).toBe(8)
    expect(events[2].payload).toMatchObject({ status: 'fail', message: `${path.join(root, 'limits.conf')} does not exist` })
  })
})
