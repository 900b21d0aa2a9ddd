import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import { addShareFolderSet } from '../src/api/share-folder.js'
import { addVerificationSet } from '../src/api/verify.js'
import { executePlan } from '../src/core/apply.js'
import { AuditLog } from '../src/core/audit.js'
import { Plan } from '../src/core/plan.js'
import { createPrecheck } from '../src/core/precheck.js'
import { recordingRunner, scriptedPrompter, testContext, testProfile } from './helpers.js'

function newLog() {
  return new AuditLog({ workflow: 'test', user: 'dev', cwd: '/tmp', startedAt: new Date() })
}

describe('repeated runs against a real filesystem', () => {
  let tmp: string

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'boardprep-idem-'))
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  it('second verification run enqueues nothing once the link was created', async () => {
    const bin = path.join(tmp, 'bin')
    await fs.ensureDir(bin)
    await fs.writeFile(path.join(bin, 'gdb-multiarch'), '#!/bin/sh\n', { mode: 0o755 })
    await fs.writeFile(path.join(bin, 'openocd'), '#!/bin/sh\n', { mode: 0o755 })

    const profile = testProfile({
      verify: {
        links: [{ source: path.join(bin, 'gdb-multiarch'), target: path.join(bin, 'arm-none-eabi-gdb') }],
        tools: [{ command: 'openocd', reinstall: 'apt-get install -y --reinstall openocd' }],
      },
    })
    const ctx = testContext({ precheck: createPrecheck({ searchPath: bin }), profile })

    const first = new Plan()
    await addVerificationSet(first, ctx)
    expect(first.size).toBe(1)
    const res = await executePlan(first, newLog(), { runner: recordingRunner() })
    expect(res.ok).toBe(true)

    const second = new Plan()
    await addVerificationSet(second, ctx)
    expect(second.size).toBe(0)
  })

  it('second shared-folder run does not append the mount entry again', async () => {
    const table = path.join(tmp, 'fstab')
    await fs.writeFile(table, 'UUID=abc / ext4 defaults 0 1\n')
    const mountRoot = path.join(tmp, 'mnt', 'hgfs') + '/'
    const home = path.join(tmp, 'home', 'dev')
    await fs.ensureDir(path.join(home, 'Desktop'))
    const mountLine = '.host:/ /mnt/hgfs fuse.vmhgfs-fuse defaults,allow_other 0 0'

    const profile = testProfile({ share: { mountRoot, mountTable: table, mountLine, desktopDir: 'Desktop' } })
    const precheck = createPrecheck()

    const first = new Plan()
    await addShareFolderSet(first, testContext({ precheck, profile, homeDir: home, prompter: scriptedPrompter(['y', 'shared']) }))
    expect(first.operations.map(o => o.kind)).toEqual(['mkdirp', 'symlink', 'append_line'])
    expect((await executePlan(first, newLog(), { runner: recordingRunner() })).ok).toBe(true)

    const second = new Plan()
    await addShareFolderSet(second, testContext({ precheck, profile, homeDir: home, prompter: scriptedPrompter(['y', 'shared']) }))
    expect(second.size).toBe(0)

    const lines = (await fs.readFile(table, 'utf8')).split('\n').filter(l => l === mountLine)
    expect(lines).toHaveLength(1)
  })
})
