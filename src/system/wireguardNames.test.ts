import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createNameMapReader } from './wireguardNames'

describe('createNameMapReader', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'wireguard-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('maps each real interface to the profile that created it', async () => {
    await writeFile(join(dir, 'nl-amsterdam.name'), 'utun4\n')
    await writeFile(join(dir, 'utun4.sock'), '')

    const map = await createNameMapReader(dir)()

    expect([...map.keys()]).toEqual(['utun4'])
    expect(map.get('utun4')?.profile).toBe('nl-amsterdam')
    expect(map.get('utun4')?.startedAt).toEqual(expect.any(Number))
  })

  it('skips empty name files', async () => {
    await writeFile(join(dir, 'broken.name'), '\n')

    await expect(createNameMapReader(dir)()).resolves.toEqual(new Map())
  })

  it('is empty when wg-quick has no runtime directory', async () => {
    await expect(createNameMapReader(join(dir, 'missing'))()).resolves.toEqual(new Map())
  })
})
