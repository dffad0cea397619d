import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { StorageError } from '../errors'
import type { UserRecord } from '../../types'
import { JsonFileLedgerStore, MemoryLedgerStore } from './store'

function record(userId: string, nextSeq = 1): UserRecord {
  return {
    profile: {
      userId,
      calorieGoal: null,
      macroTargets: {},
      tzOffsetMinutes: 0,
      energyUnit: 'kcal',
      createdAt: '2026-10-18T00:00:00.000Z',
    },
    entries: [],
    activities: [],
    water: [],
    customFoods: {},
    nextSeq,
  }
}

describe('MemoryLedgerStore', () => {
  it('hands out copies', async () => {
    const store = new MemoryLedgerStore()
    await store.save(record('u1'))
    const loaded = await store.load('u1')
    if (!loaded) throw new Error('missing record')
    loaded.nextSeq = 99
    expect((await store.load('u1'))?.nextSeq).toBe(1)
  })
})

describe('JsonFileLedgerStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-'))
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  it('starts empty without a file', async () => {
    const store = new JsonFileLedgerStore(join(dir, 'data.json'))
    expect(await store.load('u1')).toBeUndefined()
  })

  it('persists records across instances', async () => {
    const path = join(dir, 'nested', 'data.json')
    const first = new JsonFileLedgerStore(path)
    await first.save(record('u1', 3))
    await first.save(record('u2'))

    const second = new JsonFileLedgerStore(path)
    expect((await second.load('u1'))?.nextSeq).toBe(3)
    expect((await second.load('u2'))?.profile.userId).toBe('u2')
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'))
    expect(raw).toMatchObject({ version: 1 })
  })

  it('keeps every concurrent save', async () => {
    const path = join(dir, 'data.json')
    const store = new JsonFileLedgerStore(path)
    await Promise.all(['a', 'b', 'c', 'd'].map((id) => store.save(record(id))))
    const reopened = new JsonFileLedgerStore(path)
    for (const id of ['a', 'b', 'c', 'd']) expect(await reopened.load(id)).toBeDefined()
  })

  it('moves a corrupted file aside and starts over', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const path = join(dir, 'data.json')
    await writeFile(path, '{not json', 'utf-8')
    const store = new JsonFileLedgerStore(path)
    expect(await store.load('u1')).toBeUndefined()
    expect(await readFile(join(dir, 'data.corrupted.json'), 'utf-8')).toBe('{not json')
  })

  it('reports an unusable path as StorageError', async () => {
    await writeFile(join(dir, 'blocker'), '')
    const store = new JsonFileLedgerStore(join(dir, 'blocker', 'data.json'))
    await expect(store.save(record('u1'))).rejects.toBeInstanceOf(StorageError)
  })
})
