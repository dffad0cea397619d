import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { StorageError } from '../errors'
import type { UserId, UserRecord } from '../../types'

/**
 * Durable keyed storage of per-user records. Pure persistence; no business rules.
 * `load` returns a private copy; nothing is visible to other callers until `save` resolves.
 */
export interface LedgerStore {
  load(userId: UserId): Promise<UserRecord | undefined>
  save(record: UserRecord): Promise<void>
}

export class MemoryLedgerStore implements LedgerStore {
  private readonly users = new Map<UserId, UserRecord>()

  async load(userId: UserId): Promise<UserRecord | undefined> {
    const r = this.users.get(userId)
    return r ? structuredClone(r) : undefined
  }

  async save(record: UserRecord): Promise<void> {
    this.users.set(record.profile.userId, structuredClone(record))
  }
}

const macrosSchema = z.object({ protein: z.number(), fat: z.number(), carbs: z.number() })

const stamped = {
  seq: z.number().int(),
  userId: z.string(),
  timestamp: z.string(),
  tzOffsetMinutes: z.number(),
  recordedAt: z.string(),
}

const userRecordSchema = z.object({
  profile: z.object({
    userId: z.string(),
    calorieGoal: z.number().nullable(),
    macroTargets: macrosSchema.partial(),
    tzOffsetMinutes: z.number(),
    energyUnit: z.enum(['kcal', 'kj']),
    weightKg: z.number().optional(),
    heightCm: z.number().optional(),
    age: z.number().optional(),
    activityMinutes: z.number().optional(),
    createdAt: z.string(),
  }),
  entries: z.array(
    z.object({
      ...stamped,
      id: z.string(),
      label: z.string(),
      catalogKey: z.string().optional(),
      quantity: z.number(),
      calories: z.number(),
      macros: macrosSchema,
    })
  ),
  activities: z.array(z.object({ ...stamped, label: z.string(), minutes: z.number(), burnedCalories: z.number() })),
  water: z.array(z.object({ ...stamped, ml: z.number() })),
  customFoods: z.record(
    z.object({
      key: z.string(),
      name: z.string(),
      unit: z.string(),
      quantity: z.number(),
      calories: z.number(),
      protein: z.number(),
      fat: z.number(),
      carbs: z.number(),
      source: z.enum(['catalog', 'custom']),
    })
  ),
  nextSeq: z.number().int(),
})

const fileSchema = z.object({
  version: z.literal(1),
  users: z.record(userRecordSchema),
})

type LedgerFile = z.infer<typeof fileSchema>

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}

/**
 * JSON file backend (`data.json`). The whole file is rewritten on every save
 * through a temp file and rename. Saves are chained so two users never race
 * on the file, and a record enters the in-memory view only after its write lands.
 */
export class JsonFileLedgerStore implements LedgerStore {
  private users: Map<UserId, UserRecord> | null = null
  private opening: Promise<Map<UserId, UserRecord>> | null = null
  private writes: Promise<void> = Promise.resolve()

  constructor(private readonly path: string) {}

  async load(userId: UserId): Promise<UserRecord | undefined> {
    const users = await this.open()
    const r = users.get(userId)
    return r ? structuredClone(r) : undefined
  }

  save(record: UserRecord): Promise<void> {
    const copy = structuredClone(record)
    const run = this.writes.then(async () => {
      const users = await this.open()
      const file: LedgerFile = { version: 1, users: Object.fromEntries(users) }
      file.users[copy.profile.userId] = copy
      await this.writeFile(file)
      users.set(copy.profile.userId, copy)
    })
    // keep the chain alive for the next writer; this caller still sees the failure
    this.writes = run.catch(() => undefined)
    return run
  }

  private open(): Promise<Map<UserId, UserRecord>> {
    if (this.users) return Promise.resolve(this.users)
    if (!this.opening) {
      this.opening = this.readFile().then(
        (users) => {
          this.users = users
          return users
        },
        (e: unknown) => {
          this.opening = null
          throw e
        }
      )
    }
    return this.opening
  }

  private async readFile(): Promise<Map<UserId, UserRecord>> {
    let text: string
    try {
      text = await readFile(this.path, 'utf-8')
    } catch (e) {
      if (isMissingFile(e)) return new Map()
      throw new StorageError(`Could not read ledger file ${this.path}`, { cause: e })
    }

    let parsed: LedgerFile
    try {
      parsed = fileSchema.parse(JSON.parse(text))
    } catch (e) {
      // keep the unreadable file for inspection and start over
      const backup = this.path.replace(/\.json$/, '') + '.corrupted.json'
      console.warn('[ledger] %s is unreadable, moved to %s', this.path, backup, e)
      try {
        await rename(this.path, backup)
      } catch (renameError) {
        throw new StorageError(`Could not move corrupted ledger file ${this.path}`, { cause: renameError })
      }
      return new Map()
    }
    return new Map(Object.entries(parsed.users))
  }

  private async writeFile(file: LedgerFile): Promise<void> {
    const tmp = `${this.path}.tmp`
    try {
      await mkdir(dirname(this.path), { recursive: true })
      await writeFile(tmp, JSON.stringify(file, null, 2), 'utf-8')
      await rename(tmp, this.path)
    } catch (e) {
      throw new StorageError(`Could not write ledger file ${this.path}`, { cause: e })
    }
  }
}
