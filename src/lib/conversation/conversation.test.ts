import { beforeEach, describe, expect, it, vi } from 'vitest'
import { StorageError } from '../errors'
import { NutritionLedger } from '../ledger/ledger'
import { MemoryLedgerStore } from '../ledger/store'
import { MemorySessionStore } from '../session/store'
import type { CatalogFood, UserRecord } from '../../types'
import { ConversationEngine } from './conversation'
import * as R from './replies'

const T0 = Date.parse('2026-10-18T09:00:00.000Z')
const MINUTE = 60_000

const catalog: CatalogFood[] = [
  { key: 'egg', name: 'Egg', unit: 'n', quantity: 1, calories: 78, protein: 6.3, fat: 5.3, carbs: 0.6, source: 'catalog' },
  { key: 'apple', name: 'Apple', unit: 'n', quantity: 1, calories: 95, protein: 0.5, fat: 0.3, carbs: 25, source: 'catalog' },
]

/** Memory store whose writes can be switched off. */
class FlakyStore extends MemoryLedgerStore {
  failing = false

  override async save(record: UserRecord): Promise<void> {
    if (this.failing) throw new StorageError('disk full')
    return super.save(record)
  }
}

describe('ConversationEngine', () => {
  let store: FlakyStore
  let ledger: NutritionLedger
  let sessions: MemorySessionStore
  let engine: ConversationEngine
  let clock: number

  const say = (text: string, at = clock) => {
    clock = at + MINUTE
    return engine.handle('u1', text, new Date(at))
  }

  beforeEach(() => {
    store = new FlakyStore()
    ledger = new NutritionLedger(store, { now: () => new Date(T0) })
    sessions = new MemorySessionStore(30 * MINUTE)
    engine = new ConversationEngine({ ledger, sessions, catalog })
    clock = T0
  })

  it('logs a catalog food and reports the day', async () => {
    expect((await say('/goal 2000'))[0]).toMatch(/^✅ Saved\.\n👤 Profile\nCalorie goal: 2000 kcal/)
    expect(await say('egg')).toEqual(['Egg: 78 kcal per 1 Egg. How much did you have? (e.g. 2)'])
    expect(await say('2')).toEqual(['Egg, 2 pcs: 156 kcal, P 12.6g / F 10.6g / C 1.2g', R.ASK_CONFIRM])
    expect(await say('yes')).toEqual(['✅ Logged Egg (156 kcal). Today: 156 kcal of 2000 kcal.'])
    expect((await ledger.dailyTotals('u1', '2026-10-18')).calories).toBe(156)
  })

  it('uses a personal food before the catalog', async () => {
    await say('/addfood egg 100')
    expect(await say('egg')).toEqual(['egg: 100 kcal per 1 serving. How much did you have? (e.g. 2)'])
  })

  it('logs a food under the name the user typed when it only contains a catalog name', async () => {
    expect(await say('pineapple')).toEqual(['How many servings of pineapple? (e.g. 1, 0.5, 2)'])
    await say('1')
    await say('80')
    await say('skip')
    await say('yes')
    expect(await ledger.lastEntry('u1')).toMatchObject({ label: 'pineapple', calories: 80 })
  })

  it('records a weighed unknown food with the kcal for that amount', async () => {
    await say('quinoa salad')
    expect(await say('150 g')).toEqual(['How many kcal in 150 g of quinoa salad?'])
    await say('250')
    await say('skip')
    expect(await say('yes')).toEqual(['✅ Logged quinoa salad (250 kcal). Today: 250 kcal.'])
    expect(await ledger.lastEntry('u1')).toMatchObject({ quantity: 1, calories: 250 })
  })

  it('measures water against a goal from weight and daily activity', async () => {
    await say('/weight 70')
    expect((await say('/activity 45'))[0].split('\n').slice(-2)).toEqual(['Activity: 45 min/day', 'Water goal: 2600 ml/day'])
    expect(await say('/water 500')).toEqual(['💧 Logged 500 ml. Today: 500 of 2600 ml.'])
    await say('/workout run 30')
    expect(await say('/water 250')).toEqual(['💧 Logged 250 ml. Today: 750 of 2800 ml.'])
  })

  it('removes only one entry when undo is confirmed twice', async () => {
    await say('egg')
    await say('1')
    await say('yes')
    await say('egg')
    await say('2')
    await say('yes')

    expect(await say('/undo')).toEqual(['Remove the last entry: Egg (156 kcal)? (yes / no)'])
    expect(await say('yes')).toEqual(['↩️ Removed Egg (156 kcal).'])
    expect(await say('yes')).toEqual([])
    expect((await ledger.dailyTotals('u1', '2026-10-18')).calories).toBe(78)
  })

  it('keeps the question open after a bad answer', async () => {
    await say('mystery stew')
    expect(await say('lots')).toEqual(['Send the amount as a number, e.g. 2, 0.5 or 150 g.'])
    expect(await say('1')).toEqual(['How many kcal in one serving of mystery stew?'])
  })

  it('stays on the field when the ledger rejects the value', async () => {
    await say('/goal')
    expect(await say('20000')).toEqual(['⚠️ Calorie goal must be a number between 1 and 10000.'])
    expect(sessions.get('u1', clock).flow).toEqual({ kind: 'editingProfileField', field: 'calorieGoal' })
    expect((await say('1800'))[0]).toMatch(/^✅ Saved\./)
    expect((await ledger.getProfile('u1')).calorieGoal).toBe(1800)
  })

  it('drops a partial entry after the session timeout', async () => {
    await say('egg')
    await say('2')
    expect(await say('yes', clock + 31 * MINUTE)).toEqual([R.EXPIRED_TEXT])
    expect((await ledger.dailyTotals('u1', '2026-10-18')).entryCount).toBe(0)
  })

  it('cancels without writing anything', async () => {
    await say('egg')
    await say('2')
    expect(await say('cancel')).toEqual([R.CANCELLED_TEXT])
    expect(await ledger.lastEntry('u1')).toBeUndefined()
  })

  it('reports a storage failure and resets the conversation', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    await say('egg')
    await say('2')
    store.failing = true
    expect(await say('yes')).toEqual([R.STORAGE_FAILURE_TEXT])
    store.failing = false
    expect(sessions.get('u1', clock).flow).toEqual({ kind: 'idle' })
    expect(await ledger.lastEntry('u1')).toBeUndefined()
    vi.restoreAllMocks()
  })

  it('shows the workout burn in the day summary', async () => {
    await say('/weight 70')
    await say('/goal 2000')
    expect(await say('/workout walk 60')).toEqual(['🏃 Logged walk, 60 min: about 257 kcal burned. Water goal +400 ml today.'])
    const summary = (await say('/today'))[0].split('\n')
    expect(summary[0]).toBe('📊 Today, 2026-10-18')
    expect(summary).toContain('Burned: 257 kcal · Net: -257 kcal')
  })
})
