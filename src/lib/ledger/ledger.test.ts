import { describe, it, expect, beforeEach } from 'vitest'
import { NotFoundError, StorageError, ValidationError } from '../errors'
import type { FoodEntry, NewFoodEntry, UserRecord } from '../../types'
import { NutritionLedger } from './ledger'
import { MemoryLedgerStore, type LedgerStore } from './store'

const NOW = new Date('2026-10-18T12:00:00.000Z')

function entry(calories: number, timestamp = '2026-10-18T10:00:00.000Z', tzOffsetMinutes = 0): NewFoodEntry {
  return {
    timestamp,
    tzOffsetMinutes,
    label: 'Meal',
    quantity: 1,
    calories,
    macros: { protein: 10, fat: 10, carbs: 10 },
  }
}

describe('NutritionLedger', () => {
  let store: MemoryLedgerStore
  let ledger: NutritionLedger

  beforeEach(async () => {
    store = new MemoryLedgerStore()
    ledger = new NutritionLedger(store, { now: () => NOW })
    await ledger.updateProfile('u1', { calorieGoal: 2000 })
  })

  it('creates a default profile on first contact', async () => {
    const profile = await ledger.getProfile('u2')
    expect(profile).toEqual({
      userId: 'u2',
      calorieGoal: null,
      macroTargets: {},
      tzOffsetMinutes: 0,
      energyUnit: 'kcal',
      createdAt: '2026-10-18T12:00:00.000Z',
    })
  })

  it('totals a day against the goal', async () => {
    await ledger.recordEntry('u1', entry(500))
    await ledger.recordEntry('u1', entry(700))
    await ledger.recordEntry('u1', entry(300))
    const day = await ledger.dailyTotals('u1', '2026-10-18')
    expect(day.calories).toBe(1500)
    expect(day.delta).toBe(-500)

    await ledger.recordEntry('u1', entry(600))
    const after = await ledger.dailyTotals('u1', '2026-10-18')
    expect(after.calories).toBe(2100)
    expect(after.delta).toBe(100)
  })

  it('reads totals for an unknown user without creating a record', async () => {
    const day = await ledger.dailyTotals('u3', '2026-10-18')
    expect(day.calories).toBe(0)
    expect(day.goal).toBeNull()
    expect(await ledger.rangeTotals('u3', '2026-10-17', '2026-10-18')).toHaveLength(2)
    expect(await store.load('u3')).toBeUndefined()
  })

  it('assigns increasing ids', async () => {
    expect(await ledger.recordEntry('u1', entry(100))).toBe('u1:1')
    expect(await ledger.recordEntry('u1', entry(100))).toBe('u1:2')
  })

  it('rejects negative calories and empty quantity', async () => {
    await expect(ledger.recordEntry('u1', entry(-1))).rejects.toBeInstanceOf(ValidationError)
    await expect(ledger.recordEntry('u1', { ...entry(100), quantity: 0 })).rejects.toThrow('quantity must be more than zero')
    expect((await ledger.dailyTotals('u1', '2026-10-18')).entryCount).toBe(0)
  })

  it('undoes the most recently recorded entry', async () => {
    await ledger.recordEntry('u1', entry(500, '2026-10-18T18:00:00.000Z'))
    await ledger.recordEntry('u1', entry(200, '2026-10-18T08:00:00.000Z'))
    const removed = await ledger.undoLast('u1')
    expect(removed.calories).toBe(200)
    expect((await ledger.dailyTotals('u1', '2026-10-18')).calories).toBe(500)
  })

  it('fails undo with nothing recorded', async () => {
    await expect(ledger.undoLast('u1')).rejects.toBeInstanceOf(NotFoundError)
    await expect(ledger.undoLast('nobody')).rejects.toThrow('No entries to undo')
  })

  it('returns one aggregate per day of a range, empty days included', async () => {
    await ledger.recordEntry('u1', entry(400, '2026-10-16T10:00:00.000Z'))
    await ledger.recordEntry('u1', entry(900, '2026-10-18T10:00:00.000Z'))
    const days = await ledger.rangeTotals('u1', '2026-10-15', '2026-10-18')
    expect(days.map((d) => [d.date, d.calories])).toEqual([
      ['2026-10-15', 0],
      ['2026-10-16', 400],
      ['2026-10-17', 0],
      ['2026-10-18', 900],
    ])
  })

  it('rejects reversed and oversized ranges', async () => {
    await expect(ledger.rangeTotals('u1', '2026-10-18', '2026-10-01')).rejects.toThrow('start date is after end date')
    await expect(ledger.rangeTotals('u1', '2025-01-01', '2026-10-18')).rejects.toThrow('range is longer than 366 days')
    await expect(ledger.dailyTotals('u1', '2026-13-01')).rejects.toBeInstanceOf(ValidationError)
  })

  it('keeps old entries on their day after a timezone change', async () => {
    await ledger.recordEntry('u1', entry(450, '2026-10-18T22:30:00.000Z', 0))
    await ledger.updateProfile('u1', { tzOffsetMinutes: 180 })
    expect((await ledger.dailyTotals('u1', '2026-10-18')).calories).toBe(450)
    expect((await ledger.dailyTotals('u1', '2026-10-19')).calories).toBe(0)
  })

  it('merges profile updates and validates ranges', async () => {
    await ledger.updateProfile('u1', { macroTargets: { protein: 120 } })
    const profile = await ledger.updateProfile('u1', { macroTargets: { fat: 70 }, weightKg: 72.5 })
    expect(profile.macroTargets).toEqual({ protein: 120, fat: 70 })
    expect(profile.calorieGoal).toBe(2000)
    expect(profile.weightKg).toBe(72.5)
    await expect(ledger.updateProfile('u1', { calorieGoal: 20000 })).rejects.toThrow(
      'calorie goal must be a number between 1 and 10000'
    )
    await expect(ledger.updateProfile('u1', { age: 30.5 })).rejects.toThrow('age must be a whole number between 1 and 120')
    await expect(ledger.updateProfile('u1', { activityMinutes: 2000 })).rejects.toBeInstanceOf(ValidationError)
    expect((await ledger.updateProfile('u1', { activityMinutes: 45 })).activityMinutes).toBe(45)
  })

  it('records workouts and water into the day', async () => {
    await ledger.recordEntry('u1', entry(900))
    await ledger.recordActivity('u1', {
      timestamp: '2026-10-18T11:00:00.000Z',
      tzOffsetMinutes: 0,
      label: 'run',
      minutes: 30,
      burnedCalories: 257,
    })
    await ledger.recordWater('u1', { timestamp: '2026-10-18T11:00:00.000Z', tzOffsetMinutes: 0, ml: 250 })
    const day = await ledger.dailyTotals('u1', '2026-10-18')
    expect(day.burnedCalories).toBe(257)
    expect(day.netCalories).toBe(643)
    expect(day.waterMl).toBe(250)
    await expect(ledger.recordWater('u1', { timestamp: NOW.toISOString(), tzOffsetMinutes: 0, ml: 0 })).rejects.toThrow(
      'water must be a whole number between 1 and 5000'
    )
  })

  it('stores custom foods under a normalized key', async () => {
    const saved = await ledger.addCustomFood('u1', {
      name: ' Granola Bar ',
      unit: 'serving',
      quantity: 1,
      calories: 190,
      protein: 4,
      fat: 7,
      carbs: 28,
    })
    expect(saved.key).toBe('granola bar')
    expect(saved.name).toBe('Granola Bar')
    expect(await ledger.customFoods('u1')).toEqual([saved])
  })

  it('notifies listeners after commit and survives their failures', async () => {
    const seen: string[] = []
    const noisy = new NutritionLedger(store, {
      now: () => NOW,
      listeners: [
        {
          entryRecorded: () => {
            throw new Error('listener down')
          },
        },
        { entryRecorded: (e: FoodEntry) => void seen.push(e.id), entryRemoved: (e: FoodEntry) => void seen.push(`-${e.id}`) },
      ],
    })
    const id = await noisy.recordEntry('u1', entry(100))
    await noisy.undoLast('u1')
    expect(seen).toEqual([id, `-${id}`])
  })

  it('surfaces storage failures and leaves state unchanged', async () => {
    await ledger.recordEntry('u1', entry(300))
    const failing: LedgerStore = {
      load: (userId) => store.load(userId),
      save: async (_record: UserRecord) => {
        throw new StorageError('disk full')
      },
    }
    const broken = new NutritionLedger(failing, { now: () => NOW })
    await expect(broken.recordEntry('u1', entry(500))).rejects.toBeInstanceOf(StorageError)
    expect((await ledger.dailyTotals('u1', '2026-10-18')).calories).toBe(300)
  })
})
