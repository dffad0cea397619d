import { describe, it, expect } from 'vitest'
import type { FoodEntry, TrackerRow } from '../../types'
import { HttpError } from '../errors'
import { monthSheetName, rowValues, SheetsTrackerMirror, toTrackerRow } from './sheets'

const entry: FoodEntry = {
  id: 'u1:3',
  seq: 3,
  userId: 'u1',
  timestamp: '2026-10-31T22:30:00.000Z',
  tzOffsetMinutes: 180,
  label: 'Oats',
  quantity: 0.5,
  calories: 190,
  macros: { protein: 6.5, fat: 3.5, carbs: 33 },
  recordedAt: '2026-10-31T22:30:01.000Z',
}

describe('monthSheetName', () => {
  it('returns YYYY-MM_Tracker for a date', () => {
    expect(monthSheetName('2026-10-05')).toBe('2026-10_Tracker')
  })
})

describe('toTrackerRow', () => {
  it('dates the row by the entry local day', () => {
    const row = toTrackerRow(entry)
    expect(row.date).toBe('2026-11-01')
    expect(monthSheetName(row.date)).toBe('2026-11_Tracker')
  })

  it('mirrors a removal as a negative row', () => {
    const row = toTrackerRow(entry, true)
    expect(row.calories).toBe(-190)
    expect(row.protein).toBe(-6.5)
    expect(row.note).toBe('undo u1:3')
  })

  it('lays out values in header order', () => {
    expect(rowValues(toTrackerRow(entry))).toEqual(['2026-11-01', 'u1', 'Oats', '0.5', 190, 6.5, 3.5, 33, 'u1:3'])
  })
})

describe('SheetsTrackerMirror', () => {
  const profile = {
    userId: 'u1',
    calorieGoal: null,
    macroTargets: {},
    tzOffsetMinutes: 180,
    energyUnit: 'kcal' as const,
    createdAt: '2026-10-01T00:00:00.000Z',
  }

  it('appends one row per recorded entry', async () => {
    const rows: TrackerRow[] = []
    const mirror = new SheetsTrackerMirror({ appendTrackerRows: async (r) => void rows.push(...r) })
    await mirror.entryRecorded(entry, profile)
    expect(rows).toHaveLength(1)
    expect(rows[0].foodItem).toBe('Oats')
  })

  it('swallows sink failures after retrying', async () => {
    let calls = 0
    const mirror = new SheetsTrackerMirror(
      {
        appendTrackerRows: async () => {
          calls++
          throw new Error('sheets down')
        },
      },
      { maxAttempts: 2, initialMs: 0 }
    )
    await expect(mirror.entryRemoved(entry, profile)).resolves.toBeUndefined()
    expect(calls).toBe(2)
  })

  it('gives up on a rejected request without retrying', async () => {
    let calls = 0
    const mirror = new SheetsTrackerMirror(
      {
        appendTrackerRows: async () => {
          calls++
          throw new HttpError('Sheets append failed: 403 forbidden', 403)
        },
      },
      { initialMs: 0 }
    )
    await expect(mirror.entryRecorded(entry, profile)).resolves.toBeUndefined()
    expect(calls).toBe(1)
  })
})
