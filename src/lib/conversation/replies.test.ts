import { describe, it, expect } from 'vitest'
import type { DailyAggregate, UserProfile } from '../../types'
import { askField, askQuantity, formatDailySummary, formatDraft, formatProfile, formatRange } from './replies'

const profile: UserProfile = {
  userId: 'u1',
  calorieGoal: 2000,
  macroTargets: {},
  tzOffsetMinutes: 0,
  energyUnit: 'kcal',
  weightKg: 70,
  createdAt: '2026-10-01T00:00:00.000Z',
}

function day(date: string, calories: number, entryCount: number, extra: Partial<DailyAggregate> = {}): DailyAggregate {
  return {
    date,
    calories,
    macros: { protein: 0, fat: 0, carbs: 0 },
    entryCount,
    burnedCalories: 0,
    netCalories: calories,
    waterMl: 0,
    waterGoalMl: null,
    goal: 2000,
    delta: calories - 2000,
    macroRatios: { protein: 0, fat: 0, carbs: 0 },
    macroDeltas: {},
    ...extra,
  }
}

describe('formatDraft', () => {
  it('shows totals for the whole amount', () => {
    const draft = {
      label: 'Egg',
      quantity: 2,
      quantityText: '2 pcs',
      caloriesPerServing: 78,
      macrosPerServing: { protein: 6.3, fat: 5.3, carbs: 0.6 },
    }
    expect(formatDraft(draft, profile)).toBe('Egg, 2 pcs: 156 kcal, P 12.6g / F 10.6g / C 1.2g')
  })

  it('uses the preferred energy unit', () => {
    const draft = { label: 'Soup', quantity: 1, caloriesPerServing: 100 }
    expect(formatDraft(draft, { ...profile, energyUnit: 'kj' })).toBe('Soup, 1 serving: 418 kJ')
  })
})

describe('formatDailySummary', () => {
  it('reports goal delta, macro split and burn hints when over goal', () => {
    const text = formatDailySummary(
      day('2026-10-18', 2100, 4, {
        macros: { protein: 100, fat: 70, carbs: 250 },
        macroRatios: { protein: 19.7, fat: 31, carbs: 49.3 },
      }),
      profile,
      'Today'
    )
    expect(text.split('\n')).toEqual([
      '📊 Today',
      'Eaten: 2100 kcal of 2000 kcal (+100 kcal)',
      'Entries: 4',
      'Protein 100g (19.7%) · Fat 70g (31%) · Carbs 250g (49.3%)',
      '💡 To offset ~100 kcal: brisk walking ~23 min, cycling ~11 min, running ~8 min',
    ])
  })

  it('notes a missing goal and shows water', () => {
    const text = formatDailySummary(day('2026-10-18', 0, 0, { goal: null, delta: null, waterMl: 500 }), profile)
    expect(text.split('\n')).toEqual([
      '📊 2026-10-18',
      'Eaten: 0 kcal (no goal set, /goal)',
      'Entries: 0',
      'Protein 0g (0%) · Fat 0g (0%) · Carbs 0g (0%)',
      'Water: 500 ml',
    ])
  })
})

describe('formatDailySummary under a goal', () => {
  it('tracks water against the goal and offers light foods for the calories left', () => {
    const text = formatDailySummary(day('2026-10-18', 1500, 3, { waterMl: 1000, waterGoalMl: 2600 }), profile)
    expect(text.split('\n')).toEqual([
      '📊 2026-10-18',
      'Eaten: 1500 kcal of 2000 kcal (-500 kcal)',
      'Entries: 3',
      'Protein 0g (0%) · Fat 0g (0%) · Carbs 0g (0%)',
      'Water: 1000 of 2600 ml, 1600 ml to go',
      '🥗 Light ideas for the rest: cucumbers or tomatoes ~300 g (60 kcal), apple ~300 g (156 kcal), ' +
        'greek yogurt 2% ~300 g (240 kcal), cottage cheese 2% ~300 g (309 kcal)',
    ])
  })

  it('offers nothing when the day is nearly on target', () => {
    const text = formatDailySummary(day('2026-10-18', 1900, 3, { waterMl: 2700, waterGoalMl: 2600 }), profile)
    expect(text.split('\n').slice(-1)).toEqual(['Water: 2700 of 2600 ml, goal reached'])
  })

  it('shows the goal delta in kJ when that is the preferred unit', () => {
    const text = formatDailySummary(day('2026-10-18', 2100, 4), { ...profile, energyUnit: 'kj' })
    expect(text.split('\n')[1]).toBe('Eaten: 8786 kJ of 8368 kJ (+418 kJ)')
  })
})

describe('askQuantity', () => {
  it('suggests a weight only for foods measured by weight', () => {
    expect(askQuantity({ label: 'Rice', baseQuantity: 100, baseUnit: 'g', caloriesPerServing: 130 })).toBe(
      'Rice: 130 kcal per 100 g. How much did you have? (e.g. 2, or 150 g)'
    )
    expect(askQuantity({ label: 'Egg', baseQuantity: 1, baseUnit: 'n', caloriesPerServing: 78 })).toBe(
      'Egg: 78 kcal per 1 Egg. How much did you have? (e.g. 2)'
    )
  })
})

describe('formatRange', () => {
  it('lists each day with an average over logged days', () => {
    const text = formatRange([day('2026-10-17', 1800, 2), day('2026-10-18', 0, 0)], profile)
    expect(text.split('\n')).toEqual([
      '📈 2026-10-17 → 2026-10-18',
      '2026-10-17: 1800 kcal (-200 kcal)',
      '2026-10-18: 0 kcal (-2000 kcal)',
      'Average on logged days: 1800 kcal over 1/2 days, trending down ↘',
    ])
  })
})

describe('profile texts', () => {
  it('formats an empty profile', () => {
    const bare: UserProfile = { ...profile, calorieGoal: null, weightKg: undefined }
    expect(formatProfile(bare).split('\n')).toEqual([
      '👤 Profile',
      'Calorie goal: not set',
      'Targets: protein -, fat -, carbs -',
      'Timezone: UTC+00:00',
      'Units: kcal',
      'Weight: - kg, height: - cm, age: -',
      'Activity: - min/day',
      'Water goal: set /weight',
    ])
  })

  it('derives the water goal from weight and daily activity', () => {
    const lines = formatProfile({ ...profile, activityMinutes: 45 }).split('\n')
    expect(lines.slice(-2)).toEqual(['Activity: 45 min/day', 'Water goal: 2600 ml/day'])
  })

  it('adds the activity bonus to the suggested goal', () => {
    expect(askField('calorieGoal', { ...profile, heightCm: 175, age: 30, activityMinutes: 90 })).toBe(
      'Daily calorie goal in kcal? (e.g. 2000)\nSuggested from your profile: 2044 kcal. Send 0 to use it.'
    )
  })

  it('offers a suggested goal once the body profile is complete', () => {
    expect(askField('calorieGoal', { ...profile, heightCm: 175, age: 30 })).toBe(
      'Daily calorie goal in kcal? (e.g. 2000)\nSuggested from your profile: 1844 kcal. Send 0 to use it.'
    )
    expect(askField('calorieGoal', profile)).toBe('Daily calorie goal in kcal? (e.g. 2000)')
  })
})
