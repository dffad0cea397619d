import { addDays, differenceInCalendarDays, eachDayOfInterval, format, isValid, parseISO } from 'date-fns'
import type { DailyAggregate, MacroName, Macros, MacroTargets, UserRecord } from '../../types'
import { dailyWaterGoalMl, workoutExtraWaterMl } from '../nutrition/calc'

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/
const MINUTE_MS = 60_000

export const KCAL_PER_GRAM: Macros = { protein: 4, fat: 9, carbs: 4 }
const MACRO_NAMES: MacroName[] = ['protein', 'fat', 'carbs']

export function round1(n: number): number {
  return Math.round(n * 10) / 10
}

/** True for a real calendar date in YYYY-MM-DD form (rejects 2026-02-30). */
export function isIsoDate(s: string): boolean {
  if (!DATE_RE.test(s)) return false
  const d = parseISO(s)
  return isValid(d) && format(d, 'yyyy-MM-dd') === s
}

/**
 * Local calendar day of an instant under a fixed UTC offset.
 * Uses the offset recorded with the entry, so later timezone edits never move it.
 */
export function localDateOf(timestampUtc: string, tzOffsetMinutes: number): string {
  const shifted = new Date(Date.parse(timestampUtc) + tzOffsetMinutes * MINUTE_MS)
  return shifted.toISOString().slice(0, 10)
}

/** Every date from start to end inclusive. Caller validates order. */
export function datesInRange(start: string, end: string): string[] {
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map((d) => format(d, 'yyyy-MM-dd'))
}

export function daySpan(start: string, end: string): number {
  return differenceInCalendarDays(parseISO(end), parseISO(start)) + 1
}

export function shiftDate(date: string, days: number): string {
  return format(addDays(parseISO(date), days), 'yyyy-MM-dd')
}

export function emptyMacros(): Macros {
  return { protein: 0, fat: 0, carbs: 0 }
}

export function macroRatios(macros: Macros): Macros {
  const energy = MACRO_NAMES.reduce((s, m) => s + macros[m] * KCAL_PER_GRAM[m], 0)
  if (energy <= 0) return emptyMacros()
  return {
    protein: round1(((macros.protein * KCAL_PER_GRAM.protein) / energy) * 100),
    fat: round1(((macros.fat * KCAL_PER_GRAM.fat) / energy) * 100),
    carbs: round1(((macros.carbs * KCAL_PER_GRAM.carbs) / energy) * 100),
  }
}

function macroDeltas(macros: Macros, targets: MacroTargets): MacroTargets {
  const out: MacroTargets = {}
  for (const m of MACRO_NAMES) {
    const target = targets[m]
    if (target != null) out[m] = round1(macros[m] - target)
  }
  return out
}

/** Build the aggregate for one local day from raw entries. Pure; same input, same output. */
export function aggregateDay(record: UserRecord, date: string): DailyAggregate {
  let calories = 0
  let entryCount = 0
  const macros = emptyMacros()
  for (const e of record.entries) {
    if (localDateOf(e.timestamp, e.tzOffsetMinutes) !== date) continue
    calories += e.calories
    macros.protein += e.macros.protein
    macros.fat += e.macros.fat
    macros.carbs += e.macros.carbs
    entryCount++
  }

  let burned = 0
  let workoutWater = 0
  for (const a of record.activities) {
    if (localDateOf(a.timestamp, a.tzOffsetMinutes) !== date) continue
    burned += a.burnedCalories
    workoutWater += workoutExtraWaterMl(a.minutes)
  }

  let waterMl = 0
  for (const w of record.water) {
    if (localDateOf(w.timestamp, w.tzOffsetMinutes) === date) waterMl += w.ml
  }

  const summed: Macros = { protein: round1(macros.protein), fat: round1(macros.fat), carbs: round1(macros.carbs) }
  const total = round1(calories)
  const { calorieGoal: goal, weightKg, activityMinutes } = record.profile
  return {
    date,
    calories: total,
    macros: summed,
    entryCount,
    burnedCalories: round1(burned),
    netCalories: round1(total - burned),
    waterMl: Math.round(waterMl),
    waterGoalMl: weightKg != null ? dailyWaterGoalMl(weightKg, activityMinutes) + workoutWater : null,
    goal,
    delta: goal != null ? round1(total - goal) : null,
    macroRatios: macroRatios(summed),
    macroDeltas: macroDeltas(summed, record.profile.macroTargets),
  }
}

export type Trend = 'up' | 'down' | 'flat'

/**
 * Compare the average calories of the second half of a range with the first half.
 * Changes within 5% count as flat.
 */
export function calorieTrend(days: DailyAggregate[]): Trend {
  if (days.length < 2) return 'flat'
  const half = Math.floor(days.length / 2)
  const avg = (xs: DailyAggregate[]) => xs.reduce((s, d) => s + d.calories, 0) / xs.length
  const first = avg(days.slice(0, half))
  const second = avg(days.slice(days.length - half))
  if (first === 0 && second === 0) return 'flat'
  const base = Math.max(first, 1)
  const change = (second - first) / base
  if (change > 0.05) return 'up'
  if (change < -0.05) return 'down'
  return 'flat'
}
