import type { DailyAggregate, FoodEntry, UserProfile } from '../../types'
import { calorieTrend, round1 } from '../ledger/aggregate'
import { unitsCompatible } from '../food/units'
import { burnHints, dailyWaterGoalMl, formatEnergy, lightFoodIdeas, suggestCalorieGoal } from '../nutrition/calc'
import { formatTimezoneOffset } from './parse'
import type { FoodDraft, ProfileField, ReadyDraft } from './states'

export const HELP_TEXT = [
  'Log food: /log, or just send a food name, e.g. "oats".',
  'Reports: /today, /day 2026-10-01, /week, /range 2026-10-01 2026-10-07 or /range 14.',
  'Activity: /workout run 30, /water 250.',
  'Goals: /goal 2000, /protein 120, /fat 70, /carbs 250.',
  'Profile: /profile, /timezone +3, /units kcal|kj, /weight, /height, /age, /activity 45 (minutes a day).',
  'Personal foods: /addfood granola 450 10 15 60 (per serving: kcal protein fat carbs).',
  'Fix mistakes: /undo removes the last food entry. /cancel stops whatever I am asking.',
].join('\n')

export const WELCOME_TEXT =
  "Hi! I keep a food diary for you. Send what you ate, e.g. \"banana\", and I'll ask how much.\n\n" + HELP_TEXT

export const GREETING_TEXT = 'Hey! Send me a food name to log it, or /today for your totals.'
export const QUERY_HINT = 'Use /today for today, /week for the last 7 days.'
export const IDLE_HINT = 'I log nutrition. Try a food name like "oats", or /help.'
export const EXPIRED_TEXT = 'Your previous entry timed out and was discarded. Start again with /log.'
export const CANCELLED_TEXT = 'Cancelled. Nothing was saved.'
export const NOTHING_TO_CANCEL = 'Nothing to cancel.'
export const NOTHING_TO_UNDO = 'Nothing to undo.'
export const UNDO_TARGET_CHANGED = 'The last entry has changed since I asked. Send /undo again.'
export const STORAGE_FAILURE_TEXT = 'Something went wrong saving your data; nothing changed. Please try again.'
export const UNKNOWN_COMMAND_TEXT = 'Unknown command. /help'

export const ASK_FOOD_NAME = 'What did you eat? Send the food name.'
export const ASK_CONFIRM = 'Save it? (yes / no)'
export const ASK_RANGE = 'Which days? Send "2026-10-01 2026-10-07", or a number of days like 7.'
export const ASK_WORKOUT_TYPE = 'What kind of workout? (e.g. run, walk, bike, gym, yoga)'
export const ASK_WORKOUT_MINUTES = 'How many minutes?'

export function askQuantity(draft: FoodDraft): string {
  if (draft.baseQuantity != null && draft.baseUnit != null && draft.caloriesPerServing != null) {
    const base = draft.baseUnit === 'n' ? `1 ${draft.label}` : `${draft.baseQuantity} ${draft.baseUnit}`
    const example = unitsCompatible('g', draft.baseUnit) ? '2, or 150 g' : '2'
    return `${draft.label}: ${Math.round(draft.caloriesPerServing)} kcal per ${base}. How much did you have? (e.g. ${example})`
  }
  return `How many servings of ${draft.label}? (e.g. 1, 0.5, 2)`
}

export function askCalories(draft: FoodDraft): string {
  if (draft.baseQuantity != null && draft.baseUnit != null) {
    return `How many kcal in ${draft.baseQuantity} ${draft.baseUnit} of ${draft.label}?`
  }
  return `How many kcal in one serving of ${draft.label}?`
}

export function askMacros(draft: FoodDraft): string {
  const ask =
    draft.baseQuantity != null && draft.baseUnit != null
      ? `Grams of protein, fat and carbs in ${draft.baseQuantity} ${draft.baseUnit}`
      : 'Protein, fat and carbs per serving in grams'
  return `${ask}, e.g. "20 10 30". Send "skip" if you don't know.`
}

export const FIELD_PROMPTS: Record<ProfileField, string> = {
  calorieGoal: 'Daily calorie goal in kcal? (e.g. 2000)',
  protein: 'Daily protein target in grams?',
  fat: 'Daily fat target in grams?',
  carbs: 'Daily carbs target in grams?',
  timezone: 'Your UTC offset? (e.g. +3, -5, +05:30)',
  energyUnit: 'Show energy in kcal or kj?',
  weightKg: 'Your weight in kg?',
  heightCm: 'Your height in cm?',
  age: 'Your age in years?',
  activityMinutes: 'Minutes of activity on a typical day? (e.g. 45)',
}

/** Restates the expected input after a bad answer. */
export const FIELD_ERRORS: Record<ProfileField, string> = {
  calorieGoal: 'Send the goal as a number of kcal, e.g. 2000.',
  protein: 'Send grams as a number, e.g. 120.',
  fat: 'Send grams as a number, e.g. 70.',
  carbs: 'Send grams as a number, e.g. 250.',
  timezone: 'Send an offset like +3, -5 or +05:30.',
  energyUnit: 'Send kcal or kj.',
  weightKg: 'Send your weight in kg, e.g. 72.5.',
  heightCm: 'Send your height in cm, e.g. 175.',
  age: 'Send your age as a whole number, e.g. 35.',
  activityMinutes: 'Send minutes as a whole number, e.g. 45.',
}

export function askField(field: ProfileField, profile: UserProfile): string {
  if (field === 'calorieGoal') {
    const suggested = suggestCalorieGoal(profile)
    if (suggested != null) return `${FIELD_PROMPTS.calorieGoal}\nSuggested from your profile: ${suggested} kcal. Send 0 to use it.`
  }
  return FIELD_PROMPTS[field]
}

export function draftTotals(draft: ReadyDraft): { calories: number; protein: number; fat: number; carbs: number } {
  const m = draft.macrosPerServing
  return {
    calories: Math.round(draft.caloriesPerServing * draft.quantity),
    protein: m ? round1(m.protein * draft.quantity) : 0,
    fat: m ? round1(m.fat * draft.quantity) : 0,
    carbs: m ? round1(m.carbs * draft.quantity) : 0,
  }
}

export function formatDraft(draft: ReadyDraft, profile: UserProfile): string {
  const t = draftTotals(draft)
  const amount = draft.quantityText ?? `${draft.quantity} serving${draft.quantity === 1 ? '' : 's'}`
  const macros = draft.macrosPerServing ? `, P ${t.protein}g / F ${t.fat}g / C ${t.carbs}g` : ''
  return `${draft.label}, ${amount}: ${formatEnergy(t.calories, profile.energyUnit)}${macros}`
}

export function formatEntry(entry: FoodEntry, profile: UserProfile): string {
  return `${entry.label} (${formatEnergy(entry.calories, profile.energyUnit)})`
}

function signed(n: number, suffix = ''): string {
  return `${n > 0 ? '+' : ''}${n}${suffix}`
}

function signedEnergy(kcal: number, unit: UserProfile['energyUnit']): string {
  return `${kcal > 0 ? '+' : ''}${formatEnergy(kcal, unit)}`
}

/** Food ideas are offered only when more than this is left. */
const ROOM_FOR_IDEAS_KCAL = 150

function waterProgress(waterMl: number, goalMl: number): string {
  const left = goalMl - waterMl
  return `Water: ${waterMl} of ${goalMl} ml` + (left > 0 ? `, ${left} ml to go` : ', goal reached')
}

/** Daily summary: totals, goal delta, macros, activity, water, then burn hints or light food ideas. */
export function formatDailySummary(day: DailyAggregate, profile: UserProfile, title = day.date): string {
  const unit = profile.energyUnit
  const lines = [`📊 ${title}`]
  if (day.goal != null && day.delta != null) {
    lines.push(`Eaten: ${formatEnergy(day.calories, unit)} of ${formatEnergy(day.goal, unit)} (${signedEnergy(day.delta, unit)})`)
  } else {
    lines.push(`Eaten: ${formatEnergy(day.calories, unit)} (no goal set, /goal)`)
  }
  lines.push(`Entries: ${day.entryCount}`)

  const { protein, fat, carbs } = day.macros
  const r = day.macroRatios
  lines.push(`Protein ${protein}g (${r.protein}%) · Fat ${fat}g (${r.fat}%) · Carbs ${carbs}g (${r.carbs}%)`)
  const targets = (['protein', 'fat', 'carbs'] as const)
    .filter((m) => day.macroDeltas[m] != null)
    .map((m) => `${m} ${signed(day.macroDeltas[m] ?? 0, 'g')}`)
  if (targets.length) lines.push(`vs targets: ${targets.join(', ')}`)

  if (day.burnedCalories > 0) {
    lines.push(`Burned: ${formatEnergy(day.burnedCalories, unit)} · Net: ${formatEnergy(day.netCalories, unit)}`)
  }
  if (day.waterGoalMl != null) lines.push(waterProgress(day.waterMl, day.waterGoalMl))
  else if (day.waterMl > 0) lines.push(`Water: ${day.waterMl} ml`)

  if (day.goal == null) return lines.join('\n')
  const surplus = day.netCalories - day.goal
  const hints = burnHints(surplus, profile.weightKg)
  if (hints.length) {
    lines.push(`💡 To offset ~${formatEnergy(surplus, unit)}: ` + hints.map((h) => `${h.activity} ~${h.minutes} min`).join(', '))
  }
  if (-surplus > ROOM_FOR_IDEAS_KCAL) {
    const ideas = lightFoodIdeas(-surplus)
    if (ideas.length) {
      const list = ideas.map((i) => `${i.name} ~${i.grams} g (${formatEnergy(i.calories, unit)})`)
      lines.push(`🥗 Light ideas for the rest: ${list.join(', ')}`)
    }
  }
  return lines.join('\n')
}

const TREND_TEXT = { up: 'trending up ↗', down: 'trending down ↘', flat: 'steady →' } as const

/** One line per day plus average and trend. */
export function formatRange(days: DailyAggregate[], profile: UserProfile): string {
  if (days.length === 0) return 'No days in that range.'
  const unit = profile.energyUnit
  const first = days[0].date
  const last = days[days.length - 1].date
  const lines = [`📈 ${first} → ${last}`]
  for (const d of days) {
    const delta = d.delta != null ? ` (${signedEnergy(d.delta, unit)})` : ''
    lines.push(`${d.date}: ${formatEnergy(d.calories, unit)}${delta}`)
  }
  const logged = days.filter((d) => d.entryCount > 0)
  const avg = logged.length ? logged.reduce((s, d) => s + d.calories, 0) / logged.length : 0
  lines.push(`Average on logged days: ${formatEnergy(avg, unit)} over ${logged.length}/${days.length} days, ${TREND_TEXT[calorieTrend(days)]}`)
  return lines.join('\n')
}

export function formatProfile(profile: UserProfile): string {
  const t = profile.macroTargets
  const g = (v: number | undefined) => (v != null ? `${v}g` : '-')
  return [
    '👤 Profile',
    `Calorie goal: ${profile.calorieGoal != null ? formatEnergy(profile.calorieGoal, profile.energyUnit) : 'not set'}`,
    `Targets: protein ${g(t.protein)}, fat ${g(t.fat)}, carbs ${g(t.carbs)}`,
    `Timezone: ${formatTimezoneOffset(profile.tzOffsetMinutes)}`,
    `Units: ${profile.energyUnit}`,
    `Weight: ${profile.weightKg ?? '-'} kg, height: ${profile.heightCm ?? '-'} cm, age: ${profile.age ?? '-'}`,
    `Activity: ${profile.activityMinutes ?? '-'} min/day`,
    `Water goal: ${profile.weightKg != null ? `${dailyWaterGoalMl(profile.weightKg, profile.activityMinutes)} ml/day` : 'set /weight'}`,
  ].join('\n')
}
