import type { UserProfile } from '../../types'

/** MET values by workout keyword; first match wins. */
const WORKOUT_METS: Array<{ keywords: string[]; met: number }> = [
  { keywords: ['walk', 'hike', 'ходьба'], met: 3.5 },
  { keywords: ['run', 'jog', 'бег'], met: 9.8 },
  { keywords: ['bike', 'cycl', 'вело'], met: 7.5 },
  { keywords: ['gym', 'weight', 'strength', 'lift', 'сил'], met: 6.0 },
  { keywords: ['yoga', 'stretch', 'pilates', 'йог'], met: 2.5 },
  { keywords: ['swim'], met: 8.0 },
]

const DEFAULT_MET = 6.0

export function workoutMet(workoutType: string): number {
  const t = workoutType.toLowerCase().trim()
  return WORKOUT_METS.find((w) => w.keywords.some((k) => t.includes(k)))?.met ?? DEFAULT_MET
}

/** kcal = MET * 3.5 * kg / 200 * minutes */
export function workoutBurnedCalories(workoutType: string, minutes: number, weightKg: number): number {
  return Math.round(((workoutMet(workoutType) * 3.5 * weightKg) / 200) * minutes)
}

export function minutesToBurn(calories: number, workoutType: string, weightKg: number): number {
  if (calories <= 0) return 0
  const perMinute = (workoutMet(workoutType) * 3.5 * weightKg) / 200
  if (perMinute <= 0) return 0
  return Math.round(calories / perMinute)
}

/** Extra kcal for daily activity: up to 30 min +200, up to 60 min +300, more +400. */
export function activityBonus(activityMinutes: number): number {
  if (activityMinutes <= 30) return 200
  if (activityMinutes <= 60) return 300
  return 400
}

/**
 * Suggested daily goal: 10*kg + 6.25*cm - 5*age plus the activity bonus.
 * Null until weight, height and age are all in the profile.
 */
export function suggestCalorieGoal(
  profile: Pick<UserProfile, 'weightKg' | 'heightCm' | 'age' | 'activityMinutes'>
): number | null {
  const { weightKg, heightCm, age } = profile
  if (weightKg == null || heightCm == null || age == null) return null
  return Math.round(10 * weightKg + 6.25 * heightCm - 5 * age + activityBonus(profile.activityMinutes ?? 0))
}

/** 30 ml per kg, plus 500 ml for each full 30 minutes of daily activity. */
export function dailyWaterGoalMl(weightKg: number, activityMinutes = 0): number {
  return Math.round(weightKg * 30 + Math.floor(activityMinutes / 30) * 500)
}

/** Added to the day's water goal: 200 ml for each full 30 minutes of a workout. */
export function workoutExtraWaterMl(minutes: number): number {
  return Math.floor(minutes / 30) * 200
}

export const KJ_PER_KCAL = 4.184

/** Energy in the user's preferred unit, rounded for display. */
export function formatEnergy(kcal: number, unit: UserProfile['energyUnit']): string {
  if (unit === 'kj') return `${Math.round(kcal * KJ_PER_KCAL)} kJ`
  return `${Math.round(kcal)} kcal`
}

export interface BurnHint {
  activity: string
  minutes: number
}

/** Ways to offset a surplus, shortest last. Empty when there is no surplus or no weight. */
export function burnHints(surplusKcal: number, weightKg: number | undefined): BurnHint[] {
  if (surplusKcal <= 0 || weightKg == null) return []
  return [
    { activity: 'brisk walking', minutes: minutesToBurn(surplusKcal, 'walk', weightKg) },
    { activity: 'cycling', minutes: minutesToBurn(surplusKcal, 'bike', weightKg) },
    { activity: 'running', minutes: minutesToBurn(surplusKcal, 'run', weightKg) },
  ].filter((h) => h.minutes > 0)
}

/** Low-calorie foods offered when there is room left in the day, kcal per 100 g. */
const LIGHT_FOODS: Array<{ name: string; kcalPer100g: number }> = [
  { name: 'cucumbers or tomatoes', kcalPer100g: 20 },
  { name: 'apple', kcalPer100g: 52 },
  { name: 'greek yogurt 2%', kcalPer100g: 80 },
  { name: 'cottage cheese 2%', kcalPer100g: 103 },
  { name: 'chicken breast', kcalPer100g: 165 },
]

export interface FoodIdea {
  name: string
  grams: number
  calories: number
}

/**
 * Portions (50 to 300 g) that fit the calories left, at most four.
 * A portion may overshoot the remainder by up to 10%.
 */
export function lightFoodIdeas(remainingKcal: number): FoodIdea[] {
  if (remainingKcal <= 0) return []
  const ideas: FoodIdea[] = []
  for (const f of LIGHT_FOODS) {
    const grams = Math.round(Math.min(300, Math.max(50, (remainingKcal / f.kcalPer100g) * 100)))
    const calories = (f.kcalPer100g * grams) / 100
    if (calories <= remainingKcal * 1.1) ideas.push({ name: f.name, grams, calories: Math.round(calories) })
  }
  return ideas.slice(0, 4)
}
