/** Opaque per-chat user id (Telegram chat id as a string). */
export type UserId = string

/** `<userId>:<seq>` */
export type EntryId = string

export type EnergyUnit = 'kcal' | 'kj'

export interface Macros {
  protein: number
  fat: number
  carbs: number
}

export type MacroName = keyof Macros

/** Gram targets; a missing key means no target for that macro. */
export type MacroTargets = Partial<Macros>

export interface UserProfile {
  userId: UserId
  /** kcal per day; null until the user sets one */
  calorieGoal: number | null
  macroTargets: MacroTargets
  /** UTC offset in minutes, e.g. 180 for UTC+3 */
  tzOffsetMinutes: number
  energyUnit: EnergyUnit
  weightKg?: number
  heightCm?: number
  age?: number
  /** minutes of activity on a typical day; sets the goal bonus and the water goal */
  activityMinutes?: number
  createdAt: string
}

export type ProfileUpdate = Partial<Omit<UserProfile, 'userId' | 'createdAt' | 'macroTargets'>> & {
  macroTargets?: MacroTargets
}

/** One logged food item. Calories and macros are totals for the whole quantity. */
export interface FoodEntry {
  id: EntryId
  seq: number
  userId: UserId
  /** UTC ISO instant of the message that logged it */
  timestamp: string
  /** offset in effect when the entry was captured */
  tzOffsetMinutes: number
  label: string
  catalogKey?: string
  /** serving multiplier */
  quantity: number
  calories: number
  macros: Macros
  recordedAt: string
}

export type NewFoodEntry = Omit<FoodEntry, 'id' | 'seq' | 'userId' | 'recordedAt'>

export interface ActivityEntry {
  seq: number
  userId: UserId
  timestamp: string
  tzOffsetMinutes: number
  label: string
  minutes: number
  burnedCalories: number
  recordedAt: string
}

export type NewActivityEntry = Omit<ActivityEntry, 'seq' | 'userId' | 'recordedAt'>

export interface WaterEntry {
  seq: number
  userId: UserId
  timestamp: string
  tzOffsetMinutes: number
  ml: number
  recordedAt: string
}

export type NewWaterEntry = Omit<WaterEntry, 'seq' | 'userId' | 'recordedAt'>

/** Reference food: nutrition for `quantity` of `unit` (e.g. 100 g, 1 n, 1 cup). */
export interface CatalogFood {
  key: string
  name: string
  unit: string
  quantity: number
  calories: number
  protein: number
  fat: number
  carbs: number
  source: 'catalog' | 'custom'
}

/** Everything the store keeps for one user. */
export interface UserRecord {
  profile: UserProfile
  entries: FoodEntry[]
  activities: ActivityEntry[]
  water: WaterEntry[]
  customFoods: Record<string, CatalogFood>
  nextSeq: number
}

/** Derived per-day summary; never stored. */
export interface DailyAggregate {
  /** YYYY-MM-DD, local to each entry's capture offset */
  date: string
  calories: number
  macros: Macros
  entryCount: number
  burnedCalories: number
  netCalories: number
  waterMl: number
  /** from the current weight and activity plus this day's workouts; null without a weight */
  waterGoalMl: number | null
  goal: number | null
  /** calories - goal; null without a goal */
  delta: number | null
  /** percent of macro energy (4/9/4 kcal per g); zeros when nothing was eaten */
  macroRatios: Macros
  macroDeltas: MacroTargets
}

/** Google Sheets tracker row (mirror of ledger changes). */
export interface TrackerRow {
  date: string
  userId: UserId
  foodItem: string
  quantity: string
  calories: number
  protein: number
  fat: number
  carbs: number
  note?: string
}
