import { NotFoundError, ValidationError } from '../errors'
import { normalizeFoodName } from '../food/match'
import type {
  ActivityEntry,
  CatalogFood,
  DailyAggregate,
  EntryId,
  FoodEntry,
  NewActivityEntry,
  NewFoodEntry,
  NewWaterEntry,
  ProfileUpdate,
  UserId,
  UserProfile,
  UserRecord,
  WaterEntry,
} from '../../types'
import { aggregateDay, datesInRange, daySpan, isIsoDate } from './aggregate'
import type { LedgerStore } from './store'

export const MAX_RANGE_DAYS = 366

/** Notified after a ledger change is committed. */
export interface LedgerListener {
  entryRecorded?(entry: FoodEntry, profile: UserProfile): void | Promise<void>
  entryRemoved?(entry: FoodEntry, profile: UserProfile): void | Promise<void>
}

export interface NutritionLedgerOptions {
  /** offset given to profiles created on first contact */
  defaultTzOffsetMinutes?: number
  now?: () => Date
  listeners?: LedgerListener[]
}

interface Range {
  min: number
  max: number
  integer?: boolean
}

const PROFILE_LIMITS = {
  calorieGoal: { min: 1, max: 10000 },
  macroTarget: { min: 0, max: 1000 },
  tzOffsetMinutes: { min: -720, max: 840, integer: true },
  weightKg: { min: 1, max: 400 },
  heightCm: { min: 1, max: 260 },
  age: { min: 1, max: 120, integer: true },
  activityMinutes: { min: 0, max: 1440, integer: true },
} satisfies Record<string, Range>

function checkRange(field: string, value: number, r: Range): void {
  if (!Number.isFinite(value) || value < r.min || value > r.max || (r.integer && !Number.isInteger(value))) {
    const kind = r.integer ? 'a whole number' : 'a number'
    throw new ValidationError(`${field} must be ${kind} between ${r.min} and ${r.max}`, field)
  }
}

function checkNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) throw new ValidationError(`${field} must be zero or more`, field)
}

function checkTimestamp(timestamp: string): void {
  if (Number.isNaN(Date.parse(timestamp))) throw new ValidationError('timestamp is not a valid instant', 'timestamp')
}

/**
 * Owns entry lifecycle and aggregation. Every write is scoped to one user record;
 * callers serialize per user (see keyedQueue).
 */
export class NutritionLedger {
  private readonly defaultTzOffsetMinutes: number
  private readonly now: () => Date
  private readonly listeners: LedgerListener[]

  constructor(
    private readonly store: LedgerStore,
    options: NutritionLedgerOptions = {}
  ) {
    this.defaultTzOffsetMinutes = options.defaultTzOffsetMinutes ?? 0
    this.now = options.now ?? (() => new Date())
    this.listeners = options.listeners ?? []
  }

  async getProfile(userId: UserId): Promise<UserProfile> {
    const record = await this.loadOrCreate(userId)
    return record.profile
  }

  async recordEntry(userId: UserId, entry: NewFoodEntry): Promise<EntryId> {
    const label = entry.label.trim()
    if (!label) throw new ValidationError('food name is empty', 'label')
    checkNonNegative('calories', entry.calories)
    checkNonNegative('protein', entry.macros.protein)
    checkNonNegative('fat', entry.macros.fat)
    checkNonNegative('carbs', entry.macros.carbs)
    if (!Number.isFinite(entry.quantity) || entry.quantity <= 0) {
      throw new ValidationError('quantity must be more than zero', 'quantity')
    }
    checkTimestamp(entry.timestamp)

    const record = await this.loadOrCreate(userId)
    const seq = record.nextSeq
    const saved: FoodEntry = {
      ...entry,
      label,
      macros: { ...entry.macros },
      id: `${userId}:${seq}`,
      seq,
      userId,
      recordedAt: this.now().toISOString(),
    }
    record.entries.push(saved)
    record.nextSeq = seq + 1
    await this.store.save(record)
    await this.notify('entryRecorded', saved, record.profile)
    return saved.id
  }

  /** Most recent food entry by recording order (seq), not by event time. */
  async lastEntry(userId: UserId): Promise<FoodEntry | undefined> {
    const record = await this.store.load(userId)
    if (!record) return undefined
    return latestBySeq(record.entries)
  }

  async undoLast(userId: UserId): Promise<FoodEntry> {
    const record = await this.store.load(userId)
    const last = record ? latestBySeq(record.entries) : undefined
    if (!record || !last) throw new NotFoundError('No entries to undo')
    record.entries = record.entries.filter((e) => e.seq !== last.seq)
    await this.store.save(record)
    await this.notify('entryRemoved', last, record.profile)
    return last
  }

  async dailyTotals(userId: UserId, date: string): Promise<DailyAggregate> {
    if (!isIsoDate(date)) throw new ValidationError(`"${date}" is not a date (YYYY-MM-DD)`, 'date')
    const record = await this.loadOrDefault(userId)
    return aggregateDay(record, date)
  }

  /** One aggregate per day, start and end inclusive, empty days included. */
  async rangeTotals(userId: UserId, startDate: string, endDate: string): Promise<DailyAggregate[]> {
    for (const d of [startDate, endDate]) {
      if (!isIsoDate(d)) throw new ValidationError(`"${d}" is not a date (YYYY-MM-DD)`, 'date')
    }
    if (startDate > endDate) throw new ValidationError('start date is after end date', 'date')
    if (daySpan(startDate, endDate) > MAX_RANGE_DAYS) {
      throw new ValidationError(`range is longer than ${MAX_RANGE_DAYS} days`, 'date')
    }
    const record = await this.loadOrDefault(userId)
    return datesInRange(startDate, endDate).map((d) => aggregateDay(record, d))
  }

  async updateProfile(userId: UserId, update: ProfileUpdate): Promise<UserProfile> {
    validateProfileUpdate(update)
    const record = await this.loadOrCreate(userId)
    const profile: UserProfile = { ...record.profile, macroTargets: { ...record.profile.macroTargets } }
    if (update.calorieGoal !== undefined) profile.calorieGoal = update.calorieGoal
    if (update.tzOffsetMinutes !== undefined) profile.tzOffsetMinutes = update.tzOffsetMinutes
    if (update.energyUnit !== undefined) profile.energyUnit = update.energyUnit
    if (update.weightKg !== undefined) profile.weightKg = update.weightKg
    if (update.heightCm !== undefined) profile.heightCm = update.heightCm
    if (update.age !== undefined) profile.age = update.age
    if (update.activityMinutes !== undefined) profile.activityMinutes = update.activityMinutes
    for (const m of ['protein', 'fat', 'carbs'] as const) {
      const grams = update.macroTargets?.[m]
      if (grams !== undefined) profile.macroTargets[m] = grams
    }
    record.profile = profile
    await this.store.save(record)
    return profile
  }

  async recordActivity(userId: UserId, activity: NewActivityEntry): Promise<ActivityEntry> {
    if (!activity.label.trim()) throw new ValidationError('workout type is empty', 'label')
    if (!Number.isFinite(activity.minutes) || activity.minutes <= 0) {
      throw new ValidationError('minutes must be more than zero', 'minutes')
    }
    checkNonNegative('burned calories', activity.burnedCalories)
    checkTimestamp(activity.timestamp)

    const record = await this.loadOrCreate(userId)
    const saved: ActivityEntry = {
      ...activity,
      label: activity.label.trim(),
      seq: record.nextSeq,
      userId,
      recordedAt: this.now().toISOString(),
    }
    record.activities.push(saved)
    record.nextSeq++
    await this.store.save(record)
    return saved
  }

  async recordWater(userId: UserId, water: NewWaterEntry): Promise<WaterEntry> {
    checkRange('water', water.ml, { min: 1, max: 5000, integer: true })
    checkTimestamp(water.timestamp)

    const record = await this.loadOrCreate(userId)
    const saved: WaterEntry = { ...water, seq: record.nextSeq, userId, recordedAt: this.now().toISOString() }
    record.water.push(saved)
    record.nextSeq++
    await this.store.save(record)
    return saved
  }

  /** Add or replace a food in the user's personal base. */
  async addCustomFood(userId: UserId, food: Omit<CatalogFood, 'key' | 'source'>): Promise<CatalogFood> {
    const key = normalizeFoodName(food.name)
    if (!key) throw new ValidationError('food name is empty', 'name')
    checkNonNegative('calories', food.calories)
    checkNonNegative('protein', food.protein)
    checkNonNegative('fat', food.fat)
    checkNonNegative('carbs', food.carbs)
    if (!Number.isFinite(food.quantity) || food.quantity <= 0) {
      throw new ValidationError('serving size must be more than zero', 'quantity')
    }

    const record = await this.loadOrCreate(userId)
    const saved: CatalogFood = { ...food, name: food.name.trim(), key, source: 'custom' }
    record.customFoods[key] = saved
    await this.store.save(record)
    return saved
  }

  async customFoods(userId: UserId): Promise<CatalogFood[]> {
    const record = await this.store.load(userId)
    return record ? Object.values(record.customFoods) : []
  }

  private async loadOrCreate(userId: UserId): Promise<UserRecord> {
    const existing = await this.store.load(userId)
    if (existing) return existing
    const record = this.newRecord(userId)
    await this.store.save(record)
    return record
  }

  /** Reads never create a record. */
  private async loadOrDefault(userId: UserId): Promise<UserRecord> {
    return (await this.store.load(userId)) ?? this.newRecord(userId)
  }

  private newRecord(userId: UserId): UserRecord {
    return {
      profile: {
        userId,
        calorieGoal: null,
        macroTargets: {},
        tzOffsetMinutes: this.defaultTzOffsetMinutes,
        energyUnit: 'kcal',
        createdAt: this.now().toISOString(),
      },
      entries: [],
      activities: [],
      water: [],
      customFoods: {},
      nextSeq: 1,
    }
  }

  private async notify(event: keyof LedgerListener, entry: FoodEntry, profile: UserProfile): Promise<void> {
    for (const l of this.listeners) {
      try {
        await l[event]?.(entry, profile)
      } catch (e) {
        // the ledger change is already committed; a listener cannot undo it
        console.error('[ledger] listener %s failed', event, e)
      }
    }
  }
}

function latestBySeq(entries: FoodEntry[]): FoodEntry | undefined {
  let last: FoodEntry | undefined
  for (const e of entries) {
    if (!last || e.seq > last.seq) last = e
  }
  return last
}

export function validateProfileUpdate(update: ProfileUpdate): void {
  if (update.calorieGoal != null) checkRange('calorie goal', update.calorieGoal, PROFILE_LIMITS.calorieGoal)
  if (update.tzOffsetMinutes !== undefined) checkRange('timezone offset', update.tzOffsetMinutes, PROFILE_LIMITS.tzOffsetMinutes)
  if (update.weightKg !== undefined) checkRange('weight', update.weightKg, PROFILE_LIMITS.weightKg)
  if (update.heightCm !== undefined) checkRange('height', update.heightCm, PROFILE_LIMITS.heightCm)
  if (update.age !== undefined) checkRange('age', update.age, PROFILE_LIMITS.age)
  if (update.activityMinutes !== undefined) {
    checkRange('daily activity', update.activityMinutes, PROFILE_LIMITS.activityMinutes)
  }
  if (update.energyUnit !== undefined && update.energyUnit !== 'kcal' && update.energyUnit !== 'kj') {
    throw new ValidationError('unit must be kcal or kj', 'energyUnit')
  }
  for (const [name, grams] of Object.entries(update.macroTargets ?? {})) {
    if (grams !== undefined) checkRange(`${name} target`, grams, PROFILE_LIMITS.macroTarget)
  }
}
