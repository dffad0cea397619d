import type {
  CatalogFood,
  FoodEntry,
  MacroTargets,
  NewActivityEntry,
  NewFoodEntry,
  NewWaterEntry,
  ProfileUpdate,
  UserProfile,
} from '../../types'
import { isPlausibleFood } from '../food/validate'
import { quantityMultiplier, unitsCompatible } from '../food/units'
import { classifyIntent } from '../intent/classify'
import { shiftDate } from '../ledger/aggregate'
import { suggestCalorieGoal, workoutBurnedCalories } from '../nutrition/calc'
import {
  isAffirmative,
  isCancel,
  isNegative,
  isSkip,
  parseAmount,
  parseCommand,
  parseDay,
  parseMacros,
  parseNonNegativeNumber,
  parseRange,
  parseTimezoneOffset,
  type Command,
} from './parse'
import * as R from './replies'
import { IDLE, type FlowState, type FoodDraft, type ProfileField, type ReadyDraft } from './states'

export interface InboundMessage {
  text: string
  /** UTC ISO instant */
  timestamp: string
}

/** Read-only facts the transition may consult. Loaded by the runner before each step. */
export interface TransitionContext {
  profile: UserProfile
  /** local date of the message under the profile's current offset */
  today: string
  lastEntry?: FoodEntry
  lookupFood(name: string): CatalogFood | null
}

export type LedgerOp =
  | { type: 'recordEntry'; entry: NewFoodEntry }
  | { type: 'undoLast' }
  | { type: 'dailyTotals'; date: string; title: string }
  | { type: 'rangeTotals'; start: string; end: string }
  | { type: 'updateProfile'; update: ProfileUpdate }
  | { type: 'recordActivity'; activity: NewActivityEntry }
  | { type: 'recordWater'; water: NewWaterEntry }
  | { type: 'addCustomFood'; food: Omit<CatalogFood, 'key' | 'source'> }

export interface Transition {
  flow: FlowState
  replies: string[]
  op?: LedgerOp
}

const ANSWER_YES_NO = 'Please answer yes or no.'
const MAX_WORKOUT_MINUTES = 1000

function stay(flow: FlowState, reply: string): Transition {
  return { flow, replies: [reply] }
}

function done(replies: string[], op?: LedgerOp): Transition {
  return { flow: IDLE, replies, op }
}

/**
 * One step of the conversation. Pure: the same state, message and context always give
 * the same transition. Cancellation is checked before anything else, then commands,
 * then the state's own handler.
 */
export function transition(flow: FlowState, msg: InboundMessage, ctx: TransitionContext): Transition {
  const text = msg.text.trim()

  if (flow.kind !== 'idle' && isCancel(text)) return done([R.CANCELLED_TEXT])

  const cmd = parseCommand(text)
  if (cmd) return onCommand(flow, cmd, msg, ctx)

  switch (flow.kind) {
    case 'idle':
      return onIdleText(flow, text, ctx)
    case 'collectingFoodName':
      if (!isPlausibleFood(text)) return stay(flow, `That doesn't look like a food name. ${R.ASK_FOOD_NAME}`)
      return startFoodFlow(text, ctx)
    case 'collectingQuantity':
      return onQuantity(flow, flow.draft, text, ctx)
    case 'collectingCalories': {
      const kcal = parseNonNegativeNumber(text)
      if (kcal == null) return stay(flow, 'Send the kcal as a number, e.g. 250.')
      const draft = { ...flow.draft, caloriesPerServing: kcal }
      return { flow: { kind: 'collectingMacros', draft }, replies: [R.askMacros(draft)] }
    }
    case 'collectingMacros': {
      if (isSkip(text)) return askConfirm(flow.draft, ctx)
      const macros = parseMacros(text)
      if (!macros) return stay(flow, 'Send three numbers: protein fat carbs in grams, e.g. 20 10 30, or "skip".')
      return askConfirm({ ...flow.draft, macrosPerServing: macros }, ctx)
    }
    case 'confirmingEntry':
      if (isAffirmative(text)) return done([], { type: 'recordEntry', entry: buildEntry(flow.draft, msg, ctx) })
      if (isNegative(text)) return done([R.CANCELLED_TEXT])
      return stay(flow, `${ANSWER_YES_NO} ${R.formatDraft(flow.draft, ctx.profile)}`)
    case 'editingProfileField': {
      const parsed = parseField(flow.field, text, ctx.profile)
      if ('error' in parsed) return stay(flow, parsed.error)
      return done([], { type: 'updateProfile', update: parsed.update })
    }
    case 'awaitingRangeQuery': {
      const range = parseRange(text, ctx.today)
      if (!range) return stay(flow, 'Send two dates like 2026-10-01 2026-10-07, or a number of days from 1 to 90.')
      return done([], { type: 'rangeTotals', ...range })
    }
    case 'confirmingUndo':
      if (isAffirmative(text)) {
        if (!ctx.lastEntry) return done([R.NOTHING_TO_UNDO])
        // something was logged since the question; removing it would hit the wrong entry
        if (ctx.lastEntry.id !== flow.entryId) return done([R.UNDO_TARGET_CHANGED])
        return done([], { type: 'undoLast' })
      }
      if (isNegative(text)) return done(['Okay, kept it.'])
      return stay(flow, `${ANSWER_YES_NO} Remove ${flow.label}?`)
    case 'collectingWorkoutType':
      if (text.length < 2 || parseNonNegativeNumber(text) != null) {
        return stay(flow, 'Send the workout type as text, e.g. run.')
      }
      return { flow: { kind: 'collectingWorkoutMinutes', workoutType: text }, replies: [R.ASK_WORKOUT_MINUTES] }
    case 'collectingWorkoutMinutes': {
      const minutes = parseNonNegativeNumber(text)
      if (minutes == null || minutes <= 0 || minutes > MAX_WORKOUT_MINUTES) {
        return stay(flow, `Send minutes as a number from 1 to ${MAX_WORKOUT_MINUTES}, e.g. 30.`)
      }
      return workoutDone(flow.workoutType, minutes, msg, ctx)
    }
    default: {
      const unreachable: never = flow
      return unreachable
    }
  }
}

function onIdleText(flow: Extract<FlowState, { kind: 'idle' }>, text: string, ctx: TransitionContext): Transition {
  const intent = classifyIntent(text)
  switch (intent) {
    case 'food_log': {
      const started = startFoodFlow(text, ctx)
      return flow.expired ? { ...started, replies: [R.EXPIRED_TEXT, ...started.replies] } : started
    }
    case 'greeting':
      return done([R.GREETING_TEXT])
    case 'query':
      return done([R.QUERY_HINT])
    case 'acknowledgement':
      // a late "yes" after a finished flow changes nothing
      return done(flow.expired ? [R.EXPIRED_TEXT] : [])
    case 'command':
    case 'other':
      return done([flow.expired ? R.EXPIRED_TEXT : R.IDLE_HINT])
  }
}

function startFoodFlow(name: string, ctx: TransitionContext): Transition {
  const label = name.trim()
  const food = ctx.lookupFood(label)
  const draft: FoodDraft = food
    ? {
        label: food.name,
        catalogKey: food.key,
        baseQuantity: food.quantity,
        baseUnit: food.unit,
        caloriesPerServing: food.calories,
        macrosPerServing: { protein: food.protein, fat: food.fat, carbs: food.carbs },
      }
    : { label }
  return { flow: { kind: 'collectingQuantity', draft }, replies: [R.askQuantity(draft)] }
}

function unitName(unit: string): string {
  return unit === 'n' ? 'pieces' : unit
}

function baseAmountText(servings: number, baseQuantity: number, baseUnit: string): string | undefined {
  if (baseUnit === 'n') return `${servings} pcs`
  if (baseUnit === 'serving') return undefined
  return `${servings * baseQuantity} ${baseUnit}`
}

function onQuantity(flow: FlowState, draft: FoodDraft, text: string, ctx: TransitionContext): Transition {
  const amount = parseAmount(text)
  if (!amount) return stay(flow, 'Send the amount as a number, e.g. 2, 0.5 or 150 g.')
  if (amount.amount <= 0) return stay(flow, 'The amount must be more than zero.')

  const typed = amount.unit && amount.unit !== 'n' && amount.unit !== 'serving' ? `${amount.amount} ${amount.unit}` : undefined

  const { baseQuantity, baseUnit, caloriesPerServing } = draft
  if (baseQuantity != null && baseUnit != null && caloriesPerServing != null) {
    if (amount.unit && !unitsCompatible(amount.unit, baseUnit)) {
      const example = baseUnit === 'n' ? '2' : `2, or ${baseQuantity} ${baseUnit}`
      return stay(flow, `${draft.label} is measured in ${unitName(baseUnit)}. Send e.g. ${example}.`)
    }
    // a bare number counts base servings
    const quantity = amount.unit
      ? quantityMultiplier(amount.amount, amount.unit, baseQuantity, baseUnit)
      : amount.amount
    const quantityText = typed ?? baseAmountText(amount.amount, baseQuantity, baseUnit)
    return askConfirm({ ...draft, quantity, quantityText, caloriesPerServing }, ctx)
  }

  // "150 g" of an unknown food: ask for the kcal in that amount, not per serving
  const next = typed
    ? { ...draft, baseQuantity: amount.amount, baseUnit: amount.unit, quantity: 1, quantityText: typed }
    : { ...draft, quantity: amount.amount }
  return { flow: { kind: 'collectingCalories', draft: next }, replies: [R.askCalories(next)] }
}

function askConfirm(draft: ReadyDraft, ctx: TransitionContext): Transition {
  return { flow: { kind: 'confirmingEntry', draft }, replies: [R.formatDraft(draft, ctx.profile), R.ASK_CONFIRM] }
}

function buildEntry(draft: ReadyDraft, msg: InboundMessage, ctx: TransitionContext): NewFoodEntry {
  const t = R.draftTotals(draft)
  return {
    timestamp: msg.timestamp,
    tzOffsetMinutes: ctx.profile.tzOffsetMinutes,
    label: draft.label,
    catalogKey: draft.catalogKey,
    quantity: draft.quantity,
    calories: t.calories,
    macros: { protein: t.protein, fat: t.fat, carbs: t.carbs },
  }
}

type FieldResult = { update: ProfileUpdate } | { error: string }

/** Reads one profile field. Range checks are left to the ledger. */
export function parseField(field: ProfileField, text: string, profile: UserProfile): FieldResult {
  const error = { error: R.FIELD_ERRORS[field] }
  switch (field) {
    case 'calorieGoal': {
      const n = parseNonNegativeNumber(text)
      if (n == null) return error
      if (n > 0) return { update: { calorieGoal: Math.round(n) } }
      const suggested = suggestCalorieGoal(profile)
      if (suggested == null) return { error: 'Set /weight, /height and /age first to get a suggested goal, or send a number.' }
      return { update: { calorieGoal: suggested } }
    }
    case 'protein':
    case 'fat':
    case 'carbs': {
      const n = parseNonNegativeNumber(text)
      if (n == null) return error
      const macroTargets: MacroTargets = {}
      macroTargets[field] = n
      return { update: { macroTargets } }
    }
    case 'timezone': {
      const offset = parseTimezoneOffset(text)
      return offset == null ? error : { update: { tzOffsetMinutes: offset } }
    }
    case 'energyUnit': {
      const unit = text.trim().toLowerCase()
      if (unit === 'kcal' || unit === 'cal' || unit === 'calories') return { update: { energyUnit: 'kcal' } }
      if (unit === 'kj' || unit === 'kilojoules') return { update: { energyUnit: 'kj' } }
      return error
    }
    case 'weightKg':
    case 'heightCm':
    case 'age': {
      const n = parseNonNegativeNumber(text.replace(/\s*(kg|cm|y|yrs|years)$/i, ''))
      if (n == null) return error
      if (field === 'weightKg') return { update: { weightKg: n } }
      if (field === 'heightCm') return { update: { heightCm: n } }
      return { update: { age: n } }
    }
    case 'activityMinutes': {
      const n = parseNonNegativeNumber(text.replace(/\s*(min|mins|minutes)$/i, ''))
      return n == null ? error : { update: { activityMinutes: n } }
    }
  }
}

function workoutDone(workoutType: string, minutes: number, msg: InboundMessage, ctx: TransitionContext): Transition {
  const weight = ctx.profile.weightKg
  if (weight == null) return done([NEED_WEIGHT])
  return done([], {
    type: 'recordActivity',
    activity: {
      timestamp: msg.timestamp,
      tzOffsetMinutes: ctx.profile.tzOffsetMinutes,
      label: workoutType,
      minutes,
      burnedCalories: workoutBurnedCalories(workoutType, minutes, weight),
    },
  })
}

const NEED_WEIGHT = 'Set your weight first so I can estimate the burn: /weight 70'

const FIELD_COMMANDS: Record<string, ProfileField> = {
  goal: 'calorieGoal',
  protein: 'protein',
  fat: 'fat',
  carbs: 'carbs',
  timezone: 'timezone',
  tz: 'timezone',
  units: 'energyUnit',
  weight: 'weightKg',
  height: 'heightCm',
  age: 'age',
  activity: 'activityMinutes',
}

/** "granola 450" or "granola bar 450 10 15 60": name, kcal, optional protein fat carbs. */
export function parseCustomFood(args: string): Omit<CatalogFood, 'key' | 'source'> | null {
  const tokens = args.trim().split(/\s+/).filter(Boolean)
  const numbers: number[] = []
  while (tokens.length > 1 && numbers.length < 4) {
    const n = parseNonNegativeNumber(tokens[tokens.length - 1])
    if (n == null) break
    numbers.unshift(n)
    tokens.pop()
  }
  const name = tokens.join(' ')
  if (!name || parseNonNegativeNumber(name) != null) return null
  if (numbers.length === 1) {
    return { name, unit: 'serving', quantity: 1, calories: numbers[0], protein: 0, fat: 0, carbs: 0 }
  }
  if (numbers.length === 4) {
    const [calories, protein, fat, carbs] = numbers
    return { name, unit: 'serving', quantity: 1, calories, protein, fat, carbs }
  }
  return null
}

function onCommand(flow: FlowState, cmd: Command, msg: InboundMessage, ctx: TransitionContext): Transition {
  const { name, args } = cmd
  const field = FIELD_COMMANDS[name]
  if (field) {
    if (!args) return { flow: { kind: 'editingProfileField', field }, replies: [R.askField(field, ctx.profile)] }
    const parsed = parseField(field, args, ctx.profile)
    if ('error' in parsed) return { flow: { kind: 'editingProfileField', field }, replies: [parsed.error] }
    return done([], { type: 'updateProfile', update: parsed.update })
  }

  switch (name) {
    case 'start':
      return done([R.WELCOME_TEXT])
    case 'help':
      return done([R.HELP_TEXT])
    case 'cancel':
      return done([R.NOTHING_TO_CANCEL])
    case 'log':
      if (!args) return { flow: { kind: 'collectingFoodName' }, replies: [R.ASK_FOOD_NAME] }
      if (!isPlausibleFood(args)) {
        return { flow: { kind: 'collectingFoodName' }, replies: [`That doesn't look like a food name. ${R.ASK_FOOD_NAME}`] }
      }
      return startFoodFlow(args, ctx)
    case 'today':
      return done([], { type: 'dailyTotals', date: ctx.today, title: `Today, ${ctx.today}` })
    case 'day': {
      const date = parseDay(args, ctx.today)
      if (!date) return done(['Send /day 2026-10-01 or /day yesterday.'])
      return done([], { type: 'dailyTotals', date, title: date })
    }
    case 'week':
      return done([], { type: 'rangeTotals', start: shiftDate(ctx.today, -6), end: ctx.today })
    case 'range': {
      if (!args) return { flow: { kind: 'awaitingRangeQuery' }, replies: [R.ASK_RANGE] }
      const range = parseRange(args, ctx.today)
      if (!range) return { flow: { kind: 'awaitingRangeQuery' }, replies: [R.ASK_RANGE] }
      return done([], { type: 'rangeTotals', ...range })
    }
    case 'undo': {
      const last = ctx.lastEntry
      if (!last) return done([R.NOTHING_TO_UNDO])
      return {
        flow: { kind: 'confirmingUndo', entryId: last.id, label: last.label },
        replies: [`Remove the last entry: ${R.formatEntry(last, ctx.profile)}? (yes / no)`],
      }
    }
    case 'profile':
      return done([R.formatProfile(ctx.profile)])
    case 'water': {
      const ml = parseNonNegativeNumber(args.replace(/\s*ml$/i, ''))
      if (ml == null || ml <= 0) return done(['Send the amount in ml, e.g. /water 250.'])
      return done([], {
        type: 'recordWater',
        water: { timestamp: msg.timestamp, tzOffsetMinutes: ctx.profile.tzOffsetMinutes, ml: Math.round(ml) },
      })
    }
    case 'workout': {
      if (ctx.profile.weightKg == null) return done([NEED_WEIGHT])
      if (!args) return { flow: { kind: 'collectingWorkoutType' }, replies: [R.ASK_WORKOUT_TYPE] }
      const m = /^(.*\D)\s+(\d+(?:[.,]\d+)?)\s*(?:min|mins|minutes|m)?$/i.exec(args)
      if (!m) return { flow: { kind: 'collectingWorkoutMinutes', workoutType: args }, replies: [R.ASK_WORKOUT_MINUTES] }
      const minutes = parseNonNegativeNumber(m[2])
      if (minutes == null || minutes <= 0 || minutes > MAX_WORKOUT_MINUTES) {
        return { flow: { kind: 'collectingWorkoutMinutes', workoutType: m[1].trim() }, replies: [R.ASK_WORKOUT_MINUTES] }
      }
      return workoutDone(m[1].trim(), minutes, msg, ctx)
    }
    case 'addfood': {
      const food = parseCustomFood(args)
      if (!food) return done(['Send /addfood <name> <kcal>, or /addfood <name> <kcal> <protein> <fat> <carbs>, per serving.'])
      return done([], { type: 'addCustomFood', food })
    }
    default:
      return { flow, replies: [R.UNKNOWN_COMMAND_TEXT] }
  }
}
