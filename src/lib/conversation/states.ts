import type { EntryId, Macros } from '../../types'

/** Partial food entry collected across several messages. Per-serving values. */
export interface FoodDraft {
  label: string
  catalogKey?: string
  /** base serving of a catalog/custom food, e.g. 100 g */
  baseQuantity?: number
  baseUnit?: string
  /** serving multiplier */
  quantity?: number
  /** what the user typed for the amount, for display */
  quantityText?: string
  caloriesPerServing?: number
  macrosPerServing?: Macros
}

export type ReadyDraft = FoodDraft & { quantity: number; caloriesPerServing: number }

export type ProfileField =
  | 'calorieGoal'
  | 'protein'
  | 'fat'
  | 'carbs'
  | 'timezone'
  | 'energyUnit'
  | 'weightKg'
  | 'heightCm'
  | 'age'
  | 'activityMinutes'

export type FlowState =
  | { kind: 'idle'; expired?: boolean }
  | { kind: 'collectingFoodName' }
  | { kind: 'collectingQuantity'; draft: FoodDraft }
  | { kind: 'collectingCalories'; draft: FoodDraft & { quantity: number } }
  | { kind: 'collectingMacros'; draft: ReadyDraft }
  | { kind: 'confirmingEntry'; draft: ReadyDraft }
  | { kind: 'editingProfileField'; field: ProfileField }
  | { kind: 'awaitingRangeQuery' }
  | { kind: 'confirmingUndo'; entryId: EntryId; label: string }
  | { kind: 'collectingWorkoutType' }
  | { kind: 'collectingWorkoutMinutes'; workoutType: string }

export interface SessionState {
  flow: FlowState
  /** ms since epoch of the last message that touched this session */
  lastActivityAt: number
}

export const IDLE: FlowState = { kind: 'idle' }

export function idleSession(now: number): SessionState {
  return { flow: IDLE, lastActivityAt: now }
}
