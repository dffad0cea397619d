import { NotFoundError, StorageError, ValidationError } from '../errors'
import { matchFood } from '../food/match'
import { localDateOf } from '../ledger/aggregate'
import type { NutritionLedger } from '../ledger/ledger'
import { formatEnergy, workoutExtraWaterMl } from '../nutrition/calc'
import type { SessionStore } from '../session/store'
import type { CatalogFood, UserId, UserProfile } from '../../types'
import { transition, type LedgerOp } from './engine'
import * as R from './replies'
import { IDLE, type FlowState } from './states'

export interface ConversationDeps {
  ledger: NutritionLedger
  sessions: SessionStore
  /** shared reference foods; personal foods are looked up first */
  catalog: CatalogFood[]
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1)
}

/**
 * Drives one user's conversation: loads what the transition needs, applies its ledger
 * operation, and only then commits the new session state. Callers serialize per user
 * (see KeyedQueue); the dispatcher does.
 */
export class ConversationEngine {
  constructor(private readonly deps: ConversationDeps) {}

  /** Replies to send, in order. Empty when the message needs no answer. */
  async handle(userId: UserId, text: string, timestamp: Date): Promise<string[]> {
    const { ledger, sessions } = this.deps
    const now = timestamp.getTime()
    const session = sessions.get(userId, now)
    const previous = session.flow

    try {
      const profile = await ledger.getProfile(userId)
      const customFoods = await ledger.customFoods(userId)
      const lastEntry = await ledger.lastEntry(userId)
      const iso = timestamp.toISOString()
      const next = transition(
        previous,
        { text, timestamp: iso },
        {
          profile,
          today: localDateOf(iso, profile.tzOffsetMinutes),
          lastEntry,
          lookupFood: (name) => matchFood(name, customFoods, this.deps.catalog),
        }
      )

      const opReplies = next.op ? await this.apply(userId, next.op, profile) : []
      this.commit(userId, next.flow, now)
      return [...next.replies, ...opReplies]
    } catch (e) {
      if (e instanceof ValidationError) {
        this.commit(userId, previous, now)
        return [`⚠️ ${capitalize(e.message)}.`]
      }
      if (e instanceof NotFoundError) {
        this.commit(userId, IDLE, now)
        return [R.NOTHING_TO_UNDO]
      }
      sessions.clear(userId)
      if (e instanceof StorageError) {
        console.error('[conversation] user %s: storage failed', userId, e)
        return [R.STORAGE_FAILURE_TEXT]
      }
      throw e
    }
  }

  private commit(userId: UserId, flow: FlowState, now: number): void {
    // an expired marker is shown once
    const next: FlowState = flow.kind === 'idle' ? IDLE : flow
    this.deps.sessions.put(userId, { flow: next, lastActivityAt: now })
  }

  private async apply(userId: UserId, op: LedgerOp, profile: UserProfile): Promise<string[]> {
    const { ledger } = this.deps
    const unit = profile.energyUnit
    switch (op.type) {
      case 'recordEntry': {
        await ledger.recordEntry(userId, op.entry)
        const day = await ledger.dailyTotals(userId, localDateOf(op.entry.timestamp, op.entry.tzOffsetMinutes))
        const goal = day.goal != null ? ` of ${formatEnergy(day.goal, unit)}` : ''
        console.log('[conversation] user %s: logged %s', userId, op.entry.label)
        return [`✅ Logged ${op.entry.label} (${formatEnergy(op.entry.calories, unit)}). Today: ${formatEnergy(day.calories, unit)}${goal}.`]
      }
      case 'undoLast': {
        const removed = await ledger.undoLast(userId)
        console.log('[conversation] user %s: removed %s', userId, removed.id)
        return [`↩️ Removed ${R.formatEntry(removed, profile)}.`]
      }
      case 'dailyTotals':
        return [R.formatDailySummary(await ledger.dailyTotals(userId, op.date), profile, op.title)]
      case 'rangeTotals':
        return [R.formatRange(await ledger.rangeTotals(userId, op.start, op.end), profile)]
      case 'updateProfile': {
        const updated = await ledger.updateProfile(userId, op.update)
        return [`✅ Saved.\n${R.formatProfile(updated)}`]
      }
      case 'recordActivity': {
        const a = await ledger.recordActivity(userId, op.activity)
        const extraWater = workoutExtraWaterMl(a.minutes)
        const water = extraWater > 0 ? ` Water goal +${extraWater} ml today.` : ''
        return [`🏃 Logged ${a.label}, ${a.minutes} min: about ${formatEnergy(a.burnedCalories, unit)} burned.${water}`]
      }
      case 'recordWater': {
        await ledger.recordWater(userId, op.water)
        const day = await ledger.dailyTotals(userId, localDateOf(op.water.timestamp, op.water.tzOffsetMinutes))
        const goal = day.waterGoalMl != null ? ` of ${day.waterGoalMl}` : ''
        return [`💧 Logged ${op.water.ml} ml. Today: ${day.waterMl}${goal} ml.`]
      }
      case 'addCustomFood': {
        const food = await ledger.addCustomFood(userId, op.food)
        return [`✅ Saved ${food.name}: ${formatEnergy(food.calories, unit)} per serving. Log it by sending "${food.name}".`]
      }
    }
  }
}
